export interface KeyStroke {
  readonly key: string;
  readonly ctrl: boolean;
  readonly alt: boolean;
  readonly shift: boolean;
  readonly meta: boolean;
}

const KEY_TOKEN_ALIASES = new Map<string, string>([
  ['cmd', 'meta'],
  ['command', 'meta'],
  ['meta', 'meta'],
  ['super', 'meta'],
  ['win', 'meta'],
  ['ctrl', 'ctrl'],
  ['control', 'ctrl'],
  ['alt', 'alt'],
  ['option', 'alt'],
  ['opt', 'alt'],
  ['shift', 'shift'],
  ['esc', 'escape'],
  ['return', 'enter'],
  ['spacebar', 'space'],
]);

const NAMED_KEYS = new Set([
  'enter',
  'tab',
  'escape',
  'space',
  'backspace',
  'delete',
  'up',
  'down',
  'left',
  'right',
  'home',
  'end',
  'pageup',
  'pagedown',
]);

const FUNCTION_KEY_PATTERN = /^f([1-9]|1[0-9]|2[0-4])$/;

function normalizeKeyToken(raw: string): string | null {
  const key = raw.trim().toLowerCase();
  if (key.length === 0) {
    return null;
  }
  return KEY_TOKEN_ALIASES.get(key) ?? key;
}

function isValidKey(key: string): boolean {
  return key.length === 1 || NAMED_KEYS.has(key) || FUNCTION_KEY_PATTERN.test(key);
}

/**
 * Parses `cmd+shift+k` style combos. Modifiers come first in any order, the key last.
 * Returns null for anything that is not exactly one valid key with known modifiers.
 */
export function parseHotkeyCombo(input: string): KeyStroke | null {
  const trimmed = input.trim().toLowerCase();
  if (trimmed.length === 0) {
    return null;
  }

  const tokens = trimmed
    .split('+')
    .map((part) => normalizeKeyToken(part))
    .flatMap((token) => (token === null ? [] : [token]));
  const key = tokens.pop();
  if (key === undefined || !isValidKey(key)) {
    return null;
  }

  const modifiers = {
    ctrl: false,
    alt: false,
    shift: false,
    meta: false,
  };
  for (const token of tokens) {
    if (token === 'ctrl') {
      modifiers.ctrl = true;
      continue;
    }
    if (token === 'alt') {
      modifiers.alt = true;
      continue;
    }
    if (token === 'shift') {
      modifiers.shift = true;
      continue;
    }
    if (token === 'meta') {
      modifiers.meta = true;
      continue;
    }
    return null;
  }

  return {
    key,
    ...modifiers,
  };
}

// Canonical text; two combos that parse to the same stroke format identically.
export function formatKeyStroke(stroke: KeyStroke): string {
  const parts: string[] = [];
  if (stroke.ctrl) {
    parts.push('ctrl');
  }
  if (stroke.alt) {
    parts.push('alt');
  }
  if (stroke.shift) {
    parts.push('shift');
  }
  if (stroke.meta) {
    parts.push('meta');
  }
  parts.push(stroke.key);
  return parts.join('+');
}
