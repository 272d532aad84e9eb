export const WINDOW_KINDS = ['main', 'notes', 'ai'] as const;

export type WindowKind = (typeof WINDOW_KINDS)[number];

export type HotkeySignal =
  | {
      readonly kind: 'main-toggle';
    }
  | {
      readonly kind: 'window';
      readonly window: WindowKind;
    }
  | {
      readonly kind: 'script-shortcut';
      readonly shortcutId: string;
      readonly scriptPath: string;
    };

export interface HotkeyBinding {
  readonly combo: string;
  readonly signal: HotkeySignal;
}

export function isWindowKind(value: unknown): value is WindowKind {
  return WINDOW_KINDS.some((kind) => kind === value);
}

export function describeHotkeySignal(signal: HotkeySignal): string {
  if (signal.kind === 'main-toggle') {
    return 'main-toggle';
  }
  if (signal.kind === 'window') {
    return `window:${signal.window}`;
  }
  return `script:${signal.shortcutId}`;
}
