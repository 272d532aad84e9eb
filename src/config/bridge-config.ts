import { isLogLevel, type LogLevel } from '../log/event-log.ts';
import { isWindowKind, type HotkeyBinding, type HotkeySignal } from '../hotkey/hotkey-signal.ts';

interface BridgeLogConfig {
  readonly filePath: string | null;
  readonly stderrLevel: LogLevel | 'off';
}

interface BridgeProtocolConfig {
  readonly maxLineLength: number;
}

interface BridgeSessionConfig {
  readonly stderrTailLines: number;
  readonly terminateGraceMs: number;
  readonly exitRequestGraceMs: number;
  readonly stdioDrainMs: number;
  readonly promptTimeoutMs: number | null;
  readonly envAllowlist: readonly string[];
}

interface BridgeHotkeyConfig {
  readonly pollIntervalMs: number;
  readonly channelCapacity: number;
  readonly bindings: readonly HotkeyBinding[];
}

export interface BridgeConfig {
  readonly log: BridgeLogConfig;
  readonly protocol: BridgeProtocolConfig;
  readonly session: BridgeSessionConfig;
  readonly hotkeys: BridgeHotkeyConfig;
  readonly runtimes: Readonly<Record<string, readonly string[]>>;
}

const DEFAULT_ENV_ALLOWLIST = [
  'PATH',
  'HOME',
  'USER',
  'LOGNAME',
  'SHELL',
  'LANG',
  'LC_ALL',
  'TMPDIR',
  'TERM',
] as const;

export const DEFAULT_BRIDGE_CONFIG: BridgeConfig = {
  log: {
    filePath: null,
    stderrLevel: 'warn',
  },
  protocol: {
    maxLineLength: 16 * 1024 * 1024,
  },
  session: {
    stderrTailLines: 50,
    terminateGraceMs: 2000,
    exitRequestGraceMs: 1000,
    stdioDrainMs: 250,
    promptTimeoutMs: null,
    envAllowlist: DEFAULT_ENV_ALLOWLIST,
  },
  hotkeys: {
    pollIntervalMs: 25,
    channelCapacity: 64,
    bindings: [
      { combo: 'cmd+;', signal: { kind: 'main-toggle' } },
      { combo: 'cmd+shift+n', signal: { kind: 'window', window: 'notes' } },
      { combo: 'cmd+shift+space', signal: { kind: 'window', window: 'ai' } },
    ],
  },
  runtimes: {
    '.ts': ['bun', 'run'],
    '.js': ['node'],
    '.mjs': ['node'],
  },
};

function asRecord(value: unknown): Record<string, unknown> | null {
  if (typeof value !== 'object' || value === null || Array.isArray(value)) {
    return null;
  }
  return value as Record<string, unknown>;
}

function normalizeIntInRange(value: unknown, fallback: number, min: number, max: number): number {
  if (typeof value !== 'number' || !Number.isFinite(value)) {
    return fallback;
  }
  const parsed = Math.floor(value);
  if (parsed < min || parsed > max) {
    return fallback;
  }
  return parsed;
}

function normalizeOptionalTimeout(value: unknown, fallback: number | null): number | null {
  if (value === null) {
    return null;
  }
  if (typeof value !== 'number' || !Number.isFinite(value) || value <= 0) {
    return fallback;
  }
  return Math.floor(value);
}

function normalizeStringList(value: unknown, fallback: readonly string[]): readonly string[] {
  if (!Array.isArray(value)) {
    return fallback;
  }
  const items: string[] = [];
  for (const entry of value) {
    if (typeof entry !== 'string') {
      continue;
    }
    const trimmed = entry.trim();
    if (trimmed.length > 0 && !items.includes(trimmed)) {
      items.push(trimmed);
    }
  }
  return items;
}

function normalizeFilePath(value: unknown, fallback: string | null): string | null {
  if (value === null) {
    return null;
  }
  if (typeof value !== 'string') {
    return fallback;
  }
  const trimmed = value.trim();
  return trimmed.length === 0 ? null : trimmed;
}

function normalizeStderrLevel(value: unknown, fallback: LogLevel | 'off'): LogLevel | 'off' {
  if (value === 'off' || isLogLevel(value)) {
    return value;
  }
  return fallback;
}

function normalizeLogConfig(input: unknown): BridgeLogConfig {
  const record = asRecord(input);
  const defaults = DEFAULT_BRIDGE_CONFIG.log;
  if (record === null) {
    return defaults;
  }
  return {
    filePath: normalizeFilePath(record['filePath'], defaults.filePath),
    stderrLevel: normalizeStderrLevel(record['stderrLevel'], defaults.stderrLevel),
  };
}

function normalizeProtocolConfig(input: unknown): BridgeProtocolConfig {
  const record = asRecord(input);
  const defaults = DEFAULT_BRIDGE_CONFIG.protocol;
  if (record === null) {
    return defaults;
  }
  return {
    maxLineLength: normalizeIntInRange(
      record['maxLineLength'],
      defaults.maxLineLength,
      1024,
      256 * 1024 * 1024,
    ),
  };
}

function normalizeSessionConfig(input: unknown): BridgeSessionConfig {
  const record = asRecord(input);
  const defaults = DEFAULT_BRIDGE_CONFIG.session;
  if (record === null) {
    return defaults;
  }
  return {
    stderrTailLines: normalizeIntInRange(record['stderrTailLines'], defaults.stderrTailLines, 1, 10_000),
    terminateGraceMs: normalizeIntInRange(
      record['terminateGraceMs'],
      defaults.terminateGraceMs,
      0,
      60_000,
    ),
    exitRequestGraceMs: normalizeIntInRange(
      record['exitRequestGraceMs'],
      defaults.exitRequestGraceMs,
      0,
      60_000,
    ),
    stdioDrainMs: normalizeIntInRange(record['stdioDrainMs'], defaults.stdioDrainMs, 0, 10_000),
    promptTimeoutMs: normalizeOptionalTimeout(record['promptTimeoutMs'], defaults.promptTimeoutMs),
    envAllowlist: normalizeStringList(record['envAllowlist'], defaults.envAllowlist),
  };
}

function normalizeHotkeySignal(input: unknown): HotkeySignal | null {
  const record = asRecord(input);
  if (record === null) {
    return null;
  }
  const kind = record['kind'];
  if (kind === 'main-toggle') {
    return { kind };
  }
  if (kind === 'window') {
    const window = record['window'];
    return isWindowKind(window) ? { kind, window } : null;
  }
  if (kind === 'script-shortcut') {
    const shortcutId = record['shortcutId'];
    const scriptPath = record['scriptPath'];
    if (
      typeof shortcutId !== 'string' ||
      shortcutId.length === 0 ||
      typeof scriptPath !== 'string' ||
      scriptPath.length === 0
    ) {
      return null;
    }
    return { kind, shortcutId, scriptPath };
  }
  return null;
}

function normalizeHotkeyBindings(
  input: unknown,
  fallback: readonly HotkeyBinding[],
): readonly HotkeyBinding[] {
  if (!Array.isArray(input)) {
    return fallback;
  }
  const bindings: HotkeyBinding[] = [];
  for (const entry of input) {
    const record = asRecord(entry);
    if (record === null) {
      continue;
    }
    const combo = record['combo'];
    const signal = normalizeHotkeySignal(record['signal']);
    if (typeof combo !== 'string' || combo.trim().length === 0 || signal === null) {
      continue;
    }
    bindings.push({ combo: combo.trim(), signal });
  }
  return bindings;
}

function normalizeHotkeyConfig(input: unknown): BridgeHotkeyConfig {
  const record = asRecord(input);
  const defaults = DEFAULT_BRIDGE_CONFIG.hotkeys;
  if (record === null) {
    return defaults;
  }
  return {
    pollIntervalMs: normalizeIntInRange(record['pollIntervalMs'], defaults.pollIntervalMs, 1, 1000),
    channelCapacity: normalizeIntInRange(
      record['channelCapacity'],
      defaults.channelCapacity,
      1,
      65_536,
    ),
    bindings: normalizeHotkeyBindings(record['bindings'], defaults.bindings),
  };
}

function normalizeRuntimes(input: unknown): Readonly<Record<string, readonly string[]>> {
  const record = asRecord(input);
  if (record === null) {
    return DEFAULT_BRIDGE_CONFIG.runtimes;
  }
  const runtimes: Record<string, readonly string[]> = { ...DEFAULT_BRIDGE_CONFIG.runtimes };
  for (const [extension, command] of Object.entries(record)) {
    if (!extension.startsWith('.')) {
      continue;
    }
    const parts = normalizeStringList(command, []);
    if (parts.length === 0) {
      delete runtimes[extension];
      continue;
    }
    runtimes[extension] = parts;
  }
  return runtimes;
}

function applyEnvOverrides(config: BridgeConfig, env: NodeJS.ProcessEnv): BridgeConfig {
  const logFile = env['SCRIPT_BRIDGE_LOG_FILE'];
  const logLevel = env['SCRIPT_BRIDGE_LOG_LEVEL'];
  const pollMs = env['SCRIPT_BRIDGE_HOTKEY_POLL_MS'];
  const parsedPollMs = pollMs === undefined ? Number.NaN : Number.parseInt(pollMs, 10);
  return {
    ...config,
    log: {
      filePath: logFile === undefined ? config.log.filePath : normalizeFilePath(logFile, null),
      stderrLevel: normalizeStderrLevel(logLevel, config.log.stderrLevel),
    },
    hotkeys: {
      ...config.hotkeys,
      pollIntervalMs: normalizeIntInRange(parsedPollMs, config.hotkeys.pollIntervalMs, 1, 1000),
    },
  };
}

export function resolveBridgeConfig(input: unknown, env: NodeJS.ProcessEnv = {}): BridgeConfig {
  const record = asRecord(input) ?? {};
  const normalized: BridgeConfig = {
    log: normalizeLogConfig(record['log']),
    protocol: normalizeProtocolConfig(record['protocol']),
    session: normalizeSessionConfig(record['session']),
    hotkeys: normalizeHotkeyConfig(record['hotkeys']),
    runtimes: normalizeRuntimes(record['runtimes']),
  };
  return applyEnvOverrides(normalized, env);
}
