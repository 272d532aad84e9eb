import { spawn, type ChildProcessWithoutNullStreams } from 'node:child_process';
import { extname } from 'node:path';
import type { BridgeLog } from '../log/event-log.ts';
import type { Envelope } from '../protocol/envelope.ts';
import { decodeLine, LineBuffer } from '../protocol/line-codec.ts';
import {
  BrokenPipeError,
  formatErrorMessage,
  readErrorCode,
  SpawnFailedError,
} from '../runtime/bridge-errors.ts';
import { StderrTail } from './stderr-tail.ts';

export type ExitOutcome =
  | {
      readonly kind: 'exited';
      readonly code: 0;
    }
  | {
      readonly kind: 'crashed';
      readonly code: number | null;
      readonly signal: NodeJS.Signals | null;
    }
  | {
      readonly kind: 'killed';
      readonly signal: NodeJS.Signals | null;
    };

export interface ScriptProcessHandlers {
  readonly onEnvelope: (envelope: Envelope) => void;
  readonly onExit: (outcome: ExitOutcome) => void;
}

/** What a session needs from its process; tests substitute an in-memory implementation. */
export interface ScriptProcessLike {
  readonly pid: number | null;
  attach(handlers: ScriptProcessHandlers): void;
  writeLine(text: string): void;
  terminate(): void;
  waitExit(): Promise<ExitOutcome>;
  hasExited(): boolean;
  stderrTail(): readonly string[];
}

export interface ScriptCommand {
  readonly command: string;
  readonly args: readonly string[];
}

export interface SpawnScriptOptions {
  readonly sessionId: string;
  readonly scriptPath: string;
  readonly args?: readonly string[];
  readonly cwd?: string;
  readonly env?: NodeJS.ProcessEnv;
  readonly runtimes?: Readonly<Record<string, readonly string[]>>;
  readonly log: BridgeLog;
  readonly maxLineLength?: number;
  readonly stderrTailLines?: number;
  readonly terminateGraceMs?: number;
  readonly stdioDrainMs?: number;
}

export type SpawnResult =
  | {
      readonly ok: true;
      readonly process: ScriptProcess;
    }
  | {
      readonly ok: false;
      readonly error: SpawnFailedError;
    };

interface RawExit {
  readonly code: number | null;
  readonly signal: NodeJS.Signals | null;
}

const DEFAULT_STDERR_TAIL_LINES = 50;
const DEFAULT_TERMINATE_GRACE_MS = 2000;
const DEFAULT_STDIO_DRAIN_MS = 250;
const SESSION_ENV_KEY = 'SCRIPT_BRIDGE_SESSION_ID';

export function resolveScriptCommand(
  scriptPath: string,
  runtimes: Readonly<Record<string, readonly string[]>> = {},
  args: readonly string[] = [],
): ScriptCommand {
  const prefix = runtimes[extname(scriptPath).toLowerCase()] ?? [];
  const [command, ...prefixArgs] = prefix;
  if (command === undefined) {
    return {
      command: scriptPath,
      args: [...args],
    };
  }
  return {
    command,
    args: [...prefixArgs, scriptPath, ...args],
  };
}

export function buildScriptEnv(
  allowlist: readonly string[],
  baseEnv: NodeJS.ProcessEnv,
  sessionId: string,
  extra: Readonly<Record<string, string>> = {},
): NodeJS.ProcessEnv {
  const env: NodeJS.ProcessEnv = {};
  for (const key of allowlist) {
    const value = baseEnv[key];
    if (value !== undefined) {
      env[key] = value;
    }
  }
  return {
    ...env,
    ...extra,
    [SESSION_ENV_KEY]: sessionId,
  };
}

function classifyExit(exit: RawExit, terminateRequested: boolean): ExitOutcome {
  if (terminateRequested) {
    return { kind: 'killed', signal: exit.signal };
  }
  if (exit.code === 0) {
    return { kind: 'exited', code: 0 };
  }
  return { kind: 'crashed', code: exit.code, signal: exit.signal };
}

/**
 * One script child process. The child leads its own process group so that terminating the
 * session reaches everything it forked. stdout is read as protocol lines; stderr is kept as a
 * bounded tail for crash reports.
 */
export class ScriptProcess implements ScriptProcessLike {
  readonly pid: number | null;
  private readonly child: ChildProcessWithoutNullStreams;
  private readonly sessionId: string;
  private readonly log: BridgeLog;
  private readonly lineBuffer: LineBuffer;
  private readonly tail: StderrTail;
  private readonly terminateGraceMs: number;
  private readonly stdioDrainMs: number;
  private readonly exitWaiters: Array<(outcome: ExitOutcome) => void> = [];
  private handlers: ScriptProcessHandlers | null = null;
  private rawExit: RawExit | null = null;
  private outcome: ExitOutcome | null = null;
  private stdoutClosed = false;
  private stdinClosed = false;
  private stdinBackedUp = false;
  private terminateRequested = false;
  private killTimer: NodeJS.Timeout | null = null;
  private drainTimer: NodeJS.Timeout | null = null;

  constructor(child: ChildProcessWithoutNullStreams, options: SpawnScriptOptions) {
    this.child = child;
    this.pid = typeof child.pid === 'number' ? child.pid : null;
    this.sessionId = options.sessionId;
    this.log = options.log;
    this.lineBuffer = new LineBuffer(options.maxLineLength);
    this.tail = new StderrTail(options.stderrTailLines ?? DEFAULT_STDERR_TAIL_LINES);
    this.terminateGraceMs = options.terminateGraceMs ?? DEFAULT_TERMINATE_GRACE_MS;
    this.stdioDrainMs = options.stdioDrainMs ?? DEFAULT_STDIO_DRAIN_MS;

    child.stdout.setEncoding('utf8');
    child.stderr.setEncoding('utf8');

    child.stderr.on('data', (chunk: string) => {
      for (const line of this.tail.push(chunk)) {
        this.log.debug('script.stderr', { session: this.sessionId, line });
      }
    });

    child.stdin.on('error', (error: Error) => {
      this.stdinClosed = true;
      this.log.debug('process.stdin-error', {
        session: this.sessionId,
        code: readErrorCode(error),
        message: error.message,
      });
    });

    child.stdin.on('drain', () => {
      if (this.stdinBackedUp) {
        this.stdinBackedUp = false;
        this.log.debug('process.stdin-drained', { session: this.sessionId });
      }
    });

    child.stdout.on('close', () => {
      this.stdoutClosed = true;
      this.finalizeIfDrained();
    });

    child.on('error', (error: Error) => {
      this.log.warn('process.error', {
        session: this.sessionId,
        message: formatErrorMessage(error, false),
      });
    });

    child.on('exit', (code: number | null, signal: NodeJS.Signals | null) => {
      this.rawExit = { code, signal };
      this.stdinClosed = true;
      if (this.stdoutClosed) {
        this.finalizeIfDrained();
        return;
      }
      this.drainTimer = setTimeout(() => {
        this.drainTimer = null;
        this.finalize();
      }, this.stdioDrainMs);
    });
  }

  /**
   * Starts the read loop. stdout stays paused until a handler is attached, and an exit that
   * already happened is replayed to the late handler.
   */
  attach(handlers: ScriptProcessHandlers): void {
    if (this.handlers !== null) {
      throw new Error(`script process for ${this.sessionId} already has handlers`);
    }
    this.handlers = handlers;
    this.child.stdout.on('data', (chunk: string) => {
      this.consumeStdout(chunk);
    });
    if (this.outcome !== null) {
      handlers.onExit(this.outcome);
    }
  }

  writeLine(text: string): void {
    if (text.includes('\n')) {
      throw new Error('protocol line must not contain a raw newline');
    }
    if (this.rawExit !== null || this.stdinClosed || !this.child.stdin.writable) {
      throw new BrokenPipeError(`session ${this.sessionId} has exited`);
    }
    // stdin buffers without bound past the high-water mark; warn once per stall.
    if (!this.child.stdin.write(`${text}\n`) && !this.stdinBackedUp) {
      this.stdinBackedUp = true;
      this.log.warn('process.stdin-backpressure', {
        session: this.sessionId,
        'buffered-bytes': this.child.stdin.writableLength,
      });
    }
  }

  terminate(): void {
    if (this.rawExit !== null || this.terminateRequested) {
      return;
    }
    this.terminateRequested = true;
    this.log.info('process.terminate', { session: this.sessionId, pid: this.pid });
    if (this.terminateGraceMs === 0) {
      this.signalGroup('SIGKILL');
      return;
    }
    this.signalGroup('SIGTERM');
    this.killTimer = setTimeout(() => {
      this.killTimer = null;
      if (this.rawExit === null) {
        this.signalGroup('SIGKILL');
      }
    }, this.terminateGraceMs);
    this.killTimer.unref();
  }

  waitExit(): Promise<ExitOutcome> {
    if (this.outcome !== null) {
      return Promise.resolve(this.outcome);
    }
    return new Promise<ExitOutcome>((resolve) => {
      this.exitWaiters.push(resolve);
    });
  }

  hasExited(): boolean {
    return this.rawExit !== null;
  }

  stderrTail(): readonly string[] {
    return this.tail.snapshot();
  }

  private consumeStdout(chunk: string): void {
    const consumed = this.lineBuffer.push(chunk);
    if (consumed.overflowed > 0) {
      this.log.warn('protocol.malformed-line', {
        session: this.sessionId,
        reason: 'line-too-long',
        count: consumed.overflowed,
      });
    }
    for (const line of consumed.lines) {
      this.deliverLine(line);
    }
  }

  private deliverLine(line: string): void {
    const decoded = decodeLine(line);
    if (!decoded.ok) {
      this.log.warn('protocol.malformed-line', {
        session: this.sessionId,
        reason: decoded.malformed.reason,
        detail: decoded.malformed.detail,
        line: decoded.malformed.line,
      });
      return;
    }
    this.handlers?.onEnvelope(decoded.envelope);
  }

  private signalGroup(signal: NodeJS.Signals): void {
    if (this.pid === null) {
      return;
    }
    try {
      if (process.platform === 'win32') {
        this.child.kill(signal);
      } else {
        process.kill(-this.pid, signal);
      }
    } catch (error: unknown) {
      if (readErrorCode(error) === 'ESRCH') {
        return;
      }
      this.log.warn('process.signal-failed', {
        session: this.sessionId,
        signal,
        message: formatErrorMessage(error, false),
      });
    }
  }

  private finalizeIfDrained(): void {
    if (this.rawExit === null || !this.stdoutClosed) {
      return;
    }
    this.finalize();
  }

  private finalize(): void {
    if (this.outcome !== null || this.rawExit === null) {
      return;
    }
    if (this.drainTimer !== null) {
      clearTimeout(this.drainTimer);
      this.drainTimer = null;
    }
    if (this.killTimer !== null) {
      clearTimeout(this.killTimer);
      this.killTimer = null;
    }
    if (this.handlers !== null) {
      const rest = this.lineBuffer.flush();
      if (rest !== null) {
        this.deliverLine(rest);
      }
    }
    // Anything the script left running in its group goes with it.
    this.signalGroup('SIGKILL');

    const outcome = classifyExit(this.rawExit, this.terminateRequested);
    this.outcome = outcome;
    this.log.event(outcome.kind === 'crashed' ? 'warn' : 'info', 'process.exit', {
      session: this.sessionId,
      pid: this.pid,
      outcome: outcome.kind,
      code: outcome.kind === 'killed' ? null : outcome.code,
      signal: outcome.kind === 'exited' ? null : outcome.signal,
    });
    for (const resolve of this.exitWaiters.splice(0)) {
      resolve(outcome);
    }
    this.handlers?.onExit(outcome);
  }
}

export function spawnScriptProcess(options: SpawnScriptOptions): Promise<SpawnResult> {
  const command = resolveScriptCommand(options.scriptPath, options.runtimes, options.args);
  const reportFailure = (cause: unknown): SpawnResult => {
    const error = new SpawnFailedError(options.scriptPath, cause);
    options.log.error('process.spawn-failed', {
      session: options.sessionId,
      script: options.scriptPath,
      message: error.message,
    });
    return { ok: false, error };
  };

  return new Promise<SpawnResult>((resolve) => {
    let child: ChildProcessWithoutNullStreams;
    try {
      child = spawn(command.command, [...command.args], {
        cwd: options.cwd,
        env: options.env ?? process.env,
        stdio: ['pipe', 'pipe', 'pipe'],
        detached: process.platform !== 'win32',
      });
    } catch (error: unknown) {
      resolve(reportFailure(error));
      return;
    }

    const onError = (error: Error): void => {
      child.off('spawn', onSpawn);
      resolve(reportFailure(error));
    };
    const onSpawn = (): void => {
      child.off('error', onError);
      options.log.info('process.spawned', {
        session: options.sessionId,
        script: options.scriptPath,
        pid: typeof child.pid === 'number' ? child.pid : null,
      });
      resolve({ ok: true, process: new ScriptProcess(child, options) });
    };
    child.once('error', onError);
    child.once('spawn', onSpawn);
  });
}
