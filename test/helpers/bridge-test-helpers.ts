import { createSilentLog, type BridgeLog, type LogRecord } from '../../src/log/event-log.ts';
import type { WindowKind } from '../../src/hotkey/hotkey-signal.ts';
import { decodeLine } from '../../src/protocol/line-codec.ts';
import type {
  ExitOutcome,
  ScriptProcessHandlers,
  ScriptProcessLike,
} from '../../src/process/script-process.ts';
import { BrokenPipeError } from '../../src/runtime/bridge-errors.ts';
import type { WindowController, WindowHandle } from '../../src/runtime/window-registry.ts';

export function waitForCondition(
  predicate: () => boolean,
  description: string,
  timeoutMs = 3000,
): Promise<void> {
  const startedAt = Date.now();
  return new Promise((resolve, reject) => {
    const tick = (): void => {
      if (predicate()) {
        resolve();
        return;
      }

      if (Date.now() - startedAt > timeoutMs) {
        reject(new Error(`timed out waiting for ${description}`));
        return;
      }

      setTimeout(tick, 5);
    };

    tick();
  });
}

export function createRecordingLog(): { log: BridgeLog; records: LogRecord[]; names: () => string[] } {
  const records: LogRecord[] = [];
  const log = createSilentLog((record) => {
    records.push(record);
  });
  return {
    log,
    records,
    names: () => records.map((record) => record.name),
  };
}

/** In-memory script process: lines written by the session are kept, stdout is fed by the test. */
export class FakeScriptProcess implements ScriptProcessLike {
  readonly pid = 4242;
  readonly written: string[] = [];
  terminateCalls = 0;
  private handlers: ScriptProcessHandlers | null = null;
  private outcome: ExitOutcome | null = null;
  private tail: string[] = [];

  attach(handlers: ScriptProcessHandlers): void {
    this.handlers = handlers;
  }

  writeLine(text: string): void {
    if (this.outcome !== null) {
      throw new BrokenPipeError('fake process has exited');
    }
    this.written.push(text);
  }

  writtenRecords(): unknown[] {
    return this.written.map((line): unknown => JSON.parse(line));
  }

  terminate(): void {
    this.terminateCalls += 1;
    if (this.outcome === null) {
      this.exit({ kind: 'killed', signal: 'SIGTERM' });
    }
  }

  waitExit(): Promise<ExitOutcome> {
    return Promise.resolve(this.outcome ?? { kind: 'exited', code: 0 });
  }

  hasExited(): boolean {
    return this.outcome !== null;
  }

  stderrTail(): readonly string[] {
    return this.tail;
  }

  setStderrTail(lines: readonly string[]): void {
    this.tail = [...lines];
  }

  /** Feeds one stdout line through the real decoder; malformed lines are dropped. */
  emitLine(line: string): boolean {
    const decoded = decodeLine(line);
    if (!decoded.ok) {
      return false;
    }
    this.handlers?.onEnvelope(decoded.envelope);
    return true;
  }

  exit(outcome: ExitOutcome): void {
    this.outcome = outcome;
    this.handlers?.onExit(outcome);
  }
}

export class FakeWindow implements WindowHandle {
  readonly actions: string[] = [];
  private visible = false;

  constructor(readonly kind: WindowKind) {}

  isVisible(): boolean {
    return this.visible;
  }

  show(): void {
    this.visible = true;
    this.actions.push('show');
  }

  hide(): void {
    this.visible = false;
    this.actions.push('hide');
  }
}

export class FakeWindowController implements WindowController {
  readonly created: FakeWindow[] = [];
  createDelayMs = 0;
  /** When set, `create` never settles. */
  stallCreates = false;

  async create(kind: WindowKind): Promise<FakeWindow> {
    if (this.stallCreates) {
      await new Promise<never>(() => undefined);
    }
    if (this.createDelayMs > 0) {
      await new Promise<void>((resolve) => {
        setTimeout(resolve, this.createDelayMs);
      });
    }
    const window = new FakeWindow(kind);
    this.created.push(window);
    return window;
  }

  windowsOf(kind: WindowKind): FakeWindow[] {
    return this.created.filter((window) => window.kind === kind);
  }
}
