import type { BridgeLog } from '../log/event-log.ts';
import type { WindowKind } from '../hotkey/hotkey-signal.ts';
import { formatErrorMessage } from './bridge-errors.ts';

export interface WindowHandle {
  readonly kind: WindowKind;
  isVisible(): boolean;
  show(): void | Promise<void>;
  hide(): void | Promise<void>;
}

/** The UI layer's side of window management; creating a window is the only slow step. */
export interface WindowController {
  create(kind: WindowKind): Promise<WindowHandle>;
}

interface WindowRegistryOptions {
  readonly controller: WindowController;
  readonly log: BridgeLog;
}

/**
 * One slot per window kind. `ensure` decides synchronously whether a slot is filled, being
 * filled, or empty, so concurrent callers for the same kind share a single `create`.
 */
export class WindowRegistry {
  private readonly controller: WindowController;
  private readonly log: BridgeLog;
  private readonly live = new Map<WindowKind, WindowHandle>();
  private readonly creating = new Map<WindowKind, Promise<WindowHandle>>();

  constructor(options: WindowRegistryOptions) {
    this.controller = options.controller;
    this.log = options.log;
  }

  ensure(kind: WindowKind): Promise<WindowHandle> {
    const existing = this.live.get(kind);
    if (existing !== undefined) {
      return Promise.resolve(existing);
    }
    const inFlight = this.creating.get(kind);
    if (inFlight !== undefined) {
      return inFlight;
    }

    const created = this.create(kind).finally(() => {
      this.creating.delete(kind);
    });
    this.creating.set(kind, created);
    return created;
  }

  current(kind: WindowKind): WindowHandle | null {
    return this.live.get(kind) ?? null;
  }

  /** Empties the slot when the UI closes a window. A stale handle leaves the slot alone. */
  release(kind: WindowKind, handle?: WindowHandle): boolean {
    const existing = this.live.get(kind);
    if (existing === undefined || (handle !== undefined && handle !== existing)) {
      return false;
    }
    this.live.delete(kind);
    this.log.debug('window.released', { kind });
    return true;
  }

  liveKinds(): readonly WindowKind[] {
    return [...this.live.keys()];
  }

  private async create(kind: WindowKind): Promise<WindowHandle> {
    const span = this.log.startSpan('window.create', { kind });
    try {
      const handle = await this.controller.create(kind);
      this.live.set(kind, handle);
      span.end({ status: 'ok' });
      return handle;
    } catch (error: unknown) {
      span.end({ status: 'error' });
      this.log.warn('window.create-failed', { kind, message: formatErrorMessage(error, false) });
      throw error;
    }
  }
}
