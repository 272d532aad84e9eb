import type { BridgeLog } from '../log/event-log.ts';
import { formatErrorMessage } from '../runtime/bridge-errors.ts';
import { formatKeyStroke, parseHotkeyCombo, type KeyStroke } from './hotkey-combo.ts';
import { describeHotkeySignal, type HotkeySignal } from './hotkey-signal.ts';
import { SignalRing } from './signal-ring.ts';

export type HotkeyId = number;

export type BackendRegistration =
  | {
      readonly ok: true;
    }
  | {
      readonly ok: false;
      readonly detail: string;
    };

/**
 * The OS side of global hotkeys. A backend pushes the id of a fired hotkey onto the ring from
 * whatever thread observes it, and may call `wake` to ask for an immediate drain.
 */
export interface HotkeyBackend {
  start(ring: SignalRing, wake: () => void): Promise<void>;
  register(id: HotkeyId, stroke: KeyStroke): Promise<BackendRegistration>;
  unregister(id: HotkeyId): Promise<void>;
  stop(): Promise<void>;
}

export type RegistrationFailureReason = 'invalid-combo' | 'duplicate' | 'backend-rejected';

export type HotkeyRegistration =
  | {
      readonly ok: true;
      readonly id: HotkeyId;
      readonly combo: string;
    }
  | {
      readonly ok: false;
      readonly combo: string;
      readonly reason: RegistrationFailureReason;
      readonly detail: string;
    };

export interface RegisteredHotkey {
  readonly id: HotkeyId;
  readonly combo: string;
  readonly signal: HotkeySignal;
}

interface HotkeyBridgeOptions {
  readonly backend: HotkeyBackend;
  readonly log: BridgeLog;
  readonly onSignal: (signal: HotkeySignal) => void;
  readonly pollIntervalMs?: number;
  readonly channelCapacity?: number;
  readonly setInterval?: (callback: () => void, delayMs: number) => NodeJS.Timeout;
  readonly clearInterval?: (timer: NodeJS.Timeout) => void;
}

const DEFAULT_POLL_INTERVAL_MS = 25;
const DEFAULT_CHANNEL_CAPACITY = 64;

/**
 * Moves hotkey presses from the backend's thread to `onSignal`. The fixed-interval poll is
 * started by `start()`, before any window exists, and is what guarantees delivery; the
 * backend's wake call only shortens the wait.
 */
export class HotkeyBridge {
  readonly ring: SignalRing;
  private readonly backend: HotkeyBackend;
  private readonly log: BridgeLog;
  private readonly onSignal: (signal: HotkeySignal) => void;
  private readonly pollIntervalMs: number;
  private readonly setIntervalFn: (callback: () => void, delayMs: number) => NodeJS.Timeout;
  private readonly clearIntervalFn: (timer: NodeJS.Timeout) => void;
  private readonly hotkeys = new Map<HotkeyId, RegisteredHotkey>();
  private nextHotkeyId = 1;
  private pollTimer: NodeJS.Timeout | null = null;
  private started = false;
  private droppedSignals = 0;

  constructor(options: HotkeyBridgeOptions) {
    this.backend = options.backend;
    this.log = options.log;
    this.onSignal = options.onSignal;
    this.pollIntervalMs = options.pollIntervalMs ?? DEFAULT_POLL_INTERVAL_MS;
    this.ring = new SignalRing(options.channelCapacity ?? DEFAULT_CHANNEL_CAPACITY);
    this.setIntervalFn = options.setInterval ?? ((callback, delayMs) => setInterval(callback, delayMs));
    this.clearIntervalFn = options.clearInterval ?? ((timer) => clearInterval(timer));
  }

  /** Starts the poll first, then the backend, so nothing the backend pushes can wait on a window. */
  async start(): Promise<void> {
    if (this.started) {
      return;
    }
    this.started = true;
    const timer = this.setIntervalFn(() => {
      this.drain();
    }, this.pollIntervalMs);
    timer.unref();
    this.pollTimer = timer;
    this.log.debug('hotkey.consumer-started', { 'poll-ms': this.pollIntervalMs });
    await this.backend.start(this.ring, () => {
      this.drain();
    });
  }

  async register(combo: string, signal: HotkeySignal): Promise<HotkeyRegistration> {
    const stroke = parseHotkeyCombo(combo);
    if (stroke === null) {
      return this.registrationFailed(combo, 'invalid-combo', 'not a valid key combination');
    }
    const canonical = formatKeyStroke(stroke);
    for (const existing of this.hotkeys.values()) {
      if (existing.combo === canonical) {
        return this.registrationFailed(combo, 'duplicate', `already bound to ${describeHotkeySignal(existing.signal)}`);
      }
    }

    const id = this.nextHotkeyId;
    this.nextHotkeyId += 1;
    // Reserve the combo before the backend round-trip.
    this.hotkeys.set(id, { id, combo: canonical, signal });
    let accepted: BackendRegistration;
    try {
      accepted = await this.backend.register(id, stroke);
    } catch (error: unknown) {
      accepted = { ok: false, detail: formatErrorMessage(error, false) };
    }
    if (!accepted.ok) {
      this.hotkeys.delete(id);
      return this.registrationFailed(combo, 'backend-rejected', accepted.detail);
    }
    this.log.info('hotkey.registered', { id, combo: canonical, signal: describeHotkeySignal(signal) });
    return { ok: true, id, combo: canonical };
  }

  async unregister(id: HotkeyId): Promise<boolean> {
    if (!this.hotkeys.delete(id)) {
      return false;
    }
    await this.backend.unregister(id);
    return true;
  }

  registered(): readonly RegisteredHotkey[] {
    return [...this.hotkeys.values()];
  }

  /** Delivers every queued press in arrival order. Returns how many were delivered. */
  drain(): number {
    const overflowed = this.ring.takeOverflow();
    if (overflowed > 0) {
      this.droppedSignals += overflowed;
      this.log.warn('hotkey.channel-full', { dropped: overflowed, capacity: this.ring.capacity() });
    }
    let delivered = 0;
    for (const id of this.ring.drain()) {
      const hotkey = this.hotkeys.get(id);
      if (hotkey === undefined) {
        this.log.debug('hotkey.unknown-id', { id });
        continue;
      }
      delivered += 1;
      this.log.debug('hotkey.fired', { id, combo: hotkey.combo });
      this.onSignal(hotkey.signal);
    }
    return delivered;
  }

  droppedCount(): number {
    return this.droppedSignals;
  }

  async stop(): Promise<void> {
    if (!this.started) {
      return;
    }
    this.started = false;
    if (this.pollTimer !== null) {
      this.clearIntervalFn(this.pollTimer);
      this.pollTimer = null;
    }
    await this.backend.stop();
    this.drain();
  }

  private registrationFailed(
    combo: string,
    reason: RegistrationFailureReason,
    detail: string,
  ): HotkeyRegistration {
    this.log.warn('hotkey.registration-failed', { combo, reason, detail });
    return { ok: false, combo, reason, detail };
  }
}

/**
 * Backend for hosts that observe hotkeys on the main thread (and for tests): `trigger` pushes
 * onto the ring and leaves delivery to the poll.
 */
export class InProcessHotkeyBackend implements HotkeyBackend {
  private ring: SignalRing | null = null;
  private readonly strokes = new Map<HotkeyId, string>();
  private readonly rejected = new Set<string>();

  constructor(rejectCombos: readonly string[] = []) {
    for (const combo of rejectCombos) {
      const stroke = parseHotkeyCombo(combo);
      if (stroke !== null) {
        this.rejected.add(formatKeyStroke(stroke));
      }
    }
  }

  start(ring: SignalRing): Promise<void> {
    this.ring = ring;
    return Promise.resolve();
  }

  register(id: HotkeyId, stroke: KeyStroke): Promise<BackendRegistration> {
    const combo = formatKeyStroke(stroke);
    if (this.rejected.has(combo)) {
      return Promise.resolve({ ok: false, detail: `${combo} is owned by another application` });
    }
    this.strokes.set(id, combo);
    return Promise.resolve({ ok: true });
  }

  unregister(id: HotkeyId): Promise<void> {
    this.strokes.delete(id);
    return Promise.resolve();
  }

  stop(): Promise<void> {
    this.ring = null;
    return Promise.resolve();
  }

  /** Simulates the OS reporting a press. Returns false when no registered hotkey matches. */
  trigger(combo: string): boolean {
    const stroke = parseHotkeyCombo(combo);
    if (stroke === null || this.ring === null) {
      return false;
    }
    const canonical = formatKeyStroke(stroke);
    for (const [id, registered] of this.strokes) {
      if (registered === canonical) {
        return this.ring.push(id);
      }
    }
    return false;
  }
}
