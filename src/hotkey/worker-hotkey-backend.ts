import { Worker } from 'node:worker_threads';
import type { BridgeLog } from '../log/event-log.ts';
import { formatErrorMessage } from '../runtime/bridge-errors.ts';
import type { BackendRegistration, HotkeyBackend, HotkeyId } from './hotkey-bridge.ts';
import type { KeyStroke } from './hotkey-combo.ts';
import {
  workerToHostMessageSchema,
  type HostToWorkerMessage,
  type WorkerToHostMessage,
} from './hotkey-worker-protocol.ts';
import type { SignalRing } from './signal-ring.ts';

interface PendingRegistration {
  resolve: (registration: BackendRegistration) => void;
}

interface WorkerHotkeyBackendOptions {
  readonly workerUrl: URL | string;
  readonly log: BridgeLog;
  readonly workerData?: Readonly<Record<string, unknown>>;
  readonly startTimeoutMs?: number;
  readonly stopTimeoutMs?: number;
}

const DEFAULT_START_TIMEOUT_MS = 5000;
const DEFAULT_STOP_TIMEOUT_MS = 1000;

/**
 * Runs the OS hotkey hook in a worker thread. The worker writes fired hotkey ids straight into
 * the shared ring, so presses are captured even while the main thread is busy; the `wake`
 * message only asks for an early drain.
 */
export class WorkerHotkeyBackend implements HotkeyBackend {
  private readonly workerUrl: URL | string;
  private readonly log: BridgeLog;
  private readonly extraWorkerData: Readonly<Record<string, unknown>>;
  private readonly startTimeoutMs: number;
  private readonly stopTimeoutMs: number;
  private readonly pending = new Map<number, PendingRegistration>();
  private worker: Worker | null = null;
  private nextRequestId = 1;

  constructor(options: WorkerHotkeyBackendOptions) {
    this.workerUrl = options.workerUrl;
    this.log = options.log;
    this.extraWorkerData = options.workerData ?? {};
    this.startTimeoutMs = options.startTimeoutMs ?? DEFAULT_START_TIMEOUT_MS;
    this.stopTimeoutMs = options.stopTimeoutMs ?? DEFAULT_STOP_TIMEOUT_MS;
  }

  start(ring: SignalRing, wake: () => void): Promise<void> {
    if (this.worker !== null) {
      return Promise.resolve();
    }
    const worker = new Worker(this.workerUrl, {
      workerData: {
        ...this.extraWorkerData,
        ringBuffer: ring.buffer,
      },
    });
    this.worker = worker;

    return new Promise<void>((resolve, reject) => {
      let settled = false;
      const finish = (error: Error | null): void => {
        if (settled) {
          return;
        }
        settled = true;
        clearTimeout(timer);
        if (error === null) {
          resolve();
        } else {
          reject(error);
        }
      };
      const timer = setTimeout(() => {
        finish(new Error(`hotkey worker did not report ready within ${String(this.startTimeoutMs)}ms`));
      }, this.startTimeoutMs);

      worker.on('message', (value: unknown) => {
        const parsed = workerToHostMessageSchema.safeParse(value);
        if (!parsed.success) {
          this.log.warn('hotkey.worker-bad-message', { message: parsed.error.message });
          return;
        }
        if (parsed.data.type === 'ready') {
          finish(null);
          return;
        }
        this.handleMessage(parsed.data, wake);
      });
      worker.on('error', (error: Error) => {
        this.log.error('hotkey.worker-error', { message: formatErrorMessage(error) });
        finish(error);
      });
      worker.on('exit', (code: number) => {
        if (this.worker === worker) {
          this.worker = null;
        }
        this.resolvePending({ ok: false, detail: 'hotkey worker exited' });
        this.log.info('hotkey.worker-exit', { code });
        finish(new Error(`hotkey worker exited with code ${String(code)} before it was ready`));
      });
    });
  }

  register(id: HotkeyId, stroke: KeyStroke): Promise<BackendRegistration> {
    const worker = this.worker;
    if (worker === null) {
      return Promise.resolve({ ok: false, detail: 'hotkey worker is not running' });
    }
    const requestId = this.nextRequestId;
    this.nextRequestId += 1;
    return new Promise<BackendRegistration>((resolve) => {
      this.pending.set(requestId, { resolve });
      this.post(worker, {
        type: 'register',
        requestId,
        hotkeyId: id,
        stroke: {
          key: stroke.key,
          ctrl: stroke.ctrl,
          alt: stroke.alt,
          shift: stroke.shift,
          meta: stroke.meta,
        },
      });
    });
  }

  unregister(id: HotkeyId): Promise<void> {
    if (this.worker !== null) {
      this.post(this.worker, { type: 'unregister', hotkeyId: id });
    }
    return Promise.resolve();
  }

  async stop(): Promise<void> {
    const worker = this.worker;
    if (worker === null) {
      return;
    }
    this.worker = null;
    const exited = new Promise<void>((resolve) => {
      worker.once('exit', () => {
        resolve();
      });
    });
    this.post(worker, { type: 'stop' });
    let timer: NodeJS.Timeout | undefined;
    const timedOut = new Promise<'timeout'>((resolve) => {
      timer = setTimeout(() => {
        resolve('timeout');
      }, this.stopTimeoutMs);
    });
    const result = await Promise.race([exited, timedOut]);
    clearTimeout(timer);
    if (result === 'timeout') {
      await worker.terminate();
    }
    this.resolvePending({ ok: false, detail: 'hotkey worker stopped' });
  }

  private handleMessage(message: WorkerToHostMessage, wake: () => void): void {
    if (message.type === 'wake') {
      wake();
      return;
    }
    if (message.type === 'error') {
      this.log.warn('hotkey.worker-reported-error', { message: message.message });
      return;
    }
    if (message.type === 'registered') {
      const pending = this.pending.get(message.requestId);
      if (pending === undefined) {
        return;
      }
      this.pending.delete(message.requestId);
      pending.resolve(message.ok ? { ok: true } : { ok: false, detail: message.detail ?? 'rejected by hotkey hook' });
    }
  }

  private post(worker: Worker, message: HostToWorkerMessage): void {
    worker.postMessage(message);
  }

  private resolvePending(registration: BackendRegistration): void {
    const entries = [...this.pending.values()];
    this.pending.clear();
    for (const entry of entries) {
      entry.resolve(registration);
    }
  }
}
