import { parentPort, workerData } from 'node:worker_threads';
import { formatErrorMessage } from '../runtime/bridge-errors.ts';
import type { BackendRegistration, HotkeyId } from './hotkey-bridge.ts';
import type { KeyStroke } from './hotkey-combo.ts';
import {
  hostToWorkerMessageSchema,
  hotkeyWorkerDataSchema,
  type HostToWorkerMessage,
  type WorkerToHostMessage,
} from './hotkey-worker-protocol.ts';
import { SignalRing } from './signal-ring.ts';

/** The platform hook a worker wraps. `onFire` may be called from the hook's own callback thread. */
export interface OsHotkeyHook {
  register(
    id: HotkeyId,
    stroke: KeyStroke,
    onFire: () => void,
  ): BackendRegistration | Promise<BackendRegistration>;
  unregister(id: HotkeyId): void;
  dispose?(): void;
}

export interface HotkeyWorkerPort {
  on(event: 'message', listener: (value: unknown) => void): unknown;
  postMessage(value: WorkerToHostMessage): void;
  close(): void;
}

interface RunHotkeyWorkerOptions {
  readonly port?: HotkeyWorkerPort;
  readonly data?: unknown;
}

/**
 * Worker-side half of `WorkerHotkeyBackend`. Call it from the worker entry module with the
 * platform hook; it answers registrations and writes fired ids into the shared ring.
 */
export function runHotkeyWorker(hook: OsHotkeyHook, options: RunHotkeyWorkerOptions = {}): void {
  const port: HotkeyWorkerPort | null = options.port ?? parentPort;
  if (port === null) {
    throw new Error('runHotkeyWorker must run inside a worker thread');
  }
  const data = hotkeyWorkerDataSchema.parse(options.data ?? workerData);
  const ring = new SignalRing(data.ringBuffer);

  const fire = (id: HotkeyId): void => {
    if (!ring.push(id)) {
      port.postMessage({ type: 'error', message: `signal ring full, dropped hotkey ${String(id)}` });
    }
    port.postMessage({ type: 'wake' });
  };

  const handle = async (message: HostToWorkerMessage): Promise<void> => {
    if (message.type === 'register') {
      const hotkeyId = message.hotkeyId;
      let registration: BackendRegistration;
      try {
        registration = await hook.register(hotkeyId, message.stroke, () => {
          fire(hotkeyId);
        });
      } catch (error: unknown) {
        registration = { ok: false, detail: formatErrorMessage(error, false) };
      }
      port.postMessage({
        type: 'registered',
        requestId: message.requestId,
        ok: registration.ok,
        ...(registration.ok ? {} : { detail: registration.detail }),
      });
      return;
    }
    if (message.type === 'unregister') {
      hook.unregister(message.hotkeyId);
      return;
    }
    hook.dispose?.();
    port.close();
  };

  port.on('message', (value: unknown) => {
    const parsed = hostToWorkerMessageSchema.safeParse(value);
    if (!parsed.success) {
      port.postMessage({ type: 'error', message: `bad message: ${parsed.error.message}` });
      return;
    }
    void handle(parsed.data).catch((error: unknown) => {
      port.postMessage({ type: 'error', message: formatErrorMessage(error, false) });
    });
  });
  port.postMessage({ type: 'ready' });
}
