import type { BridgeLog } from '../log/event-log.ts';
import type { BridgeScheduler } from '../runtime/bridge-scheduler.ts';
import { formatErrorMessage } from '../runtime/bridge-errors.ts';
import type { WindowHandle, WindowRegistry } from '../runtime/window-registry.ts';
import type { LaunchResult } from '../session/script-runner.ts';
import { describeHotkeySignal, type HotkeySignal, type WindowKind } from './hotkey-signal.ts';

export interface ScriptLauncher {
  launch(scriptPath: string): Promise<LaunchResult>;
}

type WindowAction = (window: WindowHandle) => void | Promise<void>;

interface HotkeyDispatcherOptions {
  readonly scheduler: BridgeScheduler;
  readonly windows: WindowRegistry;
  readonly launcher: ScriptLauncher;
  readonly log: BridgeLog;
}

/**
 * Turns hotkey signals into window and launch actions on the interactive lane, one task per
 * signal so repeated presses stay distinct and ordered.
 */
export class HotkeyDispatcher {
  private readonly scheduler: BridgeScheduler;
  private readonly windows: WindowRegistry;
  private readonly launcher: ScriptLauncher;
  private readonly log: BridgeLog;
  private readonly windowActions = new Map<WindowKind, Promise<void>>();

  constructor(options: HotkeyDispatcherOptions) {
    this.scheduler = options.scheduler;
    this.windows = options.windows;
    this.launcher = options.launcher;
    this.log = options.log;
  }

  dispatch(signal: HotkeySignal): void {
    const label = `hotkey:${describeHotkeySignal(signal)}`;
    if (!this.scheduler.enqueueInteractive(() => this.apply(signal), label)) {
      this.log.debug('hotkey.dispatch-dropped', { signal: describeHotkeySignal(signal) });
    }
  }

  /** Resolves once every window action started so far has finished or failed. */
  async settled(): Promise<void> {
    while (this.windowActions.size > 0) {
      await Promise.all(this.windowActions.values());
    }
  }

  private apply(signal: HotkeySignal): void {
    if (signal.kind === 'main-toggle') {
      this.queueWindowAction('main', (main) => (main.isVisible() ? main.hide() : main.show()));
      return;
    }
    if (signal.kind === 'window') {
      this.queueWindowAction(signal.window, (window) => window.show());
      return;
    }
    const { shortcutId, scriptPath } = signal;
    // Launching waits on a process spawn, which must not hold the queue.
    void this.launcher.launch(scriptPath).then(
      (result) => {
        if (!result.ok) {
          this.log.warn('hotkey.launch-failed', {
            shortcut: shortcutId,
            script: scriptPath,
            message: result.error.message,
          });
        }
      },
      (error: unknown) => {
        this.log.error('hotkey.launch-failed', {
          shortcut: shortcutId,
          script: scriptPath,
          message: formatErrorMessage(error),
        });
      },
    );
  }

  /**
   * Window creation waits on the UI, so it runs beside the queue. Actions for one kind are
   * chained in press order; the show or hide itself runs as a follow-up interactive task.
   */
  private queueWindowAction(kind: WindowKind, action: WindowAction): void {
    const previous = this.windowActions.get(kind) ?? Promise.resolve();
    const next = previous
      .then(() => this.windows.ensure(kind))
      .then((window) => this.runInteractive(kind, () => action(window)))
      .catch((error: unknown) => {
        this.log.warn('hotkey.window-action-failed', { kind, message: formatErrorMessage(error, false) });
      });
    this.windowActions.set(kind, next);
    void next.finally(() => {
      if (this.windowActions.get(kind) === next) {
        this.windowActions.delete(kind);
      }
    });
  }

  private runInteractive(kind: WindowKind, action: () => void | Promise<void>): Promise<void> {
    return new Promise<void>((resolve, reject) => {
      const queued = this.scheduler.enqueueInteractive(() => {
        try {
          // Not awaited: a slow show or hide holds only this kind's chain.
          resolve(action());
        } catch (error: unknown) {
          reject(error);
        }
      }, `window:${kind}`);
      if (!queued) {
        this.log.debug('hotkey.window-action-dropped', { kind });
        resolve();
      }
    });
  }
}
