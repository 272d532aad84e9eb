import { DEFAULT_BRIDGE_CONFIG, type BridgeConfig } from '../config/bridge-config.ts';
import { HotkeyDispatcher } from '../hotkey/hotkey-dispatcher.ts';
import {
  HotkeyBridge,
  InProcessHotkeyBackend,
  type HotkeyBackend,
  type HotkeyRegistration,
} from '../hotkey/hotkey-bridge.ts';
import { BridgeLog } from '../log/event-log.ts';
import { ScriptRunner } from '../session/script-runner.ts';
import type { PromptPresenter, SessionUiSink } from '../session/script-session.ts';
import { formatErrorMessage } from './bridge-errors.ts';
import { BridgeScheduler } from './bridge-scheduler.ts';
import { WindowRegistry, type WindowController } from './window-registry.ts';

export interface BridgeContextOptions {
  readonly windows: WindowController;
  readonly config?: BridgeConfig;
  readonly log?: BridgeLog;
  readonly hotkeyBackend?: HotkeyBackend;
  readonly presenter?: PromptPresenter;
  readonly ui?: SessionUiSink;
  readonly baseEnv?: NodeJS.ProcessEnv;
}

export interface BridgeContext {
  readonly config: BridgeConfig;
  readonly log: BridgeLog;
  readonly scheduler: BridgeScheduler;
  readonly windows: WindowRegistry;
  readonly runner: ScriptRunner;
  readonly hotkeys: HotkeyBridge;
  readonly dispatcher: HotkeyDispatcher;
  readonly registrations: readonly HotkeyRegistration[];
  dispose(): Promise<void>;
}

/**
 * Builds everything the bridge shares, once, at startup. The hotkey consumer is running before
 * this resolves, so a press that arrives before the first window is still delivered.
 */
export async function createBridgeContext(options: BridgeContextOptions): Promise<BridgeContext> {
  const config = options.config ?? DEFAULT_BRIDGE_CONFIG;
  const ownsLog = options.log === undefined;
  const log =
    options.log ??
    new BridgeLog({
      filePath: config.log.filePath,
      stderrLevel: config.log.stderrLevel,
    });

  const scheduler = new BridgeScheduler({
    onError: (event, _metrics, error) => {
      log.error('scheduler.task-failed', {
        label: event.label,
        lane: event.lane,
        'wait-ms': event.waitMs,
        message: formatErrorMessage(error),
      });
    },
    onFatal: (error) => {
      log.error('scheduler.fatal', { message: formatErrorMessage(error) });
    },
  });
  const windows = new WindowRegistry({ controller: options.windows, log });
  const runner = new ScriptRunner({
    config,
    scheduler,
    log,
    ...(options.presenter === undefined ? {} : { presenter: options.presenter }),
    ...(options.ui === undefined ? {} : { ui: options.ui }),
    ...(options.baseEnv === undefined ? {} : { baseEnv: options.baseEnv }),
  });
  const dispatcher = new HotkeyDispatcher({
    scheduler,
    windows,
    launcher: runner,
    log,
  });
  const hotkeys = new HotkeyBridge({
    backend: options.hotkeyBackend ?? new InProcessHotkeyBackend(),
    log,
    pollIntervalMs: config.hotkeys.pollIntervalMs,
    channelCapacity: config.hotkeys.channelCapacity,
    onSignal: (signal) => {
      dispatcher.dispatch(signal);
    },
  });

  try {
    await hotkeys.start();
  } catch (error: unknown) {
    // The poll is already running; only registrations through the backend are lost.
    log.error('hotkey.backend-start-failed', { message: formatErrorMessage(error) });
  }

  const registrations: HotkeyRegistration[] = [];
  for (const binding of config.hotkeys.bindings) {
    registrations.push(await hotkeys.register(binding.combo, binding.signal));
  }

  let disposed: Promise<void> | null = null;
  const dispose = async (): Promise<void> => {
    await hotkeys.stop();
    const reports = await runner.killAll();
    scheduler.stop();
    await scheduler.waitForIdle();
    log.info('bridge.disposed', { 'killed-sessions': reports.length });
    if (ownsLog) {
      log.close();
    }
  };

  log.info('bridge.started', {
    'poll-ms': config.hotkeys.pollIntervalMs,
    hotkeys: registrations.filter((registration) => registration.ok).length,
  });

  return {
    config,
    log,
    scheduler,
    windows,
    runner,
    hotkeys,
    dispatcher,
    registrations,
    dispose: () => {
      disposed ??= dispose();
      return disposed;
    },
  };
}
