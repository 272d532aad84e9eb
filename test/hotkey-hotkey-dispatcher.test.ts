import assert from 'node:assert/strict';
import test from 'node:test';
import { HotkeyDispatcher, type ScriptLauncher } from '../src/hotkey/hotkey-dispatcher.ts';
import type { LaunchResult } from '../src/session/script-runner.ts';
import { BridgeScheduler } from '../src/runtime/bridge-scheduler.ts';
import { SpawnFailedError } from '../src/runtime/bridge-errors.ts';
import type { WindowKind } from '../src/hotkey/hotkey-signal.ts';
import { WindowRegistry } from '../src/runtime/window-registry.ts';
import { ScriptSession } from '../src/session/script-session.ts';
import {
  createRecordingLog,
  FakeScriptProcess,
  FakeWindow,
  FakeWindowController,
  waitForCondition,
} from './helpers/bridge-test-helpers.ts';

class RecordingLauncher implements ScriptLauncher {
  readonly launched: string[] = [];

  launch(scriptPath: string): Promise<LaunchResult> {
    this.launched.push(scriptPath);
    return Promise.resolve({ ok: false, error: new SpawnFailedError(scriptPath, new Error('ENOENT')) });
  }
}

class FailOnceWindowController extends FakeWindowController {
  private failed = false;

  override async create(kind: WindowKind): Promise<FakeWindow> {
    if (!this.failed) {
      this.failed = true;
      throw new Error('display disconnected');
    }
    return super.create(kind);
  }
}

function createDispatcher(controller = new FakeWindowController()) {
  const { log, records } = createRecordingLog();
  const scheduler = new BridgeScheduler();
  const launcher = new RecordingLauncher();
  const dispatcher = new HotkeyDispatcher({
    scheduler,
    windows: new WindowRegistry({ controller, log }),
    launcher,
    log,
  });
  return { dispatcher, scheduler, controller, launcher, records };
}

void test('hotkey dispatcher toggles the main window on each press', async () => {
  const { dispatcher, scheduler, controller } = createDispatcher();
  dispatcher.dispatch({ kind: 'main-toggle' });
  dispatcher.dispatch({ kind: 'main-toggle' });
  dispatcher.dispatch({ kind: 'main-toggle' });
  await scheduler.waitForIdle();
  await dispatcher.settled();

  const [main] = controller.windowsOf('main');
  assert.equal(controller.created.length, 1);
  assert.deepEqual(main?.actions, ['show', 'hide', 'show']);
});

void test('hotkey dispatcher creates and shows a secondary window once per kind', async () => {
  const { dispatcher, scheduler, controller } = createDispatcher();
  dispatcher.dispatch({ kind: 'window', window: 'notes' });
  dispatcher.dispatch({ kind: 'window', window: 'ai' });
  dispatcher.dispatch({ kind: 'window', window: 'notes' });
  await scheduler.waitForIdle();
  await dispatcher.settled();

  assert.deepEqual(
    controller.created.map((window) => window.kind),
    ['notes', 'ai'],
  );
  assert.deepEqual(controller.windowsOf('notes')[0]?.actions, ['show', 'show']);
});

void test('hotkey dispatcher launches shortcut scripts and logs a failed launch', async () => {
  const { dispatcher, scheduler, launcher, records } = createDispatcher();
  dispatcher.dispatch({ kind: 'script-shortcut', shortcutId: 'clipboard', scriptPath: '/scripts/clipboard.ts' });
  await scheduler.waitForIdle();
  assert.deepEqual(launcher.launched, ['/scripts/clipboard.ts']);

  await new Promise<void>((resolve) => {
    setImmediate(resolve);
  });
  const failed = records.find((record) => record.name === 'hotkey.launch-failed');
  assert.equal(failed?.attrs?.['shortcut'], 'clipboard');
  assert.equal(failed?.attrs?.['script'], '/scripts/clipboard.ts');
});

void test('hotkey dispatcher drops signals once the scheduler has stopped', async () => {
  const { dispatcher, scheduler, controller, records } = createDispatcher();
  scheduler.stop();
  dispatcher.dispatch({ kind: 'main-toggle' });
  await scheduler.waitForIdle();
  assert.equal(controller.created.length, 0);
  assert.equal(records.some((record) => record.name === 'hotkey.dispatch-dropped'), true);
});

void test('hotkey dispatcher keeps envelope handling moving while a window create never settles', async () => {
  const { dispatcher, scheduler, controller, records } = createDispatcher();
  controller.stallCreates = true;
  const process = new FakeScriptProcess();
  const session = new ScriptSession({
    sessionId: 'session-1',
    scriptPath: '/scripts/pick-fruit.ts',
    process,
    scheduler,
    log: createRecordingLog().log,
  });
  session.start();

  const result = session.prompt({ type: 'arg', placeholder: 'Pick', choices: ['apple'] });
  dispatcher.dispatch({ kind: 'main-toggle' });
  await scheduler.waitForIdle();
  assert.equal(process.emitLine('{"type":"submit","id":"1","value":"apple"}'), true);
  assert.deepEqual(await result, { status: 'submitted', value: 'apple' });

  controller.stallCreates = false;
  dispatcher.dispatch({ kind: 'window', window: 'notes' });
  await waitForCondition(() => controller.windowsOf('notes')[0]?.isVisible() === true, 'notes window shown');
  assert.equal(controller.windowsOf('main').length, 0);
  assert.equal(records.some((record) => record.name === 'hotkey.window-action-failed'), false);
});

void test('hotkey dispatcher logs a failed window create and serves the next press', async () => {
  const { dispatcher, scheduler, controller, records } = createDispatcher(new FailOnceWindowController());
  dispatcher.dispatch({ kind: 'main-toggle' });
  dispatcher.dispatch({ kind: 'main-toggle' });
  await scheduler.waitForIdle();
  await dispatcher.settled();

  assert.equal(controller.created.length, 1);
  assert.deepEqual(controller.windowsOf('main')[0]?.actions, ['show']);
  const failed = records.find((record) => record.name === 'hotkey.window-action-failed');
  assert.deepEqual(failed?.attrs, { kind: 'main', message: 'display disconnected' });
});
