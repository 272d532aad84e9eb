import assert from 'node:assert/strict';
import test from 'node:test';
import type { WindowKind } from '../src/hotkey/hotkey-signal.ts';
import { WindowRegistry, type WindowController, type WindowHandle } from '../src/runtime/window-registry.ts';
import { createRecordingLog, FakeWindow, FakeWindowController } from './helpers/bridge-test-helpers.ts';

void test('window registry shares one create between concurrent ensure calls', async () => {
  const controller = new FakeWindowController();
  controller.createDelayMs = 10;
  const { log } = createRecordingLog();
  const registry = new WindowRegistry({ controller, log });

  const [first, second] = await Promise.all([registry.ensure('main'), registry.ensure('main')]);
  assert.equal(first, second);
  assert.equal(controller.windowsOf('main').length, 1);
  assert.equal(registry.current('main'), first);
  assert.equal(await registry.ensure('main'), first);
  assert.deepEqual(registry.liveKinds(), ['main']);
});

void test('window registry release empties the slot and ignores stale handles', async () => {
  const controller = new FakeWindowController();
  const { log } = createRecordingLog();
  const registry = new WindowRegistry({ controller, log });

  const notes = await registry.ensure('notes');
  assert.equal(registry.release('notes', new FakeWindow('notes')), false);
  assert.equal(registry.current('notes'), notes);
  assert.equal(registry.release('notes', notes), true);
  assert.equal(registry.release('notes'), false);
  assert.equal(registry.current('notes'), null);

  const reopened = await registry.ensure('notes');
  assert.notEqual(reopened, notes);
  assert.equal(controller.windowsOf('notes').length, 2);
});

void test('window registry reports a failed create and retries on the next ensure', async () => {
  let attempts = 0;
  const controller: WindowController = {
    create: (kind: WindowKind): Promise<WindowHandle> => {
      attempts += 1;
      if (attempts === 1) {
        return Promise.reject(new Error('display unavailable'));
      }
      return Promise.resolve(new FakeWindow(kind));
    },
  };
  const { log, records } = createRecordingLog();
  const registry = new WindowRegistry({ controller, log });

  await assert.rejects(registry.ensure('ai'), /display unavailable/);
  assert.equal(registry.current('ai'), null);
  const failure = records.find((record) => record.name === 'window.create-failed');
  assert.equal(failure?.attrs?.['message'], 'display unavailable');

  const window = await registry.ensure('ai');
  assert.equal(window.kind, 'ai');
  assert.equal(attempts, 2);
});
