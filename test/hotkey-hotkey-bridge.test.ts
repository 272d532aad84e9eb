import assert from 'node:assert/strict';
import test from 'node:test';
import { HotkeyBridge, InProcessHotkeyBackend, type HotkeyBackend } from '../src/hotkey/hotkey-bridge.ts';
import type { HotkeySignal } from '../src/hotkey/hotkey-signal.ts';
import { WorkerHotkeyBackend } from '../src/hotkey/worker-hotkey-backend.ts';
import { createRecordingLog, waitForCondition } from './helpers/bridge-test-helpers.ts';

const NOTES: HotkeySignal = { kind: 'window', window: 'notes' };
const MAIN: HotkeySignal = { kind: 'main-toggle' };

function createBridge(backend: HotkeyBackend, channelCapacity = 8) {
  const recording = createRecordingLog();
  const signals: HotkeySignal[] = [];
  const polls: Array<() => void> = [];
  const bridge = new HotkeyBridge({
    backend,
    log: recording.log,
    channelCapacity,
    onSignal: (signal) => {
      signals.push(signal);
    },
    setInterval: (callback) => {
      polls.push(callback);
      return setInterval(() => undefined, 60_000);
    },
  });
  return { bridge, signals, polls, ...recording };
}

void test('hotkey bridge reports invalid, duplicate and backend-rejected registrations', async () => {
  const backend = new InProcessHotkeyBackend(['ctrl+alt+delete']);
  const { bridge, names } = createBridge(backend);
  await bridge.start();

  assert.deepEqual(await bridge.register('cmd+shift+n', NOTES), { ok: true, id: 1, combo: 'shift+meta+n' });
  assert.deepEqual(await bridge.register('cmd+', MAIN), {
    ok: false,
    combo: 'cmd+',
    reason: 'invalid-combo',
    detail: 'not a valid key combination',
  });
  assert.deepEqual(await bridge.register('Shift+Command+N', MAIN), {
    ok: false,
    combo: 'Shift+Command+N',
    reason: 'duplicate',
    detail: 'already bound to window:notes',
  });
  assert.deepEqual(await bridge.register('ctrl+alt+delete', MAIN), {
    ok: false,
    combo: 'ctrl+alt+delete',
    reason: 'backend-rejected',
    detail: 'ctrl+alt+delete is owned by another application',
  });
  assert.deepEqual(bridge.registered(), [{ id: 1, combo: 'shift+meta+n', signal: NOTES }]);
  assert.equal(names().filter((name) => name === 'hotkey.registration-failed').length, 3);
  await bridge.stop();
});

void test('hotkey bridge delivers every press in order without merging repeats', async () => {
  const backend = new InProcessHotkeyBackend();
  const { bridge, signals, polls } = createBridge(backend);
  await bridge.start();
  await bridge.register('cmd+;', MAIN);
  await bridge.register('cmd+shift+n', NOTES);

  backend.trigger('cmd+;');
  backend.trigger('cmd+shift+n');
  backend.trigger('cmd+;');
  assert.deepEqual(signals, []);

  assert.equal(polls.length, 1);
  polls[0]?.();
  assert.deepEqual(signals, [MAIN, NOTES, MAIN]);
  assert.equal(bridge.drain(), 0);
  await bridge.stop();
});

void test('hotkey bridge counts presses lost to a full channel and logs them once', async () => {
  const backend = new InProcessHotkeyBackend();
  const { bridge, signals, records } = createBridge(backend, 2);
  await bridge.start();
  await bridge.register('cmd+;', MAIN);

  assert.deepEqual([backend.trigger('cmd+;'), backend.trigger('cmd+;'), backend.trigger('cmd+;')], [true, true, false]);
  assert.equal(bridge.drain(), 2);
  assert.equal(signals.length, 2);
  assert.equal(bridge.droppedCount(), 1);
  const full = records.filter((record) => record.name === 'hotkey.channel-full');
  assert.deepEqual(full.map((record) => record.attrs), [{ dropped: 1, capacity: 2 }]);
  await bridge.stop();
});

void test('hotkey bridge unregister stops delivery and stop drains what is left', async () => {
  const backend = new InProcessHotkeyBackend();
  const { bridge, signals } = createBridge(backend);
  await bridge.start();
  const main = await bridge.register('cmd+;', MAIN);
  await bridge.register('cmd+shift+n', NOTES);

  assert.equal(main.ok && (await bridge.unregister(main.id)), true);
  assert.equal(await bridge.unregister(99), false);
  assert.equal(backend.trigger('cmd+;'), false);
  assert.equal(backend.trigger('cmd+shift+n'), true);

  await bridge.stop();
  assert.deepEqual(signals, [NOTES]);
});

void test('worker hotkey backend and worker host carry presses from a worker thread through the shared ring', async () => {
  const { log } = createRecordingLog();
  const backend = new WorkerHotkeyBackend({
    workerUrl: new URL('./fixtures/hotkey-worker.mjs', import.meta.url),
    log,
  });
  const signals: HotkeySignal[] = [];
  const bridge = new HotkeyBridge({
    backend,
    log,
    // Only the worker's wake message can deliver within this test.
    pollIntervalMs: 60_000,
    onSignal: (signal) => {
      signals.push(signal);
    },
  });

  await bridge.start();
  try {
    assert.deepEqual(await bridge.register('cmd+shift+n', NOTES), { ok: true, id: 1, combo: 'shift+meta+n' });
    await waitForCondition(() => signals.length === 2, 'worker presses');
    assert.deepEqual(signals, [NOTES, NOTES]);

    assert.deepEqual(await bridge.register('ctrl+x', MAIN), {
      ok: false,
      combo: 'ctrl+x',
      reason: 'backend-rejected',
      detail: 'combo is taken',
    });
  } finally {
    await bridge.stop();
  }
  assert.deepEqual(await backend.register(5, { key: 'k', ctrl: true, alt: false, shift: false, meta: false }), {
    ok: false,
    detail: 'hotkey worker is not running',
  });
});
