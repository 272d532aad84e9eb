import assert from 'node:assert/strict';
import test from 'node:test';
import { DEFAULT_BRIDGE_CONFIG, resolveBridgeConfig } from '../src/config/bridge-config.ts';

void test('bridge config falls back to defaults for missing or non-object input', () => {
  assert.deepEqual(resolveBridgeConfig(undefined), DEFAULT_BRIDGE_CONFIG);
  assert.deepEqual(resolveBridgeConfig('nope'), DEFAULT_BRIDGE_CONFIG);
  assert.deepEqual(resolveBridgeConfig([]), DEFAULT_BRIDGE_CONFIG);
});

void test('bridge config normalizes numeric fields and rejects out-of-range values per field', () => {
  const config = resolveBridgeConfig({
    protocol: { maxLineLength: 10 },
    session: {
      stderrTailLines: 12.9,
      terminateGraceMs: -5,
      exitRequestGraceMs: 0,
      stdioDrainMs: 'soon',
      promptTimeoutMs: 1500,
    },
    hotkeys: { pollIntervalMs: 5000, channelCapacity: 8 },
  });
  assert.equal(config.protocol.maxLineLength, DEFAULT_BRIDGE_CONFIG.protocol.maxLineLength);
  assert.equal(config.session.stderrTailLines, 12);
  assert.equal(config.session.terminateGraceMs, 2000);
  assert.equal(config.session.exitRequestGraceMs, 0);
  assert.equal(config.session.stdioDrainMs, 250);
  assert.equal(config.session.promptTimeoutMs, 1500);
  assert.equal(config.hotkeys.pollIntervalMs, 25);
  assert.equal(config.hotkeys.channelCapacity, 8);
});

void test('bridge config keeps valid hotkey bindings and drops malformed ones', () => {
  const config = resolveBridgeConfig({
    hotkeys: {
      bindings: [
        { combo: ' cmd+k ', signal: { kind: 'main-toggle' } },
        { combo: 'cmd+j', signal: { kind: 'window', window: 'settings' } },
        { combo: 'ctrl+1', signal: { kind: 'script-shortcut', shortcutId: 'clip', scriptPath: '/scripts/clip.ts' } },
        { combo: '', signal: { kind: 'main-toggle' } },
        'cmd+x',
      ],
    },
  });
  assert.deepEqual(config.hotkeys.bindings, [
    { combo: 'cmd+k', signal: { kind: 'main-toggle' } },
    {
      combo: 'ctrl+1',
      signal: { kind: 'script-shortcut', shortcutId: 'clip', scriptPath: '/scripts/clip.ts' },
    },
  ]);
});

void test('bridge config merges runtimes by extension and removes emptied entries', () => {
  const config = resolveBridgeConfig({
    runtimes: {
      '.py': ['python3', '-u'],
      '.ts': [],
      sh: ['bash'],
    },
  });
  assert.deepEqual(config.runtimes, {
    '.js': ['node'],
    '.mjs': ['node'],
    '.py': ['python3', '-u'],
  });
});

void test('bridge config env overrides win over input values', () => {
  const config = resolveBridgeConfig(
    {
      log: { filePath: '/tmp/from-config.jsonl', stderrLevel: 'error' },
      hotkeys: { pollIntervalMs: 40 },
    },
    {
      SCRIPT_BRIDGE_LOG_FILE: '/tmp/from-env.jsonl',
      SCRIPT_BRIDGE_LOG_LEVEL: 'debug',
      SCRIPT_BRIDGE_HOTKEY_POLL_MS: '10',
    },
  );
  assert.deepEqual(config.log, { filePath: '/tmp/from-env.jsonl', stderrLevel: 'debug' });
  assert.equal(config.hotkeys.pollIntervalMs, 10);

  const ignored = resolveBridgeConfig(
    { hotkeys: { pollIntervalMs: 40 } },
    { SCRIPT_BRIDGE_LOG_LEVEL: 'loud', SCRIPT_BRIDGE_HOTKEY_POLL_MS: 'fast' },
  );
  assert.equal(ignored.log.stderrLevel, 'warn');
  assert.equal(ignored.hotkeys.pollIntervalMs, 40);
});
