import assert from 'node:assert/strict';
import test from 'node:test';
import { envelopeId, isRequestKind } from '../src/protocol/envelope.ts';
import { decodeLine, encodeEnvelope, LineBuffer } from '../src/protocol/line-codec.ts';

void test('line codec decodes an arg request and normalizes string choices', () => {
  const decoded = decodeLine('{"type":"arg","id":"1","placeholder":"Pick","choices":["apple","banana"]}');
  assert.deepEqual(decoded, {
    ok: true,
    envelope: {
      type: 'arg',
      id: '1',
      placeholder: 'Pick',
      choices: [
        { name: 'apple', value: 'apple' },
        { name: 'banana', value: 'banana' },
      ],
    },
  });
});

void test('line codec maps a submit without value to null', () => {
  assert.deepEqual(decodeLine('{"type":"submit","id":"9"}'), {
    ok: true,
    envelope: { type: 'submit', id: '9', value: null },
  });
  assert.deepEqual(decodeLine('{"type":"submit","id":"9","value":"apple"}'), {
    ok: true,
    envelope: { type: 'submit', id: '9', value: 'apple' },
  });
});

void test('line codec keeps unknown kinds with their tag id and fields', () => {
  const decoded = decodeLine('{"type":"widget","id":"w1","html":"<b>x</b>","width":300}');
  assert.deepEqual(decoded, {
    ok: true,
    envelope: {
      type: 'unknown',
      tag: 'widget',
      id: 'w1',
      fields: { html: '<b>x</b>', width: 300 },
    },
  });
  assert.equal(decoded.ok && envelopeId(decoded.envelope), 'w1');
  assert.equal(
    decoded.ok ? encodeEnvelope(decoded.envelope) : '',
    '{"type":"widget","id":"w1","html":"<b>x</b>","width":300}',
  );
});

void test('line codec reports malformed input by reason', () => {
  const reasons = [
    'not json',
    '[1,2]',
    '{"id":"1"}',
    '{"type":"arg","id":7}',
    '{"type":"arg","placeholder":"x"}',
    '{"type":"div","id":"3"}',
    '{"type":"setHint","text":4}',
  ].map((line) => {
    const decoded = decodeLine(line);
    return decoded.ok ? 'ok' : decoded.malformed.reason;
  });
  assert.deepEqual(reasons, [
    'invalid-json',
    'not-an-object',
    'missing-type',
    'invalid-id',
    'missing-id',
    'invalid-fields',
    'invalid-fields',
  ]);
});

void test('line codec truncates the malformed line preview', () => {
  const line = `{"type":${'x'.repeat(300)}`;
  const decoded = decodeLine(line);
  assert.equal(decoded.ok, false);
  if (!decoded.ok) {
    assert.equal(decoded.malformed.line, `${line.slice(0, 200)}…`);
  }
});

void test('line codec escapes embedded newlines so an envelope stays on one line', () => {
  const line = encodeEnvelope({ type: 'submit', id: '4', value: 'first\nsecond' });
  assert.equal(line, '{"type":"submit","id":"4","value":"first\\nsecond"}');
  assert.equal(line.includes('\n'), false);
  assert.deepEqual(decodeLine(line), {
    ok: true,
    envelope: { type: 'submit', id: '4', value: 'first\nsecond' },
  });
});

void test('line codec decodes fire-and-forget notices without ids', () => {
  assert.deepEqual(decodeLine('{"type":"setPlaceholder","text":"Search"}'), {
    ok: true,
    envelope: { type: 'setPlaceholder', text: 'Search' },
  });
  assert.deepEqual(decodeLine('{"type":"update","progress":0.5,"label":"half"}'), {
    ok: true,
    envelope: { type: 'update', progress: 0.5, label: 'half' },
  });
  assert.deepEqual(decodeLine('{"type":"exit","code":3}'), {
    ok: true,
    envelope: { type: 'exit', code: 3 },
  });
  assert.equal(isRequestKind('update'), false);
  assert.equal(isRequestKind('editor'), true);
});

void test('line buffer splits chunks into lines and keeps the partial remainder', () => {
  const buffer = new LineBuffer();
  assert.deepEqual(buffer.push('{"a":1}\r\n{"b"'), { lines: ['{"a":1}'], overflowed: 0 });
  assert.deepEqual(buffer.push(':2}\n\n   \n{"c":3}'), { lines: ['{"b":2}'], overflowed: 0 });
  assert.equal(buffer.flush(), '{"c":3}');
  assert.equal(buffer.flush(), null);
});

void test('line buffer drops an over-long line once and resumes at the next newline', () => {
  const buffer = new LineBuffer(8);
  assert.deepEqual(buffer.push('0123456789'), { lines: [], overflowed: 1 });
  assert.deepEqual(buffer.push('abcdef'), { lines: [], overflowed: 0 });
  assert.deepEqual(buffer.push('ghi\nshort\n123456789\nok'), {
    lines: ['short'],
    overflowed: 1,
  });
  assert.equal(buffer.flush(), 'ok');
});
