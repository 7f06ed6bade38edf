import assert from 'node:assert/strict';
import { test } from './testHarness';
import { ProtocolError } from '../src/domain/errors';
import type { Command, Response } from '../src/domain/protocol/types';
import {
  decodeCommand,
  decodeResponse,
  encodeCommand,
  encodeResponse,
} from '../src/adapters/control/protocol/codec';
import { LineFramer } from '../src/shared/lineFramer';

function protocolMessage(fn: () => unknown): string {
  try {
    fn();
  } catch (error) {
    if (!(error instanceof ProtocolError)) {
      throw error;
    }
    return error.message;
  }
  throw new Error('expected a ProtocolError');
}

test('decodeCommand accepts every command with and without args', () => {
  assert.deepEqual(decodeCommand('{"cmd":"play"}'), { cmd: 'play' });
  assert.deepEqual(decodeCommand('{"cmd":"pause","args":{}}'), { cmd: 'pause' });
  assert.deepEqual(decodeCommand('{"cmd":"status","args":{"verbose":true}}'), { cmd: 'status' });
  assert.deepEqual(decodeCommand('{"cmd":"next"}'), { cmd: 'next' });
  assert.deepEqual(decodeCommand('{"cmd":"list"}'), { cmd: 'list' });
  assert.deepEqual(decodeCommand('{"cmd":"stop"}'), { cmd: 'stop' });
  assert.deepEqual(decodeCommand('{"cmd":"hello"}'), { cmd: 'hello' });
  assert.deepEqual(decodeCommand('{"cmd":"enqueue","args":{"uri":"/m/a.flac"},"token":"test-secret"}'), {
    cmd: 'enqueue',
    uri: '/m/a.flac',
    token: 'test-secret',
  });
});

test('decodeCommand rejects malformed requests with specific messages', () => {
  assert.equal(protocolMessage(() => decodeCommand('{"cmd":')), 'malformed JSON');
  assert.equal(protocolMessage(() => decodeCommand('[1,2]')), 'request must be a JSON object');
  assert.equal(protocolMessage(() => decodeCommand('"play"')), 'request must be a JSON object');
  assert.equal(protocolMessage(() => decodeCommand('{"args":{}}')), 'missing "cmd" field');
  assert.equal(protocolMessage(() => decodeCommand('{"cmd":"rewind"}')), 'unknown command "rewind"');
  assert.equal(protocolMessage(() => decodeCommand('{"cmd":7}')), 'unknown command 7');
  assert.equal(protocolMessage(() => decodeCommand('{"cmd":"play","args":[]}')), '"args" must be an object');
  assert.equal(protocolMessage(() => decodeCommand('{"cmd":"play","token":5}')), '"token" must be a string');
});

test('decodeCommand requires a non-empty uri for enqueue', () => {
  const expected = 'enqueue requires a non-empty "uri" argument';
  assert.equal(protocolMessage(() => decodeCommand('{"cmd":"enqueue"}')), expected);
  assert.equal(protocolMessage(() => decodeCommand('{"cmd":"enqueue","args":{"uri":""}}')), expected);
  assert.equal(protocolMessage(() => decodeCommand('{"cmd":"enqueue","args":{"uri":"  "}}')), expected);
  assert.equal(protocolMessage(() => decodeCommand('{"cmd":"enqueue","args":{"uri":3}}')), expected);
});

test('decodeCommand enforces the line size limit', () => {
  const line = JSON.stringify({ cmd: 'enqueue', args: { uri: 'x'.repeat(100) } });
  assert.equal(protocolMessage(() => decodeCommand(line, { maxLineBytes: 64 })), 'line exceeds 64 bytes');
  assert.equal(decodeCommand(line, { maxLineBytes: 1024 }).cmd, 'enqueue');
});

test('encodeCommand then decodeCommand yields the same command', () => {
  const commands: Command[] = [
    { cmd: 'play' },
    { cmd: 'status', token: 'test-secret' },
    { cmd: 'enqueue', uri: 'https://radio.example/stream?x=1&y="2"' },
    { cmd: 'enqueue', uri: '/music/Ünïcödé – track.flac', token: 'test-secret' },
  ];
  for (const command of commands) {
    const line = encodeCommand(command);
    assert.equal(line.endsWith('\n'), true);
    assert.equal(line.indexOf('\n'), line.length - 1);
    assert.deepEqual(decodeCommand(line.slice(0, -1)), command);
  }
});

test('encodeResponse then decodeResponse yields the same envelope', () => {
  const responses: Response[] = [
    { ok: true, data: { state: 'Playing', track: '/m/a.flac' } },
    { ok: true, data: { tracks: ['a', 'b'] } },
    { ok: false, error: { kind: 'queue_empty', message: 'queue is empty' } },
  ];
  for (const response of responses) {
    const line = encodeResponse(response);
    assert.deepEqual(decodeResponse(line.slice(0, -1)), response);
  }
});

test('decodeResponse rejects envelopes with unknown error kinds', () => {
  assert.throws(
    () => decodeResponse('{"ok":false,"error":{"kind":"teapot","message":"short and stout"}}'),
    ProtocolError,
  );
  assert.throws(() => decodeResponse('{"data":{}}'), ProtocolError);
  assert.deepEqual(decodeResponse('{"ok":true}'), { ok: true, data: {} });
});

test('LineFramer splits lines across chunks and strips carriage returns', () => {
  const framer = new LineFramer(1024);
  assert.deepEqual(framer.push(Buffer.from('{"cmd":')), []);
  assert.equal(framer.bufferedBytes, 7);
  assert.deepEqual(framer.push(Buffer.from('"play"}\r\n{"cmd":"list"}\n\n')), [
    { kind: 'line', line: '{"cmd":"play"}' },
    { kind: 'line', line: '{"cmd":"list"}' },
    { kind: 'line', line: '' },
  ]);
  assert.equal(framer.bufferedBytes, 0);
});

test('LineFramer keeps multi-byte characters split across chunks intact', () => {
  const framer = new LineFramer(1024);
  const bytes = Buffer.from('é\n', 'utf8');
  assert.deepEqual(framer.push(bytes.subarray(0, 1)), []);
  assert.deepEqual(framer.push(bytes.subarray(1)), [{ kind: 'line', line: 'é' }]);
});

test('LineFramer reports an oversized line once and resumes after its newline', () => {
  const framer = new LineFramer(8);
  assert.deepEqual(framer.push(Buffer.from('0123456789')), [{ kind: 'overflow', bytes: 10 }]);
  assert.equal(framer.bufferedBytes, 0);
  assert.deepEqual(framer.push(Buffer.from('abcdef')), []);
  assert.equal(framer.bufferedBytes, 0);
  assert.deepEqual(framer.push(Buffer.from('gh\nok\n')), [{ kind: 'line', line: 'ok' }]);
});
