import assert from 'node:assert/strict';
import fs from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import { Writable } from 'node:stream';
import { test } from './testHarness';
import { EXIT_COMMAND_FAILED, EXIT_OK, EXIT_TRANSPORT, runCtl } from '../src/ctl';
import type { AuthConfig } from '../src/domain/config/types';
import { AuthPolicy } from '../src/application/dispatch/authPolicy';
import { CommandDispatcher } from '../src/application/dispatch/commandDispatcher';
import { PlaybackSession } from '../src/application/session/PlaybackSession';
import { ControlServer } from '../src/adapters/control/controlServer';
import { FakePlaybackAdapter } from './fakes/playbackAdapter';
import { createRecordingLogger } from './fakes/logger';

class Capture extends Writable {
  public text = '';

  public _write(chunk: Buffer | string, _encoding: BufferEncoding, callback: (error?: Error | null) => void): void {
    this.text += chunk.toString();
    callback();
  }
}

type CtlRun = { code: number; stdout: string; stderr: string };

async function ctl(argv: string[], env: NodeJS.ProcessEnv = {}): Promise<CtlRun> {
  const stdout = new Capture();
  const stderr = new Capture();
  const code = await runCtl(argv, { stdout, stderr, env });
  return { code, stdout: stdout.text, stderr: stderr.text };
}

async function withServer(auth: AuthConfig, fn: (socketPath: string) => Promise<void>): Promise<void> {
  const dir = await fs.mkdtemp(path.join(os.tmpdir(), 'cadence-cli-'));
  const socketPath = path.join(dir, 'cadence.sock');
  const log = createRecordingLogger();
  const session = new PlaybackSession({ adapter: new FakePlaybackAdapter(), log });
  const dispatcher = new CommandDispatcher({
    session,
    auth: new AuthPolicy(auth),
    server: { name: 'cadence', version: '0.0.0-test' },
    log,
  });
  const server = new ControlServer({
    socketPath,
    dispatcher,
    maxLineBytes: 4096,
    idleTimeoutMs: 0,
    maxConnections: 4,
    log,
  });
  await server.start();
  try {
    await fn(socketPath);
  } finally {
    server.stopAccepting();
    await session.shutdown();
    await server.stop();
    await fs.rm(dir, { recursive: true, force: true });
  }
}

test('cadencectl prints the response data and exits 0', async () => {
  await withServer({ token: null, mode: 'first-message' }, async (socketPath) => {
    assert.deepEqual(await ctl(['--socket', socketPath, 'enqueue', 'a.mp3']), {
      code: EXIT_OK,
      stdout: '{"queue_len":1}\n',
      stderr: '',
    });
    assert.deepEqual(await ctl(['-s', socketPath, 'next']), {
      code: EXIT_OK,
      stdout: '{"state":"Playing","track":"a.mp3"}\n',
      stderr: '',
    });
  });
});

test('cadencectl reports daemon errors on stderr and exits 1', async () => {
  await withServer({ token: null, mode: 'first-message' }, async (socketPath) => {
    assert.deepEqual(await ctl(['--socket', socketPath, 'next']), {
      code: EXIT_COMMAND_FAILED,
      stdout: '',
      stderr: 'queue_empty: queue is empty\n',
    });
  });
});

test('cadencectl takes the socket and token from the environment', async () => {
  await withServer({ token: 'test-secret', mode: 'every-message' }, async (socketPath) => {
    const env = { CADENCE_SOCKET: socketPath, CADENCE_TOKEN: 'test-secret' };
    assert.deepEqual(await ctl(['list'], env), { code: EXIT_OK, stdout: '{"tracks":[]}\n', stderr: '' });
    assert.deepEqual(await ctl(['--token', 'wrong', 'list'], env), {
      code: EXIT_COMMAND_FAILED,
      stdout: '',
      stderr: 'auth_error: invalid token\n',
    });
    assert.deepEqual(await ctl(['list'], { CADENCE_SOCKET: socketPath }), {
      code: EXIT_COMMAND_FAILED,
      stdout: '',
      stderr: 'auth_error: authentication required\n',
    });
  });
});

test('cadencectl exits 2 when the daemon cannot be reached', async () => {
  const socketPath = path.join(os.tmpdir(), `cadence-missing-${process.pid}.sock`);
  const run = await ctl(['--socket', socketPath, 'status']);
  assert.equal(run.code, EXIT_TRANSPORT);
  assert.equal(run.stdout, '');
  assert.ok(run.stderr.startsWith(`cannot reach daemon at ${socketPath}: `));
});

test('cadencectl rejects unusable invocations with exit 2', async () => {
  const firstLine = (run: CtlRun) => run.stderr.split('\n')[0];

  const missing = await ctl([]);
  assert.equal(missing.code, EXIT_TRANSPORT);
  assert.equal(firstLine(missing), 'missing command');

  const unknown = await ctl(['shuffle']);
  assert.equal(unknown.code, EXIT_TRANSPORT);
  assert.equal(firstLine(unknown), 'unknown command "shuffle"');

  const noUri = await ctl(['enqueue']);
  assert.equal(noUri.code, EXIT_TRANSPORT);
  assert.equal(firstLine(noUri), 'enqueue needs a uri');

  const badTimeout = await ctl(['--timeout', '0', 'list']);
  assert.deepEqual(badTimeout, { code: EXIT_TRANSPORT, stdout: '', stderr: 'invalid --timeout "0"\n' });

  const badFlag = await ctl(['--volume', '3', 'play']);
  assert.equal(badFlag.code, EXIT_TRANSPORT);
  assert.equal(badFlag.stdout, '');
});

test('cadencectl --help prints usage', async () => {
  const run = await ctl(['--help']);
  assert.equal(run.code, EXIT_OK);
  assert.ok(run.stdout.startsWith('usage: cadencectl '));
  assert.equal(run.stderr, '');
});
