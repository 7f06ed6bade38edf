import { spawn, type ChildProcess } from 'node:child_process';
import { promises as fs } from 'node:fs';
import net from 'node:net';
import os from 'node:os';
import path from 'node:path';
import { setTimeout as sleep } from 'node:timers/promises';
import { AdapterError } from '@/domain/errors';
import { createLogger, errorMessage } from '@/shared/logging/logger';
import { bestEffort } from '@/shared/bestEffort';

const DEFAULT_KILL_TIMEOUT_MS = 2000;
const IPC_POLL_INTERVAL_MS = 100;
const IPC_POLL_ATTEMPTS = 50;
const FALLBACK_POLL_ATTEMPTS = 30;

export type MpvLaunchOptions = {
  binary: string;
  /** Passed as `--ao=`; headless hosts use `null`. */
  audioOutput?: string;
  ipcPath?: string;
  pollAttempts?: number;
  pollIntervalMs?: number;
};

/**
 * A running backend process with an IPC socket ready to accept connections.
 */
export interface MpvHandle {
  readonly ipcPath: string;
  readonly pid: number | undefined;
  readonly exited: boolean;
  onExit(listener: (code: number | null, signal: NodeJS.Signals | null) => void): void;
  terminate(killTimeoutMs?: number): Promise<void>;
}

export type MpvLauncher = (options: MpvLaunchOptions) => Promise<MpvHandle>;

export function defaultIpcPath(): string {
  return path.join(os.tmpdir(), `cadence-mpv-${process.pid}-${Date.now()}.sock`);
}

class MpvChildHandle implements MpvHandle {
  private readonly log = createLogger('Playback', 'MpvProcess');
  private readonly exitListeners = new Set<(code: number | null, signal: NodeJS.Signals | null) => void>();
  private readonly exitPromise: Promise<void>;
  private hasExited = false;
  private lastStderrLine: string | null = null;
  private spawnError: NodeJS.ErrnoException | null = null;
  private exitCode: number | null = null;

  constructor(
    private readonly child: ChildProcess,
    public readonly ipcPath: string,
  ) {
    this.exitPromise = new Promise((resolve) => {
      child.on('exit', (code, signal) => {
        this.hasExited = true;
        this.exitCode = code;
        this.log.info('mpv exited', {
          pid: child.pid,
          code,
          signal,
          stderr: this.lastStderrLine ?? undefined,
        });
        for (const listener of this.exitListeners) {
          listener(code, signal);
        }
        resolve();
      });
      child.on('error', (error: NodeJS.ErrnoException) => {
        this.spawnError = error;
        if (!child.pid) {
          // Never started, so there will be no exit event.
          this.hasExited = true;
          resolve();
        }
        this.log.error('mpv process error', { message: error.message, code: error.code });
      });
    });
    child.stderr?.on('data', (chunk: Buffer) => {
      const message = chunk.toString().trim();
      if (message) {
        this.lastStderrLine = message.split('\n').pop() ?? message;
        this.log.spam('mpv stderr', { message });
      }
    });
  }

  public get pid(): number | undefined {
    return this.child.pid;
  }

  public get exited(): boolean {
    return this.hasExited;
  }

  public onExit(listener: (code: number | null, signal: NodeJS.Signals | null) => void): void {
    this.exitListeners.add(listener);
  }

  public startupFailure(binary: string): AdapterError | null {
    if (this.spawnError?.code === 'ENOENT') {
      return new AdapterError('unavailable', `mpv binary not found: ${binary}`);
    }
    if (this.spawnError) {
      return new AdapterError('unavailable', `failed to spawn mpv: ${this.spawnError.message}`);
    }
    if (this.hasExited) {
      const detail = this.lastStderrLine ? `: ${this.lastStderrLine}` : '';
      return new AdapterError('process_exited', `mpv exited during startup (code=${this.exitCode})${detail}`);
    }
    return null;
  }

  public async terminate(killTimeoutMs = DEFAULT_KILL_TIMEOUT_MS): Promise<void> {
    if (!this.hasExited) {
      this.child.kill('SIGTERM');
      const killTimer = setTimeout(() => {
        if (!this.hasExited) {
          this.log.warn('mpv ignored SIGTERM; killing', { pid: this.child.pid });
          this.child.kill('SIGKILL');
        }
      }, killTimeoutMs);
      await this.exitPromise;
      clearTimeout(killTimer);
    }
    await bestEffort(() => fs.rm(this.ipcPath, { force: true }), {
      fallback: undefined,
      log: this.log,
      label: 'mpv ipc socket not removed',
      context: { ipcPath: this.ipcPath },
    });
  }
}

function buildArgs(options: MpvLaunchOptions, ipcPath: string, minimal: boolean): string[] {
  if (minimal) {
    return ['--idle', `--input-ipc-server=${ipcPath}`];
  }
  return [
    '--no-config',
    '--no-video',
    '--idle',
    '--no-terminal',
    ...(options.audioOutput ? [`--ao=${options.audioOutput}`] : []),
    `--input-ipc-server=${ipcPath}`,
  ];
}

function canConnect(ipcPath: string): Promise<boolean> {
  return new Promise((resolve) => {
    const probe = net.createConnection(ipcPath);
    probe.once('connect', () => {
      probe.destroy();
      resolve(true);
    });
    probe.once('error', () => {
      probe.destroy();
      resolve(false);
    });
  });
}

async function spawnAndWait(
  options: MpvLaunchOptions,
  ipcPath: string,
  minimal: boolean,
  attempts: number,
): Promise<MpvChildHandle> {
  const args = buildArgs(options, ipcPath, minimal);
  const child = spawn(options.binary, args, { stdio: ['ignore', 'ignore', 'pipe'] });
  const handle = new MpvChildHandle(child, ipcPath);
  const interval = options.pollIntervalMs ?? IPC_POLL_INTERVAL_MS;

  for (let attempt = 0; attempt < attempts; attempt += 1) {
    // Let 'error'/'exit' from the spawn land before checking.
    await sleep(attempt === 0 ? 0 : interval);
    const failure = handle.startupFailure(options.binary);
    if (failure) {
      throw failure;
    }
    if (await canConnect(ipcPath)) {
      return handle;
    }
  }

  await handle.terminate();
  throw new AdapterError('timeout', `mpv ipc socket did not appear at ${ipcPath}`);
}

/**
 * Spawns mpv in idle mode and waits for its JSON IPC socket. When the full
 * flag set does not come up, one retry runs with the minimal flags.
 */
export const launchMpv: MpvLauncher = async (options) => {
  const log = createLogger('Playback', 'MpvProcess');
  const ipcPath = options.ipcPath ?? defaultIpcPath();
  await bestEffort(() => fs.rm(ipcPath, { force: true }), {
    fallback: undefined,
    log,
    label: 'stale mpv ipc socket not removed',
    context: { ipcPath },
  });
  const attempts = options.pollAttempts ?? IPC_POLL_ATTEMPTS;

  try {
    const handle = await spawnAndWait(options, ipcPath, false, attempts);
    log.info('mpv started', { pid: handle.pid, ipcPath });
    return handle;
  } catch (error) {
    // A binary that cannot be spawned will not spawn with fewer flags either.
    if (error instanceof AdapterError && error.reason === 'unavailable') {
      throw error;
    }
    log.warn('mpv failed to start; retrying with minimal flags', { message: errorMessage(error) });
  }

  const fallbackAttempts = Math.min(attempts, FALLBACK_POLL_ATTEMPTS);
  const handle = await spawnAndWait(options, ipcPath, true, fallbackAttempts);
  log.info('mpv started with minimal flags', { pid: handle.pid, ipcPath });
  return handle;
};
