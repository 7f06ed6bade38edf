import { AdapterError } from '@/domain/errors';
import type { BackendStatus, PlaybackState, Track } from '@/domain/playback/types';
import type { PlaybackAdapter } from '@/ports/PlaybackAdapterPort';
import { withAdapterTimeout } from '@/adapters/playback/withAdapterTimeout';
import { MpvIpcClient } from '@/adapters/playback/mpv/mpvIpcClient';
import { launchMpv, type MpvHandle, type MpvLauncher } from '@/adapters/playback/mpv/mpvProcess';
import { createLogger, errorMessage } from '@/shared/logging/logger';

export type LocalProcessAdapterOptions = {
  binary: string;
  audioOutput?: string;
  timeoutMs: number;
  /**
   * Upper bound for a call that has to start mpv first: spawn, socket wait,
   * IPC connect and the command itself.
   */
  startupTimeoutMs?: number;
  ipcPath?: string;
  launcher?: MpvLauncher;
};

/**
 * Drives an mpv child process over its JSON IPC socket.
 *
 * The process is started lazily on the first transport call (or by `start`),
 * and relaunched on the next `play` after an unexpected exit.
 */
export class LocalProcessAdapter implements PlaybackAdapter {
  public readonly kind = 'local';
  private readonly log = createLogger('Playback', 'LocalProcess');
  private readonly launcher: MpvLauncher;
  private handle: MpvHandle | null = null;
  private client: MpvIpcClient | null = null;
  private launching: Promise<MpvIpcClient> | null = null;
  private currentLocator: string | null = null;
  private shuttingDown = false;

  constructor(private readonly options: LocalProcessAdapterOptions) {
    this.launcher = options.launcher ?? launchMpv;
  }

  public async start(): Promise<void> {
    try {
      await this.ensureClient();
    } catch (error) {
      // The daemon still serves clients; transport calls will retry the launch.
      this.log.warn('playback backend not available at startup', { message: errorMessage(error) });
    }
  }

  public async play(track: Track): Promise<void> {
    await this.call('play', async (client, timeoutMs) => {
      await client.command(['loadfile', track.locator, 'replace'], timeoutMs);
      await client.command(['set_property', 'pause', false], timeoutMs);
    });
    this.currentLocator = track.locator;
  }

  public async pause(): Promise<void> {
    await this.callRunning('pause', async (client, timeoutMs) => {
      await client.command(['set_property', 'pause', true], timeoutMs);
    });
  }

  public async resume(): Promise<void> {
    await this.callRunning('resume', async (client, timeoutMs) => {
      await client.command(['set_property', 'pause', false], timeoutMs);
    });
  }

  public async stop(): Promise<void> {
    if (!this.isRunning()) {
      // An idle or dead backend is already stopped.
      this.currentLocator = null;
      return;
    }
    await this.callRunning('stop', async (client, timeoutMs) => {
      await client.command(['stop'], timeoutMs);
    });
    this.currentLocator = null;
  }

  public async currentStatus(): Promise<BackendStatus> {
    if (!this.isRunning()) {
      return { state: 'Stopped' };
    }
    return this.callRunning('status', async (client, timeoutMs) => {
      const idle = await client.command(['get_property', 'idle-active'], timeoutMs);
      const paused = await client.command(['get_property', 'pause'], timeoutMs);
      const position = await client
        .command(['get_property', 'time-pos'], timeoutMs)
        .catch((error: unknown) => {
          this.log.spam('mpv position unavailable', { message: errorMessage(error) });
          return undefined;
        });
      const state: PlaybackState = idle === true ? 'Stopped' : paused === true ? 'Paused' : 'Playing';
      const status: BackendStatus = { state };
      if (state !== 'Stopped' && this.currentLocator) {
        status.track = this.currentLocator;
      }
      if (typeof position === 'number' && Number.isFinite(position)) {
        status.position = Math.max(0, Math.round(position * 10) / 10);
      }
      return status;
    });
  }

  public async shutdown(): Promise<void> {
    this.shuttingDown = true;
    const client = this.client;
    const handle = this.handle;
    this.client = null;
    this.handle = null;
    if (client?.connected) {
      await client.command(['quit'], Math.min(this.options.timeoutMs, 1000)).catch((error: unknown) => {
        this.log.debug('mpv quit not acknowledged', { message: errorMessage(error) });
      });
    }
    client?.close();
    if (handle) {
      await handle.terminate();
    }
    this.log.info('playback backend released');
  }

  private isRunning(): boolean {
    return Boolean(this.client?.connected && this.handle && !this.handle.exited);
  }

  /** Launches the backend when needed, then runs the call under one deadline. */
  private async call<T>(
    operation: string,
    fn: (client: MpvIpcClient, timeoutMs: number) => Promise<T>,
  ): Promise<T> {
    const timeoutMs = this.options.timeoutMs;
    const budget = this.client && this.isRunning() ? timeoutMs : this.startupTimeoutMs();
    return withAdapterTimeout(`mpv ${operation}`, async () => fn(await this.ensureClient(), timeoutMs), budget);
  }

  private startupTimeoutMs(): number {
    return this.options.startupTimeoutMs ?? Math.max(this.options.timeoutMs, 10000);
  }

  /** Runs the call against the live backend only; a dead process is an error. */
  private async callRunning<T>(
    operation: string,
    fn: (client: MpvIpcClient, timeoutMs: number) => Promise<T>,
  ): Promise<T> {
    const client = this.client;
    if (!client || !this.isRunning()) {
      throw new AdapterError('process_exited', `mpv is not running (${operation})`);
    }
    const timeoutMs = this.options.timeoutMs;
    return withAdapterTimeout(`mpv ${operation}`, () => fn(client, timeoutMs), timeoutMs);
  }

  private async ensureClient(): Promise<MpvIpcClient> {
    if (this.shuttingDown) {
      throw new AdapterError('unavailable', 'playback backend is shutting down');
    }
    if (this.client && this.isRunning()) {
      return this.client;
    }
    if (!this.launching) {
      this.launching = this.launch().finally(() => {
        this.launching = null;
      });
    }
    return this.launching;
  }

  private async launch(): Promise<MpvIpcClient> {
    this.client?.close();
    this.client = null;
    if (this.handle && !this.handle.exited) {
      await this.handle.terminate();
    }
    this.handle = null;

    const startupTimeoutMs = this.startupTimeoutMs();
    const launched = this.launcher({
      binary: this.options.binary,
      audioOutput: this.options.audioOutput,
      ipcPath: this.options.ipcPath,
    });
    let handle: MpvHandle;
    try {
      handle = await withAdapterTimeout('mpv startup', () => launched, startupTimeoutMs);
    } catch (error) {
      if (error instanceof AdapterError && error.reason === 'timeout') {
        // The launch may still complete; make sure that process does not linger.
        void launched
          .then((late) => late.terminate())
          .catch((lateError: unknown) => {
            this.log.debug('late mpv launch failed', { message: errorMessage(lateError) });
          });
      }
      throw error;
    }
    handle.onExit((code, signal) => {
      if (this.handle !== handle) return;
      if (!this.shuttingDown) {
        this.log.warn('mpv exited unexpectedly', { code, signal });
      }
      this.client?.close();
      this.client = null;
      this.currentLocator = null;
    });

    const client = new MpvIpcClient(handle.ipcPath);
    try {
      await withAdapterTimeout('mpv ipc connect', () => client.connect(), this.options.timeoutMs);
    } catch (error) {
      await handle.terminate();
      throw error;
    }
    client.onEvent((event) => {
      if (event.event === 'end-file') {
        this.log.debug('mpv finished a file', { reason: event.reason });
      }
    });
    this.handle = handle;
    this.client = client;
    return client;
  }
}
