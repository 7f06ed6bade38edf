import { AdapterError, ProtocolError, QueueEmptyError, ShutdownError } from '@/domain/errors';
import { TrackQueue } from '@/domain/playback/queue';
import { classifyLocator, createTrack, withMetadata } from '@/domain/playback/track';
import type { PlaybackState, SessionSnapshot, Track, TrackMetadata } from '@/domain/playback/types';
import type { PlaybackAdapter } from '@/ports/PlaybackAdapterPort';
import type { LocatorCheckPort } from '@/ports/LocatorCheckPort';
import type { TrackMetadataPort } from '@/ports/TrackMetadataPort';
import { SerialTaskQueue } from '@/shared/serialTaskQueue';
import { createLogger, errorMessage, type Logger } from '@/shared/logging/logger';

export type PlaybackSessionOptions = {
  adapter: PlaybackAdapter;
  metadata?: TrackMetadataPort;
  /** Confirms `https://` locators answer before they are queued. */
  locatorCheck?: LocatorCheckPort;
  /** Accept plain `http://` locators on enqueue. */
  allowInsecureHttp?: boolean;
  log?: Logger;
};

export type TransportResult = {
  state: PlaybackState;
  track?: Track;
};

/**
 * The single authoritative playback session: transport state, current track
 * and queue. Every command runs as one task on a serial queue, so callers on
 * different connections observe a total order; adapter calls happen inside
 * the task and are bounded by the adapter's own timeout.
 */
export class PlaybackSession {
  private readonly log: Logger;
  private readonly adapter: PlaybackAdapter;
  private readonly queue = new TrackQueue();
  private readonly tasks = new SerialTaskQueue();
  private readonly metadata = new Map<string, TrackMetadata>();
  private state: PlaybackState = 'Stopped';
  private current: Track | null = null;
  private lastError: string | null = null;
  private closing: Promise<void> | null = null;

  constructor(private readonly options: PlaybackSessionOptions) {
    this.adapter = options.adapter;
    this.log = options.log ?? createLogger('Session');
  }

  public get shuttingDown(): boolean {
    return this.closing !== null;
  }

  public async start(): Promise<void> {
    await this.adapter.start();
    this.log.info('playback session ready', { backend: this.adapter.kind });
  }

  public play(): Promise<TransportResult> {
    return this.submit('play', async () => {
      const track = this.current;
      if (!track) {
        throw new QueueEmptyError('no current track; use next to start the queue');
      }
      if (this.state === 'Playing') {
        return this.result();
      }
      if (this.state === 'Paused') {
        await this.transition(track, 'Playing', () => this.adapter.resume());
      } else {
        await this.transition(track, 'Playing', () => this.adapter.play(track));
      }
      return this.result();
    });
  }

  public pause(): Promise<TransportResult> {
    return this.submit('pause', async () => {
      if (this.state !== 'Playing') {
        return this.result();
      }
      await this.transition(this.current, 'Paused', () => this.adapter.pause());
      return this.result();
    });
  }

  public next(): Promise<TransportResult> {
    return this.submit('next', async () => {
      const track = this.queue.shift();
      if (!track) {
        throw new QueueEmptyError();
      }
      await this.transition(track, 'Playing', () => this.adapter.play(track));
      return this.result();
    });
  }

  public stop(): Promise<TransportResult> {
    return this.submit('stop', async () => {
      await this.transition(null, 'Stopped', () => this.adapter.stop());
      return this.result();
    });
  }

  /**
   * Committed state plus the backend's position. Never changes the state; a
   * failing backend only costs the position.
   */
  public status(): Promise<SessionSnapshot> {
    return this.submit('status', async () => {
      const snapshot = this.snapshot();
      if (this.state !== 'Playing' && this.state !== 'Paused') {
        return snapshot;
      }
      try {
        const backend = await this.adapter.currentStatus();
        if (backend.position !== undefined) {
          snapshot.position = backend.position;
        }
      } catch (error) {
        this.log.debug('backend status unavailable', { message: errorMessage(error) });
      }
      return snapshot;
    });
  }

  /**
   * Validates and queues a locator. The network check of `https://`
   * locators runs before the command is queued, so it never holds up other
   * commands.
   */
  public async enqueue(locator: string): Promise<number> {
    if (this.closing) {
      throw new ShutdownError();
    }
    const track = createTrack(locator);
    const kind = classifyLocator(track.locator);
    if (kind === 'http' && !this.options.allowInsecureHttp) {
      throw new ProtocolError('insecure http:// locators are not allowed');
    }
    if (kind === 'https' && this.options.locatorCheck) {
      try {
        await this.options.locatorCheck.check(track.locator);
      } catch (error) {
        this.log.info('remote locator refused', { locator: track.locator, message: errorMessage(error) });
        throw new ProtocolError(`url validation failed: ${errorMessage(error)}`);
      }
    }
    return this.submit('enqueue', async () => {
      const length = this.queue.enqueue(track);
      this.log.debug('track enqueued', { locator: track.locator, queueLength: length });
      this.probeMetadata(track.locator);
      return length;
    });
  }

  public list(): Promise<string[]> {
    return this.submit('list', async () => this.queue.locators());
  }

  /** State as of the last completed command. */
  public snapshot(): SessionSnapshot {
    const snapshot: SessionSnapshot = { state: this.state, queueLength: this.queue.length };
    if (this.current) {
      snapshot.track = this.decorate(this.current);
    }
    if (this.state === 'Error' && this.lastError) {
      snapshot.lastError = this.lastError;
    }
    return snapshot;
  }

  /**
   * Rejects new commands, lets queued ones finish, then releases the backend.
   */
  public shutdown(): Promise<void> {
    if (!this.closing) {
      this.log.info('playback session shutting down', { pending: this.tasks.pending });
      this.closing = this.tasks.drain().then(() => this.adapter.shutdown());
    }
    return this.closing;
  }

  private submit<T>(name: string, task: () => Promise<T>): Promise<T> {
    if (this.closing) {
      return Promise.reject(new ShutdownError());
    }
    this.log.spam('command queued', { command: name, pending: this.tasks.pending });
    return this.tasks.run(task);
  }

  /**
   * Runs one adapter call and commits `target` on success. On failure the
   * session enters `Error`, keeping `track` as the track that failed.
   */
  private async transition(
    track: Track | null,
    target: PlaybackState,
    call: () => Promise<void>,
  ): Promise<void> {
    const from = this.state;
    try {
      await call();
    } catch (error) {
      const failure =
        error instanceof AdapterError ? error : new AdapterError('failed', errorMessage(error));
      const replaced = this.current;
      this.state = 'Error';
      this.current = track ?? this.current;
      this.lastError = failure.message;
      if (replaced && replaced.locator !== this.current?.locator) {
        this.forgetMetadata(replaced.locator);
      }
      this.log.warn('playback transition failed', {
        from,
        to: target,
        reason: failure.reason,
        message: failure.message,
      });
      throw failure;
    }
    const previous = this.current;
    this.state = target;
    this.current = track;
    this.lastError = null;
    if (previous && previous.locator !== track?.locator) {
      this.forgetMetadata(previous.locator);
    }
    this.log.info('playback state changed', { from, to: target, track: track?.locator });
  }

  private result(): TransportResult {
    const result: TransportResult = { state: this.state };
    if (this.current) {
      result.track = this.decorate(this.current);
    }
    return result;
  }

  private decorate(track: Track): Track {
    const known = this.metadata.get(track.locator);
    return known ? withMetadata(track, known) : track;
  }

  /** Metadata is kept only for tracks still queued or current. */
  private isReferenced(locator: string): boolean {
    return this.current?.locator === locator || this.queue.locators().includes(locator);
  }

  private forgetMetadata(locator: string): void {
    if (!this.isReferenced(locator)) {
      this.metadata.delete(locator);
    }
  }

  private probeMetadata(locator: string): void {
    const reader = this.options.metadata;
    if (!reader || this.metadata.has(locator)) {
      return;
    }
    void reader
      .read(locator)
      .then((metadata) => {
        if ((metadata.title !== undefined || metadata.duration !== undefined) && this.isReferenced(locator)) {
          this.metadata.set(locator, metadata);
        }
      })
      .catch((error: unknown) => {
        this.log.debug('metadata probe failed', { locator, message: errorMessage(error) });
      });
  }
}
