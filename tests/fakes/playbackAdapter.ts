import { AdapterError } from '../../src/domain/errors';
import type { BackendStatus, Track } from '../../src/domain/playback/types';
import type { PlaybackAdapter, PlaybackAdapterKind } from '../../src/ports/PlaybackAdapterPort';
import { withAdapterTimeout } from '../../src/adapters/playback/withAdapterTimeout';

export type FakeOperation = 'start' | 'play' | 'pause' | 'resume' | 'stop' | 'status' | 'shutdown';

type Scripted = { kind: 'fail'; error: Error } | { kind: 'hang' } | { kind: 'delay'; ms: number };

/**
 * In-memory backend. Records every call as `op` or `op:locator` and can be
 * scripted to fail, hang or stall the next call of an operation. Calls are
 * bounded by `timeoutMs` the same way the real backends are.
 */
export class FakePlaybackAdapter implements PlaybackAdapter {
  public readonly kind: PlaybackAdapterKind = 'local';
  public readonly calls: string[] = [];
  public position: number | undefined = 12.5;
  public shutdownCount = 0;
  private readonly scripted = new Map<FakeOperation, Scripted[]>();
  private playing: string | null = null;
  private paused = false;

  constructor(private readonly timeoutMs = 1000) {}

  public failNext(operation: FakeOperation, error: Error = new AdapterError('failed', `${operation} failed`)): void {
    this.script(operation, { kind: 'fail', error });
  }

  public hangNext(operation: FakeOperation): void {
    this.script(operation, { kind: 'hang' });
  }

  public delayNext(operation: FakeOperation, ms: number): void {
    this.script(operation, { kind: 'delay', ms });
  }

  public callsOf(operation: FakeOperation): string[] {
    return this.calls.filter((call) => call === operation || call.startsWith(`${operation}:`));
  }

  public async start(): Promise<void> {
    await this.perform('start', 'start');
  }

  public async play(track: Track): Promise<void> {
    await this.perform('play', `play:${track.locator}`);
    this.playing = track.locator;
    this.paused = false;
  }

  public async pause(): Promise<void> {
    await this.perform('pause', 'pause');
    this.paused = true;
  }

  public async resume(): Promise<void> {
    await this.perform('resume', 'resume');
    this.paused = false;
  }

  public async stop(): Promise<void> {
    await this.perform('stop', 'stop');
    this.playing = null;
    this.paused = false;
  }

  public async currentStatus(): Promise<BackendStatus> {
    await this.perform('status', 'status');
    if (!this.playing) {
      return { state: 'Stopped' };
    }
    const status: BackendStatus = { state: this.paused ? 'Paused' : 'Playing', track: this.playing };
    if (this.position !== undefined) {
      status.position = this.position;
    }
    return status;
  }

  public async shutdown(): Promise<void> {
    this.calls.push('shutdown');
    this.shutdownCount += 1;
    this.playing = null;
  }

  private script(operation: FakeOperation, entry: Scripted): void {
    const entries = this.scripted.get(operation) ?? [];
    entries.push(entry);
    this.scripted.set(operation, entries);
  }

  private perform(operation: FakeOperation, record: string): Promise<void> {
    this.calls.push(record);
    const next = this.scripted.get(operation)?.shift();
    return withAdapterTimeout(
      `fake ${operation}`,
      async () => {
        if (!next) return;
        switch (next.kind) {
          case 'fail':
            throw next.error;
          case 'hang':
            return new Promise<never>(() => undefined);
          case 'delay':
            await new Promise((resolve) => setTimeout(resolve, next.ms));
            return;
        }
      },
      this.timeoutMs,
    );
  }
}
