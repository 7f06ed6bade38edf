import { AdapterError } from '@/domain/errors';
import type { BackendStatus, Track } from '@/domain/playback/types';
import type { PlaybackAdapter } from '@/ports/PlaybackAdapterPort';
import { createLogger } from '@/shared/logging/logger';

/**
 * Placeholder for a streaming-service backend. Every transport call fails with
 * `not_implemented` until real credentials and an integration exist.
 */
export class StubRemoteAdapter implements PlaybackAdapter {
  public readonly kind = 'remote-stub';
  private readonly log = createLogger('Playback', 'RemoteStub');

  public async start(): Promise<void> {
    this.log.warn('remote backend is a stub; transport commands will fail');
  }

  public async play(track: Track): Promise<void> {
    throw this.notImplemented(`play ${track.locator}`);
  }

  public async pause(): Promise<void> {
    throw this.notImplemented('pause');
  }

  public async resume(): Promise<void> {
    throw this.notImplemented('resume');
  }

  public async stop(): Promise<void> {
    throw this.notImplemented('stop');
  }

  public async currentStatus(): Promise<BackendStatus> {
    throw this.notImplemented('status');
  }

  public async shutdown(): Promise<void> {
    /* nothing to release */
  }

  private notImplemented(operation: string): AdapterError {
    return new AdapterError('not_implemented', `remote backend: ${operation} not implemented`);
  }
}
