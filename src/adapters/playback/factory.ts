import type { AdapterConfig } from '@/domain/config/types';
import type { PlaybackAdapter } from '@/ports/PlaybackAdapterPort';
import { LocalProcessAdapter } from '@/adapters/playback/LocalProcessAdapter';
import { StubRemoteAdapter } from '@/adapters/playback/StubRemoteAdapter';
import { createLogger } from '@/shared/logging/logger';

const log = createLogger('Playback', 'Factory');

/**
 * Builds the configured backend. The choice is fixed for the lifetime of the daemon.
 */
export function createPlaybackAdapter(config: AdapterConfig): PlaybackAdapter {
  switch (config.kind) {
    case 'local':
      log.info('using local mpv backend', { binary: config.mpvPath, ao: config.audioOutput ?? undefined });
      return new LocalProcessAdapter({
        binary: config.mpvPath,
        audioOutput: config.audioOutput ?? undefined,
        timeoutMs: config.timeoutMs,
      });
    case 'remote-stub':
      log.info('using remote stub backend');
      return new StubRemoteAdapter();
  }
}
