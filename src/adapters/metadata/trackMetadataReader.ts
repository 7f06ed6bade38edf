import path from 'node:path';
import { fileURLToPath } from 'node:url';
import { parseFile } from 'music-metadata';
import type { TrackMetadata } from '@/domain/playback/types';
import { classifyLocator } from '@/domain/playback/track';
import type { TrackMetadataPort } from '@/ports/TrackMetadataPort';
import { createLogger, errorMessage } from '@/shared/logging/logger';

const DEFAULT_PROBE_TIMEOUT_MS = 2000;
const MAX_CACHE_ENTRIES = 512;

export type TrackMetadataReaderOptions = {
  timeoutMs?: number;
  /** Relative locators resolve against this directory. */
  baseDir?: string;
};

/**
 * Reads title and duration of local files with music-metadata. Remote
 * locators are not probed. Results, including misses, are cached per path.
 */
export class TrackMetadataReader implements TrackMetadataPort {
  private readonly log = createLogger('Metadata', 'Reader');
  private readonly cache = new Map<string, TrackMetadata>();
  private readonly timeoutMs: number;
  private readonly baseDir: string;

  constructor(options: TrackMetadataReaderOptions = {}) {
    this.timeoutMs = options.timeoutMs ?? DEFAULT_PROBE_TIMEOUT_MS;
    this.baseDir = options.baseDir ?? process.cwd();
  }

  public async read(locator: string): Promise<TrackMetadata> {
    const filePath = this.resolvePath(locator);
    if (!filePath) {
      return {};
    }
    const cached = this.cache.get(filePath);
    if (cached) {
      return cached;
    }
    const metadata = await this.probe(filePath);
    if (this.cache.size >= MAX_CACHE_ENTRIES) {
      const oldest = this.cache.keys().next();
      if (!oldest.done) {
        this.cache.delete(oldest.value);
      }
    }
    this.cache.set(filePath, metadata);
    return metadata;
  }

  private resolvePath(locator: string): string | null {
    const kind = classifyLocator(locator);
    if (kind !== 'file') {
      return null;
    }
    if (locator.toLowerCase().startsWith('file://')) {
      try {
        return fileURLToPath(locator);
      } catch (error) {
        this.log.debug('unusable file url', { locator, message: errorMessage(error) });
        return null;
      }
    }
    return path.resolve(this.baseDir, locator);
  }

  private async probe(filePath: string): Promise<TrackMetadata> {
    let timer: NodeJS.Timeout | undefined;
    const timeout = new Promise<never>((_, reject) => {
      timer = setTimeout(() => reject(new Error(`probe timed out after ${this.timeoutMs}ms`)), this.timeoutMs);
    });
    try {
      const meta = await Promise.race([parseFile(filePath, { skipCovers: true }), timeout]);
      const metadata: TrackMetadata = {};
      const title = meta.common.title?.trim();
      if (title) {
        const artist = meta.common.artist?.trim();
        metadata.title = artist ? `${artist} - ${title}` : title;
      }
      const duration = meta.format.duration;
      if (typeof duration === 'number' && duration > 0) {
        metadata.duration = Math.round(duration);
      }
      return metadata;
    } catch (error) {
      this.log.debug('metadata probe failed', { path: filePath, message: errorMessage(error) });
      return {};
    } finally {
      clearTimeout(timer);
    }
  }
}
