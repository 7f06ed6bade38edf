import type { TrackMetadata } from '@/domain/playback/types';

/**
 * Best-effort lookup of display metadata for a locator. Never rejects;
 * unknown fields are simply absent.
 */
export interface TrackMetadataPort {
  read(locator: string): Promise<TrackMetadata>;
}
