import { ProtocolError } from '@/domain/errors';
import type { Track, TrackMetadata } from '@/domain/playback/types';

export function createTrack(locator: string, metadata: TrackMetadata = {}): Track {
  if (typeof locator !== 'string' || !locator.trim()) {
    throw new ProtocolError('track locator must be a non-empty string');
  }
  const track: Track = { locator };
  if (metadata.title) {
    track.title = metadata.title;
  }
  if (typeof metadata.duration === 'number' && Number.isFinite(metadata.duration) && metadata.duration > 0) {
    track.duration = Math.round(metadata.duration);
  }
  return Object.freeze(track);
}

export function withMetadata(track: Track, metadata: TrackMetadata): Track {
  return createTrack(track.locator, { ...track, ...metadata });
}

export type LocatorKind = 'file' | 'http' | 'https' | 'uri';

export function classifyLocator(locator: string): LocatorKind {
  const lowered = locator.toLowerCase();
  if (lowered.startsWith('https://')) return 'https';
  if (lowered.startsWith('http://')) return 'http';
  if (lowered.startsWith('file://')) return 'file';
  // Anything with a scheme (spotify:, ytdl://, ...) is passed through untouched.
  if (/^[a-z][a-z0-9+.-]*:/i.test(locator) && !/^[a-z]:[\\/]/i.test(locator)) return 'uri';
  return 'file';
}
