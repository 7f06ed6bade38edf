import type { AdapterKind } from '@/domain/config/types';
import type { BackendStatus, Track } from '@/domain/playback/types';

export type PlaybackAdapterKind = AdapterKind;

/**
 * Transport primitives every playback backend provides.
 *
 * Each call either resolves or rejects with an `AdapterError`; implementations
 * bound their own calls with a timeout so a hung backend surfaces as an error.
 */
export interface PlaybackAdapter {
  readonly kind: PlaybackAdapterKind;
  start(): Promise<void>;
  play(track: Track): Promise<void>;
  pause(): Promise<void>;
  resume(): Promise<void>;
  stop(): Promise<void>;
  currentStatus(): Promise<BackendStatus>;
  /** Releases the backend resource (terminates a child process). Idempotent. */
  shutdown(): Promise<void>;
}
