export type PlaybackState = 'Stopped' | 'Playing' | 'Paused' | 'Error';

export interface TrackMetadata {
  title?: string;
  /** Seconds, rounded. */
  duration?: number;
}

/**
 * Immutable value object; two tracks are the same track when their locators match.
 */
export interface Track extends TrackMetadata {
  readonly locator: string;
}

/**
 * What a backend reports about itself. `position` is best-effort seconds.
 */
export interface BackendStatus {
  state: PlaybackState;
  track?: string;
  position?: number;
}

/**
 * Committed view of the session, as handed to `status` callers.
 */
export interface SessionSnapshot {
  state: PlaybackState;
  track?: Track;
  position?: number;
  queueLength: number;
  lastError?: string;
}
