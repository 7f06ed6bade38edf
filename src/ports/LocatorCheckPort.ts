/**
 * Confirms that a remote locator answers before it is queued. Rejects with
 * an error whose message says why the locator was refused.
 */
export interface LocatorCheckPort {
  check(locator: string): Promise<void>;
}
