import type { LocatorCheckPort } from '@/ports/LocatorCheckPort';
import { createLogger, errorMessage } from '@/shared/logging/logger';

const DEFAULT_CHECK_TIMEOUT_MS = 5000;

/** Answers from servers that do not implement HEAD. */
const HEAD_UNSUPPORTED = new Set([405, 501]);

type Attempt = { ok: true; status: number } | { ok: false; timedOut: boolean; message: string };

export type HttpsLocatorCheckerOptions = {
  /** Per request; a HEAD that falls back to GET may take twice as long. */
  timeoutMs?: number;
};

function failureMessage(error: unknown): string {
  // fetch reports network failures as "fetch failed" with the reason in `cause`.
  if (error instanceof Error && error.cause instanceof Error) {
    return `${error.message}: ${error.cause.message}`;
  }
  return errorMessage(error);
}

/**
 * Asks a remote server whether a stream exists: HEAD first, GET when HEAD
 * fails or is not supported. Only a 2xx answer is accepted.
 */
export class HttpsLocatorChecker implements LocatorCheckPort {
  private readonly log = createLogger('Playback', 'LocatorCheck');
  private readonly timeoutMs: number;

  constructor(options: HttpsLocatorCheckerOptions = {}) {
    this.timeoutMs = options.timeoutMs ?? DEFAULT_CHECK_TIMEOUT_MS;
  }

  public async check(locator: string): Promise<void> {
    let attempt = await this.request(locator, 'HEAD');
    if ((!attempt.ok && !attempt.timedOut) || (attempt.ok && HEAD_UNSUPPORTED.has(attempt.status))) {
      this.log.debug('HEAD not usable; retrying with GET', {
        locator,
        status: attempt.ok ? attempt.status : undefined,
        message: attempt.ok ? undefined : attempt.message,
      });
      attempt = await this.request(locator, 'GET');
    }
    if (!attempt.ok) {
      throw new Error(attempt.message);
    }
    if (attempt.status < 200 || attempt.status >= 300) {
      throw new Error(`non-success status ${attempt.status}`);
    }
  }

  private async request(locator: string, method: 'HEAD' | 'GET'): Promise<Attempt> {
    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), this.timeoutMs);
    timeout.unref();
    try {
      const response = await fetch(locator, { method, redirect: 'follow', signal: controller.signal });
      // Only the status matters; do not download the stream.
      await response.body?.cancel();
      return { ok: true, status: response.status };
    } catch (error) {
      if (controller.signal.aborted) {
        return { ok: false, timedOut: true, message: `no answer within ${this.timeoutMs}ms` };
      }
      return { ok: false, timedOut: false, message: failureMessage(error) };
    } finally {
      clearTimeout(timeout);
    }
  }
}
