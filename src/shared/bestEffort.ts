import { errorMessage, type Logger } from '@/shared/logging/logger';

/**
 * Options for an operation whose failure is tolerated. When `log` is given
 * the failure is reported at debug level under `label`.
 */
export type BestEffortOptions<T> = {
  fallback: T;
  log?: Logger;
  label?: string;
  context?: Record<string, unknown>;
};

type FailureReport = Omit<BestEffortOptions<unknown>, 'fallback'>;

function report(error: unknown, options: FailureReport): void {
  options.log?.debug(options.label ?? 'best-effort fallback used', {
    ...options.context,
    message: errorMessage(error),
  });
}

export async function bestEffort<T>(fn: () => Promise<T>, options: BestEffortOptions<T>): Promise<T> {
  try {
    return await fn();
  } catch (error) {
    report(error, options);
    return options.fallback;
  }
}

export function bestEffortSync<T>(fn: () => T, options: BestEffortOptions<T>): T {
  try {
    return fn();
  } catch (error) {
    report(error, options);
    return options.fallback;
  }
}

/** Parses JSON, returning `fallback` for anything that does not parse. */
export function safeJsonParse(raw: string, fallback: unknown, options: FailureReport = {}): unknown {
  return bestEffortSync<unknown>(() => JSON.parse(raw), { ...options, fallback });
}
