import { createLogger, errorMessage, type Logger } from '@/shared/logging/logger';

export type StopResult =
  | { kind: 'stopped' }
  | { kind: 'timeout' }
  | { kind: 'error'; error: unknown };

type StopLogger = Pick<Logger, 'info' | 'warn' | 'error'>;

/**
 * Runs one service's stop, bounded by `timeoutMs`. Never rejects; a stop that
 * outlives the timeout keeps running and its late failure is still logged.
 */
export async function stopWithTimeout(
  name: string,
  stopFn: () => Promise<void>,
  timeoutMs: number,
  log: StopLogger = createLogger('Server'),
): Promise<StopResult> {
  let timeoutHandle: NodeJS.Timeout | null = null;
  const stopPromise = (async (): Promise<StopResult> => {
    try {
      await stopFn();
      return { kind: 'stopped' };
    } catch (error) {
      return { kind: 'error', error };
    }
  })();
  const timeoutPromise = new Promise<StopResult>((resolve) => {
    timeoutHandle = setTimeout(() => resolve({ kind: 'timeout' }), timeoutMs);
  });

  const result = await Promise.race([stopPromise, timeoutPromise]).finally(() => {
    if (timeoutHandle) {
      clearTimeout(timeoutHandle);
    }
  });

  switch (result.kind) {
    case 'stopped':
      log.info(`service ${name} stopped`);
      return result;
    case 'timeout':
      log.warn(`service ${name} stop timed out`, { timeoutMs });
      void stopPromise.then((late) => {
        if (late.kind === 'error') {
          log.error(`failed to stop ${name}`, { message: errorMessage(late.error) });
        }
      });
      return result;
    case 'error':
      log.error(`failed to stop ${name}`, { message: errorMessage(result.error) });
      return result;
  }
}
