import { AdapterError } from '@/domain/errors';

/**
 * Races a backend call against a timer; a hang becomes `AdapterError('timeout')`.
 * Non-adapter failures are wrapped as `AdapterError('failed')`.
 */
export async function withAdapterTimeout<T>(
  label: string,
  fn: () => Promise<T>,
  timeoutMs: number,
): Promise<T> {
  let timeoutHandle: NodeJS.Timeout | null = null;
  const timeoutPromise = new Promise<never>((_, reject) => {
    timeoutHandle = setTimeout(() => {
      reject(new AdapterError('timeout', `${label} timed out after ${timeoutMs}ms`));
    }, timeoutMs);
  });

  try {
    return await Promise.race([fn(), timeoutPromise]);
  } catch (error) {
    if (error instanceof AdapterError) {
      throw error;
    }
    const message = error instanceof Error ? error.message : String(error);
    throw new AdapterError('failed', `${label} failed: ${message}`);
  } finally {
    if (timeoutHandle) {
      clearTimeout(timeoutHandle);
    }
  }
}
