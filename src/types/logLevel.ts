export type LogLevel = 'spam' | 'debug' | 'info' | 'warn' | 'error' | 'none';

export const LOG_LEVELS: readonly LogLevel[] = ['spam', 'debug', 'info', 'warn', 'error', 'none'];

export function isLogLevel(value: unknown): value is LogLevel {
  return LOG_LEVELS.some((known) => known === value);
}
