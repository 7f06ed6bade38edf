import { createLogger, errorMessage, type Logger } from '@/shared/logging/logger';
import type { Runtime } from '@/runtime/bootstrap';

export const FORCE_EXIT_MS = 8000;

export type ShutdownHooks = {
  /** Defaults to `process`. */
  signals?: { on(event: NodeJS.Signals, listener: () => void): unknown };
  exit?: (code: number) => void;
  forceExitMs?: number;
};

/**
 * Stops the runtime on SIGINT/SIGTERM and exits. Returns the shutdown routine
 * so it can be triggered directly.
 */
export function registerShutdownHandlers(
  runtime: Runtime,
  log: Logger = createLogger('Server'),
  hooks: ShutdownHooks = {},
): () => Promise<void> {
  const exit = hooks.exit ?? ((code: number) => process.exit(code));
  const signals = hooks.signals ?? process;
  let shuttingDown: Promise<void> | null = null;

  const shutdown = (): Promise<void> => {
    if (shuttingDown) {
      return shuttingDown;
    }
    log.info('shutdown requested');

    // Force-exit watchdog so Ctrl+C cannot hang forever if a service stop never resolves.
    const forceExit = setTimeout(() => {
      log.warn('shutdown timed out; forcing exit');
      exit(1);
    }, hooks.forceExitMs ?? FORCE_EXIT_MS);

    shuttingDown = runtime
      .stop()
      .then(
        () => 0,
        (error: unknown) => {
          log.error('shutdown failed', { message: errorMessage(error) });
          return 1;
        },
      )
      .then((code) => {
        clearTimeout(forceExit);
        exit(code);
      });
    return shuttingDown;
  };

  const onSignal = (signal: NodeJS.Signals) => {
    log.info('signal received', { signal });
    void shutdown();
  };
  signals.on('SIGINT', () => onSignal('SIGINT'));
  signals.on('SIGTERM', () => onSignal('SIGTERM'));
  return shutdown;
}
