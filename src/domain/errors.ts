/**
 * Error kinds as they appear in the `error.kind` field of a response envelope.
 */
export type ErrorKind =
  | 'protocol_error'
  | 'auth_error'
  | 'queue_empty'
  | 'adapter_error'
  | 'internal_error';

export const ERROR_KINDS: readonly ErrorKind[] = [
  'protocol_error',
  'auth_error',
  'queue_empty',
  'adapter_error',
  'internal_error',
];

/**
 * Base class for every failure the dispatcher knows how to put on the wire.
 */
export abstract class DaemonError extends Error {
  public abstract readonly kind: ErrorKind;

  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

/** Malformed, oversized or unknown input. The connection stays open. */
export class ProtocolError extends DaemonError {
  public readonly kind = 'protocol_error';
}

/** Missing or wrong token. The connection is closed after the reply. */
export class AuthError extends DaemonError {
  public readonly kind = 'auth_error';
}

/** Nothing to play; session state is left untouched. */
export class QueueEmptyError extends DaemonError {
  public readonly kind = 'queue_empty';

  constructor(message = 'queue is empty') {
    super(message);
  }
}

export type AdapterErrorReason =
  | 'not_implemented'
  | 'unavailable'
  | 'timeout'
  | 'process_exited'
  | 'ipc_error'
  | 'failed';

/** Backend failure; the session moves to `Error`. */
export class AdapterError extends DaemonError {
  public readonly kind = 'adapter_error';

  constructor(
    public readonly reason: AdapterErrorReason,
    message: string,
  ) {
    super(message);
  }
}

/** Raised for commands that arrive while the daemon is stopping. */
export class ShutdownError extends DaemonError {
  public readonly kind = 'internal_error';

  constructor() {
    super('daemon shutting down');
  }
}

export function isDaemonError(error: unknown): error is DaemonError {
  return error instanceof DaemonError;
}
