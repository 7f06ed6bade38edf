import { createHash, timingSafeEqual } from 'node:crypto';
import { AuthError } from '@/domain/errors';
import type { AuthConfig, AuthMode } from '@/domain/config/types';

/** Per-connection auth state. */
export interface AuthState {
  authenticated: boolean;
}

function digest(value: string): Buffer {
  return createHash('sha256').update(value, 'utf8').digest();
}

/**
 * Compares in constant time regardless of where the inputs differ; hashing
 * first also hides the configured token's length.
 */
export function tokensMatch(presented: string, expected: string): boolean {
  return timingSafeEqual(digest(presented), digest(expected));
}

/**
 * Token check for incoming commands. Without a configured token every
 * command is accepted.
 */
export class AuthPolicy {
  private readonly token: string | null;
  public readonly mode: AuthMode;

  constructor(config: AuthConfig) {
    this.token = config.token;
    this.mode = config.mode;
  }

  public get enabled(): boolean {
    return this.token !== null;
  }

  /**
   * Throws `AuthError` when the command may not run. On success under
   * `first-message` the connection stays authenticated.
   */
  public authorize(connection: AuthState, presented: string | undefined): void {
    if (this.token === null) {
      return;
    }
    if (this.mode === 'first-message' && connection.authenticated) {
      return;
    }
    if (presented === undefined) {
      throw new AuthError('authentication required');
    }
    if (!tokensMatch(presented, this.token)) {
      throw new AuthError('invalid token');
    }
    connection.authenticated = true;
  }
}
