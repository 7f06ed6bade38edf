import type { LogLevel } from '@/types/logLevel';

export type AdapterKind = 'local' | 'remote-stub';

/**
 * `first-message`: the first command of a connection must carry the token.
 * `every-message`: every command must carry it.
 */
export type AuthMode = 'first-message' | 'every-message';

export interface AuthConfig {
  token: string | null;
  mode: AuthMode;
}

export interface AdapterConfig {
  kind: AdapterKind;
  mpvPath: string;
  /** mpv `--ao` value; null keeps mpv's own default. */
  audioOutput: string | null;
  timeoutMs: number;
}

export interface ProtocolConfig {
  maxLineBytes: number;
  /** 0 disables the idle timeout. */
  idleTimeoutMs: number;
  maxConnections: number;
}

export interface PlaybackConfig {
  allowInsecureHttp: boolean;
  probeMetadata: boolean;
  /** Check that `https://` locators answer before queueing them. */
  validateHttps: boolean;
}

export interface LoggingConfig {
  level: LogLevel;
  json: boolean;
}

/**
 * Fully resolved daemon configuration (defaults, then file, then environment).
 */
export interface DaemonConfig {
  socketPath: string;
  auth: AuthConfig;
  adapter: AdapterConfig;
  protocol: ProtocolConfig;
  playback: PlaybackConfig;
  logging: LoggingConfig;
}

export const ADAPTER_KINDS: readonly AdapterKind[] = ['local', 'remote-stub'];

export const AUTH_MODES: readonly AuthMode[] = ['first-message', 'every-message'];

export function isAdapterKind(value: unknown): value is AdapterKind {
  return ADAPTER_KINDS.some((known) => known === value);
}

export function isAuthMode(value: unknown): value is AuthMode {
  return AUTH_MODES.some((known) => known === value);
}
