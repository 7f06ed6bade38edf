import os from 'node:os';
import path from 'node:path';
import type { DaemonConfig } from '@/domain/config/types';

export function defaultSocketPath(): string {
  const uid = typeof process.getuid === 'function' ? process.getuid() : 'user';
  return path.join(os.tmpdir(), `cadence-${uid}.sock`);
}

export function defaultDaemonConfig(): DaemonConfig {
  return {
    socketPath: defaultSocketPath(),
    auth: {
      token: null,
      mode: 'first-message',
    },
    adapter: {
      kind: 'local',
      mpvPath: 'mpv',
      audioOutput: null,
      timeoutMs: 5000,
    },
    protocol: {
      maxLineBytes: 64 * 1024,
      idleTimeoutMs: 30000,
      maxConnections: 64,
    },
    playback: {
      allowInsecureHttp: false,
      probeMetadata: true,
      validateHttps: true,
    },
    logging: {
      level: 'info',
      json: false,
    },
  };
}
