import path from 'node:path';
import { isRecord } from '@/shared/utils/isRecord';

type EnvParser = 'string' | 'integer' | 'boolean';

type EnvBinding = {
  name: string;
  /** Dotted path into the settings document. */
  field: string;
  parse: EnvParser;
};

/**
 * Environment variables understood by the daemon, in documentation order.
 */
export const ENV_BINDINGS: readonly EnvBinding[] = [
  { name: 'CADENCE_SOCKET', field: 'socketPath', parse: 'string' },
  { name: 'CADENCE_TOKEN', field: 'auth.token', parse: 'string' },
  { name: 'CADENCE_AUTH_MODE', field: 'auth.mode', parse: 'string' },
  { name: 'CADENCE_ADAPTER', field: 'adapter.kind', parse: 'string' },
  { name: 'CADENCE_MPV_PATH', field: 'adapter.mpvPath', parse: 'string' },
  { name: 'CADENCE_MPV_AO', field: 'adapter.audioOutput', parse: 'string' },
  { name: 'CADENCE_ADAPTER_TIMEOUT_MS', field: 'adapter.timeoutMs', parse: 'integer' },
  { name: 'CADENCE_MAX_LINE_BYTES', field: 'protocol.maxLineBytes', parse: 'integer' },
  { name: 'CADENCE_IDLE_TIMEOUT_MS', field: 'protocol.idleTimeoutMs', parse: 'integer' },
  { name: 'CADENCE_MAX_CONNECTIONS', field: 'protocol.maxConnections', parse: 'integer' },
  { name: 'CADENCE_ALLOW_INSECURE', field: 'playback.allowInsecureHttp', parse: 'boolean' },
  { name: 'CADENCE_PROBE_METADATA', field: 'playback.probeMetadata', parse: 'boolean' },
  { name: 'CADENCE_VALIDATE_HTTPS', field: 'playback.validateHttps', parse: 'boolean' },
  { name: 'CADENCE_LOG_LEVEL', field: 'logging.level', parse: 'string' },
  { name: 'CADENCE_LOG_JSON', field: 'logging.json', parse: 'boolean' },
];

const TRUE_VALUES = new Set(['1', 'true', 'yes', 'on']);
const FALSE_VALUES = new Set(['0', 'false', 'no', 'off']);

/**
 * Converts a raw variable; values that do not parse are passed through as
 * strings so the merge step rejects and reports them.
 */
function parseValue(raw: string, parser: EnvParser): unknown {
  const trimmed = raw.trim();
  switch (parser) {
    case 'string':
      return trimmed;
    case 'integer':
      return /^\d+$/.test(trimmed) ? Number(trimmed) : raw;
    case 'boolean': {
      const lowered = trimmed.toLowerCase();
      if (TRUE_VALUES.has(lowered)) return true;
      if (FALSE_VALUES.has(lowered)) return false;
      return raw;
    }
  }
}

/**
 * Builds a settings document from the `CADENCE_*` variables that are set.
 */
export function readEnvironmentOverrides(env: NodeJS.ProcessEnv): Record<string, unknown> {
  const overrides: Record<string, unknown> = {};
  for (const binding of ENV_BINDINGS) {
    const raw = env[binding.name];
    if (raw === undefined) continue;
    const [head, leaf] = binding.field.split('.');
    const value = parseValue(raw, binding.parse);
    if (leaf === undefined) {
      overrides[head] = value;
      continue;
    }
    const existing = overrides[head];
    const section: Record<string, unknown> = isRecord(existing) ? { ...existing } : {};
    section[leaf] = value;
    overrides[head] = section;
  }
  return overrides;
}

export function envNameForField(field: string): string | undefined {
  return ENV_BINDINGS.find((binding) => binding.field === field)?.name;
}

/**
 * Directory holding `config.json`; `CADENCE_DATA_DIR` or `./data`.
 */
export function resolveDataDir(env: NodeJS.ProcessEnv, cwd = process.cwd()): string {
  const configured = env.CADENCE_DATA_DIR?.trim();
  return configured ? path.resolve(cwd, configured) : path.resolve(cwd, 'data');
}
