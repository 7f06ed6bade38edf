import { isLogLevel } from '@/types/logLevel';
import { isAdapterKind, isAuthMode, type DaemonConfig } from '@/domain/config/types';
import { isRecord } from '@/shared/utils/isRecord';

/** Called with the dotted field path and the rejected value. */
export type InvalidSettingHandler = (field: string, value: unknown) => void;

/** Returns the accepted value, or undefined when the input is invalid. */
type Reader<T> = (value: unknown) => T | undefined;

const nonEmptyString: Reader<string> = (value) =>
  typeof value === 'string' && value.trim() ? value.trim() : undefined;

const optionalString: Reader<string | null> = (value) => {
  if (value === null || value === '') return null;
  return typeof value === 'string' ? value : undefined;
};

const integerAtLeast =
  (min: number): Reader<number> =>
  (value) =>
    typeof value === 'number' && Number.isInteger(value) && value >= min ? value : undefined;

const boolean: Reader<boolean> = (value) => (typeof value === 'boolean' ? value : undefined);

function guard<T>(predicate: (value: unknown) => value is T): Reader<T> {
  return (value) => (predicate(value) ? value : undefined);
}

export const MIN_LINE_BYTES = 64;

/**
 * Overlays a partial, untrusted settings document on top of `base`.
 * Unknown keys are ignored; invalid values are reported and leave the base value in place.
 */
export function mergeConfig(
  base: DaemonConfig,
  patch: unknown,
  onInvalid: InvalidSettingHandler,
): DaemonConfig {
  const merged = structuredClone(base);
  if (patch === undefined || patch === null) {
    return merged;
  }
  if (!isRecord(patch)) {
    onInvalid('', patch);
    return merged;
  }
  const doc: Record<string, unknown> = patch;

  const apply = <T>(
    section: Record<string, unknown> | undefined,
    field: string,
    read: Reader<T>,
    assign: (value: T) => void,
  ): void => {
    const key = field.slice(field.lastIndexOf('.') + 1);
    const raw = section?.[key];
    if (raw === undefined) return;
    const value = read(raw);
    if (value === undefined) {
      onInvalid(field, raw);
      return;
    }
    assign(value);
  };

  const sectionOf = (name: string): Record<string, unknown> | undefined => {
    const section = doc[name];
    if (section === undefined) return undefined;
    if (!isRecord(section)) {
      onInvalid(name, section);
      return undefined;
    }
    return section;
  };

  apply(doc, 'socketPath', nonEmptyString, (value) => {
    merged.socketPath = value;
  });

  const auth = sectionOf('auth');
  apply(auth, 'auth.token', optionalString, (value) => {
    merged.auth.token = value;
  });
  apply(auth, 'auth.mode', guard(isAuthMode), (value) => {
    merged.auth.mode = value;
  });

  const adapter = sectionOf('adapter');
  apply(adapter, 'adapter.kind', guard(isAdapterKind), (value) => {
    merged.adapter.kind = value;
  });
  apply(adapter, 'adapter.mpvPath', nonEmptyString, (value) => {
    merged.adapter.mpvPath = value;
  });
  apply(adapter, 'adapter.audioOutput', optionalString, (value) => {
    merged.adapter.audioOutput = value;
  });
  apply(adapter, 'adapter.timeoutMs', integerAtLeast(1), (value) => {
    merged.adapter.timeoutMs = value;
  });

  const protocol = sectionOf('protocol');
  apply(protocol, 'protocol.maxLineBytes', integerAtLeast(MIN_LINE_BYTES), (value) => {
    merged.protocol.maxLineBytes = value;
  });
  apply(protocol, 'protocol.idleTimeoutMs', integerAtLeast(0), (value) => {
    merged.protocol.idleTimeoutMs = value;
  });
  apply(protocol, 'protocol.maxConnections', integerAtLeast(1), (value) => {
    merged.protocol.maxConnections = value;
  });

  const playback = sectionOf('playback');
  apply(playback, 'playback.allowInsecureHttp', boolean, (value) => {
    merged.playback.allowInsecureHttp = value;
  });
  apply(playback, 'playback.probeMetadata', boolean, (value) => {
    merged.playback.probeMetadata = value;
  });
  apply(playback, 'playback.validateHttps', boolean, (value) => {
    merged.playback.validateHttps = value;
  });

  const logging = sectionOf('logging');
  apply(logging, 'logging.level', guard(isLogLevel), (value) => {
    merged.logging.level = value;
  });
  apply(logging, 'logging.json', boolean, (value) => {
    merged.logging.json = value;
  });

  return merged;
}
