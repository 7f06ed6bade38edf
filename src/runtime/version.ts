import { readFileSync } from 'node:fs';
import path from 'node:path';
import { bestEffortSync, safeJsonParse } from '@/shared/bestEffort';
import { isRecord } from '@/shared/utils/isRecord';

export const DAEMON_NAME = 'cadence';

// Sources live one level below the package root, compiled output two.
const PACKAGE_JSON_CANDIDATES = [
  path.resolve(__dirname, '..', '..', 'package.json'),
  path.resolve(__dirname, '..', '..', '..', 'package.json'),
];

let cachedVersion: string | null = null;

export function daemonVersion(): string {
  if (cachedVersion) {
    return cachedVersion;
  }
  for (const candidate of PACKAGE_JSON_CANDIDATES) {
    const raw = bestEffortSync(() => readFileSync(candidate, 'utf8'), { fallback: '' });
    const parsed = safeJsonParse(raw, null);
    if (isRecord(parsed) && parsed.name === DAEMON_NAME && typeof parsed.version === 'string') {
      cachedVersion = parsed.version;
      return cachedVersion;
    }
  }
  cachedVersion = '0.0.0';
  return cachedVersion;
}
