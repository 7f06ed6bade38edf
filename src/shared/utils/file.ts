import { promises as fs } from 'node:fs';
import path from 'node:path';
import { createLogger, errorMessage } from '@/shared/logging/logger';
import { safeJsonParse } from '@/shared/bestEffort';

const log = createLogger('Core', 'File');

/**
 * Ensures that the given directory path exists on disk.
 */
export async function ensureDir(dirPath: string): Promise<void> {
  await fs.mkdir(dirPath, { recursive: true });
}

function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && 'code' in error;
}

export function isMissingFileError(error: unknown): boolean {
  return isErrnoException(error) && error.code === 'ENOENT';
}

/**
 * Reads a JSON file and returns its parsed value (or undefined if missing or invalid).
 */
export async function readJson(filePath: string): Promise<unknown> {
  let content: string;
  try {
    content = await fs.readFile(filePath, 'utf-8');
  } catch (error) {
    if (!isMissingFileError(error)) {
      log.warn('failed to read json', { filePath, error: errorMessage(error) });
    }
    return undefined;
  }
  const parsed = safeJsonParse(content, undefined, {
    log,
    label: 'json parse failed',
    context: { filePath },
  });
  if (parsed === undefined) {
    log.warn('failed to read json', { filePath, error: 'invalid json' });
  }
  return parsed;
}

/**
 * Serializes an object to JSON and writes it to disk (pretty printed).
 * The file is replaced through a rename so readers never see a partial write.
 */
export async function writeJson(filePath: string, data: unknown): Promise<void> {
  await ensureDir(path.dirname(filePath));
  const tmpPath = `${filePath}.${process.pid}.tmp`;
  await fs.writeFile(tmpPath, `${JSON.stringify(data, null, 2)}\n`, 'utf-8');
  await fs.rename(tmpPath, filePath);
}
