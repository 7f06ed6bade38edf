import { promises as fs } from 'node:fs';
import type { StorageReadOptions, StoragePort } from '@/ports/StoragePort';
import { isMissingFileError, readJson, writeJson } from '@/shared/utils/file';

export class StorageAdapter implements StoragePort {
  public async readJson(
    filePath: string,
    fallback: unknown,
    options?: StorageReadOptions,
  ): Promise<unknown> {
    const data = await readJson(filePath);
    if (data !== undefined) {
      return data;
    }
    if (options?.writeIfMissing && !(await exists(filePath))) {
      await writeJson(filePath, fallback);
    }
    return fallback;
  }

  public async writeJson(filePath: string, data: unknown): Promise<void> {
    await writeJson(filePath, data);
  }
}

async function exists(filePath: string): Promise<boolean> {
  try {
    await fs.access(filePath);
    return true;
  } catch (error) {
    if (isMissingFileError(error)) {
      return false;
    }
    throw error;
  }
}
