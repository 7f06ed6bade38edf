import path from 'node:path';
import type { DaemonConfig } from '@/domain/config/types';
import type { StoragePort } from '@/ports/StoragePort';
import { createConfigRepository } from '@/application/config/configRepository';
import { mergeConfig } from '@/application/config/mergeConfig';
import { StorageAdapter } from '@/adapters/storage/StorageAdapter';
import { defaultDaemonConfig } from '@/config/defaults';
import { envNameForField, readEnvironmentOverrides, resolveDataDir } from '@/config/environment';
import { createLogger, type Logger } from '@/shared/logging/logger';

export type LoadConfigOptions = {
  env?: NodeJS.ProcessEnv;
  cwd?: string;
  storage?: StoragePort;
  log?: Logger;
};

export const CONFIG_FILE_NAME = 'config.json';

/**
 * Resolves the daemon settings: defaults, then `<dataDir>/config.json`, then
 * `CADENCE_*` environment variables. Invalid values are logged and skipped.
 */
export async function loadConfig(options: LoadConfigOptions = {}): Promise<DaemonConfig> {
  const env = options.env ?? process.env;
  const log = options.log ?? createLogger('Config');
  const filePath = path.join(resolveDataDir(env, options.cwd), CONFIG_FILE_NAME);

  const repository = createConfigRepository({
    storage: options.storage ?? new StorageAdapter(),
    filePath,
    defaults: defaultDaemonConfig,
    onInvalid: (field, value) => {
      log.warn('ignoring invalid setting in config file', { filePath, field, value });
    },
  });
  const fromFile = await repository.load();

  return mergeConfig(fromFile, readEnvironmentOverrides(env), (field, value) => {
    log.warn('ignoring invalid environment variable', {
      variable: envNameForField(field) ?? field,
      value,
    });
  });
}

export { defaultDaemonConfig, defaultSocketPath } from '@/config/defaults';
