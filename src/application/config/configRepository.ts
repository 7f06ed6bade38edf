import type { ConfigPort } from '@/ports/ConfigPort';
import type { StoragePort } from '@/ports/StoragePort';
import type { DaemonConfig } from '@/domain/config/types';
import { mergeConfig, type InvalidSettingHandler } from '@/application/config/mergeConfig';

export type ConfigRepositoryOptions = {
  storage: StoragePort;
  /** Absolute path of the settings document. */
  filePath: string;
  defaults: () => DaemonConfig;
  onInvalid: InvalidSettingHandler;
};

/**
 * Settings store backed by a JSON file on disk. A missing file is created
 * with the defaults; an unreadable one falls back to them.
 */
export class ConfigRepository implements ConfigPort {
  constructor(private readonly options: ConfigRepositoryOptions) {}

  public async load(): Promise<DaemonConfig> {
    const defaults = this.options.defaults();
    const stored = await this.options.storage.readJson(this.options.filePath, defaults, {
      writeIfMissing: true,
    });
    return mergeConfig(defaults, stored, this.options.onInvalid);
  }
}

export function createConfigRepository(options: ConfigRepositoryOptions): ConfigRepository {
  return new ConfigRepository(options);
}
