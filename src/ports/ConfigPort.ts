import type { DaemonConfig } from '@/domain/config/types';

export interface ConfigPort {
  load(): Promise<DaemonConfig>;
}

export type { DaemonConfig };
