export type StorageReadOptions = {
  /** Persist `fallback` when the file does not exist yet. */
  writeIfMissing?: boolean;
};

export interface StoragePort {
  /** Resolves the parsed document, or `fallback` when it is missing or unreadable. */
  readJson(path: string, fallback: unknown, options?: StorageReadOptions): Promise<unknown>;
  writeJson(path: string, data: unknown): Promise<void>;
}
