/**
 * Record storage: string values addressed by slash-separated keys.
 *
 * Every persisted structure of the engine (queues, status sidecars) goes
 * through this adapter so the same code runs against the filesystem or memory.
 */
export interface RecordStorage {
  /** Returns null when the key does not exist. */
  read(key: string): Promise<string | null>;

  /** Replaces the value atomically: readers see the old or the new value, never a mix. */
  write(key: string, data: string): Promise<void>;

  /** Deleting an absent key is a no-op. */
  delete(key: string): Promise<void>;

  exists(key: string): Promise<boolean>;

  list(prefix: string): Promise<string[]>;
}

export interface LocalStorageConfig {
  basePath: string;
  createDirectories?: boolean;
}

export interface StorageConfig {
  type: "memory" | "local";
  local?: LocalStorageConfig;
}
