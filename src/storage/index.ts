export type { RecordStorage, LocalStorageConfig, StorageConfig } from "./types";

export { MemoryRecordStorage, createMemoryStorage } from "./memory";

export { LocalRecordStorage, createLocalStorage } from "./local";

import { RecordStorage, StorageConfig } from "./types";
import { createMemoryStorage } from "./memory";
import { createLocalStorage } from "./local";

export const createStorage = (config: StorageConfig): RecordStorage => {
  switch (config.type) {
    case "memory":
      return createMemoryStorage();
    case "local":
      if (!config.local) {
        throw new Error("Local storage configuration required when type is 'local'");
      }
      return createLocalStorage(config.local);
    default: {
      const unknown: never = config.type;
      throw new Error(`Unknown storage type: ${String(unknown)}`);
    }
  }
};
