import { RecordStorage } from "./types";

export class MemoryRecordStorage implements RecordStorage {
  private records = new Map<string, string>();

  async read(key: string): Promise<string | null> {
    return this.records.get(key) ?? null;
  }

  async write(key: string, data: string): Promise<void> {
    this.records.set(key, data);
  }

  async delete(key: string): Promise<void> {
    this.records.delete(key);
  }

  async exists(key: string): Promise<boolean> {
    return this.records.has(key);
  }

  async list(prefix: string): Promise<string[]> {
    const normalized = prefix.endsWith("/") ? prefix : `${prefix}/`;
    return Array.from(this.records.keys())
      .filter((key) => key.startsWith(normalized) && !key.slice(normalized.length).includes("/"))
      .sort();
  }

  clear(): void {
    this.records.clear();
  }

  size(): number {
    return this.records.size;
  }
}

export const createMemoryStorage = (): MemoryRecordStorage => {
  return new MemoryRecordStorage();
};
