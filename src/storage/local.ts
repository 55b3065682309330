import { mkdir, readFile, rename, rm, unlink, writeFile, access, readdir } from "fs/promises";
import { randomUUID } from "crypto";
import { dirname, join, relative, resolve, sep } from "path";
import { RecordStorage, LocalStorageConfig } from "./types";

const isNotFound = (error: unknown): boolean =>
  error instanceof Error && "code" in error && error.code === "ENOENT";

export class LocalRecordStorage implements RecordStorage {
  private basePath: string;
  private createDirectories: boolean;

  constructor(config: LocalStorageConfig) {
    this.basePath = resolve(config.basePath);
    this.createDirectories = config.createDirectories ?? true;
  }

  getFilePath(key: string): string {
    const filePath = resolve(this.basePath, key);
    if (filePath !== this.basePath && !filePath.startsWith(this.basePath + sep)) {
      throw new Error(`Key escapes storage directory: ${key}`);
    }
    return filePath;
  }

  private async ensureDirectory(filePath: string): Promise<void> {
    if (this.createDirectories) {
      await mkdir(dirname(filePath), { recursive: true });
    }
  }

  async read(key: string): Promise<string | null> {
    try {
      return await readFile(this.getFilePath(key), "utf-8");
    } catch (error) {
      if (isNotFound(error)) return null;
      throw error;
    }
  }

  async write(key: string, data: string): Promise<void> {
    const filePath = this.getFilePath(key);
    await this.ensureDirectory(filePath);

    const tempPath = `${filePath}.${randomUUID().slice(0, 8)}.tmp`;
    try {
      await writeFile(tempPath, data, "utf-8");
      await rename(tempPath, filePath);
    } catch (error) {
      await rm(tempPath, { force: true });
      throw error;
    }
  }

  async delete(key: string): Promise<void> {
    try {
      await unlink(this.getFilePath(key));
    } catch (error) {
      if (!isNotFound(error)) {
        throw error;
      }
    }
  }

  async exists(key: string): Promise<boolean> {
    try {
      await access(this.getFilePath(key));
      return true;
    } catch {
      return false;
    }
  }

  async list(prefix: string): Promise<string[]> {
    const directory = this.getFilePath(prefix);
    try {
      const entries = await readdir(directory, { withFileTypes: true });
      return entries
        .filter((entry) => entry.isFile() && !entry.name.endsWith(".tmp"))
        .map((entry) => relative(this.basePath, join(directory, entry.name)).split(sep).join("/"))
        .sort();
    } catch (error) {
      if (isNotFound(error)) return [];
      throw error;
    }
  }
}

export const createLocalStorage = (config: LocalStorageConfig): LocalRecordStorage => {
  return new LocalRecordStorage(config);
};
