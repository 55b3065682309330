import { RecordStorage } from "../storage/types";
import { Logger, defaultLogger } from "../observability/logger";
import {
  ERROR_CODES,
  EntryNotFoundError,
  PersistenceError,
  ValidationError,
  errorMessage,
  formatZodError,
} from "../errors";
import type { EntryRecordCache } from "../cache/records";
import {
  EntityStatusRecord,
  EntryStatus,
  MaterializeInput,
  WriteOptions,
  entityStatusRecordSchema,
  entryIdSchema,
  materializeInputSchema,
  writableStatusSchema,
} from "./types";

const ENTRIES_PREFIX = "entries";

export interface EntityStatusStoreOptions {
  storage: RecordStorage;
  logger?: Logger;
  cache?: EntryRecordCache;
  now?: () => number;
}

export const entryRecordKey = (entryId: number): string => `${ENTRIES_PREFIX}/${entryId}.json`;

/**
 * Per-entry status sidecars. Each record lives in its own key so a write to
 * one entry never touches another.
 */
export class EntityStatusStore {
  private storage: RecordStorage;
  private logger: Logger;
  private cache?: EntryRecordCache;
  private now: () => number;
  private locks = new Map<number, Promise<unknown>>();

  constructor(options: EntityStatusStoreOptions) {
    this.storage = options.storage;
    this.logger = options.logger ?? defaultLogger;
    this.cache = options.cache;
    this.now = options.now ?? Date.now;
  }

  async load(entryId: number): Promise<EntityStatusRecord | null> {
    assertEntryId(entryId);

    const cached = this.cache?.get(entryId);
    if (cached) return cached;

    const record = await this.readRecord(entryId);
    if (record) this.cache?.set(record);
    return record;
  }

  async write(
    entryId: number,
    newStatus: EntryStatus,
    options: WriteOptions
  ): Promise<EntityStatusRecord> {
    assertEntryId(entryId);
    const parsed = writableStatusSchema.safeParse(newStatus);
    if (!parsed.success) {
      throw new ValidationError(`Status '${newStatus}' cannot be written locally`, {
        entryId,
        status: newStatus,
      });
    }

    return this.withLock(entryId, async () => {
      const current = await this.readRecord(entryId);
      if (!current) {
        throw new EntryNotFoundError(entryId);
      }

      const timestamp = this.now();
      const next: EntityStatusRecord = {
        ...current,
        status: parsed.data,
        lastUpdated: timestamp,
        pendingFromSubprocess: options.viaWorker,
        pendingFromSubprocessTimestamp: options.viaWorker ? timestamp : null,
      };

      await this.persist(next);
      return { ...next };
    });
  }

  async materialize(input: MaterializeInput): Promise<EntityStatusRecord> {
    const parsed = materializeInputSchema.safeParse(input);
    if (!parsed.success) {
      throw new ValidationError("Invalid entry status record", formatZodError(parsed.error));
    }

    const record: EntityStatusRecord = {
      ...parsed.data,
      version: 1,
      lastUpdated: parsed.data.lastUpdated ?? this.now(),
      pendingFromSubprocess: parsed.data.pendingFromSubprocess ?? false,
      pendingFromSubprocessTimestamp: parsed.data.pendingFromSubprocessTimestamp ?? null,
    };

    return this.withLock(record.id, async () => {
      await this.persist(record);
      return { ...record };
    });
  }

  async purge(entryId: number): Promise<void> {
    assertEntryId(entryId);
    await this.withLock(entryId, async () => {
      const key = entryRecordKey(entryId);
      try {
        await this.storage.delete(key);
      } catch (error) {
        throw new PersistenceError(`Failed to delete entry ${entryId}`, key, { cause: error });
      }
      this.cache?.remove(entryId);
    });
  }

  async list(): Promise<EntityStatusRecord[]> {
    let keys: string[];
    try {
      keys = await this.storage.list(ENTRIES_PREFIX);
    } catch (error) {
      throw new PersistenceError("Failed to list entry records", ENTRIES_PREFIX, { cause: error });
    }

    const records: EntityStatusRecord[] = [];
    for (const key of keys) {
      if (!key.endsWith(".json")) continue;
      try {
        const record = await this.readKey(key);
        if (record) records.push(record);
      } catch (error) {
        if (error instanceof PersistenceError && error.isCorruption()) {
          this.logger.warn({ msg: "Skipping corrupt entry record", key, error: errorMessage(error) });
          continue;
        }
        throw error;
      }
    }

    return records.sort((a, b) => a.id - b.id);
  }

  private async readRecord(entryId: number): Promise<EntityStatusRecord | null> {
    return this.readKey(entryRecordKey(entryId));
  }

  private async readKey(key: string): Promise<EntityStatusRecord | null> {
    let raw: string | null;
    try {
      raw = await this.storage.read(key);
    } catch (error) {
      throw new PersistenceError(`Failed to read ${key}`, key, { cause: error });
    }
    if (raw === null) return null;

    let json: unknown;
    try {
      json = JSON.parse(raw);
    } catch (error) {
      throw new PersistenceError(`Entry record ${key} is not valid JSON`, key, {
        cause: error,
        code: ERROR_CODES.CORRUPT_RECORD,
      });
    }

    const parsed = entityStatusRecordSchema.safeParse(json);
    if (!parsed.success) {
      throw new PersistenceError(`Entry record ${key} does not match the record schema`, key, {
        cause: formatZodError(parsed.error),
        code: ERROR_CODES.CORRUPT_RECORD,
      });
    }
    return parsed.data;
  }

  private async persist(record: EntityStatusRecord): Promise<void> {
    const key = entryRecordKey(record.id);
    try {
      await this.storage.write(key, JSON.stringify(record));
    } catch (error) {
      throw new PersistenceError(`Failed to write entry ${record.id}`, key, { cause: error });
    }
    this.cache?.set(record);
  }

  private async withLock<T>(entryId: number, fn: () => Promise<T>): Promise<T> {
    const previous = this.locks.get(entryId) ?? Promise.resolve();
    const run = previous.then(fn, fn);
    const tail = run.catch(() => undefined);
    this.locks.set(entryId, tail);

    try {
      return await run;
    } finally {
      if (this.locks.get(entryId) === tail) {
        this.locks.delete(entryId);
      }
    }
  }
}

const assertEntryId = (entryId: number): void => {
  if (!entryIdSchema.safeParse(entryId).success) {
    throw new ValidationError(`Invalid entry id: ${entryId}`, { entryId });
  }
};

export const createEntityStatusStore = (options: EntityStatusStoreOptions): EntityStatusStore =>
  new EntityStatusStore(options);
