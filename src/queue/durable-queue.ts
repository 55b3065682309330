import { z } from "zod";
import { RecordStorage } from "../storage/types";
import { Logger, defaultLogger } from "../observability/logger";
import { PersistenceError, formatZodError } from "../errors";

export interface DurableQueueOptions<TEntry> {
  name: string;
  key: string;
  storage: RecordStorage;
  schema: z.ZodType<TEntry, z.ZodTypeDef, unknown>;
  logger?: Logger;
}

const queueFileSchema = z.object({
  version: z.literal(1),
  entries: z.record(z.string(), z.unknown()),
});

const sameEntry = (a: unknown, b: unknown): boolean => JSON.stringify(a) === JSON.stringify(b);

const isEntityId = (value: number): boolean => Number.isSafeInteger(value) && value > 0;

/**
 * A persisted map of entity id to the latest pending intent for that entity.
 *
 * Stored as `{ "version": 1, "entries": { "<id>": entry } }`. An empty queue
 * has no backing record at all. Every mutation reloads the map, applies the
 * change and saves the whole map back; mutations on one queue run one at a time.
 */
export class DurableQueue<TEntry> {
  readonly name: string;
  readonly key: string;
  private storage: RecordStorage;
  private schema: z.ZodType<TEntry, z.ZodTypeDef, unknown>;
  private logger: Logger;
  private tail: Promise<unknown> = Promise.resolve();

  constructor(options: DurableQueueOptions<TEntry>) {
    this.name = options.name;
    this.key = options.key;
    this.storage = options.storage;
    this.logger = options.logger ?? defaultLogger;
    this.schema = options.schema;
  }

  async load(): Promise<Map<number, TEntry>> {
    let raw: string | null;
    try {
      raw = await this.storage.read(this.key);
    } catch (error) {
      throw new PersistenceError(`Failed to read ${this.name} queue`, this.key, { cause: error });
    }
    if (raw === null) return new Map();

    let json: unknown;
    try {
      json = JSON.parse(raw);
    } catch {
      return this.corrupted("invalid JSON");
    }

    const parsed = queueFileSchema.safeParse(json);
    if (!parsed.success) {
      return this.corrupted(formatZodError(parsed.error));
    }

    const entries = new Map<number, TEntry>();
    for (const [key, value] of Object.entries(parsed.data.entries)) {
      const id = Number(key);
      if (!isEntityId(id) || String(id) !== key) {
        return this.corrupted(`invalid entity id '${key}'`);
      }
      const entry = this.schema.safeParse(value);
      if (!entry.success) {
        return this.corrupted({ id, issues: formatZodError(entry.error) });
      }
      entries.set(id, entry.data);
    }
    return entries;
  }

  async save(entries: Map<number, TEntry>): Promise<void> {
    try {
      if (entries.size === 0) {
        await this.storage.delete(this.key);
        return;
      }

      const ids = [...entries.keys()].sort((a, b) => a - b);
      const serialized: Record<string, TEntry> = {};
      for (const id of ids) {
        const entry = entries.get(id);
        if (entry !== undefined) serialized[String(id)] = entry;
      }
      await this.storage.write(this.key, JSON.stringify({ version: 1, entries: serialized }));
    } catch (error) {
      throw new PersistenceError(`Failed to save ${this.name} queue`, this.key, { cause: error });
    }
  }

  /** Replaces any pending entry for the id. */
  async enqueue(id: number, entry: TEntry): Promise<void> {
    if (!isEntityId(id)) {
      throw new PersistenceError(`Refusing to queue invalid id ${id}`, this.key);
    }
    await this.exclusive(async () => {
      const entries = await this.load();
      entries.set(id, entry);
      await this.save(entries);
    });
  }

  async remove(id: number): Promise<void> {
    await this.exclusive(async () => {
      const entries = await this.load();
      if (!entries.delete(id)) return;
      await this.save(entries);
    });
  }

  /**
   * Removes the ids of a drained snapshot whose stored entry is still the one
   * that was drained. Returns the ids actually removed.
   */
  async removeIfUnchanged(drained: Map<number, TEntry>): Promise<number[]> {
    return this.exclusive(async () => {
      const entries = await this.load();
      const removed: number[] = [];
      for (const [id, entry] of drained) {
        const current = entries.get(id);
        if (current !== undefined && sameEntry(current, entry)) {
          entries.delete(id);
          removed.push(id);
        }
      }
      if (removed.length > 0) {
        await this.save(entries);
      }
      return removed;
    });
  }

  async get(id: number): Promise<TEntry | undefined> {
    const entries = await this.load();
    return entries.get(id);
  }

  async count(): Promise<number> {
    const entries = await this.load();
    return entries.size;
  }

  async clear(): Promise<void> {
    await this.exclusive(() => this.save(new Map()));
  }

  private corrupted(reason: unknown): Map<number, TEntry> {
    this.logger.warn({
      msg: "Queue store is corrupt, treating it as empty",
      queue: this.name,
      key: this.key,
      reason,
    });
    return new Map();
  }

  private exclusive<T>(fn: () => Promise<T>): Promise<T> {
    const run = this.tail.then(fn, fn);
    this.tail = run.catch(() => undefined);
    return run;
  }
}
