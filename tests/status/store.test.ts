import { describe, it, expect, beforeEach, vi } from "vitest";
import { EntityStatusStore, entryRecordKey } from "@/status/store";
import { isEntryRead } from "@/status/types";
import { MemoryRecordStorage } from "@/storage/memory";
import { EntryRecordCache } from "@/cache/records";
import { EntryNotFoundError, PersistenceError, ValidationError } from "@/errors";
import { createSilentLogger } from "@/observability/logger";

describe("EntityStatusStore", () => {
  let storage: MemoryRecordStorage;
  let store: EntityStatusStore;
  let clock: number;

  beforeEach(() => {
    clock = 1_000;
    storage = new MemoryRecordStorage();
    store = new EntityStatusStore({
      storage,
      logger: createSilentLogger(),
      now: () => clock,
    });
  });

  describe("materialize", () => {
    it("should create a record with defaults", async () => {
      const record = await store.materialize({ id: 42, status: "unread", title: "Hello" });

      expect(record).toEqual({
        version: 1,
        id: 42,
        status: "unread",
        title: "Hello",
        lastUpdated: 1_000,
        pendingFromSubprocess: false,
        pendingFromSubprocessTimestamp: null,
      });
      expect(JSON.parse((await storage.read("entries/42.json")) ?? "null")).toEqual(record);
    });

    it("should accept removed status", async () => {
      const record = await store.materialize({ id: 7, status: "removed" });
      expect(record.status).toBe("removed");
    });

    it("should reject invalid input", async () => {
      await expect(store.materialize({ id: -1, status: "read" })).rejects.toBeInstanceOf(
        ValidationError
      );
    });
  });

  describe("load", () => {
    it("should return null for an unknown entry", async () => {
      expect(await store.load(99)).toBeNull();
    });

    it("should return the stored record", async () => {
      await store.materialize({ id: 5, status: "read" });
      const record = await store.load(5);
      expect(record?.status).toBe("read");
    });

    it("should report a corrupt sidecar", async () => {
      await storage.write(entryRecordKey(8), "{not json");

      const error = await store.load(8).catch((e: unknown) => e);
      expect(error).toBeInstanceOf(PersistenceError);
      expect(error instanceof PersistenceError && error.code).toBe("CORRUPT_RECORD");
    });

    it("should report a sidecar with an unknown version as corrupt", async () => {
      await storage.write(
        entryRecordKey(9),
        JSON.stringify({ version: 2, id: 9, status: "read", lastUpdated: 0 })
      );

      await expect(store.load(9)).rejects.toMatchObject({ code: "CORRUPT_RECORD" });
    });

    it("should reject non-positive ids", async () => {
      await expect(store.load(0)).rejects.toBeInstanceOf(ValidationError);
    });
  });

  describe("write", () => {
    beforeEach(async () => {
      await store.materialize({ id: 42, status: "unread" });
    });

    it("should update status and timestamp", async () => {
      clock = 2_000;
      const record = await store.write(42, "read", { viaWorker: false });

      expect(record.status).toBe("read");
      expect(record.lastUpdated).toBe(2_000);
      expect(record.pendingFromSubprocess).toBe(false);
      expect(record.pendingFromSubprocessTimestamp).toBeNull();
    });

    it("should mark worker writes and clear the mark on the next user write", async () => {
      clock = 3_000;
      const reverted = await store.write(42, "read", { viaWorker: true });
      expect(reverted.pendingFromSubprocess).toBe(true);
      expect(reverted.pendingFromSubprocessTimestamp).toBe(3_000);

      clock = 4_000;
      const userWrite = await store.write(42, "unread", { viaWorker: false });
      expect(userWrite.pendingFromSubprocess).toBe(false);
      expect(userWrite.pendingFromSubprocessTimestamp).toBeNull();
    });

    it("should fail for an entry that is not stored", async () => {
      await expect(store.write(43, "read", { viaWorker: false })).rejects.toBeInstanceOf(
        EntryNotFoundError
      );
      expect(await storage.exists(entryRecordKey(43))).toBe(false);
    });

    it("should refuse to write removed", async () => {
      await expect(store.write(42, "removed", { viaWorker: false })).rejects.toBeInstanceOf(
        ValidationError
      );
      expect((await store.load(42))?.status).toBe("unread");
    });

    it("should wrap storage failures and keep the previous record", async () => {
      vi.spyOn(storage, "write").mockRejectedValueOnce(new Error("disk full"));

      const error = await store.write(42, "read", { viaWorker: false }).catch((e: unknown) => e);
      expect(error).toBeInstanceOf(PersistenceError);
      expect(error instanceof PersistenceError && error.message).toBe("Failed to write entry 42");
      expect((await store.load(42))?.status).toBe("unread");
    });

    it("should apply concurrent writes one after another", async () => {
      await Promise.all([
        store.write(42, "read", { viaWorker: false }),
        store.write(42, "unread", { viaWorker: false }),
        store.write(42, "read", { viaWorker: false }),
      ]);

      expect((await store.load(42))?.status).toBe("read");
    });
  });

  describe("purge", () => {
    it("should delete the record", async () => {
      await store.materialize({ id: 11, status: "read" });
      await store.purge(11);

      expect(await store.load(11)).toBeNull();
    });
  });

  describe("list", () => {
    it("should return records sorted by id and skip corrupt ones", async () => {
      await store.materialize({ id: 20, status: "read" });
      await store.materialize({ id: 3, status: "unread" });
      await storage.write(entryRecordKey(5), "garbage");

      const records = await store.list();
      expect(records.map((record) => record.id)).toEqual([3, 20]);
    });
  });

  describe("with a record cache", () => {
    it("should write through and serve loads from the cache", async () => {
      const cache = new EntryRecordCache();
      const cached = new EntityStatusStore({
        storage,
        cache,
        logger: createSilentLogger(),
        now: () => clock,
      });

      await cached.materialize({ id: 1, status: "unread" });
      await cached.write(1, "read", { viaWorker: false });
      expect(cache.get(1)?.status).toBe("read");

      const readSpy = vi.spyOn(storage, "read");
      expect((await cached.load(1))?.status).toBe("read");
      expect(readSpy).not.toHaveBeenCalled();

      await cached.purge(1);
      expect(cache.get(1)).toBeNull();
    });
  });
});

describe("isEntryRead", () => {
  it("should only count read as read", () => {
    expect(isEntryRead("read")).toBe(true);
    expect(isEntryRead("unread")).toBe(false);
    expect(isEntryRead("removed")).toBe(false);
  });
});
