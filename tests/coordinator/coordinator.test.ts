import { describe, it, expect, beforeEach, vi } from "vitest";
import { SyncCoordinator } from "@/coordinator/coordinator";
import type { SyncPrompt, SyncDecision } from "@/coordinator/types";
import { EntityStatusStore } from "@/status/store";
import {
  createCollectionQueue,
  createEntryStatusQueue,
  CollectionQueue,
  EntryStatusQueue,
  QUEUE_KEYS,
} from "@/queue/queues";
import { MemoryRecordStorage } from "@/storage/memory";
import { createEventBus } from "@/events";
import { ConnectivityMonitor } from "@/connectivity";
import type { ConnectivityProbe } from "@/connectivity";
import type { RemoteApi } from "@/api/client";
import { createStaticSettings } from "@/config";
import type { SyncSettings } from "@/config";
import type { Notifier } from "@/notifications";
import { ConfigurationError, ConfirmationRequiredError } from "@/errors";
import { createSilentLogger } from "@/observability/logger";
import { FakeRemoteApi } from "../helpers/fake-api";

const createRecordingNotifier = () => {
  const messages: Array<[string, string]> = [];
  const notifier: Notifier = {
    info: (message) => messages.push(["info", message]),
    success: (message) => messages.push(["success", message]),
    error: (message) => messages.push(["error", message]),
  };
  return { notifier, messages };
};

const promptAnswering = (decision: SyncDecision, confirm = false): SyncPrompt => ({
  ask: vi.fn(async () => decision),
  confirmClear: vi.fn(async () => confirm),
});

describe("SyncCoordinator", () => {
  let storage: MemoryRecordStorage;
  let store: EntityStatusStore;
  let entryQueue: EntryStatusQueue;
  let feedQueue: CollectionQueue;
  let categoryQueue: CollectionQueue;
  let api: FakeRemoteApi;
  let messages: Array<[string, string]>;
  let invalidations: number;
  let connectivity: ConnectivityMonitor;

  const createCoordinator = (
    options: {
      prompt?: SyncPrompt;
      settings?: Partial<SyncSettings>;
      api?: () => RemoteApi;
      connectivity?: ConnectivityProbe;
    } = {}
  ) => {
    const recording = createRecordingNotifier();
    messages = recording.messages;
    const bus = createEventBus(createSilentLogger());
    bus.subscribe({ onCacheInvalidated: () => invalidations++ });

    return new SyncCoordinator({
      store,
      entryQueue,
      feedQueue,
      categoryQueue,
      api: options.api ?? (() => api),
      bus,
      notifier: recording.notifier,
      settings: createStaticSettings(options.settings),
      connectivity: options.connectivity ?? connectivity,
      prompt: options.prompt,
      logger: createSilentLogger(),
    });
  };

  const enqueueEntry = (id: number, targetStatus: "read" | "unread") =>
    entryQueue.enqueue(id, {
      targetStatus,
      originalStatus: targetStatus === "read" ? "unread" : "read",
      timestamp: 1,
    });

  beforeEach(() => {
    storage = new MemoryRecordStorage();
    const logger = createSilentLogger();
    store = new EntityStatusStore({ storage, logger });
    entryQueue = createEntryStatusQueue({ storage, logger });
    feedQueue = createCollectionQueue("feed", { storage, logger });
    categoryQueue = createCollectionQueue("category", { storage, logger });
    api = new FakeRemoteApi();
    invalidations = 0;
    connectivity = new ConnectivityMonitor(true);
  });

  describe("getTotalQueueCount", () => {
    it("should sum all three queues", async () => {
      await enqueueEntry(1, "read");
      await enqueueEntry(2, "unread");
      await feedQueue.enqueue(10, { operation: "mark_all_read", timestamp: 1 });

      expect(await createCoordinator().getTotalQueueCount()).toEqual({
        total: 3,
        entries: 2,
        feeds: 1,
        categories: 0,
      });
    });
  });

  describe("processAll", () => {
    it("should report nothing to sync", async () => {
      const coordinator = createCoordinator();

      expect(await coordinator.processAll()).toEqual({ status: "nothing-to-sync" });
      expect(messages).toEqual([["info", "All changes are already synced"]]);
      expect(api.calls).toEqual([]);
    });

    it("should stay quiet when silent", async () => {
      await createCoordinator().processAll({ silent: true });
      expect(messages).toEqual([]);
    });

    it("should collapse fifty entries into two batched calls", async () => {
      for (let id = 1; id <= 30; id++) await enqueueEntry(id, "read");
      for (let id = 31; id <= 50; id++) await enqueueEntry(id, "unread");

      const summary = await createCoordinator().processAll({ autoConfirm: true });

      const updates = api.callsOf("updateEntries");
      expect(updates).toHaveLength(2);
      expect(updates[0]).toEqual({
        op: "updateEntries",
        status: "read",
        ids: Array.from({ length: 30 }, (_, i) => i + 1),
      });
      expect(updates[1]).toEqual({
        op: "updateEntries",
        status: "unread",
        ids: Array.from({ length: 20 }, (_, i) => i + 31),
      });
      expect(summary).toMatchObject({ status: "completed", processed: 50, failed: 0 });
      expect(await storage.exists(QUEUE_KEYS.entries)).toBe(false);
      expect(invalidations).toBe(1);
      expect(messages).toEqual([["success", "50 changes synced"]]);
    });

    it("should chunk batches when a maximum batch size is set", async () => {
      for (let id = 1; id <= 5; id++) await enqueueEntry(id, "read");

      await createCoordinator({ settings: { maxBatchSize: 2 } }).processAll({ autoConfirm: true });

      expect(api.callsOf("updateEntries").map((call) => call.ids)).toEqual([[1, 2], [3, 4], [5]]);
    });

    it("should keep a failed batch queued and report partial success", async () => {
      await enqueueEntry(1, "read");
      await enqueueEntry(2, "unread");
      await enqueueEntry(3, "unread");
      api.rejectStatuses.add("unread");

      const summary = await createCoordinator().processAll({ autoConfirm: true });

      expect(summary).toMatchObject({
        status: "completed",
        processed: 1,
        failed: 2,
        entries: { processed: 1, failed: 2 },
      });
      expect([...(await entryQueue.load()).keys()]).toEqual([2, 3]);
      expect(messages).toEqual([["success", "1 change synced, 2 failed"]]);
      expect(invalidations).toBe(1);
    });

    it("should report when everything failed", async () => {
      await enqueueEntry(1, "read");
      api.failWith = 500;

      await createCoordinator().processAll({ autoConfirm: true });

      expect(messages).toEqual([["error", "1 change failed to sync"]]);
      expect(invalidations).toBe(0);
    });

    it("should update stored records to the synced status", async () => {
      await store.materialize({ id: 1, status: "unread" });
      await store.write(1, "read", { viaWorker: true });
      await enqueueEntry(1, "read");
      await enqueueEntry(2, "read");

      await createCoordinator().processAll({ autoConfirm: true });

      const record = await store.load(1);
      expect(record?.status).toBe("read");
      expect(record?.pendingFromSubprocess).toBe(false);
      expect(await store.load(2)).toBeNull();
    });

    it("should process feed and category queues one id at a time", async () => {
      await feedQueue.enqueue(10, { operation: "mark_all_read", timestamp: 1 });
      await feedQueue.enqueue(11, { operation: "mark_all_read", timestamp: 1 });
      await categoryQueue.enqueue(3, { operation: "mark_all_read", timestamp: 1 });

      const summary = await createCoordinator().processAll({ autoConfirm: true });

      expect(api.calls).toEqual([
        { op: "markFeedAsRead", id: 10 },
        { op: "markFeedAsRead", id: 11 },
        { op: "markCategoryAsRead", id: 3 },
      ]);
      expect(summary).toMatchObject({
        feeds: { processed: 2, failed: 0 },
        categories: { processed: 1, failed: 0 },
      });
      expect(await storage.exists(QUEUE_KEYS.feed)).toBe(false);
      expect(await storage.exists(QUEUE_KEYS.category)).toBe(false);
      expect(invalidations).toBe(1);
    });

    it("should keep an intent enqueued while the batch was in flight", async () => {
      await enqueueEntry(1, "read");
      api.blocking = true;
      const coordinator = createCoordinator();

      const run = coordinator.processAll({ autoConfirm: true });
      await vi.waitFor(() => expect(api.calls).toHaveLength(1));
      await enqueueEntry(1, "unread");
      api.release();
      await run;

      expect(await entryQueue.get(1)).toEqual({
        targetStatus: "unread",
        originalStatus: "read",
        timestamp: 1,
      });
    });

    it("should share a run already in flight", async () => {
      await enqueueEntry(1, "read");
      api.blocking = true;
      const coordinator = createCoordinator();

      const first = coordinator.processAll({ autoConfirm: true });
      const second = coordinator.processAll({ autoConfirm: true });
      expect(second).toBe(first);

      await vi.waitFor(() => expect(api.calls).toHaveLength(1));
      api.release();
      await first;
      expect(api.callsOf("updateEntries")).toHaveLength(1);
    });

    it("should run once more for a caller with different options", async () => {
      await enqueueEntry(1, "read");
      api.blocking = true;
      const coordinator = createCoordinator();

      const reconnect = coordinator.processAll({ autoConfirm: true, silent: true });
      const explicit = coordinator.processAll({ autoConfirm: true });
      expect(explicit).not.toBe(reconnect);
      expect(coordinator.processAll({ autoConfirm: false })).toBe(explicit);

      await vi.waitFor(() => expect(api.calls).toHaveLength(1));
      api.release();

      expect((await reconnect).status).toBe("completed");
      expect(await explicit).toEqual({ status: "nothing-to-sync" });
      expect(messages).toEqual([["info", "All changes are already synced"]]);
      expect(api.callsOf("updateEntries")).toHaveLength(1);
    });

    it("should report a missing server configuration instead of failing", async () => {
      await enqueueEntry(1, "read");
      const coordinator = createCoordinator({
        api: () => {
          throw new ConfigurationError("Server address is not configured");
        },
      });

      const summary = await coordinator.processAll({ autoConfirm: true });

      expect(summary).toEqual({
        status: "not-configured",
        counts: { total: 1, entries: 1, feeds: 0, categories: 0 },
        message: "Server address is not configured",
      });
      expect(messages).toEqual([["error", "Cannot sync: Server address is not configured"]]);
      expect(await entryQueue.count()).toBe(1);
    });

    it("should treat a failing connectivity check as offline", async () => {
      await enqueueEntry(1, "read");
      const coordinator = createCoordinator({
        connectivity: {
          isOnline: async () => {
            throw new Error("lookup failed");
          },
        },
      });

      const summary = await coordinator.processAll({ autoConfirm: true });

      expect(summary.status).toBe("offline");
      expect(messages).toEqual([["info", "Offline, changes will sync when online"]]);
      expect(api.calls).toEqual([]);
    });

    it("should not contact the server while offline", async () => {
      await enqueueEntry(1, "read");
      connectivity.setOnline(false);

      const summary = await createCoordinator().processAll({ autoConfirm: true });

      expect(summary).toEqual({
        status: "offline",
        counts: { total: 1, entries: 1, feeds: 0, categories: 0 },
      });
      expect(api.calls).toEqual([]);
    });
  });

  describe("prompt", () => {
    it("should defer when the user picks later", async () => {
      await enqueueEntry(1, "read");
      const prompt = promptAnswering("later");

      const summary = await createCoordinator({ prompt }).processAll();

      expect(summary).toEqual({
        status: "deferred",
        counts: { total: 1, entries: 1, feeds: 0, categories: 0 },
      });
      expect(prompt.ask).toHaveBeenCalledWith({ total: 1, entries: 1, feeds: 0, categories: 0 });
      expect(await entryQueue.count()).toBe(1);
    });

    it("should clear the queues when the user picks delete", async () => {
      await enqueueEntry(1, "read");
      await categoryQueue.enqueue(2, { operation: "mark_all_read", timestamp: 1 });

      const summary = await createCoordinator({ prompt: promptAnswering("clear") }).processAll();

      expect(summary.status).toBe("cleared");
      expect(api.calls).toEqual([]);
      expect(storage.size()).toBe(0);
      expect(messages).toEqual([["info", "Sync queue cleared"]]);
    });

    it("should sync when the user confirms", async () => {
      await enqueueEntry(1, "read");

      const summary = await createCoordinator({ prompt: promptAnswering("sync") }).processAll();

      expect(summary).toMatchObject({ status: "completed", processed: 1 });
    });

    it("should skip the prompt when auto-confirmed", async () => {
      await enqueueEntry(1, "read");
      const prompt = promptAnswering("later");

      await createCoordinator({ prompt }).processAll({ autoConfirm: true });

      expect(prompt.ask).not.toHaveBeenCalled();
      expect(await entryQueue.count()).toBe(0);
    });
  });

  describe("clearAll", () => {
    it("should require confirmation", async () => {
      await enqueueEntry(1, "read");

      await expect(createCoordinator().clearAll()).rejects.toBeInstanceOf(ConfirmationRequiredError);
      expect(await entryQueue.count()).toBe(1);
    });

    it("should ask the prompt for confirmation", async () => {
      await enqueueEntry(1, "read");
      const declining = promptAnswering("sync", false);

      await expect(createCoordinator({ prompt: declining }).clearAll()).rejects.toMatchObject({
        code: "CONFIRMATION_REQUIRED",
      });
      expect(declining.confirmClear).toHaveBeenCalledWith(1);

      const counts = await createCoordinator({ prompt: promptAnswering("sync", true) }).clearAll();
      expect(counts.total).toBe(1);
      expect(await entryQueue.count()).toBe(0);
    });

    it("should delete all queues without reconciling when confirmed", async () => {
      await enqueueEntry(1, "read");
      await feedQueue.enqueue(5, { operation: "mark_all_read", timestamp: 1 });

      await createCoordinator().clearAll({ confirmed: true });

      expect(storage.size()).toBe(0);
      expect(api.calls).toEqual([]);
    });
  });

  describe("attach", () => {
    it("should sync silently when connectivity returns", async () => {
      await enqueueEntry(1, "read");
      connectivity.setOnline(false);
      const coordinator = createCoordinator({ prompt: promptAnswering("later") });
      coordinator.attach(connectivity);

      connectivity.setOnline(true);

      await vi.waitFor(async () => expect(await entryQueue.count()).toBe(0));
      expect(messages).toEqual([]);
    });

    it("should not sync on reconnect when disabled", async () => {
      await enqueueEntry(1, "read");
      connectivity.setOnline(false);
      const coordinator = createCoordinator({ settings: { syncOnReconnect: false } });
      coordinator.attach(connectivity);

      connectivity.setOnline(true);
      await new Promise((resolve) => setTimeout(resolve, 10));

      expect(api.calls).toEqual([]);
    });
  });
});
