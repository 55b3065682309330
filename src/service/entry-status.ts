import type { EntityStatusStore } from "../status/store";
import type { WritableStatus } from "../status/types";
import type { CollectionKind, CollectionQueue, EntryStatusQueue } from "../queue/queues";
import type { RemoteApi } from "../api/client";
import type { EventBus } from "../events";
import type { ConnectivityProbe } from "../connectivity";
import type { SettingsProvider } from "../config";
import type { Notifier } from "../notifications";
import type { BackgroundDispatcher } from "../dispatch/dispatcher";
import type { DispatchResult } from "../dispatch/types";
import { EntryNotFoundError, ValidationError, errorMessage } from "../errors";
import { entryIdSchema } from "../status/types";
import { Logger, defaultLogger } from "../observability/logger";

export interface EntryStatusServiceOptions {
  store: EntityStatusStore;
  entryQueue: EntryStatusQueue;
  feedQueue: CollectionQueue;
  categoryQueue: CollectionQueue;
  /** Throws ConfigurationError when the server is not configured. */
  api: () => RemoteApi;
  dispatcher: BackgroundDispatcher;
  bus: EventBus;
  notifier: Notifier;
  settings: SettingsProvider;
  connectivity: ConnectivityProbe;
  logger?: Logger;
  now?: () => number;
}

export interface ChangeResult {
  /** False when the change was queued for a later sync. */
  synced: boolean;
}

const opposite = (status: WritableStatus): WritableStatus => (status === "read" ? "unread" : "read");

const uniqueIds = (ids: number[]): number[] => {
  for (const id of ids) {
    if (!entryIdSchema.safeParse(id).success) {
      throw new ValidationError(`Invalid entry id: ${id}`, { id });
    }
  }
  return [...new Set(ids)];
};

/**
 * User-facing status operations. Each one updates local state right away and
 * either confirms with the server or leaves the change in a queue.
 */
export class EntryStatusService {
  private logger: Logger;
  private now: () => number;

  constructor(private options: EntryStatusServiceOptions) {
    this.logger = options.logger ?? defaultLogger;
    this.now = options.now ?? Date.now;
  }

  /** Foreground toggle from the entry view; waits for the server. */
  async changeEntryStatus(entryId: number, status: WritableStatus): Promise<ChangeResult> {
    const { store, entryQueue, dispatcher, notifier } = this.options;

    const record = await store.load(entryId);
    if (!record) {
      throw new EntryNotFoundError(entryId);
    }
    dispatcher.cancel(entryId);

    try {
      await this.remote((api) => api.updateEntries([entryId], status));
    } catch (error) {
      this.logger.info({ msg: "Status change queued", entryId, status, error: errorMessage(error) });
      await store.write(entryId, status, { viaWorker: false });
      await entryQueue.enqueue(entryId, {
        targetStatus: status,
        originalStatus: record.status,
        timestamp: this.now(),
      });
      notifier.info(`Marked as ${status} (will sync when online)`);
      return { synced: false };
    }

    await store.write(entryId, status, { viaWorker: false });
    await entryQueue.remove(entryId);
    this.options.bus.publish({ type: "cacheInvalidated", scope: "entries", ids: [entryId] });
    notifier.success(`Entry marked as ${status}`);
    return { synced: true };
  }

  /** Called when an entry is opened. Returns null when the setting is off. */
  async autoMarkAsRead(entryId: number): Promise<DispatchResult | null> {
    if (!this.options.settings.getSettings().markAsReadOnOpen) {
      return null;
    }
    return this.options.dispatcher.dispatch(entryId, "read");
  }

  markEntriesAsRead(entryIds: number[]): Promise<ChangeResult> {
    return this.markEntries(entryIds, "read");
  }

  markEntriesAsUnread(entryIds: number[]): Promise<ChangeResult> {
    return this.markEntries(entryIds, "unread");
  }

  markFeedAsRead(feedId: number): Promise<ChangeResult> {
    return this.markCollection("feed", feedId);
  }

  markCategoryAsRead(categoryId: number): Promise<ChangeResult> {
    return this.markCollection("category", categoryId);
  }

  /** Deletes the local copy of an entry. Its queued status change, if any, stays. */
  async purgeEntry(entryId: number): Promise<void> {
    this.options.dispatcher.cancel(entryId);
    await this.options.store.purge(entryId);
    this.options.bus.publish({ type: "entryPurged", entryId });
  }

  private async markEntries(entryIds: number[], status: WritableStatus): Promise<ChangeResult> {
    const ids = uniqueIds(entryIds);
    if (ids.length === 0) {
      return { synced: true };
    }

    const { entryQueue, dispatcher, notifier } = this.options;
    for (const id of ids) {
      dispatcher.cancel(id);
    }

    try {
      await this.remote((api) => api.updateEntries(ids, status));
    } catch (error) {
      this.logger.info({ msg: "Batch status change queued", count: ids.length, status, error: errorMessage(error) });
      for (const id of ids) {
        await this.writeIfStored(id, status);
        await entryQueue.enqueue(id, {
          targetStatus: status,
          originalStatus: opposite(status),
          timestamp: this.now(),
        });
      }
      notifier.info(`Marked as ${status} (will sync when online)`);
      return { synced: false };
    }

    for (const id of ids) {
      await this.writeIfStored(id, status);
      await entryQueue.remove(id);
    }
    this.options.bus.publish({ type: "cacheInvalidated", scope: "entries", ids });
    notifier.success(`Successfully marked ${ids.length} entries as ${status}`);
    return { synced: true };
  }

  private async markCollection(kind: CollectionKind, id: number): Promise<ChangeResult> {
    if (!entryIdSchema.safeParse(id).success) {
      throw new ValidationError(`Invalid ${kind} id: ${id}`, { id });
    }

    const queue = kind === "feed" ? this.options.feedQueue : this.options.categoryQueue;
    const label = kind === "feed" ? "Feed" : "Category";

    try {
      await this.remote((api) =>
        kind === "feed" ? api.markFeedAsRead(id) : api.markCategoryAsRead(id)
      );
    } catch (error) {
      this.logger.info({ msg: "Mark as read queued", kind, id, error: errorMessage(error) });
      await queue.enqueue(id, { operation: "mark_all_read", timestamp: this.now() });
      this.options.notifier.info(`${label} marked as read (will sync when online)`);
      return { synced: false };
    }

    await queue.remove(id);
    this.options.bus.publish({
      type: "cacheInvalidated",
      scope: kind === "feed" ? "feeds" : "categories",
      ids: [id],
    });
    this.options.notifier.success(`${label} marked as read`);
    return { synced: true };
  }

  private async writeIfStored(entryId: number, status: WritableStatus): Promise<void> {
    const record = await this.options.store.load(entryId);
    if (record) {
      await this.options.store.write(entryId, status, { viaWorker: false });
    }
  }

  /**
   * Runs a server call, failing fast when offline. Every failure here means
   * the change goes to a queue instead.
   */
  private async remote(call: (api: RemoteApi) => Promise<void>): Promise<void> {
    if (!(await this.options.connectivity.isOnline())) {
      throw new Error("Offline");
    }
    await call(this.options.api());
  }
}

export const createEntryStatusService = (options: EntryStatusServiceOptions): EntryStatusService =>
  new EntryStatusService(options);
