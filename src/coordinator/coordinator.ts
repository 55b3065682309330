import type { EntityStatusStore } from "../status/store";
import type { WritableStatus } from "../status/types";
import type {
  CollectionQueue,
  CollectionQueueEntry,
  EntryStatusQueue,
  EntryStatusQueueEntry,
} from "../queue/queues";
import type { RemoteApi } from "../api/client";
import type { EventBus } from "../events";
import type { ConnectivityMonitor, ConnectivityProbe } from "../connectivity";
import type { SettingsProvider } from "../config";
import type { Notifier } from "../notifications";
import { ConfirmationRequiredError, errorMessage, formatErrorForLog } from "../errors";
import { Logger, defaultLogger } from "../observability/logger";
import type {
  ClearOptions,
  GroupResult,
  ProcessOptions,
  QueueCounts,
  SyncPrompt,
  SyncSummary,
} from "./types";

export interface SyncCoordinatorOptions {
  store: EntityStatusStore;
  entryQueue: EntryStatusQueue;
  feedQueue: CollectionQueue;
  categoryQueue: CollectionQueue;
  /** Throws ConfigurationError when the server is not configured. */
  api: () => RemoteApi;
  bus: EventBus;
  notifier: Notifier;
  settings: SettingsProvider;
  connectivity?: ConnectivityProbe;
  prompt?: SyncPrompt;
  logger?: Logger;
}

const changes = (count: number): string => (count === 1 ? "1 change" : `${count} changes`);

const sameOptions = (a: ProcessOptions, b: ProcessOptions): boolean =>
  Boolean(a.autoConfirm) === Boolean(b.autoConfirm) && Boolean(a.silent) === Boolean(b.silent);

const chunk = <T>(items: T[], size: number | null): T[][] => {
  if (!size || items.length <= size) return items.length > 0 ? [items] : [];
  const chunks: T[][] = [];
  for (let i = 0; i < items.length; i += size) {
    chunks.push(items.slice(i, i + size));
  }
  return chunks;
};

/**
 * Drains the three durable queues against the server. Entry status changes
 * are sent as at most one batch per target status; feed and category
 * mark-all-as-read intents are sent one id at a time.
 */
export class SyncCoordinator {
  private inflight: { options: ProcessOptions; promise: Promise<SyncSummary> } | null = null;
  private followUp: Promise<SyncSummary> | null = null;
  private logger: Logger;

  constructor(private options: SyncCoordinatorOptions) {
    this.logger = options.logger ?? defaultLogger;
  }

  async getTotalQueueCount(): Promise<QueueCounts> {
    const [entries, feeds, categories] = await Promise.all([
      this.options.entryQueue.count(),
      this.options.feedQueue.count(),
      this.options.categoryQueue.count(),
    ]);
    return { total: entries + feeds + categories, entries, feeds, categories };
  }

  /**
   * A call with the same options as the run in progress shares it. A call
   * with different options, such as a user sync during a silent reconnect
   * sync, gets one follow-up run once the current one finishes; later
   * callers join that follow-up.
   */
  processAll(options: ProcessOptions = {}): Promise<SyncSummary> {
    const current = this.inflight;
    if (current) {
      if (sameOptions(current.options, options)) return current.promise;
      if (!this.followUp) {
        this.followUp = current.promise
          .catch(() => undefined)
          .then(() => {
            this.followUp = null;
            return this.processAll(options);
          });
      }
      return this.followUp;
    }

    const promise = this.run(options).finally(() => {
      this.inflight = null;
    });
    this.inflight = { options, promise };
    return promise;
  }

  async clearAll(options: ClearOptions = {}): Promise<QueueCounts> {
    const counts = await this.getTotalQueueCount();

    if (!options.confirmed && counts.total > 0) {
      const confirmed = this.options.prompt
        ? await this.options.prompt.confirmClear(counts.total)
        : false;
      if (!confirmed) {
        throw new ConfirmationRequiredError("Clearing the sync queues", counts.total);
      }
    }

    await Promise.all([
      this.options.entryQueue.clear(),
      this.options.feedQueue.clear(),
      this.options.categoryQueue.clear(),
    ]);
    this.logger.info({ msg: "Sync queues cleared", ...counts });
    return counts;
  }

  /**
   * Runs a silent, confirmed sync whenever the monitor goes back online and
   * sync-on-reconnect is enabled.
   */
  attach(monitor: ConnectivityMonitor): () => void {
    return monitor.onChange((online) => {
      if (!online || !this.options.settings.getSettings().syncOnReconnect) return;

      this.processAll({ autoConfirm: true, silent: true }).then(
        (summary) => this.logger.info({ msg: "Reconnect sync finished", ...summary }),
        (error: unknown) =>
          this.logger.error({ msg: "Reconnect sync failed", error: formatErrorForLog(error) })
      );
    });
  }

  private async run(options: ProcessOptions): Promise<SyncSummary> {
    const { notifier } = this.options;
    const counts = await this.getTotalQueueCount();

    if (counts.total === 0) {
      if (!options.silent) notifier.info("All changes are already synced");
      return { status: "nothing-to-sync" };
    }

    if (!options.autoConfirm && this.options.prompt) {
      const decision = await this.options.prompt.ask(counts);
      if (decision === "later") {
        return { status: "deferred", counts };
      }
      if (decision === "clear") {
        await this.clearAll({ confirmed: true });
        if (!options.silent) notifier.info("Sync queue cleared");
        return { status: "cleared", counts };
      }
    }

    if (!(await this.isOnline())) {
      if (!options.silent) notifier.info("Offline, changes will sync when online");
      return { status: "offline", counts };
    }

    let api: RemoteApi;
    try {
      api = this.options.api();
    } catch (error) {
      const message = errorMessage(error);
      this.logger.warn({ msg: "Sync skipped, server is not usable", error: formatErrorForLog(error) });
      if (!options.silent) notifier.error(`Cannot sync: ${message}`);
      return { status: "not-configured", counts, message };
    }
    const entries = await this.processEntryQueue(api);
    const feeds = await this.processCollectionQueue(this.options.feedQueue, (id) =>
      api.markFeedAsRead(id)
    );
    const categories = await this.processCollectionQueue(this.options.categoryQueue, (id) =>
      api.markCategoryAsRead(id)
    );

    const processed = entries.processed + feeds.processed + categories.processed;
    const failed = entries.failed + feeds.failed + categories.failed;

    if (processed > 0) {
      this.options.bus.publish({ type: "cacheInvalidated", scope: "all", ids: [] });
    }

    if (!options.silent) {
      if (processed > 0) {
        notifier.success(
          failed > 0 ? `${changes(processed)} synced, ${failed} failed` : `${changes(processed)} synced`
        );
      } else if (failed > 0) {
        notifier.error(`${changes(failed)} failed to sync`);
      }
    }

    this.logger.info({ msg: "Sync finished", processed, failed });
    return { status: "completed", processed, failed, entries, feeds, categories };
  }

  private async isOnline(): Promise<boolean> {
    if (!this.options.connectivity) return true;
    try {
      return await this.options.connectivity.isOnline();
    } catch (error) {
      this.logger.warn({ msg: "Connectivity check failed", error: errorMessage(error) });
      return false;
    }
  }

  private async processEntryQueue(api: RemoteApi): Promise<GroupResult> {
    const snapshot = await this.options.entryQueue.load();
    const groups: Record<WritableStatus, number[]> = { read: [], unread: [] };
    for (const [id, entry] of snapshot) {
      groups[entry.targetStatus].push(id);
    }

    const result: GroupResult = { processed: 0, failed: 0 };
    const batchSize = this.options.settings.getSettings().maxBatchSize;

    for (const status of ["read", "unread"] as const) {
      const ids = groups[status].sort((a, b) => a - b);
      for (const batch of chunk(ids, batchSize)) {
        try {
          await api.updateEntries(batch, status);
        } catch (error) {
          result.failed += batch.length;
          this.logger.warn({
            msg: "Batch status update failed",
            status,
            count: batch.length,
            error: errorMessage(error),
          });
          continue;
        }

        result.processed += batch.length;
        await this.confirmBatch(batch, status, snapshot);
      }
    }

    return result;
  }

  /**
   * Drops the confirmed ids from the queue and brings their local records in
   * line. Ids re-queued with a newer intent during the drain are left alone.
   */
  private async confirmBatch(
    batch: number[],
    status: WritableStatus,
    snapshot: Map<number, EntryStatusQueueEntry>
  ): Promise<void> {
    const drained = new Map<number, EntryStatusQueueEntry>();
    for (const id of batch) {
      const entry = snapshot.get(id);
      if (entry) drained.set(id, entry);
    }

    const removed = await this.options.entryQueue.removeIfUnchanged(drained);

    for (const id of removed) {
      try {
        const record = await this.options.store.load(id);
        if (record && (record.status !== status || record.pendingFromSubprocess)) {
          await this.options.store.write(id, status, { viaWorker: false });
        }
      } catch (error) {
        this.logger.error({
          msg: "Failed to update local record after sync",
          entryId: id,
          error: formatErrorForLog(error),
        });
      }
    }
  }

  private async processCollectionQueue(
    queue: CollectionQueue,
    markAsRead: (id: number) => Promise<void>
  ): Promise<GroupResult> {
    const snapshot = await queue.load();
    const result: GroupResult = { processed: 0, failed: 0 };

    for (const id of [...snapshot.keys()].sort((a, b) => a - b)) {
      try {
        await markAsRead(id);
      } catch (error) {
        result.failed++;
        this.logger.warn({ msg: "Mark as read failed", queue: queue.name, id, error: errorMessage(error) });
        continue;
      }

      result.processed++;
      const entry = snapshot.get(id);
      if (entry) {
        await queue.removeIfUnchanged(new Map<number, CollectionQueueEntry>([[id, entry]]));
      }
    }

    return result;
  }
}

export const createSyncCoordinator = (options: SyncCoordinatorOptions): SyncCoordinator =>
  new SyncCoordinator(options);
