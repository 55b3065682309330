import { v4 as uuidv4 } from "uuid";
import type { EntityStatusStore } from "../status/store";
import { isEntryRead } from "../status/types";
import type { EntryStatus, WritableStatus } from "../status/types";
import type { EntryStatusQueue } from "../queue/queues";
import type { EventBus } from "../events";
import type { ConnectivityProbe } from "../connectivity";
import type { SettingsProvider } from "../config";
import { EntryNotFoundError, errorMessage, formatErrorForLog } from "../errors";
import { Logger, defaultLogger } from "../observability/logger";
import type { JobRunner } from "./runner";
import type {
  DispatchResult,
  DispatchSettlement,
  DispatcherStats,
  JobOutcome,
  StatusUpdateJob,
} from "./types";

export interface DispatcherOptions {
  store: EntityStatusStore;
  queue: EntryStatusQueue;
  runner: JobRunner;
  bus: EventBus;
  connectivity: ConnectivityProbe;
  settings: SettingsProvider;
  logger?: Logger;
  now?: () => number;
  /** Defaults to the configured reaper interval. */
  maxHandleAgeMs?: number;
}

interface DispatchHandle {
  id: string;
  job: StatusUpdateJob;
  controller: AbortController;
  startedAt: number;
  settled: boolean;
  completion: Promise<DispatchSettlement>;
}

/**
 * Reverts never write "removed"; an entry the server had removed comes back
 * as unread, which classifies the same way.
 */
const revertTarget = (originalStatus: EntryStatus): WritableStatus =>
  originalStatus === "read" ? "read" : "unread";

/**
 * Runs one isolated background job per entry status change, after writing
 * the new status locally. At most one job is live per entry: a newer change
 * aborts the older job and its outcome is discarded.
 */
export class BackgroundDispatcher {
  private handles = new Map<number, DispatchHandle>();
  private pending = new Map<number, AbortController>();
  private locks = new Map<number, Promise<unknown>>();
  private reaper: ReturnType<typeof setInterval> | null = null;
  private logger: Logger;
  private now: () => number;
  private counters: Omit<DispatcherStats, "live"> = {
    dispatched: 0,
    noops: 0,
    queued: 0,
    synced: 0,
    reverted: 0,
    superseded: 0,
    reaped: 0,
  };

  constructor(private options: DispatcherOptions) {
    this.logger = options.logger ?? defaultLogger;
    this.now = options.now ?? Date.now;
  }

  /**
   * Dispatches for the same entry run one after another, so a job is always
   * started after the previous dispatch has registered its handle.
   */
  dispatch(entryId: number, newStatus: WritableStatus): Promise<DispatchResult> {
    return this.withLock(entryId, async () => {
      const pending = new AbortController();
      this.pending.set(entryId, pending);
      try {
        return await this.dispatchExclusive(entryId, newStatus, pending.signal);
      } finally {
        if (this.pending.get(entryId) === pending) {
          this.pending.delete(entryId);
        }
      }
    });
  }

  private async dispatchExclusive(
    entryId: number,
    newStatus: WritableStatus,
    cancelled: AbortSignal
  ): Promise<DispatchResult> {
    const { store } = this.options;

    const record = await store.load(entryId);
    if (!record) {
      throw new EntryNotFoundError(entryId);
    }

    if (isEntryRead(record.status) === isEntryRead(newStatus)) {
      const aborted = this.abortLive(entryId);
      if (aborted && isEntryRead(aborted.job.targetStatus) === isEntryRead(newStatus)) {
        await this.enqueue(entryId, aborted.job.targetStatus, aborted.job.originalStatus);
      }
      this.counters.noops++;
      return { kind: "noop" };
    }

    const originalStatus = record.status;
    await store.write(entryId, newStatus, { viaWorker: false });
    this.abortLive(entryId);
    if (cancelled.aborted) return this.cancelledResult(entryId);

    const online = await this.isOnline();
    if (cancelled.aborted) return this.cancelledResult(entryId);
    if (!online) {
      await this.enqueue(entryId, newStatus, originalStatus);
      return { kind: "queued", reason: "offline" };
    }

    const settings = this.options.settings.getSettings();
    if (!settings.serverAddress || !settings.apiToken) {
      this.logger.warn({ msg: "Server is not configured, queueing status change", entryId });
      await this.enqueue(entryId, newStatus, originalStatus);
      return { kind: "queued", reason: "worker-unavailable" };
    }

    const job: StatusUpdateJob = Object.freeze({
      serverAddress: settings.serverAddress,
      apiToken: settings.apiToken,
      entryId,
      targetStatus: newStatus,
      originalStatus,
      timeoutMs: settings.requestTimeoutMs,
    });

    const controller = new AbortController();
    const startedAt = this.now();

    let outcome: Promise<JobOutcome> | null;
    try {
      outcome = this.options.runner.start(job, controller.signal);
    } catch (error) {
      this.logger.error({ msg: "Failed to start status job", entryId, error: errorMessage(error) });
      outcome = null;
    }

    if (!outcome) {
      await this.enqueue(entryId, newStatus, originalStatus);
      return { kind: "queued", reason: "worker-unavailable" };
    }

    const handle: DispatchHandle = {
      id: uuidv4(),
      job,
      controller,
      startedAt,
      settled: false,
      completion: Promise.resolve<DispatchSettlement>({ outcome: "superseded" }),
    };

    handle.completion = outcome
      .then(
        (result) => this.settle(handle, result),
        (error: unknown) => this.settleRejection(handle, error)
      )
      .catch((error: unknown): DispatchSettlement => {
        this.logger.error({
          msg: "Failed to apply status job outcome",
          entryId,
          handle: handle.id,
          error: formatErrorForLog(error),
        });
        return { outcome: "error", message: errorMessage(error) };
      });

    this.handles.set(entryId, handle);
    this.counters.dispatched++;
    this.logger.debug({ msg: "Status job dispatched", entryId, handle: handle.id, newStatus });

    return { kind: "dispatched", completion: handle.completion };
  }

  /**
   * Aborts the live job for an entry, if any, and stops a dispatch for it
   * that has not started its job yet. The aborted job's outcome is ignored.
   */
  cancel(entryId: number): boolean {
    const pending = this.pending.get(entryId);
    if (pending) {
      this.pending.delete(entryId);
      pending.abort();
    }
    const handle = this.handles.get(entryId);
    if (handle) this.abortLive(entryId);
    return Boolean(pending) || Boolean(handle);
  }

  /** Returns the aborted handle when its job was still running. */
  private abortLive(entryId: number): DispatchHandle | null {
    const handle = this.handles.get(entryId);
    if (!handle) return null;

    this.handles.delete(entryId);
    if (handle.settled) return null;
    handle.controller.abort();
    return handle;
  }

  private cancelledResult(entryId: number): DispatchResult {
    this.logger.debug({ msg: "Dispatch cancelled before its job started", entryId });
    return { kind: "cancelled" };
  }

  liveCount(): number {
    let live = 0;
    for (const handle of this.handles.values()) {
      if (!handle.settled) live++;
    }
    return live;
  }

  getStats(): DispatcherStats {
    return { live: this.liveCount(), ...this.counters };
  }

  start(): void {
    if (this.reaper) return;
    const interval = this.options.settings.getSettings().reaperIntervalMs;
    this.reaper = setInterval(() => this.reap(), interval);
    this.reaper.unref();
  }

  /**
   * Drops settled handles and aborts jobs that have run for longer than the
   * maximum age. An aborted job's change is queued so it is not lost.
   */
  reap(): number {
    const maxAge =
      this.options.maxHandleAgeMs ?? this.options.settings.getSettings().reaperIntervalMs;
    const cutoff = this.now() - maxAge;
    let reaped = 0;

    for (const [entryId, handle] of [...this.handles]) {
      if (handle.settled) {
        this.handles.delete(entryId);
        continue;
      }
      if (handle.startedAt > cutoff) continue;

      this.handles.delete(entryId);
      handle.controller.abort();
      reaped++;
      this.counters.reaped++;
      this.logger.warn({ msg: "Reaped stale status job", entryId, handle: handle.id });

      const { targetStatus, originalStatus } = handle.job;
      this.enqueue(entryId, targetStatus, originalStatus).catch((error: unknown) => {
        this.logger.error({
          msg: "Failed to queue reaped status change",
          entryId,
          error: formatErrorForLog(error),
        });
      });
    }

    return reaped;
  }

  stop(): void {
    if (this.reaper) {
      clearInterval(this.reaper);
      this.reaper = null;
    }
    for (const handle of this.handles.values()) {
      if (!handle.settled) handle.controller.abort();
    }
    this.handles.clear();
    for (const pending of this.pending.values()) {
      pending.abort();
    }
    this.pending.clear();
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

  private isCurrent(handle: DispatchHandle): boolean {
    return (
      this.handles.get(handle.job.entryId) === handle && !handle.controller.signal.aborted
    );
  }

  private async settle(handle: DispatchHandle, outcome: JobOutcome): Promise<DispatchSettlement> {
    const current = this.isCurrent(handle);
    handle.settled = true;
    if (!current) {
      this.counters.superseded++;
      return { outcome: "superseded" };
    }

    const { entryId, targetStatus, originalStatus } = handle.job;
    this.handles.delete(entryId);

    switch (outcome.kind) {
      case "synced":
        await this.options.queue.remove(entryId);
        this.counters.synced++;
        this.options.bus.publish({ type: "cacheInvalidated", scope: "entries", ids: [entryId] });
        return { outcome: "synced" };

      case "failed":
        return this.heal(handle, outcome.message);

      case "offline":
        await this.enqueue(entryId, targetStatus, originalStatus);
        return { outcome: "queued", reason: "offline" };
    }
  }

  private async settleRejection(
    handle: DispatchHandle,
    error: unknown
  ): Promise<DispatchSettlement> {
    if (!this.isCurrent(handle)) {
      handle.settled = true;
      this.counters.superseded++;
      return { outcome: "superseded" };
    }
    return this.settle(handle, { kind: "failed", message: errorMessage(error) });
  }

  /**
   * Restores the status the entry had before the failed job, marked as a
   * worker write, and queues the change for the next sync. A user change made
   * after the job started wins over the revert.
   */
  private async heal(handle: DispatchHandle, message: string): Promise<DispatchSettlement> {
    const { entryId, targetStatus, originalStatus } = handle.job;
    const record = await this.options.store.load(entryId);

    if (!record || record.lastUpdated > handle.startedAt) {
      this.logger.info({ msg: "Skipping revert, entry changed since dispatch", entryId });
      return { outcome: "superseded" };
    }

    await this.options.store.write(entryId, revertTarget(originalStatus), { viaWorker: true });
    await this.enqueue(entryId, targetStatus, originalStatus);
    this.counters.reverted++;
    this.logger.warn({ msg: "Status job failed, reverted entry", entryId, error: message });
    return { outcome: "reverted", message };
  }

  private async enqueue(
    entryId: number,
    targetStatus: WritableStatus,
    originalStatus: EntryStatus
  ): Promise<void> {
    await this.options.queue.enqueue(entryId, {
      targetStatus,
      originalStatus,
      timestamp: this.now(),
    });
    this.counters.queued++;
  }

  private async isOnline(): Promise<boolean> {
    try {
      return await this.options.connectivity.isOnline();
    } catch (error) {
      this.logger.warn({ msg: "Connectivity check failed", error: errorMessage(error) });
      return false;
    }
  }
}

export const createBackgroundDispatcher = (options: DispatcherOptions): BackgroundDispatcher =>
  new BackgroundDispatcher(options);
