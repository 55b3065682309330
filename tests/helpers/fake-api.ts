import { TransportError } from "@/api/transport";
import type { Category, FeedCounters, RemoteApi, RequestOptions } from "@/api/client";
import type { WritableStatus } from "@/status/types";

export type FakeCall =
  | { op: "updateEntries"; ids: number[]; status: WritableStatus }
  | { op: "markFeedAsRead"; id: number }
  | { op: "markCategoryAsRead"; id: number }
  | { op: "getUnreadCount" }
  | { op: "getFeedCounters" }
  | { op: "getCategories"; withCounts: boolean };

/**
 * In-process stand-in for the feed reader server. Keeps a status per entry
 * and records every call.
 */
export class FakeRemoteApi implements RemoteApi {
  calls: FakeCall[] = [];
  entryStatus = new Map<number, WritableStatus>();
  unreadCount = 0;
  feedCounters: FeedCounters = { reads: {}, unreads: {} };
  categories: Category[] = [];
  /** When set, every mutating call fails with this HTTP status. */
  failWith: number | null = null;
  /** Statuses whose batches are rejected. */
  rejectStatuses = new Set<WritableStatus>();
  /** Pending calls block until release() is called. */
  blocking = false;
  private waiters: Array<() => void> = [];

  async updateEntries(ids: number[], status: WritableStatus, options?: RequestOptions): Promise<void> {
    this.calls.push({ op: "updateEntries", ids: [...ids], status });
    await this.gate(options?.signal);
    if (this.failWith !== null || this.rejectStatuses.has(status)) {
      throw new TransportError("Entry update rejected", this.failWith ?? 500, "HTTP_ERROR");
    }
    for (const id of ids) {
      this.entryStatus.set(id, status);
    }
  }

  async markFeedAsRead(feedId: number): Promise<void> {
    this.calls.push({ op: "markFeedAsRead", id: feedId });
    this.failIfConfigured();
  }

  async markCategoryAsRead(categoryId: number): Promise<void> {
    this.calls.push({ op: "markCategoryAsRead", id: categoryId });
    this.failIfConfigured();
  }

  async getUnreadCount(): Promise<number> {
    this.calls.push({ op: "getUnreadCount" });
    return this.unreadCount;
  }

  async getFeedCounters(): Promise<FeedCounters> {
    this.calls.push({ op: "getFeedCounters" });
    return this.feedCounters;
  }

  async getCategories(withCounts = false): Promise<Category[]> {
    this.calls.push({ op: "getCategories", withCounts });
    return this.categories;
  }

  release(): void {
    this.blocking = false;
    for (const resolve of this.waiters.splice(0)) {
      resolve();
    }
  }

  callsOf<K extends FakeCall["op"]>(op: K): Extract<FakeCall, { op: K }>[] {
    return this.calls.filter((call): call is Extract<FakeCall, { op: K }> => call.op === op);
  }

  private failIfConfigured(): void {
    if (this.failWith !== null) {
      throw new TransportError("Request rejected", this.failWith, "HTTP_ERROR");
    }
  }

  private gate(signal?: AbortSignal): Promise<void> {
    if (!this.blocking) return Promise.resolve();
    return new Promise<void>((resolve, reject) => {
      this.waiters.push(resolve);
      signal?.addEventListener("abort", () => reject(new Error("aborted")), { once: true });
    });
  }
}
