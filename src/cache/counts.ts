import type { Category, FeedCounters, RemoteApi } from "../api/client";
import type { EventBus } from "../events";

export type CountSource = Pick<RemoteApi, "getUnreadCount" | "getFeedCounters" | "getCategories">;

export interface CountCacheOptions {
  source: () => CountSource;
  enabled?: boolean;
  ttlMs?: number;
  now?: () => number;
}

interface CacheEntry<T> {
  value: T;
  expiresAt: number;
}

type CountKey = "unread" | "feedCounters" | "categories";

interface CountValues {
  unread: number;
  feedCounters: FeedCounters;
  categories: Category[];
}

export const DEFAULT_COUNT_TTL_MS = 300_000;

/**
 * Short-lived cache of the server's aggregate counts. Any confirmed mutation
 * drops everything through the invalidation bus.
 */
export class CountCache {
  private entries: { [K in CountKey]?: CacheEntry<CountValues[K]> } = {};
  private enabled: boolean;
  private ttlMs: number;
  private now: () => number;

  constructor(private options: CountCacheOptions) {
    this.enabled = options.enabled ?? true;
    this.ttlMs = options.ttlMs ?? DEFAULT_COUNT_TTL_MS;
    this.now = options.now ?? Date.now;
  }

  getUnreadCount(): Promise<number> {
    return this.cached("unread", () => this.options.source().getUnreadCount());
  }

  getFeedCounters(): Promise<FeedCounters> {
    return this.cached("feedCounters", () => this.options.source().getFeedCounters());
  }

  getCategoryCounts(): Promise<Category[]> {
    return this.cached("categories", () => this.options.source().getCategories(true));
  }

  invalidateAll(): void {
    this.entries = {};
  }

  attach(bus: EventBus): () => void {
    return bus.subscribe({
      onCacheInvalidated: () => this.invalidateAll(),
    });
  }

  private async cached<K extends CountKey>(
    key: K,
    fetcher: () => Promise<CountValues[K]>
  ): Promise<CountValues[K]> {
    if (!this.enabled) {
      return fetcher();
    }

    const entry = this.entries[key];
    if (entry && entry.expiresAt > this.now()) {
      return entry.value;
    }

    const value = await fetcher();
    const entries: { [P in K]?: CacheEntry<CountValues[P]> } = this.entries;
    entries[key] = { value, expiresAt: this.now() + this.ttlMs };
    return value;
  }
}

export const createCountCache = (options: CountCacheOptions): CountCache => new CountCache(options);
