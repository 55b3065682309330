/**
 * Cache Invalidation Bus
 *
 * Publishes events once a mutation is confirmed against the remote. Read
 * caches subscribe to drop their aggregates; they never see queues or workers.
 *
 * ```typescript
 * const bus = createEventBus();
 * const unsubscribe = bus.subscribe({
 *   onCacheInvalidated: () => counts.invalidateAll(),
 * });
 * bus.publish({ type: "cacheInvalidated", scope: "entries", ids: [42] });
 * ```
 */

import { Logger, defaultLogger } from "../observability/logger";
import { errorMessage } from "../errors";

export type InvalidationScope = "entries" | "feeds" | "categories" | "all";

export interface CacheInvalidatedEvent {
  type: "cacheInvalidated";
  scope: InvalidationScope;
  ids: number[];
}

export interface EntryPurgedEvent {
  type: "entryPurged";
  entryId: number;
}

export type SyncEvent = CacheInvalidatedEvent | EntryPurgedEvent;

export interface SyncEventHandlers {
  onCacheInvalidated(event: CacheInvalidatedEvent): void;
  onEntryPurged(event: EntryPurgedEvent): void;
}

export interface EventBus {
  publish(event: SyncEvent): void;
  subscribe(handlers: Partial<SyncEventHandlers>): () => void;
  subscriberCount(): number;
}

const deliver = (handlers: Partial<SyncEventHandlers>, event: SyncEvent): void => {
  switch (event.type) {
    case "cacheInvalidated":
      handlers.onCacheInvalidated?.(event);
      break;
    case "entryPurged":
      handlers.onEntryPurged?.(event);
      break;
  }
};

export const createEventBus = (logger: Logger = defaultLogger): EventBus => {
  const subscribers = new Set<Partial<SyncEventHandlers>>();

  return {
    publish(event: SyncEvent): void {
      for (const handlers of [...subscribers]) {
        try {
          deliver(handlers, event);
        } catch (error) {
          logger.error({
            msg: "Event handler failed",
            event: event.type,
            error: errorMessage(error),
          });
        }
      }
    },

    subscribe(handlers: Partial<SyncEventHandlers>): () => void {
      // Wrapped so the same handler object can subscribe twice independently.
      const entry = { ...handlers };
      subscribers.add(entry);
      return () => {
        subscribers.delete(entry);
      };
    },

    subscriberCount(): number {
      return subscribers.size;
    },
  };
};
