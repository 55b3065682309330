import { z } from "zod";
import { RecordStorage } from "../storage/types";
import { Logger } from "../observability/logger";
import { entryStatusSchema, writableStatusSchema } from "../status/types";
import { DurableQueue } from "./durable-queue";

export const entryStatusQueueEntrySchema = z.object({
  targetStatus: writableStatusSchema,
  originalStatus: entryStatusSchema,
  timestamp: z.number().int().nonnegative(),
});

export type EntryStatusQueueEntry = z.infer<typeof entryStatusQueueEntrySchema>;

export const collectionQueueEntrySchema = z.object({
  operation: z.literal("mark_all_read"),
  timestamp: z.number().int().nonnegative(),
});

export type CollectionQueueEntry = z.infer<typeof collectionQueueEntrySchema>;

export type CollectionKind = "feed" | "category";

export type EntryStatusQueue = DurableQueue<EntryStatusQueueEntry>;
export type CollectionQueue = DurableQueue<CollectionQueueEntry>;

export const QUEUE_KEYS = {
  entries: "status-queue.json",
  feed: "feed-queue.json",
  category: "category-queue.json",
} as const;

export interface QueueFactoryOptions {
  storage: RecordStorage;
  logger?: Logger;
}

export const createEntryStatusQueue = (options: QueueFactoryOptions): EntryStatusQueue =>
  new DurableQueue({
    name: "entry-status",
    key: QUEUE_KEYS.entries,
    schema: entryStatusQueueEntrySchema,
    storage: options.storage,
    logger: options.logger,
  });

export const createCollectionQueue = (
  kind: CollectionKind,
  options: QueueFactoryOptions
): CollectionQueue =>
  new DurableQueue({
    name: kind,
    key: QUEUE_KEYS[kind],
    schema: collectionQueueEntrySchema,
    storage: options.storage,
    logger: options.logger,
  });
