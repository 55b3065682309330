import { z } from "zod";

export const entryStatusSchema = z.enum(["read", "unread", "removed"]);
export const writableStatusSchema = z.enum(["read", "unread"]);

export type EntryStatus = z.infer<typeof entryStatusSchema>;
export type WritableStatus = z.infer<typeof writableStatusSchema>;

export const entryIdSchema = z.number().int().positive();

export const entityStatusRecordSchema = z.object({
  version: z.literal(1),
  id: entryIdSchema,
  status: entryStatusSchema,
  lastUpdated: z.number().int().nonnegative(),
  pendingFromSubprocess: z.boolean(),
  pendingFromSubprocessTimestamp: z.number().int().nonnegative().nullable(),
  title: z.string().optional(),
  url: z.string().optional(),
  feedId: entryIdSchema.optional(),
  categoryId: entryIdSchema.optional(),
  publishedAt: z.string().optional(),
});

export type EntityStatusRecord = z.infer<typeof entityStatusRecordSchema>;

export const materializeInputSchema = entityStatusRecordSchema
  .omit({ version: true })
  .partial({
    lastUpdated: true,
    pendingFromSubprocess: true,
    pendingFromSubprocessTimestamp: true,
  });

export type MaterializeInput = z.input<typeof materializeInputSchema>;

export interface WriteOptions {
  /** Set when the write is a revert applied for a background job that failed. */
  viaWorker: boolean;
}

export const isEntryRead = (status: EntryStatus): boolean => status === "read";
