import { z } from "zod";
import { entryIdSchema, entryStatusSchema, writableStatusSchema } from "../status/types";

/**
 * Everything a background job may know. It is built once per dispatch and
 * copied into the worker; the job has no access to settings, stores or queues.
 */
export const statusUpdateJobSchema = z.object({
  serverAddress: z.string().min(1),
  apiToken: z.string().min(1),
  entryId: entryIdSchema,
  targetStatus: writableStatusSchema,
  originalStatus: entryStatusSchema,
  timeoutMs: z.number().int().positive(),
});

export type StatusUpdateJob = Readonly<z.infer<typeof statusUpdateJobSchema>>;

export const jobOutcomeSchema = z.discriminatedUnion("kind", [
  z.object({ kind: z.literal("synced") }),
  z.object({ kind: z.literal("failed"), message: z.string() }),
  z.object({ kind: z.literal("offline") }),
]);

export type JobOutcome = z.infer<typeof jobOutcomeSchema>;

export type QueuedReason = "offline" | "worker-unavailable";

export type DispatchSettlement =
  | { outcome: "synced" }
  | { outcome: "reverted"; message: string }
  | { outcome: "queued"; reason: "offline" | "failed" | "reaped" }
  | { outcome: "superseded" }
  | { outcome: "error"; message: string };

export type DispatchResult =
  | { kind: "noop" }
  | { kind: "cancelled" }
  | { kind: "queued"; reason: QueuedReason }
  | { kind: "dispatched"; completion: Promise<DispatchSettlement> };

export interface DispatcherStats {
  live: number;
  dispatched: number;
  noops: number;
  queued: number;
  synced: number;
  reverted: number;
  superseded: number;
  reaped: number;
}
