export interface QueueCounts {
  total: number;
  entries: number;
  feeds: number;
  categories: number;
}

export type SyncDecision = "sync" | "later" | "clear";

/** Asks the user what to do with pending changes. */
export interface SyncPrompt {
  ask(counts: QueueCounts): Promise<SyncDecision>;
  confirmClear(total: number): Promise<boolean>;
}

export interface GroupResult {
  processed: number;
  failed: number;
}

export type SyncSummary =
  | { status: "nothing-to-sync" }
  | { status: "offline"; counts: QueueCounts }
  | { status: "not-configured"; counts: QueueCounts; message: string }
  | { status: "deferred"; counts: QueueCounts }
  | { status: "cleared"; counts: QueueCounts }
  | {
      status: "completed";
      processed: number;
      failed: number;
      entries: GroupResult;
      feeds: GroupResult;
      categories: GroupResult;
    };

export interface ProcessOptions {
  /** Skip the prompt. */
  autoConfirm?: boolean;
  /** Suppress notifications. */
  silent?: boolean;
}

export interface ClearOptions {
  confirmed?: boolean;
}
