import { errorMessage } from "../errors";
import type { RemoteApi } from "../api/client";
import type { ConnectivityProbe } from "../connectivity";
import type { JobOutcome, StatusUpdateJob } from "./types";

export interface JobContext {
  api: Pick<RemoteApi, "updateEntries">;
  probe: ConnectivityProbe;
  signal?: AbortSignal;
}

/**
 * Pushes one entry's status to the server. Never throws: every way the call
 * can end is reported as an outcome for the dispatcher to apply.
 */
export const performStatusUpdate = async (
  job: StatusUpdateJob,
  context: JobContext
): Promise<JobOutcome> => {
  let online: boolean;
  try {
    online = await context.probe.isOnline();
  } catch {
    online = false;
  }
  if (!online) {
    return { kind: "offline" };
  }

  try {
    await context.api.updateEntries([job.entryId], job.targetStatus, { signal: context.signal });
    return { kind: "synced" };
  } catch (error) {
    return { kind: "failed", message: errorMessage(error) };
  }
};
