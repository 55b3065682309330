/**
 * Worker thread entry point. The default export is called by piscina for
 * each status update job.
 */

import { createRemoteApi } from "../api/client";
import { createHttpConnectivityProbe } from "../connectivity";
import { performStatusUpdate } from "./job";
import { statusUpdateJobSchema } from "./types";
import type { JobOutcome } from "./types";

export default async function handleTask(raw: unknown): Promise<JobOutcome> {
  const job = statusUpdateJobSchema.parse(raw);

  return performStatusUpdate(job, {
    api: createRemoteApi({
      serverAddress: job.serverAddress,
      apiToken: job.apiToken,
      timeoutMs: job.timeoutMs,
    }),
    probe: createHttpConnectivityProbe({ url: job.serverAddress, timeoutMs: job.timeoutMs }),
  });
}
