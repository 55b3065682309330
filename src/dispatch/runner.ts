/**
 * Job runners for status updates.
 *
 * - `PiscinaJobRunner` runs each job on a worker thread; aborting a job's
 *   signal terminates the thread it runs on
 * - Lazy-initialised on first job (no threads spawned at construction)
 * - Falls back to a second runner, usually the inline one, if the pool
 *   cannot be created
 */

import { fileURLToPath } from "url";
import { availableParallelism } from "os";
import Piscina from "piscina";

import { createRemoteApi } from "../api/client";
import type { RemoteApi } from "../api/client";
import { createHttpConnectivityProbe } from "../connectivity";
import type { ConnectivityProbe } from "../connectivity";
import { Logger, defaultLogger } from "../observability/logger";
import { errorMessage } from "../errors";
import { performStatusUpdate } from "./job";
import { jobOutcomeSchema } from "./types";
import type { JobOutcome, StatusUpdateJob } from "./types";

export interface JobRunner {
  readonly kind: "worker-thread" | "inline";
  /** Returns null when the job cannot be started at all. */
  start(job: StatusUpdateJob, signal: AbortSignal): Promise<JobOutcome> | null;
  destroy(): Promise<void>;
}

export class JobAbortedError extends Error {
  constructor() {
    super("Job was aborted");
    this.name = "JobAbortedError";
  }
}

const abortable = <T>(promise: Promise<T>, signal: AbortSignal): Promise<T> =>
  new Promise<T>((resolve, reject) => {
    if (signal.aborted) {
      reject(new JobAbortedError());
      return;
    }
    const onAbort = () => reject(new JobAbortedError());
    signal.addEventListener("abort", onAbort, { once: true });
    promise.then(
      (value) => {
        signal.removeEventListener("abort", onAbort);
        resolve(value);
      },
      (error: unknown) => {
        signal.removeEventListener("abort", onAbort);
        reject(error);
      }
    );
  });

export interface InlineRunnerOptions {
  createApi?: (job: StatusUpdateJob) => Pick<RemoteApi, "updateEntries">;
  createProbe?: (job: StatusUpdateJob) => ConnectivityProbe;
}

const defaultApiFactory = (job: StatusUpdateJob): RemoteApi =>
  createRemoteApi({
    serverAddress: job.serverAddress,
    apiToken: job.apiToken,
    timeoutMs: job.timeoutMs,
  });

const defaultProbeFactory = (job: StatusUpdateJob): ConnectivityProbe =>
  createHttpConnectivityProbe({ url: job.serverAddress, timeoutMs: job.timeoutMs });

/** Runs jobs on the main thread. Used in tests and when no pool is available. */
export const createInlineRunner = (options: InlineRunnerOptions = {}): JobRunner => {
  const createApi = options.createApi ?? defaultApiFactory;
  const createProbe = options.createProbe ?? defaultProbeFactory;

  return {
    kind: "inline",
    start(job, signal) {
      const outcome = performStatusUpdate(job, {
        api: createApi(job),
        probe: createProbe(job),
        signal,
      });
      return abortable(outcome, signal);
    },
    async destroy() {},
  };
};

export interface PiscinaRunnerOptions {
  threads?: number;
  idleTimeoutMs?: number;
  logger?: Logger;
  fallback?: JobRunner;
}

const resolveWorkerPath = (): { filename: string; execArgv: string[] } => ({
  filename: fileURLToPath(new URL("./worker.ts", import.meta.url)),
  execArgv: ["--import", "tsx"],
});

export class PiscinaJobRunner implements JobRunner {
  readonly kind = "worker-thread";
  private pool: Piscina | null = null;
  private poolInitFailed = false;
  private logger: Logger;

  constructor(private options: PiscinaRunnerOptions = {}) {
    this.logger = options.logger ?? defaultLogger;
  }

  start(job: StatusUpdateJob, signal: AbortSignal): Promise<JobOutcome> | null {
    const pool = this.getPool();
    if (!pool) {
      return this.options.fallback ? this.options.fallback.start(job, signal) : null;
    }

    return pool.run({ ...job }, { signal }).then(
      (raw: unknown) => jobOutcomeSchema.parse(raw),
      (error: unknown) => {
        if (signal.aborted) throw new JobAbortedError();
        throw error;
      }
    );
  }

  async destroy(): Promise<void> {
    if (this.pool) {
      await this.pool.destroy();
      this.pool = null;
      this.logger.info("Worker thread pool destroyed");
    }
    await this.options.fallback?.destroy();
  }

  private getPool(): Piscina | null {
    if (this.poolInitFailed) return null;
    if (this.pool) return this.pool;

    try {
      const { filename, execArgv } = resolveWorkerPath();
      const threads =
        this.options.threads ?? Math.max(1, Math.min(4, Math.floor(availableParallelism() / 2)));

      this.pool = new Piscina({
        filename,
        execArgv,
        minThreads: 0,
        maxThreads: threads,
        idleTimeout: this.options.idleTimeoutMs ?? 60_000,
      });

      this.logger.info({ msg: "Worker thread pool initialised", threads, filename });
      return this.pool;
    } catch (error) {
      this.poolInitFailed = true;
      this.logger.warn({
        msg: "Failed to initialise worker thread pool",
        fallback: this.options.fallback?.kind ?? "none",
        error: errorMessage(error),
      });
      return null;
    }
  }
}

export const createPiscinaRunner = (options: PiscinaRunnerOptions = {}): JobRunner =>
  new PiscinaJobRunner(options);
