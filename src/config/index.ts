import { z } from "zod";
import { createEnv, envBoolean, envInteger, envOptionalString, EnvSource } from "../env";
import type { LogLevel } from "../observability/logger";

export interface SyncSettings {
  serverAddress: string | null;
  apiToken: string | null;
  dataDir: string;
  requestTimeoutMs: number;
  reaperIntervalMs: number;
  workerThreads: number;
  markAsReadOnOpen: boolean;
  syncOnReconnect: boolean;
  maxBatchSize: number | null;
  cacheEnabled: boolean;
  cacheTtlMs: number;
  logLevel: LogLevel;
}

/**
 * Source of the current settings. Read on every use so a host can change
 * server address or token without rebuilding the engine.
 */
export interface SettingsProvider {
  getSettings(): SyncSettings;
}

export const DEFAULT_SETTINGS: SyncSettings = {
  serverAddress: null,
  apiToken: null,
  dataDir: "./data",
  requestTimeoutMs: 15_000,
  reaperIntervalMs: 30_000,
  workerThreads: 2,
  markAsReadOnOpen: true,
  syncOnReconnect: true,
  maxBatchSize: null,
  cacheEnabled: true,
  cacheTtlMs: 300_000,
  logLevel: "info",
};

export const loadSyncConfig = (source: EnvSource = process.env): SyncSettings => {
  const env = createEnv(
    {
      SYNC: {
        SERVER_ADDRESS: envOptionalString(),
        API_TOKEN: envOptionalString(),
        DATA_DIR: z.string().min(1).default(DEFAULT_SETTINGS.dataDir),
        REQUEST_TIMEOUT_MS: envInteger(DEFAULT_SETTINGS.requestTimeoutMs, 1),
        REAPER_INTERVAL_MS: envInteger(DEFAULT_SETTINGS.reaperIntervalMs, 1),
        WORKER_THREADS: envInteger(DEFAULT_SETTINGS.workerThreads, 1),
        MARK_AS_READ_ON_OPEN: envBoolean(DEFAULT_SETTINGS.markAsReadOnOpen),
        ON_RECONNECT: envBoolean(DEFAULT_SETTINGS.syncOnReconnect),
        MAX_BATCH_SIZE: z.coerce.number().int().positive().optional(),
        CACHE_ENABLED: envBoolean(DEFAULT_SETTINGS.cacheEnabled),
        CACHE_TTL_MS: envInteger(DEFAULT_SETTINGS.cacheTtlMs),
        LOG_LEVEL: z.enum(["debug", "info", "warn", "error"]).default(DEFAULT_SETTINGS.logLevel),
      },
    },
    source
  );

  return {
    serverAddress: env.SYNC.SERVER_ADDRESS,
    apiToken: env.SYNC.API_TOKEN,
    dataDir: env.SYNC.DATA_DIR,
    requestTimeoutMs: env.SYNC.REQUEST_TIMEOUT_MS,
    reaperIntervalMs: env.SYNC.REAPER_INTERVAL_MS,
    workerThreads: env.SYNC.WORKER_THREADS,
    markAsReadOnOpen: env.SYNC.MARK_AS_READ_ON_OPEN,
    syncOnReconnect: env.SYNC.ON_RECONNECT,
    maxBatchSize: env.SYNC.MAX_BATCH_SIZE ?? null,
    cacheEnabled: env.SYNC.CACHE_ENABLED,
    cacheTtlMs: env.SYNC.CACHE_TTL_MS,
    logLevel: env.SYNC.LOG_LEVEL,
  };
};

export const createStaticSettings = (overrides: Partial<SyncSettings> = {}): SettingsProvider => {
  const settings: SyncSettings = { ...DEFAULT_SETTINGS, ...overrides };
  return {
    getSettings: () => settings,
  };
};

export const createEnvSettings = (source: EnvSource = process.env): SettingsProvider => {
  const settings = loadSyncConfig(source);
  return {
    getSettings: () => settings,
  };
};
