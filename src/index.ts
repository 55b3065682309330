export * from "./errors";
export * from "./observability/logger";
export * from "./storage";
export * from "./status";
export * from "./queue";
export * from "./api";
export * from "./connectivity";
export * from "./dispatch";
export * from "./coordinator";
export * from "./events";
export * from "./cache";
export * from "./notifications";
export * from "./service";
export * from "./config";
export { createEnv, envVariable } from "./env";
export { createSyncEngine } from "./engine";
export type { SyncEngine, SyncEngineOptions } from "./engine";
