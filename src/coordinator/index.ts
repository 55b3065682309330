export * from "./types";
export { SyncCoordinator, createSyncCoordinator } from "./coordinator";
export type { SyncCoordinatorOptions } from "./coordinator";
