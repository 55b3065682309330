export * from "./types";
export { EntityStatusStore, createEntityStatusStore, entryRecordKey } from "./store";
export type { EntityStatusStoreOptions } from "./store";
