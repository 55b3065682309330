export { CountCache, createCountCache, DEFAULT_COUNT_TTL_MS } from "./counts";
export type { CountCacheOptions, CountSource } from "./counts";
export { EntryRecordCache } from "./records";
export type { RecordSource } from "./records";
