export { EntryStatusService, createEntryStatusService } from "./entry-status";
export type { ChangeResult, EntryStatusServiceOptions } from "./entry-status";
