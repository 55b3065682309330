export * from "./types";
export { performStatusUpdate } from "./job";
export type { JobContext } from "./job";
export {
  JobAbortedError,
  PiscinaJobRunner,
  createInlineRunner,
  createPiscinaRunner,
} from "./runner";
export type { InlineRunnerOptions, JobRunner, PiscinaRunnerOptions } from "./runner";
export { BackgroundDispatcher, createBackgroundDispatcher } from "./dispatcher";
export type { DispatcherOptions } from "./dispatcher";
