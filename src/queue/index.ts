export { DurableQueue } from "./durable-queue";
export type { DurableQueueOptions } from "./durable-queue";
export * from "./queues";
