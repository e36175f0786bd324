export { QUEUE_NAMES, QUERY_JOB_OPTIONS, createQueues } from "./queues.js";
export type { QueueConfig, Queues, QueryQueue } from "./queues.js";
export { DLQ_NAME, createDeadLetterQueue } from "./dlq.js";
export type { DeadLetterJobData, DeadLetterQueue } from "./dlq.js";
export { parseRedisConnection } from "./connection.js";
