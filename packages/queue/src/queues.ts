import { Queue } from "bullmq";
import type { ConnectionOptions } from "bullmq";
import type { QueryJobData, QueryJobResult } from "@benchrag/types";

export const QUEUE_NAMES = {
  QUERY: "benchrag:query",
} as const;

export interface QueueConfig {
  connection: ConnectionOptions;
}

/**
 * Whole-query retries live here; the pipeline itself never retries.
 * Retries land 2 s and 6 s after the first failure.
 */
export const QUERY_JOB_OPTIONS = {
  attempts: 3,
  backoff: {
    type: "exponential" as const,
    delay: 2000,
  },
  removeOnComplete: { count: 1000 },
  removeOnFail: { count: 5000 },
};

export function createQueues(config: QueueConfig) {
  const queryQueue = new Queue<QueryJobData, QueryJobResult>(QUEUE_NAMES.QUERY, {
    connection: config.connection,
    defaultJobOptions: QUERY_JOB_OPTIONS,
  });

  return { queryQueue };
}

export type Queues = ReturnType<typeof createQueues>;
export type QueryQueue = Queues["queryQueue"];
