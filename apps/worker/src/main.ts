import { Worker, UnrecoverableError } from "bullmq";
import { parseEnv } from "@benchrag/config";
import { messageOf } from "@benchrag/errors";
import { createLogger } from "@benchrag/logger";
import { QUEUE_NAMES, createDeadLetterQueue, parseRedisConnection } from "@benchrag/queue";
import type { QueryJobData, QueryJobResult } from "@benchrag/types";
import { createQueryJobProcessor } from "./processors/query.js";
import { createServices } from "./services.js";

async function main(): Promise<void> {
  const config = parseEnv();
  const logger = createLogger({ level: config.logLevel, service: "benchrag-worker" });

  const services = await createServices(config, logger);
  const connection = parseRedisConnection(config.redis.url);
  const deadLetters = createDeadLetterQueue(connection);
  const processQuery = createQueryJobProcessor(services, {
    defaults: config.retrievalDefaults,
    logger,
  });

  // One question at a time, as a chat turn is.
  const worker = new Worker<QueryJobData, QueryJobResult>(
    QUEUE_NAMES.QUERY,
    async (job) => processQuery(job.data, job.id),
    { connection, concurrency: 1 },
  );

  worker.on("failed", (job, error) => {
    if (!job) return;
    const attempts = job.opts.attempts ?? 1;
    if (!(error instanceof UnrecoverableError) && job.attemptsMade < attempts) return;

    deadLetters
      .add("dead-letter", { ...job.data, originalQueue: QUEUE_NAMES.QUERY, failureReason: error.message })
      .catch((dlqError: unknown) => {
        logger.error({ err: dlqError, jobId: job.id }, "failed to move job to dead-letter queue");
      });
  });

  worker.on("error", (error) => {
    logger.error({ err: error }, "worker error");
  });

  logger.info({ queue: QUEUE_NAMES.QUERY }, "worker started");

  const shutdown = async (): Promise<void> => {
    logger.info("shutting down");
    await worker.close();
    await deadLetters.close();
    logger.info("worker closed");
    process.exit(0);
  };

  process.on("SIGTERM", () => void shutdown());
  process.on("SIGINT", () => void shutdown());
}

main().catch((err: unknown) => {
  console.error(`[worker] Fatal error: ${messageOf(err)}`);
  process.exit(1);
});
