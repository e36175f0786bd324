import { UnrecoverableError } from "bullmq";
import { QueryProcessor, createProcessorConfig, type QueryProcessorDependencies } from "@benchrag/core";
import { isRetryable, messageOf } from "@benchrag/errors";
import { ProcessTimer, createChildLogger, type Logger, type TimerClock } from "@benchrag/logger";
import type { QueryJobData, QueryJobResult, RetrievalDefaults } from "@benchrag/types";

export const PROCESS_MARK = "RAG Processing Query";

export type QueryServices = Omit<QueryProcessorDependencies, "logger" | "timer">;

export interface QueryJobProcessorOptions {
  defaults: RetrievalDefaults;
  logger: Logger;
  clock?: TimerClock;
}

/**
 * Query job processor.
 *
 * Each job gets a fresh config and processor over the shared services, so
 * per-turn topK and threshold never leak between questions. Errors the
 * retry policy rejects are marked unrecoverable so BullMQ skips the
 * remaining attempts.
 */
export function createQueryJobProcessor(services: QueryServices, options: QueryJobProcessorOptions) {
  const { defaults, clock } = options;

  return async (data: QueryJobData, jobId?: string): Promise<QueryJobResult> => {
    const log = createChildLogger(options.logger, { jobId, sessionId: data.sessionId });
    const timer = new ProcessTimer(log, clock);

    timer.mark(PROCESS_MARK);
    let answer: string;
    let model: string | undefined;
    let chunkIds: string[];
    try {
      const config = createProcessorConfig({
        retrieval: {
          topK: data.topK ?? defaults.topK,
          similarityThreshold: data.similarityThreshold ?? defaults.similarityThreshold,
        },
      });
      const processor = new QueryProcessor({ ...services, logger: log, timer }, config);
      const outcome = await processor.run(data.question);
      answer = outcome.result.text;
      model = outcome.result.model;
      chunkIds = outcome.chunks.map((chunk) => chunk.chunkId);
    } catch (error: unknown) {
      const retryable = isRetryable(error);
      log.error({ err: error, retryable }, "query failed");
      if (!retryable) {
        throw new UnrecoverableError(messageOf(error));
      }
      throw error;
    }
    timer.mark(PROCESS_MARK);

    const span = timer.spans().find((s) => s.name === PROCESS_MARK);
    return { answer, model, chunkIds, durationMs: span?.elapsedMs ?? 0 };
  };
}
