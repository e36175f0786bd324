import { randomUUID } from "node:crypto";
import { createInterface } from "node:readline/promises";
import { stdin, stdout } from "node:process";
import { QueueEvents } from "bullmq";
import { parseEnv } from "@benchrag/config";
import { messageOf } from "@benchrag/errors";
import { createLogger } from "@benchrag/logger";
import { QUEUE_NAMES, createQueues, parseRedisConnection } from "@benchrag/queue";
import { ChatSession, parseChatLine } from "./chat-session.js";

const HELP =
  "Ask a question about the benchmarks. Commands: /top_k <1-10>, /threshold <0-1>, /history, /exit";

async function main(): Promise<void> {
  const config = parseEnv();
  const logger = createLogger({ level: config.logLevel, service: "benchrag-ask" });
  const connection = parseRedisConnection(config.redis.url);

  const { queryQueue } = createQueues({ connection });
  const queueEvents = new QueueEvents(QUEUE_NAMES.QUERY, { connection });
  await queueEvents.waitUntilReady();

  const session = new ChatSession(randomUUID());
  const rl = createInterface({ input: stdin, output: stdout });
  stdout.write(`${HELP}\n`);

  try {
    for (;;) {
      const command = parseChatLine(await rl.question("> "));

      if (command.kind === "exit") break;
      switch (command.kind) {
        case "empty":
          continue;
        case "invalid":
          stdout.write(`${command.message}\n`);
          continue;
        case "topK":
          session.setTopK(command.value);
          stdout.write(`top_k set to ${String(command.value)}\n`);
          continue;
        case "threshold":
          session.setSimilarityThreshold(command.value);
          stdout.write(`threshold set to ${String(command.value)}\n`);
          continue;
        case "history":
          for (const turn of session.history) {
            stdout.write(`you: ${turn.user}\nbot: ${turn.bot}\n\n`);
          }
          continue;
        case "question": {
          const job = await queryQueue.add("query", session.jobData(command.question));
          try {
            const result = await job.waitUntilFinished(queueEvents);
            session.record(command.question, result.answer);
            stdout.write(`${result.answer}\n\n`);
          } catch (error: unknown) {
            logger.error({ err: error, jobId: job.id }, "query job failed");
            stdout.write(`The question could not be answered: ${messageOf(error)}\n`);
          }
        }
      }
    }
  } finally {
    rl.close();
    await queueEvents.close();
    await queryQueue.close();
  }
}

main().catch((err: unknown) => {
  console.error(`[ask] Fatal error: ${messageOf(err)}`);
  process.exit(1);
});
