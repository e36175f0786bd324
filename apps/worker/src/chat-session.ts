import { z } from "zod";
import type { ChatTurn, QueryJobData } from "@benchrag/types";

const topKSchema = z.coerce.number().int().min(1).max(10);
const thresholdSchema = z.coerce.number().min(0).max(1);

export type ChatCommand =
  | { kind: "question"; question: string }
  | { kind: "topK"; value: number }
  | { kind: "threshold"; value: number }
  | { kind: "history" }
  | { kind: "exit" }
  | { kind: "invalid"; message: string }
  | { kind: "empty" };

/**
 * Parse one line of input. Lines starting with `/` are commands; anything
 * else is a question.
 */
export function parseChatLine(line: string): ChatCommand {
  const trimmed = line.trim();
  if (trimmed.length === 0) return { kind: "empty" };
  if (!trimmed.startsWith("/")) return { kind: "question", question: trimmed };

  const [command, argument = ""] = trimmed.slice(1).split(/\s+/, 2);
  switch (command) {
    case "top_k":
    case "topk": {
      const parsed = topKSchema.safeParse(argument === "" ? undefined : argument);
      return parsed.success
        ? { kind: "topK", value: parsed.data }
        : { kind: "invalid", message: "top_k must be an integer between 1 and 10" };
    }
    case "threshold": {
      const parsed = thresholdSchema.safeParse(argument === "" ? undefined : argument);
      return parsed.success
        ? { kind: "threshold", value: parsed.data }
        : { kind: "invalid", message: "threshold must be a number between 0 and 1" };
    }
    case "history":
      return { kind: "history" };
    case "exit":
    case "quit":
      return { kind: "exit" };
    default:
      return { kind: "invalid", message: `Unknown command /${command ?? ""}` };
  }
}

/**
 * One conversation. Owns the chat history and the per-turn retrieval
 * settings; the pipeline never sees either beyond the values in a job.
 */
export class ChatSession {
  private readonly turns: ChatTurn[] = [];
  private topK: number | undefined;
  private similarityThreshold: number | undefined;

  constructor(readonly id: string) {}

  setTopK(value: number): void {
    this.topK = value;
  }

  setSimilarityThreshold(value: number): void {
    this.similarityThreshold = value;
  }

  jobData(question: string): QueryJobData {
    return {
      type: "query",
      sessionId: this.id,
      question,
      ...(this.topK === undefined ? {} : { topK: this.topK }),
      ...(this.similarityThreshold === undefined ? {} : { similarityThreshold: this.similarityThreshold }),
    };
  }

  record(user: string, bot: string): void {
    this.turns.push({ user, bot });
  }

  get history(): readonly ChatTurn[] {
    return this.turns;
  }
}
