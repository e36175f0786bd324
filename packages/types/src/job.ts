export type JobType = "query";

export interface JobData {
  type: JobType;
  /** Chat session the question belongs to. The session owns its history. */
  sessionId: string;
}

export interface QueryJobData extends JobData {
  type: "query";
  question: string;
  topK?: number;
  similarityThreshold?: number;
}

export type AnyJobData = QueryJobData;

export interface QueryJobResult {
  answer: string;
  model?: string;
  chunkIds: string[];
  durationMs: number;
}

export interface ChatTurn {
  user: string;
  bot: string;
}
