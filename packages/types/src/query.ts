import type { Chunk } from "./chunk.js";

export type Question = string;

export type ContextFormat = "markdown" | "xml" | "plain";

export interface RetrievalConfig {
  readonly topK: number;
  readonly similarityThreshold: number;
}

export interface ProcessorConfig {
  readonly retrieval: RetrievalConfig;
}

export interface ScoredChunk {
  chunkId: string;
  source: string;
  content: string;
  /** Cosine similarity to the query vector. Used for threshold filtering. */
  score: number;
  /** Relevance assigned by the reranker, when one ran. Never used for filtering. */
  rerankScore?: number;
  metadata: Record<string, unknown>;
}

export type AugmentedPrompt = string;

export interface GenerationResult {
  text: string;
  model?: string;
}

export interface QueryOutcome {
  result: GenerationResult;
  chunks: ScoredChunk[];
  prompt: AugmentedPrompt;
}

export function toScoredChunk(chunk: Chunk, score: number): ScoredChunk {
  return {
    chunkId: chunk.chunkId,
    source: chunk.source,
    content: chunk.content,
    score,
    metadata: chunk.metadata,
  };
}
