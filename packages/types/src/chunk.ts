/** A fixed-length numeric representation of a piece of text. */
export type EmbeddingVector = number[];

/**
 * A retrievable unit of benchmark text. Its embedding is precomputed and
 * lives in the vector store; this core never owns or mutates it.
 */
export interface Chunk {
  chunkId: string;
  /** Document or section the chunk was cut from, kept for traceability. */
  source: string;
  content: string;
  embedding: EmbeddingVector;
  metadata: Record<string, unknown>;
}
