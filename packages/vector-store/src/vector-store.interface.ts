import type { Chunk } from "@benchrag/types";

export interface VectorCandidate extends Chunk {
  /** The store's own similarity for this hit, in whatever metric the index uses. */
  storeScore: number;
}

/**
 * Read side of the vector index. Which candidates are visible is decided by
 * the store's own nearest-neighbour search.
 */
export interface IVectorStore {
  nearest(vector: number[], limit: number): Promise<VectorCandidate[]>;
  healthCheck(): Promise<boolean>;
}
