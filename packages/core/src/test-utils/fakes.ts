import { vi } from "vitest";
import type { IReranker, RerankedDocument } from "@benchrag/reranker";
import type { IVectorStore, VectorCandidate } from "@benchrag/vector-store";

export function candidate(
  chunkId: string,
  embedding: number[],
  overrides: Partial<VectorCandidate> = {},
): VectorCandidate {
  return {
    chunkId,
    source: `doc-${chunkId}`,
    content: `content of ${chunkId}`,
    embedding,
    storeScore: 0,
    metadata: {},
    ...overrides,
  };
}

/** Unit vector in the plane whose cosine with [1, 0] is `score`. */
export function vectorWithScore(score: number): number[] {
  return [score, Math.sqrt(1 - score * score)];
}

export function fakeStore(candidates: VectorCandidate[]) {
  return {
    nearest: vi.fn(async (_vector: number[], _limit: number) => candidates),
    healthCheck: async () => true,
  } satisfies IVectorStore;
}

export function fakeReranker(rerank: (query: string, documents: string[]) => Promise<RerankedDocument[]>) {
  return {
    name: "fake",
    model: "fake-rerank",
    rerank: vi.fn(rerank),
  } satisfies IReranker;
}
