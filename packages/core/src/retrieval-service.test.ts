import { describe, it, expect } from "vitest";
import { DimensionMismatchError, RetrievalError } from "@benchrag/errors";
import { RetrievalService } from "./retrieval-service.js";
import { candidate, fakeReranker, fakeStore, vectorWithScore } from "./test-utils/fakes.js";

const QUERY = [1, 0];

async function retrievalFailure(pending: Promise<unknown>): Promise<RetrievalError> {
  const error = await pending.then(
    () => undefined,
    (e: unknown) => e,
  );
  if (!(error instanceof RetrievalError)) {
    throw new Error(`Expected a RetrievalError, got ${String(error)}`);
  }
  return error;
}

describe("RetrievalService", () => {
  it("re-scores candidates with cosine similarity instead of the store score", async () => {
    const store = fakeStore([
      candidate("a", vectorWithScore(0.4), { storeScore: 0.99 }),
      candidate("b", vectorWithScore(0.8), { storeScore: 0.1 }),
    ]);
    const service = new RetrievalService(store);

    const chunks = await service.retrieve(QUERY, { topK: 5, similarityThreshold: 0 });

    expect(chunks.map((c) => c.chunkId)).toEqual(["b", "a"]);
    expect(chunks[0]?.score).toBeCloseTo(0.8, 10);
    expect(chunks[1]?.score).toBeCloseTo(0.4, 10);
  });

  it("asks the store for the candidate limit, raised to topK", async () => {
    const store = fakeStore([]);

    await new RetrievalService(store, { candidateLimit: 4 }).retrieve(QUERY, {
      topK: 8,
      similarityThreshold: 0.3,
    });
    await new RetrievalService(store).retrieve(QUERY, { topK: 3, similarityThreshold: 0.3 });

    expect(store.nearest).toHaveBeenNthCalledWith(1, QUERY, 8);
    expect(store.nearest).toHaveBeenNthCalledWith(2, QUERY, 20);
  });

  it("keeps only chunks at or above the threshold", async () => {
    const store = fakeStore([
      // cos([1, 0], [3, 4]) is exactly 3 / 5
      candidate("at", [3, 4]),
      candidate("below", vectorWithScore(0.59)),
      candidate("above", vectorWithScore(0.8)),
    ]);

    const chunks = await new RetrievalService(store).retrieve(QUERY, {
      topK: 10,
      similarityThreshold: 0.6,
    });

    expect(chunks.map((c) => c.chunkId)).toEqual(["above", "at"]);
    for (const chunk of chunks) {
      expect(chunk.score).toBeGreaterThanOrEqual(0.6);
    }
  });

  it("never returns more than topK, highest score first", async () => {
    const store = fakeStore(
      [0.35, 0.9, 0.6, 0.75, 0.5].map((s, i) => candidate(`c${String(i)}`, vectorWithScore(s))),
    );

    const chunks = await new RetrievalService(store).retrieve(QUERY, {
      topK: 3,
      similarityThreshold: 0.32,
    });

    expect(chunks.map((c) => c.chunkId)).toEqual(["c1", "c3", "c2"]);
  });

  it("keeps store order for equal scores", async () => {
    const store = fakeStore([
      candidate("first", [2, 0]),
      candidate("low", [0, 1]),
      candidate("second", [1, 0]),
      candidate("third", [5, 0]),
    ]);

    const chunks = await new RetrievalService(store).retrieve(QUERY, {
      topK: 3,
      similarityThreshold: 0,
    });

    expect(chunks.map((c) => c.chunkId)).toEqual(["first", "second", "third"]);
  });

  it("returns an empty list when nothing clears the threshold", async () => {
    const store = fakeStore([candidate("a", vectorWithScore(0.2)), candidate("b", [0, 1])]);

    await expect(
      new RetrievalService(store).retrieve(QUERY, { topK: 3, similarityThreshold: 0.6 }),
    ).resolves.toEqual([]);
  });

  it("keeps the chunk at 0.9 and drops the one at 0.5 for threshold 0.6", async () => {
    const store = fakeStore([
      candidate("high", vectorWithScore(0.9)),
      candidate("mid", vectorWithScore(0.5)),
    ]);

    const chunks = await new RetrievalService(store).retrieve(QUERY, {
      topK: 5,
      similarityThreshold: 0.6,
    });

    expect(chunks).toHaveLength(1);
    expect(chunks[0]?.chunkId).toBe("high");
    expect(chunks[0]?.source).toBe("doc-high");
    expect(chunks[0]?.score).toBeCloseTo(0.9, 10);
  });

  it("wraps store failures in RetrievalError", async () => {
    const store = fakeStore([]);
    store.nearest.mockRejectedValueOnce(new Error("connect ECONNREFUSED 127.0.0.1:6333"));

    const error = await retrievalFailure(
      new RetrievalService(store).retrieve(QUERY, { topK: 3, similarityThreshold: 0.3 }),
    );

    expect(error.stage).toBe("store");
    expect(error.message).toBe("Vector store query failed: connect ECONNREFUSED 127.0.0.1:6333");
  });

  it("surfaces candidates of the wrong dimension", async () => {
    const store = fakeStore([candidate("a", [1, 0, 0])]);

    await expect(
      new RetrievalService(store).retrieve(QUERY, { topK: 3, similarityThreshold: 0 }),
    ).rejects.toThrow(DimensionMismatchError);
  });

  describe("with a reranker", () => {
    it("ranks by reranker order but filters by cosine score", async () => {
      const store = fakeStore([
        candidate("a", vectorWithScore(0.9)),
        candidate("b", vectorWithScore(0.4)),
        candidate("c", vectorWithScore(0.7)),
      ]);
      // Prefers b, which is below the cosine threshold.
      const reranker = fakeReranker(async () => [
        { index: 1, relevanceScore: 0.99 },
        { index: 2, relevanceScore: 0.8 },
        { index: 0, relevanceScore: 0.1 },
      ]);
      const service = new RetrievalService(store, { reranker });

      const chunks = await service.retrieve(
        QUERY,
        { topK: 5, similarityThreshold: 0.5 },
        "How do I audit global admins?",
      );

      expect(chunks.map((c) => c.chunkId)).toEqual(["c", "a"]);
      expect(chunks.map((c) => c.rerankScore)).toEqual([0.8, 0.1]);
      expect(reranker.rerank).toHaveBeenCalledWith("How do I audit global admins?", [
        "content of a",
        "content of b",
        "content of c",
      ]);
      expect(service.rerankerModel).toBe("fake-rerank");
    });

    it("truncates to topK after reranking", async () => {
      const store = fakeStore([
        candidate("a", vectorWithScore(0.9)),
        candidate("b", vectorWithScore(0.8)),
      ]);
      const reranker = fakeReranker(async () => [
        { index: 1, relevanceScore: 0.9 },
        { index: 0, relevanceScore: 0.2 },
      ]);

      const chunks = await new RetrievalService(store, { reranker }).retrieve(
        QUERY,
        { topK: 1, similarityThreshold: 0 },
        "q",
      );

      expect(chunks.map((c) => c.chunkId)).toEqual(["b"]);
    });

    it("appends candidates the reranker left out in cosine order", async () => {
      const store = fakeStore([
        candidate("a", vectorWithScore(0.6)),
        candidate("b", vectorWithScore(0.9)),
        candidate("c", vectorWithScore(0.8)),
      ]);
      const reranker = fakeReranker(async () => [{ index: 2, relevanceScore: 0.5 }]);

      const chunks = await new RetrievalService(store, { reranker }).retrieve(
        QUERY,
        { topK: 5, similarityThreshold: 0 },
        "q",
      );

      expect(chunks.map((c) => c.chunkId)).toEqual(["c", "b", "a"]);
    });

    it("skips reranking without query text or candidates", async () => {
      const reranker = fakeReranker(async () => []);

      await new RetrievalService(fakeStore([candidate("a", [1, 0])]), { reranker }).retrieve(
        QUERY,
        { topK: 1, similarityThreshold: 0 },
      );
      await new RetrievalService(fakeStore([]), { reranker }).retrieve(
        QUERY,
        { topK: 1, similarityThreshold: 0 },
        "q",
      );

      expect(reranker.rerank).not.toHaveBeenCalled();
    });

    it("fails closed when the reranker fails", async () => {
      const store = fakeStore([candidate("a", [1, 0])]);
      const reranker = fakeReranker(async () => {
        throw new Error("429 Too Many Requests");
      });

      const error = await retrievalFailure(
        new RetrievalService(store, { reranker }).retrieve(
          QUERY,
          { topK: 1, similarityThreshold: 0 },
          "q",
        ),
      );

      expect(error.stage).toBe("rerank");
      expect(error.message).toBe("Reranking failed: 429 Too Many Requests");
    });

    it("rejects out-of-range and duplicate reranker indices", async () => {
      const store = fakeStore([candidate("a", [1, 0]), candidate("b", [1, 0])]);

      for (const results of [
        [{ index: 2, relevanceScore: 0.5 }],
        [
          { index: 0, relevanceScore: 0.5 },
          { index: 0, relevanceScore: 0.4 },
        ],
      ]) {
        const reranker = fakeReranker(async () => results);
        const error = await retrievalFailure(
          new RetrievalService(store, { reranker }).retrieve(
            QUERY,
            { topK: 2, similarityThreshold: 0 },
            "q",
          ),
        );
        expect(error.stage).toBe("rerank");
      }
    });
  });
});
