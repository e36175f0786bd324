import { RetrievalError, messageOf } from "@benchrag/errors";
import type { Logger } from "@benchrag/logger";
import type { IReranker, RerankedDocument } from "@benchrag/reranker";
import { toScoredChunk } from "@benchrag/types";
import type { EmbeddingVector, RetrievalConfig, ScoredChunk } from "@benchrag/types";
import type { IVectorStore, VectorCandidate } from "@benchrag/vector-store";
import { cosineSimilarity } from "./similarity.js";

const DEFAULT_CANDIDATE_LIMIT = 20;

export interface RetrievalServiceOptions {
  /** Optional second relevance pass. Its order wins; its score never filters. */
  reranker?: IReranker;
  /** How many neighbours to ask the store for. Raised to `topK` when smaller. */
  candidateLimit?: number;
  logger?: Logger;
}

function byScoreDescending(chunks: ScoredChunk[]): ScoredChunk[] {
  // Array.prototype.sort is stable, so equal scores keep store order.
  return [...chunks].sort((a, b) => b.score - a.score);
}

/**
 * Retrieval: store nearest neighbours -> cosine re-score -> optional rerank
 * -> threshold filter on cosine score -> top-K.
 *
 * Ranking and filtering use different metrics: a chunk the reranker puts
 * first still needs a cosine score at or above the threshold.
 */
export class RetrievalService {
  private readonly reranker: IReranker | undefined;
  private readonly candidateLimit: number;
  private readonly logger: Logger | undefined;

  constructor(
    private readonly store: IVectorStore,
    options: RetrievalServiceOptions = {},
  ) {
    this.reranker = options.reranker;
    this.candidateLimit = options.candidateLimit ?? DEFAULT_CANDIDATE_LIMIT;
    this.logger = options.logger;
  }

  get rerankerModel(): string | undefined {
    return this.reranker?.model;
  }

  async retrieve(
    queryVector: EmbeddingVector,
    config: RetrievalConfig,
    queryText?: string,
  ): Promise<ScoredChunk[]> {
    const limit = Math.max(this.candidateLimit, config.topK);
    const candidates = await this.fetchCandidates(queryVector, limit);

    const scored = candidates.map((candidate) =>
      toScoredChunk(candidate, cosineSimilarity(queryVector, candidate.embedding)),
    );

    const ranked =
      this.reranker && queryText !== undefined && scored.length > 0
        ? await this.rerank(this.reranker, queryText, scored)
        : byScoreDescending(scored);

    const kept = ranked.filter((chunk) => chunk.score >= config.similarityThreshold);
    const selected = kept.slice(0, config.topK);

    this.logger?.debug(
      {
        candidates: candidates.length,
        aboveThreshold: kept.length,
        selected: selected.length,
        reranked: ranked.some((chunk) => chunk.rerankScore !== undefined),
      },
      "retrieval complete",
    );

    return selected;
  }

  private async fetchCandidates(vector: EmbeddingVector, limit: number): Promise<VectorCandidate[]> {
    try {
      return await this.store.nearest(vector, limit);
    } catch (error: unknown) {
      throw new RetrievalError(`Vector store query failed: ${messageOf(error)}`, "store", {
        cause: error,
        details: { limit },
      });
    }
  }

  /**
   * Fails closed: any reranker problem aborts retrieval rather than falling
   * back to cosine order. Candidates the reranker leaves out follow the
   * reranked ones in cosine order.
   */
  private async rerank(
    reranker: IReranker,
    queryText: string,
    scored: ScoredChunk[],
  ): Promise<ScoredChunk[]> {
    let results: RerankedDocument[];
    try {
      results = await reranker.rerank(
        queryText,
        scored.map((chunk) => chunk.content),
      );
    } catch (error: unknown) {
      throw new RetrievalError(`Reranking failed: ${messageOf(error)}`, "rerank", {
        cause: error,
        details: { model: reranker.model },
      });
    }

    const seen = new Set<number>();
    const reranked: ScoredChunk[] = [];
    for (const result of results) {
      const chunk = scored[result.index];
      if (!Number.isInteger(result.index) || !chunk || seen.has(result.index)) {
        throw new RetrievalError(
          `Reranker returned an invalid document index: ${String(result.index)}`,
          "rerank",
          { details: { model: reranker.model, candidates: scored.length } },
        );
      }
      seen.add(result.index);
      reranked.push({ ...chunk, rerankScore: result.relevanceScore });
    }

    const leftOver = byScoreDescending(scored.filter((_, i) => !seen.has(i)));
    return [...reranked, ...leftOver];
  }
}
