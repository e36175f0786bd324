import { CohereClient } from "cohere-ai";
import type { IReranker, RerankedDocument } from "./reranker.interface.js";

const DEFAULT_MODEL = "rerank-v3.5";

export interface CohereRerankerConfig {
  apiKey: string;
  model?: string;
  timeoutMs?: number;
}

export class CohereReranker implements IReranker {
  readonly name = "cohere";
  readonly model: string;
  private client: CohereClient;
  private timeoutInSeconds: number | undefined;

  constructor(config: CohereRerankerConfig) {
    this.client = new CohereClient({ token: config.apiKey });
    this.model = config.model ?? DEFAULT_MODEL;
    this.timeoutInSeconds = config.timeoutMs === undefined ? undefined : config.timeoutMs / 1000;
  }

  async rerank(query: string, documents: string[]): Promise<RerankedDocument[]> {
    if (documents.length === 0) return [];

    const response = await this.client.v2.rerank(
      {
        model: this.model,
        query,
        documents,
        topN: documents.length,
      },
      { timeoutInSeconds: this.timeoutInSeconds, maxRetries: 0 },
    );

    return response.results.map((r) => ({ index: r.index, relevanceScore: r.relevanceScore }));
  }
}
