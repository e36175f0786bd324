import { EmbeddingError, messageOf } from "@benchrag/errors";
import type { EmbeddingVector } from "@benchrag/types";
import type { IEmbeddingProvider } from "./embedding-provider.interface.js";

function isTimeout(error: unknown): boolean {
  if (!(error instanceof Error)) return false;
  return error.name.includes("Timeout") || /timed? ?out/i.test(error.message);
}

/**
 * Turns a question into a query vector of exactly the configured dimension.
 * Long-lived: one instance per process, shared read-only across queries.
 */
export class EmbeddingService {
  constructor(
    private readonly provider: IEmbeddingProvider,
    readonly dimension: number,
  ) {}

  get model(): string {
    return this.provider.model;
  }

  async embed(text: string): Promise<EmbeddingVector> {
    if (text.trim().length === 0) {
      throw new EmbeddingError("Cannot embed empty text", "invalid_input");
    }

    let vectors: number[][];
    try {
      const result = await this.provider.embed(text);
      vectors = result.embeddings;
    } catch (error: unknown) {
      throw new EmbeddingError(
        `Embedding request to ${this.provider.name} failed: ${messageOf(error)}`,
        isTimeout(error) ? "timeout" : "transport",
        { cause: error, details: { model: this.provider.model } },
      );
    }

    const vector = vectors[0];
    if (!vector || vector.length === 0) {
      throw new EmbeddingError(
        `Embedding response from ${this.provider.name} contained no vector`,
        "invalid_response",
        { details: { model: this.provider.model } },
      );
    }

    if (vector.length !== this.dimension) {
      throw new EmbeddingError(
        `Embedding has ${String(vector.length)} dimensions, expected ${String(this.dimension)}`,
        "dimension_mismatch",
        { details: { model: this.provider.model, expected: this.dimension, actual: vector.length } },
      );
    }

    return vector;
  }
}
