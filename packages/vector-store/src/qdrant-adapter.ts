import { QdrantClient } from "@qdrant/js-client-rest";
import type { IVectorStore, VectorCandidate } from "./vector-store.interface.js";

export interface QdrantVectorStoreConfig {
  url: string;
  apiKey?: string;
  collection: string;
  timeoutMs?: number;
}

function isNumberArray(value: unknown): value is number[] {
  return Array.isArray(value) && value.every((v) => typeof v === "number");
}

export class QdrantVectorStore implements IVectorStore {
  private client: QdrantClient;
  private collection: string;

  constructor(config: QdrantVectorStoreConfig) {
    this.client = new QdrantClient({
      url: config.url,
      apiKey: config.apiKey,
      timeout: config.timeoutMs,
    });
    this.collection = config.collection;
  }

  async nearest(vector: number[], limit: number): Promise<VectorCandidate[]> {
    const results = await this.client.search(this.collection, {
      vector,
      limit,
      with_payload: true,
      // Stored vectors are needed to re-score candidates with cosine similarity.
      with_vector: true,
    });

    return results.map((r) => {
      const id = typeof r.id === "string" ? r.id : String(r.id);
      if (!isNumberArray(r.vector)) {
        throw new Error(`Point ${id} in ${this.collection} has no dense vector`);
      }

      const payload = r.payload ?? {};
      const { content, source, chunkId, ...metadata } = payload;

      return {
        chunkId: typeof chunkId === "string" ? chunkId : id,
        source: typeof source === "string" ? source : "unknown",
        content: typeof content === "string" ? content : "",
        embedding: r.vector,
        storeScore: r.score,
        metadata,
      };
    });
  }

  async healthCheck(): Promise<boolean> {
    try {
      await this.client.getCollections();
      return true;
    } catch {
      return false;
    }
  }
}
