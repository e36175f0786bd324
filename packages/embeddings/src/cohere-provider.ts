import { CohereClient } from "cohere-ai";
import type { EmbeddingResult } from "@benchrag/types";
import type { IEmbeddingProvider } from "./embedding-provider.interface.js";

const DEFAULT_MODEL = "embed-v4.0";
const DEFAULT_DIMENSIONS = 1536;

export interface CohereEmbeddingProviderConfig {
  apiKey: string;
  model?: string;
  dimensions?: number;
  timeoutMs?: number;
}

export class CohereEmbeddingProvider implements IEmbeddingProvider {
  readonly name = "cohere";
  readonly model: string;
  readonly dimensions: number;
  private client: CohereClient;
  private timeoutInSeconds: number | undefined;

  constructor(config: CohereEmbeddingProviderConfig) {
    this.client = new CohereClient({ token: config.apiKey });
    this.model = config.model ?? DEFAULT_MODEL;
    this.dimensions = config.dimensions ?? DEFAULT_DIMENSIONS;
    this.timeoutInSeconds = config.timeoutMs === undefined ? undefined : config.timeoutMs / 1000;
  }

  async embed(text: string): Promise<EmbeddingResult> {
    const response = await this.client.v2.embed(
      {
        texts: [text],
        model: this.model,
        inputType: "search_query",
        embeddingTypes: ["float"],
        outputDimension: this.dimensions,
      },
      { timeoutInSeconds: this.timeoutInSeconds, maxRetries: 0 },
    );

    return {
      embeddings: response.embeddings.float ?? [],
      model: this.model,
    };
  }
}
