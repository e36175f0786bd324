import OpenAI from "openai";
import type { EmbeddingResult } from "@benchrag/types";
import type { IEmbeddingProvider } from "./embedding-provider.interface.js";

const DEFAULT_MODEL = "text-embedding-3-small";
const DEFAULT_DIMENSIONS = 1536;

export interface OpenAIEmbeddingProviderConfig {
  apiKey: string;
  model?: string;
  dimensions?: number;
  timeoutMs?: number;
}

export class OpenAIEmbeddingProvider implements IEmbeddingProvider {
  readonly name = "openai";
  readonly model: string;
  readonly dimensions: number;
  private client: OpenAI;

  constructor(config: OpenAIEmbeddingProviderConfig) {
    // Retries belong to whoever runs the whole query, not to this call.
    this.client = new OpenAI({ apiKey: config.apiKey, timeout: config.timeoutMs, maxRetries: 0 });
    this.model = config.model ?? DEFAULT_MODEL;
    this.dimensions = config.dimensions ?? DEFAULT_DIMENSIONS;
  }

  async embed(text: string): Promise<EmbeddingResult> {
    const response = await this.client.embeddings.create({
      model: this.model,
      input: text.replace(/\n/g, " "),
      dimensions: this.dimensions,
    });

    return {
      embeddings: response.data.map((item) => item.embedding),
      model: response.model,
    };
  }
}
