import type { ModelProvider } from "@benchrag/types";
import type { IEmbeddingProvider } from "./embedding-provider.interface.js";
import { OpenAIEmbeddingProvider } from "./openai-provider.js";
import type { OpenAIEmbeddingProviderConfig } from "./openai-provider.js";
import { CohereEmbeddingProvider } from "./cohere-provider.js";
import type { CohereEmbeddingProviderConfig } from "./cohere-provider.js";

export interface EmbeddingFactoryConfig {
  provider: ModelProvider;
  openai?: OpenAIEmbeddingProviderConfig;
  cohere?: CohereEmbeddingProviderConfig;
}

export function createEmbeddingProvider(config: EmbeddingFactoryConfig): IEmbeddingProvider {
  switch (config.provider) {
    case "openai":
      if (!config.openai) {
        throw new Error("OpenAI config is required when provider is 'openai'");
      }
      return new OpenAIEmbeddingProvider(config.openai);
    case "cohere":
      if (!config.cohere) {
        throw new Error("Cohere config is required when provider is 'cohere'");
      }
      return new CohereEmbeddingProvider(config.cohere);
    default:
      throw new Error(`Unknown embedding provider: ${String(config.provider)}`);
  }
}
