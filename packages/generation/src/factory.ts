import type { ModelProvider } from "@benchrag/types";
import type { IGenerationProvider } from "./generation-provider.interface.js";
import { OpenAIGenerationProvider } from "./openai-provider.js";
import type { OpenAIGenerationProviderConfig } from "./openai-provider.js";
import { CohereGenerationProvider } from "./cohere-provider.js";
import type { CohereGenerationProviderConfig } from "./cohere-provider.js";

export interface GenerationFactoryConfig {
  provider: ModelProvider;
  openai?: OpenAIGenerationProviderConfig;
  cohere?: CohereGenerationProviderConfig;
}

export function createGenerationProvider(config: GenerationFactoryConfig): IGenerationProvider {
  switch (config.provider) {
    case "openai":
      if (!config.openai) {
        throw new Error("OpenAI config is required when provider is 'openai'");
      }
      return new OpenAIGenerationProvider(config.openai);
    case "cohere":
      if (!config.cohere) {
        throw new Error("Cohere config is required when provider is 'cohere'");
      }
      return new CohereGenerationProvider(config.cohere);
    default:
      throw new Error(`Unknown generation provider: ${String(config.provider)}`);
  }
}
