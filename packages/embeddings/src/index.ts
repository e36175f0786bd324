export type { IEmbeddingProvider } from "./embedding-provider.interface.js";
export { OpenAIEmbeddingProvider } from "./openai-provider.js";
export type { OpenAIEmbeddingProviderConfig } from "./openai-provider.js";
export { CohereEmbeddingProvider } from "./cohere-provider.js";
export type { CohereEmbeddingProviderConfig } from "./cohere-provider.js";
export { createEmbeddingProvider } from "./factory.js";
export type { EmbeddingFactoryConfig } from "./factory.js";
export { EmbeddingService } from "./embedding-service.js";
