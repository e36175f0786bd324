export type { IGenerationProvider } from "./generation-provider.interface.js";
export { OpenAIGenerationProvider } from "./openai-provider.js";
export type { OpenAIGenerationProviderConfig } from "./openai-provider.js";
export { CohereGenerationProvider } from "./cohere-provider.js";
export type { CohereGenerationProviderConfig } from "./cohere-provider.js";
export { createGenerationProvider } from "./factory.js";
export type { GenerationFactoryConfig } from "./factory.js";
export { GenerationService } from "./generation-service.js";
