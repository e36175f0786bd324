import type { ContextFormat } from "./query.js";

export type ModelProvider = "openai" | "cohere";

export interface AppConfig {
  nodeEnv: "development" | "test" | "production";
  logLevel: "debug" | "info" | "warn" | "error";
  redis: RedisConfig;
  vectorStore: VectorStoreSettings;
  embedding: EmbeddingSettings;
  generation: GenerationSettings;
  reranker?: RerankerSettings;
  prompt: PromptSettings;
  retrievalDefaults: RetrievalDefaults;
  apiKeys: ApiKeys;
  remoteTimeoutMs: number;
}

export interface RedisConfig {
  url: string;
}

export interface VectorStoreSettings {
  url: string;
  apiKey?: string;
  collection: string;
  dimension: number;
  candidateLimit: number;
}

export interface EmbeddingSettings {
  provider: ModelProvider;
  model: string;
}

export interface GenerationSettings {
  provider: ModelProvider;
  model: string;
}

export interface RerankerSettings {
  model: string;
}

export interface PromptSettings {
  templatePath: string;
  contextFormat: ContextFormat;
}

export interface RetrievalDefaults {
  topK: number;
  similarityThreshold: number;
}

export interface ApiKeys {
  openai?: string;
  cohere?: string;
}
