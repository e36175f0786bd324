export type { EmbeddingVector, Chunk } from "./chunk.js";
export type {
  Question,
  ContextFormat,
  RetrievalConfig,
  ProcessorConfig,
  ScoredChunk,
  AugmentedPrompt,
  GenerationResult,
  QueryOutcome,
} from "./query.js";
export { toScoredChunk } from "./query.js";
export type { EmbeddingResult, CompletionResult } from "./pipeline.js";
export type {
  AppConfig,
  ModelProvider,
  RedisConfig,
  VectorStoreSettings,
  EmbeddingSettings,
  GenerationSettings,
  RerankerSettings,
  PromptSettings,
  RetrievalDefaults,
  ApiKeys,
} from "./config.js";
export type {
  JobType,
  JobData,
  QueryJobData,
  AnyJobData,
  QueryJobResult,
  ChatTurn,
} from "./job.js";
