export { cosineSimilarity } from "./similarity.js";
export type { SimilarityScorer } from "./similarity.js";

export { RetrievalService } from "./retrieval-service.js";
export type { RetrievalServiceOptions } from "./retrieval-service.js";

export { assembleContext } from "./context-assembler.js";

export {
  PromptAugmenter,
  NO_CONTEXT_MARKER,
  parsePromptTemplate,
  loadPromptTemplate,
  renderPrompt,
} from "./prompt-augmenter.js";
export type { PromptTemplate, PromptAugmenterOptions } from "./prompt-augmenter.js";

export { createRetrievalConfig, createProcessorConfig } from "./processor-config.js";

export { QueryProcessor } from "./query-processor.js";
export type {
  QueryProcessorDependencies,
  PipelineStage,
  Embedder,
  Retriever,
  Augmenter,
  Generator,
} from "./query-processor.js";
