import { PromptAugmenter, RetrievalService } from "@benchrag/core";
import { EmbeddingService, createEmbeddingProvider, type IEmbeddingProvider } from "@benchrag/embeddings";
import {
  RetrievalError,
  createCircuitBreaker,
  type CircuitBreakerOptions,
  type CircuitStateListener,
} from "@benchrag/errors";
import { GenerationService, createGenerationProvider, type IGenerationProvider } from "@benchrag/generation";
import { createChildLogger, type Logger } from "@benchrag/logger";
import { CohereReranker, type IReranker } from "@benchrag/reranker";
import type { AppConfig } from "@benchrag/types";
import { QdrantVectorStore, type IVectorStore } from "@benchrag/vector-store";

/** Long-lived, read-only services shared by every query this process runs. */
export interface PipelineServices {
  embeddingService: EmbeddingService;
  retrievalService: RetrievalService;
  promptAugmenter: PromptAugmenter;
  generationService: GenerationService;
}

export interface ServiceBackends {
  embeddingProvider: IEmbeddingProvider;
  generationProvider: IGenerationProvider;
  vectorStore: IVectorStore;
  reranker?: IReranker;
}

function keyed<T extends object>(apiKey: string | undefined, settings: T): (T & { apiKey: string }) | undefined {
  return apiKey === undefined ? undefined : { ...settings, apiKey };
}

/** Build the remote clients named by the configuration. */
export function createBackends(config: AppConfig): ServiceBackends {
  const { apiKeys, remoteTimeoutMs: timeoutMs } = config;

  const embeddingSettings = {
    model: config.embedding.model,
    dimensions: config.vectorStore.dimension,
    timeoutMs,
  };
  const embeddingProvider = createEmbeddingProvider({
    provider: config.embedding.provider,
    openai: keyed(apiKeys.openai, embeddingSettings),
    cohere: keyed(apiKeys.cohere, embeddingSettings),
  });

  const generationSettings = { model: config.generation.model, timeoutMs };
  const generationProvider = createGenerationProvider({
    provider: config.generation.provider,
    openai: keyed(apiKeys.openai, generationSettings),
    cohere: keyed(apiKeys.cohere, generationSettings),
  });

  const vectorStore = new QdrantVectorStore({
    url: config.vectorStore.url,
    apiKey: config.vectorStore.apiKey,
    collection: config.vectorStore.collection,
    timeoutMs,
  });

  const rerankerConfig = config.reranker && keyed(apiKeys.cohere, { model: config.reranker.model, timeoutMs });

  return {
    embeddingProvider,
    generationProvider,
    vectorStore,
    ...(rerankerConfig ? { reranker: new CohereReranker(rerankerConfig) } : {}),
  };
}

/**
 * Put every remote call behind its own circuit breaker. An open circuit
 * rejects immediately and the owning service reports it as its own error kind.
 */
export function guardBackends(
  backends: ServiceBackends,
  options: CircuitBreakerOptions,
  onStateChange: CircuitStateListener,
): ServiceBackends {
  const { embeddingProvider, generationProvider, vectorStore, reranker } = backends;

  const embedBreaker = createCircuitBreaker(
    `embeddings:${embeddingProvider.name}`,
    (text: string) => embeddingProvider.embed(text),
    options,
    onStateChange,
  );
  const completeBreaker = createCircuitBreaker(
    `generation:${generationProvider.name}`,
    (prompt: string) => generationProvider.complete(prompt),
    options,
    onStateChange,
  );
  const nearestBreaker = createCircuitBreaker(
    "vector-store",
    (vector: number[], limit: number) => vectorStore.nearest(vector, limit),
    options,
    onStateChange,
  );

  const guarded: ServiceBackends = {
    embeddingProvider: {
      name: embeddingProvider.name,
      model: embeddingProvider.model,
      dimensions: embeddingProvider.dimensions,
      embed: (text) => embedBreaker.fire(text),
    },
    generationProvider: {
      name: generationProvider.name,
      model: generationProvider.model,
      complete: (prompt) => completeBreaker.fire(prompt),
    },
    vectorStore: {
      nearest: (vector, limit) => nearestBreaker.fire(vector, limit),
      healthCheck: () => vectorStore.healthCheck(),
    },
  };

  if (reranker) {
    const rerankBreaker = createCircuitBreaker(
      `reranker:${reranker.name}`,
      (query: string, documents: string[]) => reranker.rerank(query, documents),
      options,
      onStateChange,
    );
    guarded.reranker = {
      name: reranker.name,
      model: reranker.model,
      rerank: (query, documents) => rerankBreaker.fire(query, documents),
    };
  }

  return guarded;
}

/**
 * Initialise the pipeline services once per process. An unreachable vector
 * store or a bad prompt template stops startup.
 */
export async function createServices(
  config: AppConfig,
  logger: Logger,
  backends: ServiceBackends = createBackends(config),
): Promise<PipelineServices> {
  const log = createChildLogger(logger, { component: "services" });

  const guarded = guardBackends(backends, { timeout: config.remoteTimeoutMs }, (name, state) => {
    log.warn({ breaker: name, state }, `circuit ${state}`);
  });

  if (!(await backends.vectorStore.healthCheck())) {
    throw new RetrievalError(`Vector store at ${config.vectorStore.url} is unreachable`, "store");
  }

  const promptAugmenter = await PromptAugmenter.fromFile(config.prompt.templatePath, {
    contextFormat: config.prompt.contextFormat,
  });

  const services: PipelineServices = {
    embeddingService: new EmbeddingService(guarded.embeddingProvider, config.vectorStore.dimension),
    retrievalService: new RetrievalService(guarded.vectorStore, {
      reranker: guarded.reranker,
      candidateLimit: config.vectorStore.candidateLimit,
      logger: createChildLogger(logger, { component: "retrieval" }),
    }),
    promptAugmenter,
    generationService: new GenerationService(guarded.generationProvider),
  };

  log.info(
    {
      embeddingModel: services.embeddingService.model,
      rerankerModel: services.retrievalService.rerankerModel,
      template: promptAugmenter.template.name,
    },
    `LLM initialized: ${services.generationService.model}`,
  );

  return services;
}
