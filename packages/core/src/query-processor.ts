import type { Logger, TimingHook } from "@benchrag/logger";
import type {
  AugmentedPrompt,
  EmbeddingVector,
  GenerationResult,
  ProcessorConfig,
  QueryOutcome,
  Question,
  RetrievalConfig,
  ScoredChunk,
} from "@benchrag/types";
import { createProcessorConfig } from "./processor-config.js";

// Structural seams, satisfied by EmbeddingService, RetrievalService,
// PromptAugmenter and GenerationService.
export interface Embedder {
  embed(text: string): Promise<EmbeddingVector>;
}

export interface Retriever {
  retrieve(
    queryVector: EmbeddingVector,
    config: RetrievalConfig,
    queryText?: string,
  ): Promise<ScoredChunk[]>;
}

export interface Augmenter {
  augment(question: Question, rankedChunks: ScoredChunk[]): AugmentedPrompt;
}

export interface Generator {
  generate(prompt: AugmentedPrompt): Promise<GenerationResult>;
}

export interface QueryProcessorDependencies {
  embeddingService: Embedder;
  retrievalService: Retriever;
  promptAugmenter: Augmenter;
  generationService: Generator;
  logger: Logger;
  timer?: TimingHook;
}

export type PipelineStage = "embed" | "retrieve" | "augment" | "generate";

/**
 * One question in, one answer out: embed -> retrieve -> augment -> generate,
 * strictly in sequence with exactly one call per stage.
 *
 * Holds only the services it was given and its frozen config, so a fresh
 * processor per question is cheap. Stage errors propagate untouched.
 */
export class QueryProcessor {
  readonly config: ProcessorConfig;

  constructor(
    private readonly deps: QueryProcessorDependencies,
    config: ProcessorConfig,
  ) {
    this.config = createProcessorConfig(config);
  }

  async processQuery(question: Question): Promise<string> {
    const outcome = await this.run(question);
    return outcome.result.text;
  }

  async run(question: Question): Promise<QueryOutcome> {
    this.mark("query");
    let outcome: QueryOutcome;
    try {
      outcome = await this.runStages(question);
    } finally {
      // Marks stay paired when a stage throws, so a reused timer stays aligned.
      this.mark("query");
    }

    const { chunks, result } = outcome;
    this.deps.logger.debug(
      {
        topK: this.config.retrieval.topK,
        similarityThreshold: this.config.retrieval.similarityThreshold,
        chunkIds: chunks.map((chunk) => chunk.chunkId),
        model: result.model,
      },
      chunks.length === 0 ? "answered without grounding context" : "answered with grounding context",
    );

    return outcome;
  }

  private async runStages(question: Question): Promise<QueryOutcome> {
    const { embeddingService, retrievalService, promptAugmenter, generationService } = this.deps;

    const queryVector = await this.stage("embed", () => embeddingService.embed(question));

    const chunks = await this.stage("retrieve", () =>
      retrievalService.retrieve(queryVector, this.config.retrieval, question),
    );

    const prompt = await this.stage("augment", async () =>
      promptAugmenter.augment(question, chunks),
    );

    const result = await this.stage("generate", () => generationService.generate(prompt));

    return { result, chunks, prompt };
  }

  private async stage<T>(name: PipelineStage, run: () => Promise<T>): Promise<T> {
    this.mark(name);
    try {
      return await run();
    } finally {
      this.mark(name);
    }
  }

  /** Timing is observational only: a broken hook is logged, never rethrown. */
  private mark(name: string): void {
    if (!this.deps.timer) return;
    try {
      this.deps.timer.mark(name);
    } catch (error: unknown) {
      this.deps.logger.warn({ err: error, mark: name }, "timing hook failed");
    }
  }
}
