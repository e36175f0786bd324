import { z } from "zod";
import type { AppConfig } from "@benchrag/types";

const providerSchema = z.enum(["openai", "cohere"]);

// An unset variable takes the fallback; a set but blank one is an error, not 0.
function numeric(fallback: string) {
  return z.string().trim().min(1, "must not be empty").default(fallback).transform(Number);
}

/**
 * Zod schema for the environment the worker and CLI read.
 * Validates, transforms, and provides defaults so that the resulting
 * object is a strongly-typed AppConfig.
 */
export const envSchema = z
  .object({
    // ---------- Core ----------
    NODE_ENV: z.enum(["development", "test", "production"]).default("production"),
    LOG_LEVEL: z.enum(["debug", "info", "warn", "error"]).default("info"),

    // ---------- Redis (query queue) ----------
    REDIS_URL: z.string().min(1, "REDIS_URL is required"),

    // ---------- Vector store ----------
    QDRANT_URL: z.string().url("QDRANT_URL must be a URL"),
    QDRANT_API_KEY: z.string().optional(),
    VECTOR_COLLECTION: z.string().min(1).default("benchmarks"),
    VECTOR_DIMENSION: numeric("1536").pipe(z.number().int().positive()),
    CANDIDATE_LIMIT: numeric("20").pipe(z.number().int().positive().max(100)),

    // ---------- Models ----------
    EMBEDDING_PROVIDER: providerSchema.default("openai"),
    EMBEDDING_MODEL: z.string().min(1).default("text-embedding-3-small"),
    GENERATION_PROVIDER: providerSchema.default("openai"),
    INFERENCE_MODEL: z.string().min(1).default("gpt-4o-mini"),
    RERANKER_MODEL: z.string().min(1).optional(),
    OPENAI_API_KEY: z.string().min(1).optional(),
    COHERE_API_KEY: z.string().min(1).optional(),
    REMOTE_TIMEOUT_MS: numeric("30000").pipe(z.number().int().positive()),

    // ---------- Prompt ----------
    PROMPT_TEMPLATE_PATH: z.string().min(1).default("prompts/rag_prompt.md"),
    CONTEXT_FORMAT: z.enum(["markdown", "xml", "plain"]).default("markdown"),

    // ---------- Retrieval defaults ----------
    TOP_K: numeric("3").pipe(z.number().int().min(1).max(10)),
    SIMILARITY_THRESHOLD: numeric("0.32").pipe(z.number().min(0).max(1)),
  })
  .superRefine((env, ctx) => {
    const usesOpenAi = env.EMBEDDING_PROVIDER === "openai" || env.GENERATION_PROVIDER === "openai";
    if (usesOpenAi && !env.OPENAI_API_KEY) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["OPENAI_API_KEY"],
        message: "OPENAI_API_KEY is required when an OpenAI provider is selected",
      });
    }

    const usesCohere =
      env.EMBEDDING_PROVIDER === "cohere" ||
      env.GENERATION_PROVIDER === "cohere" ||
      env.RERANKER_MODEL !== undefined;
    if (usesCohere && !env.COHERE_API_KEY) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["COHERE_API_KEY"],
        message: "COHERE_API_KEY is required for Cohere providers and reranking",
      });
    }
  });

/**
 * Parse and validate process.env (or any compatible record) against
 * the envSchema and return a strongly-typed {@link AppConfig}.
 *
 * Throws a ZodError with detailed messages when validation fails.
 */
export function parseEnv(env: Record<string, string | undefined> = process.env): AppConfig {
  const parsed = envSchema.parse(env);

  return {
    nodeEnv: parsed.NODE_ENV,
    logLevel: parsed.LOG_LEVEL,

    redis: {
      url: parsed.REDIS_URL,
    },

    vectorStore: {
      url: parsed.QDRANT_URL,
      apiKey: parsed.QDRANT_API_KEY,
      collection: parsed.VECTOR_COLLECTION,
      dimension: parsed.VECTOR_DIMENSION,
      candidateLimit: parsed.CANDIDATE_LIMIT,
    },

    embedding: {
      provider: parsed.EMBEDDING_PROVIDER,
      model: parsed.EMBEDDING_MODEL,
    },

    generation: {
      provider: parsed.GENERATION_PROVIDER,
      model: parsed.INFERENCE_MODEL,
    },

    ...(parsed.RERANKER_MODEL ? { reranker: { model: parsed.RERANKER_MODEL } } : {}),

    prompt: {
      templatePath: parsed.PROMPT_TEMPLATE_PATH,
      contextFormat: parsed.CONTEXT_FORMAT,
    },

    retrievalDefaults: {
      topK: parsed.TOP_K,
      similarityThreshold: parsed.SIMILARITY_THRESHOLD,
    },

    apiKeys: {
      openai: parsed.OPENAI_API_KEY,
      cohere: parsed.COHERE_API_KEY,
    },

    remoteTimeoutMs: parsed.REMOTE_TIMEOUT_MS,
  };
}
