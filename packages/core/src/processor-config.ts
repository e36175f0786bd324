import { z } from "zod";
import { ValidationError } from "@benchrag/errors";
import type { ProcessorConfig, RetrievalConfig } from "@benchrag/types";

const retrievalConfigSchema = z.object({
  topK: z.number().int().positive(),
  similarityThreshold: z.number().finite().min(0).max(1),
});

function fieldErrors(error: z.ZodError): Record<string, string> {
  return Object.fromEntries(
    error.issues.map((issue) => [issue.path.join(".") || "config", issue.message]),
  );
}

export function createRetrievalConfig(input: RetrievalConfig): RetrievalConfig {
  const parsed = retrievalConfigSchema.safeParse(input);
  if (!parsed.success) {
    throw new ValidationError("Invalid retrieval config", fieldErrors(parsed.error));
  }
  return Object.freeze({ ...parsed.data });
}

export function createProcessorConfig(input: { retrieval: RetrievalConfig }): ProcessorConfig {
  return Object.freeze({ retrieval: createRetrievalConfig(input.retrieval) });
}
