import type { CompletionResult } from "@benchrag/types";

export interface IGenerationProvider {
  readonly name: string;
  readonly model: string;

  complete(prompt: string): Promise<CompletionResult>;
}
