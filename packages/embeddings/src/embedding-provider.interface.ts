import type { EmbeddingResult } from "@benchrag/types";

export interface IEmbeddingProvider {
  readonly name: string;
  readonly model: string;
  readonly dimensions: number;

  /** Embed a search query. */
  embed(text: string): Promise<EmbeddingResult>;
}
