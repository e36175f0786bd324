export interface EmbeddingResult {
  embeddings: number[][];
  model: string;
}

export interface CompletionResult {
  text: string;
  model: string;
}
