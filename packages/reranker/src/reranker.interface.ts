export interface RerankedDocument {
  /** Position of the document in the list handed to `rerank`. */
  index: number;
  relevanceScore: number;
}

/**
 * Secondary relevance pass over an already retrieved candidate set.
 * Results come back most relevant first.
 */
export interface IReranker {
  readonly name: string;
  readonly model: string;

  rerank(query: string, documents: string[]): Promise<RerankedDocument[]>;
}
