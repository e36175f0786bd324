export type { IReranker, RerankedDocument } from "./reranker.interface.js";
export { CohereReranker } from "./cohere-reranker.js";
export type { CohereRerankerConfig } from "./cohere-reranker.js";
