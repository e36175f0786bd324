export type { IVectorStore, VectorCandidate } from "./vector-store.interface.js";
export { QdrantVectorStore } from "./qdrant-adapter.js";
export type { QdrantVectorStoreConfig } from "./qdrant-adapter.js";
