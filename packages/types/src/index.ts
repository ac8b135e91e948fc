export type { Chunk, ChunkMetadata, ChunkingConfig } from "./chunk.js";
export type {
  DocumentType,
  DocumentStats,
  Document,
  IndexStats,
  MissingIndexStats,
} from "./document.js";
export { DOCUMENT_TYPE_PRIORITY } from "./document.js";
export type {
  ScoringMethod,
  ContextFormat,
  ScoredChunk,
  RetrievalResult,
  RetrievalMetadata,
  LexicalWeights,
  LexicalBreakdown,
} from "./query.js";
export type {
  EngineConfig,
  EmbeddingProviderKind,
  VectorStoreKind,
  AppConfig,
  EmbeddingsConfig,
  CohereConfig,
  HttpEmbeddingConfig,
  VectorStoreSettings,
} from "./config.js";
export type { ChunkResult, EmbeddingResult, VectorRecord } from "./pipeline.js";
