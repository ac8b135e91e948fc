export { RetrievalEngine, createEngineFromConfig, createEngineFromEnv } from "./engine.js";
export type {
  RetrievalEngineOptions,
  IngestOptions,
  RetrieveOptions,
  EngineFromEnvOptions,
} from "./engine.js";

export { ingest } from "./ingestion-pipeline.js";
export type { IngestionInput, IngestionDependencies, IngestionResult } from "./ingestion-pipeline.js";

export { retrieve } from "./retrieval-pipeline.js";
export type {
  RetrievalRequest,
  RetrievalDependencies,
  RetrievalSettings,
} from "./retrieval-pipeline.js";

export { VectorIndex } from "./vector-index.js";
export type {
  VectorIndexHandle,
  VectorIndexOptions,
  IndexableChunk,
  IndexedVectors,
  VectorMatch,
} from "./vector-index.js";

export { DocumentStore } from "./document-store.js";
export type { StoredDocument } from "./document-store.js";

export { classify, scoreCategories } from "./document-classifier.js";
export type { CategoryScores, ClassifyOptions, ScoredDocumentType } from "./document-classifier.js";

export { assembleContext, NO_CONTEXT_MESSAGE } from "./context-assembler.js";
