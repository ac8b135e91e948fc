import type { LexicalWeights, ContextFormat } from "./query.js";

export interface EngineConfig {
  chunkSize: number;
  overlap: number;
  topK: number;
  lexicalWeights: LexicalWeights;
  vectorBackendEnabled: boolean;
  vectorTimeoutMs: number;
  /** Bound on embedding and storing a whole document at ingest. */
  indexTimeoutMs: number;
  classifierPrefixChunks: number;
  splitOversizedSentences: boolean;
  maxQueryLength: number;
  minScore: number;
  collectionName: string;
  contextFormat: ContextFormat;
}

export type EmbeddingProviderKind = "none" | "cohere" | "http";

export type VectorStoreKind = "memory" | "qdrant";

export interface AppConfig {
  nodeEnv: "development" | "test" | "production";
  logLevel: "debug" | "info" | "warn" | "error";
  engine: EngineConfig;
  embeddings: EmbeddingsConfig;
  vectorStore: VectorStoreSettings;
}

export interface EmbeddingsConfig {
  provider: EmbeddingProviderKind;
  cohere: CohereConfig;
  http: HttpEmbeddingConfig;
}

export interface CohereConfig {
  apiKey: string;
  embedModel: string;
  dimensions?: number;
}

export interface HttpEmbeddingConfig {
  baseUrl: string;
  dimensions?: number;
}

export interface VectorStoreSettings {
  type: VectorStoreKind;
  qdrantUrl?: string;
  qdrantApiKey?: string;
}
