import type { Chunk } from "./chunk.js";
import type { DocumentType } from "./document.js";

export type ScoringMethod = "vector" | "lexical";

export type ContextFormat = "plain" | "markdown" | "xml";

export interface ScoredChunk {
  chunk: Chunk;
  score: number;
  method: ScoringMethod;
}

export interface RetrievalResult {
  documentId: string;
  query: string;
  chunks: ScoredChunk[];
  documentType: DocumentType;
  scoringMethod: ScoringMethod | "none";
  context: string;
  metadata: RetrievalMetadata;
}

export interface RetrievalMetadata {
  totalChunksSearched: number;
  retrievalTimeMs: number;
}

export interface LexicalWeights {
  jaccard: number;
  substring: number;
  wordMatch: number;
}

export interface LexicalBreakdown {
  jaccard: number;
  substring: number;
  wordMatch: number;
}
