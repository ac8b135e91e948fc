import type { VectorRecord } from "@quarry/types";

export interface VectorSearchParams {
  /** Search is always scoped to a single document. */
  documentId: string;
  vector: number[];
  topK: number;
}

export interface VectorSearchResult {
  id: string;
  chunkIndex: number;
  /** Cosine similarity in [-1, 1]. */
  score: number;
}

export interface IVectorStore {
  readonly name: string;

  upsert(collectionName: string, records: VectorRecord[]): Promise<void>;
  search(collectionName: string, params: VectorSearchParams): Promise<VectorSearchResult[]>;
  deleteByDocument(collectionName: string, documentId: string): Promise<void>;
  ensureCollection(collectionName: string, dimensions: number): Promise<void>;
}
