export interface ChunkResult {
  content: string;
  index: number;
  tokenCount: number;
  metadata: {
    startChar: number;
    endChar: number;
    overlap: number;
  };
}

export interface EmbeddingResult {
  embeddings: number[][];
  model: string;
  tokensUsed: number;
  dimensions: number;
}

export interface VectorRecord {
  id: string;
  documentId: string;
  chunkIndex: number;
  vector: number[];
  payload: Record<string, unknown>;
}
