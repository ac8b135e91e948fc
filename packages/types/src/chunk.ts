export interface Chunk {
  id: string;
  documentId: string;
  index: number;
  content: string;
  tokenCount: number;
  metadata: ChunkMetadata;
  embedding: readonly number[] | null;
}

export interface ChunkMetadata {
  startChar: number;
  endChar: number;
  /** Characters shared with the previous chunk. */
  overlap: number;
}

export interface ChunkingConfig {
  chunkSize: number;
  overlap: number;
  splitOversizedSentences?: boolean;
}
