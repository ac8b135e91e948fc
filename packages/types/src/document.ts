export type DocumentType = "research" | "business" | "legal" | "technical" | "general";

/**
 * Tie-break order for document classification, highest priority first.
 */
export const DOCUMENT_TYPE_PRIORITY: readonly DocumentType[] = [
  "research",
  "legal",
  "business",
  "technical",
  "general",
] as const;

export interface DocumentStats {
  charCount: number;
  wordCount: number;
  chunkCount: number;
}

export interface Document {
  id: string;
  filename: string;
  text: string;
  documentType: DocumentType;
  stats: DocumentStats;
  createdAt: Date;
}

export interface IndexStats {
  status: "ready";
  documentId: string;
  filename: string;
  totalChunks: number;
  vectorIndexed: boolean;
  dimensions: number | null;
  embeddingModel: string | null;
}

export interface MissingIndexStats {
  status: "missing";
  documentId: string;
}
