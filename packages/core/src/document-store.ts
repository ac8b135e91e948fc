import type { Chunk, Document } from "@quarry/types";
import type { VectorIndexHandle } from "./vector-index.js";

export interface StoredDocument {
  document: Document;
  chunks: readonly Chunk[];
  vectorHandle: VectorIndexHandle | null;
}

/**
 * Session-scoped registry of ingested documents, keyed by document id.
 * Entries are replaced whole, never mutated.
 */
export class DocumentStore {
  private entries = new Map<string, StoredDocument>();

  get(documentId: string): StoredDocument | undefined {
    return this.entries.get(documentId);
  }

  has(documentId: string): boolean {
    return this.entries.has(documentId);
  }

  set(entry: StoredDocument): void {
    this.entries.set(entry.document.id, Object.freeze(entry));
  }

  delete(documentId: string): boolean {
    return this.entries.delete(documentId);
  }

  /** Documents in ingestion order. */
  list(): Document[] {
    return [...this.entries.values()].map((entry) => entry.document);
  }

  get size(): number {
    return this.entries.size;
  }
}
