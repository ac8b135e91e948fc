import type { VectorRecord } from "@quarry/types";
import { cosineSimilarity } from "./cosine.js";
import type {
  IVectorStore,
  VectorSearchParams,
  VectorSearchResult,
} from "./vector-store.interface.js";

interface Collection {
  dimensions: number;
  records: Map<string, VectorRecord>;
}

/**
 * Brute-force cosine search held in process memory. Lives as long as the
 * engine that owns it.
 */
export class InMemoryVectorStore implements IVectorStore {
  readonly name = "memory";
  private collections = new Map<string, Collection>();

  async upsert(collectionName: string, records: VectorRecord[]): Promise<void> {
    const collection = this.getCollection(collectionName);
    for (const record of records) {
      if (record.vector.length !== collection.dimensions) {
        throw new RangeError(
          `Expected ${String(collection.dimensions)} dimensions in "${collectionName}", got ${String(record.vector.length)}`,
        );
      }
      collection.records.set(record.id, { ...record, vector: [...record.vector] });
    }
  }

  async search(collectionName: string, params: VectorSearchParams): Promise<VectorSearchResult[]> {
    const collection = this.collections.get(collectionName);
    if (!collection || params.topK <= 0) return [];

    const results: VectorSearchResult[] = [];
    for (const record of collection.records.values()) {
      if (record.documentId !== params.documentId) continue;
      results.push({
        id: record.id,
        chunkIndex: record.chunkIndex,
        score: cosineSimilarity(params.vector, record.vector),
      });
    }

    return results
      .sort((a, b) => b.score - a.score || a.chunkIndex - b.chunkIndex)
      .slice(0, params.topK);
  }

  async deleteByDocument(collectionName: string, documentId: string): Promise<void> {
    const collection = this.collections.get(collectionName);
    if (!collection) return;
    for (const [id, record] of collection.records) {
      if (record.documentId === documentId) collection.records.delete(id);
    }
  }

  async ensureCollection(collectionName: string, dimensions: number): Promise<void> {
    const existing = this.collections.get(collectionName);
    if (existing) {
      // Dimensions are fixed only while the collection holds records.
      if (existing.records.size === 0) existing.dimensions = dimensions;
      return;
    }
    this.collections.set(collectionName, { dimensions, records: new Map() });
  }

  /** Number of stored records, optionally for one document. */
  count(collectionName: string, documentId?: string): number {
    const collection = this.collections.get(collectionName);
    if (!collection) return 0;
    if (documentId === undefined) return collection.records.size;
    let total = 0;
    for (const record of collection.records.values()) {
      if (record.documentId === documentId) total++;
    }
    return total;
  }

  private getCollection(collectionName: string): Collection {
    const collection = this.collections.get(collectionName);
    if (!collection) {
      throw new Error(`Collection "${collectionName}" does not exist`);
    }
    return collection;
  }
}
