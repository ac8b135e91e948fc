import { QdrantClient } from "@qdrant/js-client-rest";
import type { VectorRecord } from "@quarry/types";
import type {
  IVectorStore,
  VectorSearchParams,
  VectorSearchResult,
} from "./vector-store.interface.js";

const BATCH_SIZE = 100;

export class QdrantVectorStore implements IVectorStore {
  readonly name = "qdrant";
  private client: QdrantClient;

  constructor(url: string, apiKey?: string) {
    this.client = new QdrantClient({ url, apiKey });
  }

  async upsert(collectionName: string, records: VectorRecord[]): Promise<void> {
    for (let i = 0; i < records.length; i += BATCH_SIZE) {
      const batch = records.slice(i, i + BATCH_SIZE);

      await this.client.upsert(collectionName, {
        wait: true,
        points: batch.map((r) => ({
          id: r.id,
          vector: r.vector,
          payload: {
            ...r.payload,
            documentId: r.documentId,
            chunkIndex: r.chunkIndex,
          },
        })),
      });
    }
  }

  async search(collectionName: string, params: VectorSearchParams): Promise<VectorSearchResult[]> {
    const results = await this.client.search(collectionName, {
      vector: params.vector,
      limit: params.topK,
      filter: { must: [{ key: "documentId", match: { value: params.documentId } }] },
      with_payload: ["chunkIndex"],
    });

    const mapped: VectorSearchResult[] = [];
    for (const r of results) {
      const chunkIndex = r.payload?.chunkIndex;
      // Points written by another writer may lack the index; they cannot be mapped to a chunk.
      if (typeof chunkIndex !== "number") continue;
      mapped.push({
        id: typeof r.id === "string" ? r.id : String(r.id),
        chunkIndex,
        score: r.score,
      });
    }
    return mapped;
  }

  async deleteByDocument(collectionName: string, documentId: string): Promise<void> {
    await this.client.delete(collectionName, {
      wait: true,
      filter: { must: [{ key: "documentId", match: { value: documentId } }] },
    });
  }

  async ensureCollection(collectionName: string, dimensions: number): Promise<void> {
    const collections = await this.client.getCollections();
    const exists = collections.collections.some((c) => c.name === collectionName);

    if (!exists) {
      await this.client.createCollection(collectionName, {
        vectors: {
          size: dimensions,
          distance: "Cosine",
        },
      });

      await this.client.createPayloadIndex(collectionName, {
        field_name: "documentId",
        field_schema: "keyword",
      });
    }
  }
}
