import type { VectorStoreKind } from "@quarry/types";
import { InvalidConfigurationError } from "@quarry/errors";
import type { IVectorStore } from "./vector-store.interface.js";
import { InMemoryVectorStore } from "./memory-store.js";
import { QdrantVectorStore } from "./qdrant-adapter.js";

export type {
  IVectorStore,
  VectorSearchParams,
  VectorSearchResult,
} from "./vector-store.interface.js";
export { InMemoryVectorStore } from "./memory-store.js";
export { QdrantVectorStore } from "./qdrant-adapter.js";
export { cosineSimilarity, isWellFormedVector } from "./cosine.js";

export interface VectorStoreConfig {
  type: VectorStoreKind;
  qdrantUrl?: string;
  qdrantApiKey?: string;
}

export function createVectorStore(config: VectorStoreConfig): IVectorStore {
  switch (config.type) {
    case "memory":
      return new InMemoryVectorStore();
    case "qdrant":
      if (!config.qdrantUrl) {
        throw new InvalidConfigurationError("qdrantUrl is required for Qdrant vector store", {
          "vectorStore.qdrantUrl": "Required",
        });
      }
      return new QdrantVectorStore(config.qdrantUrl, config.qdrantApiKey);
    default:
      throw new InvalidConfigurationError(
        `Unknown vector store type: ${String(config.type)}`,
        { "vectorStore.type": "Unknown vector store type" },
      );
  }
}
