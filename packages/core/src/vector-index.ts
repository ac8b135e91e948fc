import { randomUUID } from "node:crypto";
import type { VectorRecord } from "@quarry/types";
import type { IEmbeddingProvider } from "@quarry/embeddings";
import type { IVectorStore } from "@quarry/vector-store";
import { isWellFormedVector } from "@quarry/vector-store";
import { BackendUnavailableError, withRetry } from "@quarry/errors";
import type { RetryOptions } from "@quarry/errors";
import type { Logger } from "@quarry/logger";

/**
 * Proof that a document's chunks were embedded and stored. Retrieval only
 * attempts the vector path for documents that hold one.
 */
export interface VectorIndexHandle {
  readonly documentId: string;
  readonly dimensions: number;
  /** Number of indexed chunks. */
  readonly size: number;
  readonly model: string;
}

export interface IndexableChunk {
  id: string;
  index: number;
  content: string;
}

export interface IndexedVectors {
  handle: VectorIndexHandle;
  /** One vector per input chunk, in input order. */
  vectors: number[][];
  tokensUsed: number;
}

export interface VectorMatch {
  chunkIndex: number;
  score: number;
}

export interface VectorIndexOptions {
  provider: IEmbeddingProvider;
  store: IVectorStore;
  collectionName: string;
  logger?: Logger;
  retry?: Omit<RetryOptions, "onRetry">;
}

export class VectorIndex {
  private readonly provider: IEmbeddingProvider;
  private readonly store: IVectorStore;
  private readonly collectionName: string;
  private readonly logger?: Logger;
  private readonly retry?: Omit<RetryOptions, "onRetry">;

  constructor(options: VectorIndexOptions) {
    this.provider = options.provider;
    this.store = options.store;
    this.collectionName = options.collectionName;
    this.logger = options.logger;
    this.retry = options.retry;
  }

  get providerName(): string {
    return this.provider.name;
  }

  /**
   * Embed and store every chunk of a document, replacing any vectors the
   * document already had.
   */
  async index(
    documentId: string,
    chunks: readonly IndexableChunk[],
    signal?: AbortSignal,
  ): Promise<IndexedVectors> {
    const result = await withRetry(
      () => this.provider.batchEmbed(chunks.map((c) => c.content), { signal }),
      {
        ...this.retry,
        signal,
        onRetry: ({ attempt, maxRetries, delayMs, error }) => {
          this.logger?.warn(
            { documentId, attempt, maxRetries, delayMs, err: error },
            "Batch embedding failed, retrying",
          );
        },
      },
    );

    // No store writes once the caller or a timeout has given up.
    signal?.throwIfAborted();

    const vectors = result.embeddings;
    if (vectors.length !== chunks.length) {
      throw new BackendUnavailableError(
        "malformed_vector",
        `Expected ${String(chunks.length)} embeddings, got ${String(vectors.length)}`,
      );
    }

    const dimensions = vectors[0]?.length ?? 0;
    vectors.forEach((vector, i) => {
      if (!isWellFormedVector(vector, dimensions)) {
        throw new BackendUnavailableError(
          "malformed_vector",
          `Embedding for chunk ${String(i)} is malformed`,
          { details: { documentId, dimensions } },
        );
      }
    });

    const records: VectorRecord[] = chunks.map((chunk, i) => ({
      id: randomUUID(),
      documentId,
      chunkIndex: chunk.index,
      vector: vectors[i]!,
      payload: { chunkId: chunk.id },
    }));

    if (records.length > 0) {
      await this.store.ensureCollection(this.collectionName, dimensions);
      await this.store.deleteByDocument(this.collectionName, documentId);
      await this.store.upsert(this.collectionName, records);
    }

    return {
      handle: Object.freeze({ documentId, dimensions, size: chunks.length, model: result.model }),
      vectors,
      tokensUsed: result.tokensUsed,
    };
  }

  /**
   * Embed a query and check it fits the handle's vector space.
   */
  async embedQuery(
    handle: VectorIndexHandle,
    query: string,
    signal?: AbortSignal,
  ): Promise<number[]> {
    let vector: number[] | undefined;
    try {
      const result = await this.provider.embed(query, { signal });
      vector = result.embeddings[0];
    } catch (error: unknown) {
      if (signal?.aborted) throw error;
      throw new BackendUnavailableError("provider_error", "Query embedding failed", {
        cause: error,
      });
    }

    if (!isWellFormedVector(vector, handle.dimensions)) {
      throw new BackendUnavailableError(
        "malformed_vector",
        `Query embedding does not match the index (${String(handle.dimensions)} dimensions)`,
      );
    }
    return vector;
  }

  /**
   * Nearest chunks of one document by cosine similarity.
   */
  async search(handle: VectorIndexHandle, vector: number[], k: number): Promise<VectorMatch[]> {
    const results = await this.store.search(this.collectionName, {
      documentId: handle.documentId,
      vector,
      topK: k,
    });

    return results
      .filter((r) => r.chunkIndex >= 0 && r.chunkIndex < handle.size && Number.isFinite(r.score))
      .map((r) => ({ chunkIndex: r.chunkIndex, score: r.score }));
  }

  async remove(documentId: string): Promise<void> {
    await this.store.deleteByDocument(this.collectionName, documentId);
  }
}
