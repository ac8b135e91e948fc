import type { Chunk, ChunkingConfig, Document } from "@quarry/types";
import type { IChunker } from "@quarry/chunker";
import { normalize, countWords } from "@quarry/chunker";
import { EmptyDocumentError, AppError, BackendUnavailableError, withTimeout } from "@quarry/errors";
import type { Logger } from "@quarry/logger";
import { classify } from "./document-classifier.js";
import type { IndexedVectors, VectorIndex, VectorIndexHandle } from "./vector-index.js";

export interface IngestionInput {
  documentId: string;
  text: string;
  filename?: string;
}

export interface IngestionDependencies {
  chunker: IChunker;
  chunking: ChunkingConfig;
  /** Null when no embedding provider is configured or the backend is disabled. */
  vectorIndex: VectorIndex | null;
  /** Bound on embedding and storing the whole document. */
  indexTimeoutMs: number;
  classifierPrefixChunks: number;
  logger: Logger;
  signal?: AbortSignal;
  onProgress?: (fraction: number) => void;
}

export interface IngestionResult {
  document: Document;
  chunks: readonly Chunk[];
  vectorHandle: VectorIndexHandle | null;
}

function chunkId(documentId: string, index: number): string {
  return `${documentId}:${String(index)}`;
}

/**
 * Ingestion pipeline: Normalize -> Chunk -> Embed -> Store -> Classify
 *
 * Embedding is best effort. A document whose vectors cannot be built is still
 * ingested and served by lexical scoring.
 */
export async function ingest(
  input: IngestionInput,
  deps: IngestionDependencies,
): Promise<IngestionResult> {
  const { documentId } = input;
  const logger = deps.logger;
  deps.signal?.throwIfAborted();

  // Phase 1: Normalize
  const text = normalize(input.text);
  if (text.length === 0) {
    throw new EmptyDocumentError(documentId);
  }

  // Phase 2: Chunk
  const results = deps.chunker.chunk(text, {
    ...deps.chunking,
    onProgress: deps.onProgress,
    signal: deps.signal,
  });

  // Phase 3: Embed + store (optional)
  let indexed: IndexedVectors | null = null;
  const vectorIndex = deps.vectorIndex;
  if (vectorIndex) {
    const indexable = results.map((r) => ({
      id: chunkId(documentId, r.index),
      index: r.index,
      content: r.content,
    }));
    try {
      indexed = await withTimeout(
        (signal) => vectorIndex.index(documentId, indexable, signal),
        deps.indexTimeoutMs,
        { signal: deps.signal, label: "Vector indexing" },
      );
    } catch (error: unknown) {
      // Only the caller's own abort fails ingestion.
      deps.signal?.throwIfAborted();
      logger.warn(
        {
          err: error,
          code: AppError.isAppError(error) ? error.code : undefined,
          reason: error instanceof BackendUnavailableError ? error.reason : undefined,
          provider: vectorIndex.providerName,
        },
        "Vector indexing failed, document will be served by lexical scoring",
      );
    }
  }

  const chunks: readonly Chunk[] = Object.freeze(
    results.map((r, i) =>
      Object.freeze({
        id: chunkId(documentId, r.index),
        documentId,
        index: r.index,
        content: r.content,
        tokenCount: r.tokenCount,
        metadata: Object.freeze({ ...r.metadata }),
        embedding: indexed ? Object.freeze([...(indexed.vectors[i] ?? [])]) : null,
      }),
    ),
  );

  // Phase 4: Classify
  const documentType = classify(chunks, { prefixChunks: deps.classifierPrefixChunks });

  const document: Document = {
    id: documentId,
    filename: input.filename ?? documentId,
    text,
    documentType,
    stats: {
      charCount: text.length,
      wordCount: countWords(text),
      chunkCount: chunks.length,
    },
    createdAt: new Date(),
  };

  logger.info(
    {
      chunkCount: chunks.length,
      documentType,
      vectorIndexed: indexed !== null,
      tokensUsed: indexed?.tokensUsed ?? 0,
    },
    "Document ingested",
  );

  return { document, chunks, vectorHandle: indexed?.handle ?? null };
}
