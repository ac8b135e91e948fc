import type {
  AppConfig,
  Chunk,
  ContextFormat,
  Document,
  EngineConfig,
  IndexStats,
  MissingIndexStats,
  RetrievalResult,
} from "@quarry/types";
import { SentenceChunker } from "@quarry/chunker";
import type { IChunker } from "@quarry/chunker";
import { LexicalScorer } from "@quarry/lexical";
import { createEmbeddingProvider } from "@quarry/embeddings";
import type { IEmbeddingProvider } from "@quarry/embeddings";
import { InMemoryVectorStore, createVectorStore } from "@quarry/vector-store";
import type { IVectorStore } from "@quarry/vector-store";
import { parseEnv, resolveEngineConfig } from "@quarry/config";
import type { EngineConfigInput } from "@quarry/config";
import { createChildLogger, createLogger } from "@quarry/logger";
import type { Logger } from "@quarry/logger";
import { DocumentStore } from "./document-store.js";
import { ingest } from "./ingestion-pipeline.js";
import { retrieve } from "./retrieval-pipeline.js";
import { assembleContext } from "./context-assembler.js";
import { VectorIndex } from "./vector-index.js";

export interface RetrievalEngineOptions {
  config?: EngineConfigInput;
  /** Omit to run lexical-only. */
  embeddingProvider?: IEmbeddingProvider | null;
  /** Defaults to an in-process store. */
  vectorStore?: IVectorStore;
  chunker?: IChunker;
  logger?: Logger;
}

export interface IngestOptions {
  /** Display name used in context blocks. Defaults to the document id. */
  filename?: string;
  signal?: AbortSignal;
  onProgress?: (fraction: number) => void;
}

export interface RetrieveOptions {
  signal?: AbortSignal;
  format?: ContextFormat;
}

/**
 * Single-document retrieval engine: ingest text, then ask for the passages
 * most relevant to a query.
 */
export class RetrievalEngine {
  readonly config: EngineConfig;
  private readonly documents = new DocumentStore();
  private readonly chunker: IChunker;
  private readonly scorer: LexicalScorer;
  private readonly vectorIndex: VectorIndex | null;
  private readonly logger: Logger;

  /**
   * @throws InvalidConfigurationError when `options.config` is invalid.
   */
  constructor(options: RetrievalEngineOptions = {}) {
    this.config = resolveEngineConfig(options.config);
    this.logger = createChildLogger(options.logger ?? createLogger(), { component: "engine" });
    this.chunker = options.chunker ?? new SentenceChunker();
    this.scorer = new LexicalScorer(this.config.lexicalWeights);

    const provider = options.embeddingProvider ?? null;
    this.vectorIndex =
      provider && this.config.vectorBackendEnabled
        ? new VectorIndex({
            provider,
            store: options.vectorStore ?? new InMemoryVectorStore(),
            collectionName: this.config.collectionName,
            logger: this.logger,
          })
        : null;
  }

  /**
   * Normalize, chunk and (when a backend is configured) embed a document.
   * Re-ingesting an id replaces the earlier document.
   *
   * @throws EmptyDocumentError when no text survives normalization.
   */
  async ingest(documentId: string, rawText: string, options?: IngestOptions): Promise<readonly Chunk[]> {
    const logger = createChildLogger(this.logger, { documentId });
    const previous = this.documents.get(documentId);

    const result = await ingest(
      { documentId, text: rawText, filename: options?.filename },
      {
        chunker: this.chunker,
        chunking: {
          chunkSize: this.config.chunkSize,
          overlap: this.config.overlap,
          splitOversizedSentences: this.config.splitOversizedSentences,
        },
        vectorIndex: this.vectorIndex,
        indexTimeoutMs: this.config.indexTimeoutMs,
        classifierPrefixChunks: this.config.classifierPrefixChunks,
        logger,
        signal: options?.signal,
        onProgress: options?.onProgress,
      },
    );

    if (previous?.vectorHandle && !result.vectorHandle) {
      await this.dropVectors(documentId, logger);
    }

    this.documents.set(result);
    return result.chunks;
  }

  /**
   * Rank a document's chunks against a query. Never throws for bad queries
   * or an unavailable vector backend; an unknown document yields an empty
   * result.
   */
  async retrieve(
    documentId: string,
    query: string,
    topK?: number,
    options?: RetrieveOptions,
  ): Promise<RetrievalResult> {
    const logger = createChildLogger(this.logger, { documentId });
    const entry = this.documents.get(documentId);

    if (!entry) {
      logger.warn("Retrieval requested for unknown document");
      return {
        documentId,
        query: typeof query === "string" ? query : "",
        chunks: [],
        documentType: "general",
        scoringMethod: "none",
        context: assembleContext([], documentId, options?.format ?? this.config.contextFormat),
        metadata: { totalChunksSearched: 0, retrievalTimeMs: 0 },
      };
    }

    return retrieve(
      {
        document: entry.document,
        chunks: entry.chunks,
        vectorHandle: entry.vectorHandle,
        query,
        topK,
        format: options?.format,
        signal: options?.signal,
      },
      {
        config: this.config,
        scorer: this.scorer,
        vectorIndex: this.vectorIndex,
        logger,
      },
    );
  }

  /**
   * Forget a document and delete its vectors. Returns false for an unknown id.
   */
  async removeDocument(documentId: string): Promise<boolean> {
    const entry = this.documents.get(documentId);
    if (!entry) return false;

    this.documents.delete(documentId);
    if (entry.vectorHandle && this.vectorIndex) {
      await this.vectorIndex.remove(documentId);
    }
    this.logger.info({ documentId }, "Document removed");
    return true;
  }

  getDocument(documentId: string): Document | undefined {
    return this.documents.get(documentId)?.document;
  }

  listDocuments(): Document[] {
    return this.documents.list();
  }

  getIndexStats(documentId: string): IndexStats | MissingIndexStats {
    const entry = this.documents.get(documentId);
    if (!entry) return { status: "missing", documentId };

    const handle = entry.vectorHandle;
    return {
      status: "ready",
      documentId,
      filename: entry.document.filename,
      totalChunks: entry.chunks.length,
      vectorIndexed: handle !== null,
      dimensions: handle?.dimensions ?? null,
      embeddingModel: handle?.model ?? null,
    };
  }

  private async dropVectors(documentId: string, logger: Logger): Promise<void> {
    if (!this.vectorIndex) return;
    try {
      await this.vectorIndex.remove(documentId);
    } catch (error: unknown) {
      logger.warn({ err: error }, "Failed to delete stale vectors");
    }
  }
}

export interface EngineFromEnvOptions {
  logger?: Logger;
  /** Overrides applied on top of the environment's engine settings. */
  config?: Partial<EngineConfig>;
}

/**
 * Build an engine from environment variables (see `parseEnv`).
 *
 * @throws InvalidConfigurationError on invalid or inconsistent variables.
 */
export function createEngineFromEnv(
  env: Record<string, string | undefined> = process.env,
  options?: EngineFromEnvOptions,
): RetrievalEngine {
  return createEngineFromConfig(parseEnv(env), options);
}

/**
 * Build an engine from an already parsed {@link AppConfig}.
 *
 * @throws InvalidConfigurationError when the overrides make the engine settings invalid.
 */
export function createEngineFromConfig(
  appConfig: AppConfig,
  options?: EngineFromEnvOptions,
): RetrievalEngine {
  const logger =
    options?.logger ??
    createLogger({ level: appConfig.logLevel, pretty: appConfig.nodeEnv === "development" });

  const { embeddings } = appConfig;
  const embeddingProvider =
    embeddings.provider === "none"
      ? null
      : createEmbeddingProvider({
          provider: embeddings.provider,
          cohere: {
            apiKey: embeddings.cohere.apiKey,
            model: embeddings.cohere.embedModel,
            dimensions: embeddings.cohere.dimensions,
          },
          http: embeddings.http,
        });

  return new RetrievalEngine({
    config: { ...appConfig.engine, ...options?.config },
    embeddingProvider,
    vectorStore: createVectorStore(appConfig.vectorStore),
    logger,
  });
}
