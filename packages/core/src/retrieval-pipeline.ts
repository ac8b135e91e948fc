import type {
  Chunk,
  ContextFormat,
  Document,
  EngineConfig,
  RetrievalResult,
  ScoredChunk,
} from "@quarry/types";
import type { LexicalScorer } from "@quarry/lexical";
import { prepareQuery } from "@quarry/lexical";
import { AppError, BackendUnavailableError, TimeoutError, withTimeout } from "@quarry/errors";
import type { Logger } from "@quarry/logger";
import { redactText } from "@quarry/logger";
import { assembleContext } from "./context-assembler.js";
import type { VectorIndex, VectorIndexHandle, VectorMatch } from "./vector-index.js";

export interface RetrievalRequest {
  document: Document;
  chunks: readonly Chunk[];
  vectorHandle: VectorIndexHandle | null;
  query: unknown;
  topK?: number;
  format?: ContextFormat;
  signal?: AbortSignal;
}

export type RetrievalSettings = Pick<
  EngineConfig,
  "topK" | "vectorBackendEnabled" | "vectorTimeoutMs" | "maxQueryLength" | "minScore" | "contextFormat"
>;

export interface RetrievalDependencies {
  config: RetrievalSettings;
  scorer: LexicalScorer;
  vectorIndex: VectorIndex | null;
  logger: Logger;
}

function compareScored(a: ScoredChunk, b: ScoredChunk): number {
  return b.score - a.score || a.chunk.index - b.chunk.index;
}

/**
 * A query is searchable when it is a string within the length limit that
 * yields at least one token. Anything else scores 0 everywhere.
 */
function searchableQuery(query: unknown, maxLength: number): string | null {
  if (typeof query !== "string" || query.length > maxLength) return null;
  return prepareQuery(query).tokens.size > 0 ? query : null;
}

async function searchVectors(
  request: RetrievalRequest,
  query: string,
  k: number,
  deps: RetrievalDependencies,
): Promise<ScoredChunk[]> {
  const { vectorIndex } = deps;
  const handle = request.vectorHandle;
  if (!deps.config.vectorBackendEnabled || !vectorIndex) {
    throw new BackendUnavailableError("disabled");
  }
  if (!handle) {
    throw new BackendUnavailableError("not_indexed");
  }

  let matches: VectorMatch[];
  try {
    matches = await withTimeout(
      async (signal) => {
        const vector = await vectorIndex.embedQuery(handle, query, signal);
        return vectorIndex.search(handle, vector, k);
      },
      deps.config.vectorTimeoutMs,
      { signal: request.signal, label: "Vector search" },
    );
  } catch (error: unknown) {
    if (error instanceof BackendUnavailableError) throw error;
    if (error instanceof TimeoutError) {
      throw new BackendUnavailableError("timeout", error.message, { cause: error });
    }
    if (request.signal?.aborted) {
      throw new BackendUnavailableError("cancelled", undefined, { cause: error });
    }
    throw new BackendUnavailableError("provider_error", undefined, { cause: error });
  }

  const scored: ScoredChunk[] = [];
  for (const match of matches) {
    const chunk = request.chunks[match.chunkIndex];
    if (chunk) scored.push({ chunk, score: match.score, method: "vector" });
  }
  if (scored.length === 0) {
    throw new BackendUnavailableError("no_results");
  }
  return scored;
}

function scoreLexically(
  chunks: readonly Chunk[],
  query: string | null,
  scorer: LexicalScorer,
): ScoredChunk[] {
  const ranked = scorer.rank(query ?? "", chunks);
  const scored: ScoredChunk[] = [];
  for (const match of ranked) {
    const chunk = chunks[match.index];
    if (chunk) scored.push({ chunk, score: match.score, method: "lexical" });
  }
  return scored;
}

/**
 * Retrieval pipeline: Query -> (Embed -> Vector Search | Lexical Score) -> Rank -> Assemble Context
 *
 * The vector path is tried first on every call. Any reason it cannot serve
 * the call falls back to lexical scoring over all chunks; nothing is thrown.
 */
export async function retrieve(
  request: RetrievalRequest,
  deps: RetrievalDependencies,
): Promise<RetrievalResult> {
  const startTime = Date.now();
  const { document, chunks } = request;
  const queryText = typeof request.query === "string" ? request.query : "";
  const format = request.format ?? deps.config.contextFormat;
  const logger = deps.logger;

  if (chunks.length === 0) {
    return {
      documentId: document.id,
      query: queryText,
      chunks: [],
      documentType: document.documentType,
      scoringMethod: "none",
      context: assembleContext([], document.filename, format),
      metadata: { totalChunksSearched: 0, retrievalTimeMs: Date.now() - startTime },
    };
  }

  const k =
    typeof request.topK === "number" && Number.isInteger(request.topK) && request.topK > 0
      ? request.topK
      : deps.config.topK;
  const query = searchableQuery(request.query, deps.config.maxQueryLength);

  let scored: ScoredChunk[] | null = null;
  if (query !== null) {
    try {
      scored = await searchVectors(request, query, k, deps);
    } catch (error: unknown) {
      if (!(error instanceof BackendUnavailableError)) throw error;
      const fields = {
        code: error.code,
        reason: error.reason,
        cause: AppError.isAppError(error.cause) ? error.cause.code : undefined,
      };
      if (error.reason === "disabled") {
        logger.debug(fields, "Vector backend disabled, using lexical scoring");
      } else {
        logger.warn(fields, "Vector backend unavailable, falling back to lexical scoring");
      }
    }
  }

  const method = scored ? "vector" : "lexical";
  const ranked = (scored ?? scoreLexically(chunks, query, deps.scorer)).sort(compareScored);
  const minScore = deps.config.minScore;
  const selected = (minScore > 0 ? ranked.filter((s) => s.score >= minScore) : ranked).slice(0, k);

  const retrievalTimeMs = Date.now() - startTime;
  logger.debug(
    {
      method,
      query: redactText(queryText),
      resultCount: selected.length,
      retrievalTimeMs,
    },
    "Retrieval complete",
  );

  return {
    documentId: document.id,
    query: queryText,
    chunks: selected,
    documentType: document.documentType,
    scoringMethod: method,
    context: assembleContext(selected, document.filename, format),
    metadata: {
      totalChunksSearched: chunks.length,
      retrievalTimeMs,
    },
  };
}
