import { z } from "zod";
import type { AppConfig } from "@quarry/types";
import { InvalidConfigurationError } from "@quarry/errors";
import { DEFAULT_ENGINE_CONFIG, fieldErrors, resolveEngineConfig } from "./engine-config.js";

const booleanString = z
  .enum(["true", "false", "1", "0"])
  .transform((value) => value === "true" || value === "1");

const intString = (fallback: number) =>
  z.string().default(String(fallback)).transform(Number).pipe(z.number().int());

/**
 * Zod schema for the environment variables the engine reads.
 */
export const envSchema = z.object({
  // ---------- Core ----------
  NODE_ENV: z.enum(["development", "test", "production"]).default("production"),
  LOG_LEVEL: z.enum(["debug", "info", "warn", "error"]).default("info"),

  // ---------- Engine ----------
  QUARRY_CHUNK_SIZE: intString(DEFAULT_ENGINE_CONFIG.chunkSize),
  QUARRY_OVERLAP: intString(DEFAULT_ENGINE_CONFIG.overlap),
  QUARRY_TOP_K: intString(DEFAULT_ENGINE_CONFIG.topK),
  QUARRY_LEXICAL_WEIGHTS: z
    .string()
    .default("0.4,0.3,0.3")
    .transform((val) => val.split(",").map((part) => Number(part.trim())))
    .pipe(z.tuple([z.number(), z.number(), z.number()])),
  QUARRY_VECTOR_BACKEND_ENABLED: booleanString.default("false"),
  QUARRY_VECTOR_TIMEOUT_MS: intString(DEFAULT_ENGINE_CONFIG.vectorTimeoutMs),
  QUARRY_INDEX_TIMEOUT_MS: intString(DEFAULT_ENGINE_CONFIG.indexTimeoutMs),
  QUARRY_SPLIT_OVERSIZED: booleanString.default("false"),
  QUARRY_COLLECTION: z.string().min(1).default(DEFAULT_ENGINE_CONFIG.collectionName),

  // ---------- Embeddings ----------
  EMBEDDING_PROVIDER: z.enum(["none", "cohere", "http"]).default("none"),
  COHERE_API_KEY: z.string().optional(),
  COHERE_EMBED_MODEL: z.string().default("embed-english-v3.0"),
  EMBEDDING_SERVER_URL: z.string().url().optional(),
  EMBEDDING_DIMENSIONS: z.string().transform(Number).pipe(z.number().int().positive()).optional(),

  // ---------- Vector store ----------
  VECTOR_STORE: z.enum(["memory", "qdrant"]).default("memory"),
  QDRANT_URL: z.string().url().optional(),
  QDRANT_API_KEY: z.string().optional(),
});

/**
 * Parse process.env (or any compatible record) into a typed {@link AppConfig}.
 *
 * @throws InvalidConfigurationError naming the offending variables.
 */
export function parseEnv(env: Record<string, string | undefined> = process.env): AppConfig {
  const result = envSchema.safeParse(env);
  if (!result.success) {
    throw new InvalidConfigurationError("Invalid environment", fieldErrors(result.error), {
      cause: result.error,
    });
  }
  const parsed = result.data;

  if (parsed.EMBEDDING_PROVIDER === "cohere" && !parsed.COHERE_API_KEY) {
    throw new InvalidConfigurationError("Invalid environment", {
      COHERE_API_KEY: "COHERE_API_KEY is required when EMBEDDING_PROVIDER is cohere",
    });
  }
  if (parsed.EMBEDDING_PROVIDER === "http" && !parsed.EMBEDDING_SERVER_URL) {
    throw new InvalidConfigurationError("Invalid environment", {
      EMBEDDING_SERVER_URL: "EMBEDDING_SERVER_URL is required when EMBEDDING_PROVIDER is http",
    });
  }
  if (parsed.VECTOR_STORE === "qdrant" && !parsed.QDRANT_URL) {
    throw new InvalidConfigurationError("Invalid environment", {
      QDRANT_URL: "QDRANT_URL is required when VECTOR_STORE is qdrant",
    });
  }

  const [jaccard, substring, wordMatch] = parsed.QUARRY_LEXICAL_WEIGHTS;

  const engine = resolveEngineConfig({
    chunkSize: parsed.QUARRY_CHUNK_SIZE,
    overlap: parsed.QUARRY_OVERLAP,
    topK: parsed.QUARRY_TOP_K,
    lexicalWeights: { jaccard, substring, wordMatch },
    vectorBackendEnabled:
      parsed.QUARRY_VECTOR_BACKEND_ENABLED && parsed.EMBEDDING_PROVIDER !== "none",
    vectorTimeoutMs: parsed.QUARRY_VECTOR_TIMEOUT_MS,
    indexTimeoutMs: parsed.QUARRY_INDEX_TIMEOUT_MS,
    splitOversizedSentences: parsed.QUARRY_SPLIT_OVERSIZED,
    collectionName: parsed.QUARRY_COLLECTION,
  });

  return {
    nodeEnv: parsed.NODE_ENV,
    logLevel: parsed.LOG_LEVEL,
    engine,

    embeddings: {
      provider: parsed.EMBEDDING_PROVIDER,
      cohere: {
        apiKey: parsed.COHERE_API_KEY ?? "",
        embedModel: parsed.COHERE_EMBED_MODEL,
        dimensions: parsed.EMBEDDING_DIMENSIONS,
      },
      http: {
        baseUrl: parsed.EMBEDDING_SERVER_URL ?? "",
        dimensions: parsed.EMBEDDING_DIMENSIONS,
      },
    },

    vectorStore: {
      type: parsed.VECTOR_STORE,
      qdrantUrl: parsed.QDRANT_URL,
      qdrantApiKey: parsed.QDRANT_API_KEY,
    },
  };
}
