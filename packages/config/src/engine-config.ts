import { z } from "zod";
import type { EngineConfig } from "@quarry/types";
import { InvalidConfigurationError } from "@quarry/errors";

const WEIGHT_SUM_TOLERANCE = 1e-6;

export const DEFAULT_ENGINE_CONFIG: EngineConfig = {
  chunkSize: 1000,
  overlap: 200,
  topK: 5,
  lexicalWeights: { jaccard: 0.4, substring: 0.3, wordMatch: 0.3 },
  vectorBackendEnabled: false,
  vectorTimeoutMs: 3_000,
  indexTimeoutMs: 30_000,
  classifierPrefixChunks: 5,
  splitOversizedSentences: false,
  maxQueryLength: 4_096,
  minScore: 0,
  collectionName: "quarry-chunks",
  contextFormat: "plain",
};

const d = DEFAULT_ENGINE_CONFIG;

export const lexicalWeightsSchema = z.object({
  jaccard: z.number().nonnegative(),
  substring: z.number().nonnegative(),
  wordMatch: z.number().nonnegative(),
});

/**
 * Zod schema for {@link EngineConfig}. Every field is optional on input
 * and falls back to {@link DEFAULT_ENGINE_CONFIG}.
 */
export const engineConfigSchema = z
  .object({
    chunkSize: z.number().int().positive().default(d.chunkSize),
    overlap: z.number().int().nonnegative().default(d.overlap),
    topK: z.number().int().positive().default(d.topK),
    lexicalWeights: lexicalWeightsSchema.default(d.lexicalWeights),
    vectorBackendEnabled: z.boolean().default(d.vectorBackendEnabled),
    vectorTimeoutMs: z.number().int().positive().default(d.vectorTimeoutMs),
    indexTimeoutMs: z.number().int().positive().default(d.indexTimeoutMs),
    classifierPrefixChunks: z.number().int().positive().default(d.classifierPrefixChunks),
    splitOversizedSentences: z.boolean().default(d.splitOversizedSentences),
    maxQueryLength: z.number().int().positive().default(d.maxQueryLength),
    minScore: z.number().min(0).max(1).default(d.minScore),
    collectionName: z.string().min(1).default(d.collectionName),
    contextFormat: z.enum(["plain", "markdown", "xml"]).default(d.contextFormat),
  })
  .superRefine((config, ctx) => {
    if (config.overlap >= config.chunkSize) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["overlap"],
        message: "overlap must be smaller than chunkSize",
      });
    }

    const { jaccard, substring, wordMatch } = config.lexicalWeights;
    if (Math.abs(jaccard + substring + wordMatch - 1) > WEIGHT_SUM_TOLERANCE) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["lexicalWeights"],
        message: "lexicalWeights must sum to 1.0",
      });
    }
  });

export type EngineConfigInput = z.input<typeof engineConfigSchema>;

/**
 * Turn a ZodError into a dotted-path → message map.
 */
export function fieldErrors(error: z.ZodError): Record<string, string> {
  const fields: Record<string, string> = {};
  for (const issue of error.issues) {
    const key = issue.path.length > 0 ? issue.path.join(".") : "(root)";
    fields[key] ??= issue.message;
  }
  return fields;
}

/**
 * Validate engine options and fill in defaults.
 *
 * @throws InvalidConfigurationError when a field is out of range, when
 *   overlap ≥ chunkSize, or when the lexical weights do not sum to 1.
 */
export function resolveEngineConfig(input: EngineConfigInput = {}): EngineConfig {
  const result = engineConfigSchema.safeParse(input);
  if (!result.success) {
    throw new InvalidConfigurationError("Invalid engine configuration", fieldErrors(result.error), {
      cause: result.error,
    });
  }
  return result.data;
}
