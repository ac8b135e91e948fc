import { DOCUMENT_TYPE_PRIORITY } from "@quarry/types";
import type { DocumentType } from "@quarry/types";
import { tokenize } from "@quarry/lexical";

export type ScoredDocumentType = Exclude<DocumentType, "general">;

export type CategoryScores = Record<ScoredDocumentType, number>;

export interface ClassifyOptions {
  /** Only the first N chunks are scanned. Default: 5 */
  prefixChunks?: number;
}

const DEFAULT_PREFIX_CHUNKS = 5;

/**
 * Whole-word cues per category. Weight 2 marks a term that rarely appears
 * outside that kind of document.
 */
const KEYWORDS: Record<ScoredDocumentType, Readonly<Record<string, number>>> = {
  research: {
    abstract: 2,
    methodology: 2,
    hypothesis: 2,
    research: 1,
    study: 1,
    findings: 1,
    literature: 1,
  },
  business: {
    revenue: 2,
    kpi: 2,
    earnings: 2,
    quarter: 1,
    quarterly: 1,
    profit: 1,
    financial: 1,
  },
  legal: {
    whereas: 2,
    liability: 2,
    indemnify: 2,
    contract: 1,
    agreement: 1,
    clause: 1,
    legal: 1,
  },
  technical: {
    installation: 2,
    configuration: 2,
    troubleshooting: 2,
    manual: 1,
    guide: 1,
    instructions: 1,
    procedure: 1,
  },
};

const CATEGORIES: readonly ScoredDocumentType[] = ["research", "business", "legal", "technical"];

const LEXICON = new Map<string, { category: ScoredDocumentType; weight: number }>(
  CATEGORIES.flatMap((category) =>
    Object.entries(KEYWORDS[category]).map(
      ([word, weight]) => [word, { category, weight }] as const,
    ),
  ),
);

function emptyScores(): CategoryScores {
  return { research: 0, business: 0, legal: 0, technical: 0 };
}

/**
 * Weighted keyword totals per category over the leading chunks.
 */
export function scoreCategories(
  chunks: readonly { content: string }[],
  options?: ClassifyOptions,
): CategoryScores {
  const prefix = options?.prefixChunks ?? DEFAULT_PREFIX_CHUNKS;
  const scores = emptyScores();

  for (const chunk of chunks.slice(0, Math.max(0, prefix))) {
    for (const token of tokenize(chunk.content)) {
      const hit = LEXICON.get(token);
      if (hit) scores[hit.category] += hit.weight;
    }
  }

  return scores;
}

/**
 * Pick the category with the highest weighted count. Ties follow
 * DOCUMENT_TYPE_PRIORITY; no hits at all is "general".
 */
export function classify(
  chunks: readonly { content: string }[],
  options?: ClassifyOptions,
): DocumentType {
  const scores = scoreCategories(chunks, options);

  let best: DocumentType = "general";
  let bestScore = 0;
  for (const type of DOCUMENT_TYPE_PRIORITY) {
    if (type === "general") continue;
    if (scores[type] > bestScore) {
      best = type;
      bestScore = scores[type];
    }
  }
  return best;
}
