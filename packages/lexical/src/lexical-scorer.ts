import type { LexicalBreakdown, LexicalWeights } from "@quarry/types";
import { DEFAULT_ENGINE_CONFIG } from "@quarry/config";
import { tokenSet, toPhrase } from "./tokenizer.js";

export interface PreparedQuery {
  phrase: string;
  tokens: ReadonlySet<string>;
}

export interface LexicalCandidate {
  index: number;
  content: string;
}

export interface LexicalMatch {
  index: number;
  score: number;
}

export function prepareQuery(query: string): PreparedQuery {
  return { phrase: toPhrase(query), tokens: tokenSet(query) };
}

function intersectionSize(a: ReadonlySet<string>, b: ReadonlySet<string>): number {
  let count = 0;
  for (const token of a) {
    if (b.has(token)) count++;
  }
  return count;
}

/**
 * Keyword similarity between a query and a passage: a weighted blend of
 * token Jaccard, verbatim phrase match and query-word coverage.
 */
export class LexicalScorer {
  constructor(private readonly weights: LexicalWeights = DEFAULT_ENGINE_CONFIG.lexicalWeights) {}

  breakdown(query: string | PreparedQuery, chunkText: string): LexicalBreakdown {
    const prepared = typeof query === "string" ? prepareQuery(query) : query;
    const queryTokens = prepared.tokens;
    if (queryTokens.size === 0) {
      return { jaccard: 0, substring: 0, wordMatch: 0 };
    }

    const chunkTokens = tokenSet(chunkText);
    const shared = intersectionSize(queryTokens, chunkTokens);
    const union = queryTokens.size + chunkTokens.size - shared;

    return {
      jaccard: chunkTokens.size === 0 ? 0 : shared / union,
      substring: toPhrase(chunkText).includes(prepared.phrase) ? 1 : 0,
      wordMatch: shared / queryTokens.size,
    };
  }

  score(query: string | PreparedQuery, chunkText: string): number {
    const { jaccard, substring, wordMatch } = this.breakdown(query, chunkText);
    const total =
      jaccard * this.weights.jaccard +
      substring * this.weights.substring +
      wordMatch * this.weights.wordMatch;
    return Math.min(1, Math.max(0, total));
  }

  /**
   * Score every candidate and rank by score, ties by ascending index.
   */
  rank(query: string, candidates: readonly LexicalCandidate[]): LexicalMatch[] {
    const prepared = prepareQuery(query);
    return candidates
      .map((candidate) => ({ index: candidate.index, score: this.score(prepared, candidate.content) }))
      .sort(compareMatches);
  }
}

export function compareMatches(a: LexicalMatch, b: LexicalMatch): number {
  return b.score - a.score || a.index - b.index;
}

const defaultScorer = new LexicalScorer();

/**
 * Lexical similarity in [0, 1]. Uses the default 0.4 / 0.3 / 0.3 weights
 * unless others are given.
 */
export function score(query: string, chunkText: string, weights?: LexicalWeights): number {
  return (weights ? new LexicalScorer(weights) : defaultScorer).score(query, chunkText);
}

export function breakdown(query: string, chunkText: string): LexicalBreakdown {
  return defaultScorer.breakdown(query, chunkText);
}
