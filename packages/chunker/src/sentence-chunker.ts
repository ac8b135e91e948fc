import type { ChunkResult } from "@quarry/types";
import type { ChunkOptions, IChunker } from "./chunker.interface.js";
import {
  findSentences,
  firstSpanStartingAt,
  isWhitespace,
  splitOversized,
  type SentenceSpan,
} from "./sentence-boundaries.js";

/**
 * Sentence-aware chunker with character overlap.
 *
 * Sentences accumulate into a `[start, end)` window over the text. When the
 * next sentence would push the window past `chunkSize`, the window is
 * emitted and the next one re-enters up to `overlap` characters before the
 * old end, snapped forward to a sentence start, else a word start.
 *
 * A sentence longer than `chunkSize` becomes a chunk of its own unless
 * `splitOversizedSentences` is set, in which case it is cut at word
 * boundaries first.
 */
export class SentenceChunker implements IChunker {
  readonly strategy = "sentence";

  chunk(content: string, options: ChunkOptions): ChunkResult[] {
    const { chunkSize, overlap, signal, onProgress } = options;
    signal?.throwIfAborted();

    const found = findSentences(content);
    const sentences = options.splitOversizedSentences
      ? splitOversized(content, found, chunkSize)
      : found;

    const [first, ...rest] = sentences;
    if (!first) return [];

    const results: ChunkResult[] = [];
    let start = first.start;
    let end = first.end;
    let carried = 0;

    for (const sentence of rest) {
      if (sentence.end - start <= chunkSize) {
        end = sentence.end;
        continue;
      }

      results.push(this.buildChunk(content, results.length, start, end, carried));
      signal?.throwIfAborted();
      onProgress?.(end / content.length);

      const reentry = this.reentryPoint(content, sentences, start, end, sentence, chunkSize, overlap);
      carried = Math.max(0, end - reentry);
      start = reentry;
      end = sentence.end;
    }

    results.push(this.buildChunk(content, results.length, start, end, carried));
    onProgress?.(1);

    return results;
  }

  private reentryPoint(
    text: string,
    sentences: SentenceSpan[],
    closedStart: number,
    closedEnd: number,
    next: SentenceSpan,
    chunkSize: number,
    overlap: number,
  ): number {
    if (overlap <= 0) return next.start;

    // Keep overlap + next sentence within chunkSize where the sentence allows it.
    const lo = Math.max(closedStart, closedEnd - overlap, next.end - chunkSize);
    if (lo >= closedEnd) return next.start;

    const candidate = sentences[firstSpanStartingAt(sentences, lo)];
    if (candidate && candidate.start < closedEnd) {
      return candidate.start;
    }

    for (let p = lo; p < closedEnd; p++) {
      if ((p === 0 || isWhitespace(text[p - 1])) && !isWhitespace(text[p])) {
        return p;
      }
    }

    return lo;
  }

  private buildChunk(
    text: string,
    index: number,
    startChar: number,
    endChar: number,
    overlap: number,
  ): ChunkResult {
    const content = text.slice(startChar, endChar);
    return {
      content,
      index,
      tokenCount: this.estimateTokens(content),
      metadata: { startChar, endChar, overlap },
    };
  }

  private estimateTokens(text: string): number {
    // Rough estimate: ~4 chars per token for English text
    return Math.ceil(text.length / 4);
  }
}

const defaultChunker = new SentenceChunker();

/**
 * Split normalized text into overlapping, sentence-respecting chunks.
 */
export function chunkText(content: string, options: ChunkOptions): ChunkResult[] {
  return defaultChunker.chunk(content, options);
}
