import { describe, it, expect, vi } from "vitest";
import { SentenceChunker, chunkText } from "./sentence-chunker.js";
import { findSentences } from "./sentence-boundaries.js";
import type { ChunkOptions } from "./chunker.interface.js";

const SCENARIO = "Sentence one. Sentence two. Sentence three.";

function buildDocument(sentenceCount: number): string {
  const paragraphs: string[] = [];
  let current: string[] = [];
  for (let i = 0; i < sentenceCount; i++) {
    current.push(`Sentence number ${String(i)} covers topic ${String(i % 7)} in some detail.`);
    if (current.length === 6) {
      paragraphs.push(current.join(" "));
      current = [];
    }
  }
  if (current.length > 0) paragraphs.push(current.join(" "));
  return paragraphs.join("\n");
}

describe("SentenceChunker", () => {
  const chunker = new SentenceChunker();

  it("has strategy 'sentence'", () => {
    expect(chunker.strategy).toBe("sentence");
  });

  it("splits the three-sentence scenario into three overlapping chunks", () => {
    const results = chunker.chunk(SCENARIO, { chunkSize: 20, overlap: 5 });

    expect(results.map((c) => c.content)).toEqual([
      "Sentence one.",
      "one. Sentence two.",
      "two. Sentence three.",
    ]);
    expect(results.map((c) => c.metadata)).toEqual([
      { startChar: 0, endChar: 13, overlap: 0 },
      { startChar: 9, endChar: 27, overlap: 4 },
      { startChar: 23, endChar: 43, overlap: 4 },
    ]);
    expect(results.map((c) => c.index)).toEqual([0, 1, 2]);
  });

  it("returns one chunk without overlap for input shorter than chunkSize", () => {
    const results = chunker.chunk("A single paragraph.", { chunkSize: 1000, overlap: 200 });

    expect(results).toEqual([
      {
        content: "A single paragraph.",
        index: 0,
        tokenCount: 5,
        metadata: { startChar: 0, endChar: 19, overlap: 0 },
      },
    ]);
  });

  it("handles empty content", () => {
    expect(chunker.chunk("", { chunkSize: 100, overlap: 10 })).toHaveLength(0);
    expect(chunker.chunk("   \n  ", { chunkSize: 100, overlap: 10 })).toHaveLength(0);
  });

  it("starts each chunk at the next sentence when overlap is zero", () => {
    const results = chunker.chunk("Alpha beta. Gamma delta. Epsilon zeta.", {
      chunkSize: 12,
      overlap: 0,
    });

    expect(results.map((c) => c.content)).toEqual(["Alpha beta.", "Gamma delta.", "Epsilon zeta."]);
    expect(results.every((c) => c.metadata.overlap === 0)).toBe(true);
  });

  it("emits an oversized sentence as its own chunk", () => {
    const text = `Short one. ${"x".repeat(30)}. Tail end.`;
    const results = chunker.chunk(text, { chunkSize: 20, overlap: 5 });

    expect(results.map((c) => c.content)).toEqual([
      "Short one.",
      `${"x".repeat(30)}.`,
      "xxxx. Tail end.",
    ]);
  });

  it("hard-splits oversized sentences when asked to", () => {
    const text = `Short one. ${"x".repeat(30)}. Tail end.`;
    const results = chunker.chunk(text, {
      chunkSize: 20,
      overlap: 5,
      splitOversizedSentences: true,
    });

    expect(results.map((c) => [c.metadata.startChar, c.metadata.endChar])).toEqual([
      [0, 10],
      [11, 31],
      [26, 42],
      [37, 52],
    ]);
    results.forEach((c) => expect(c.content.length).toBeLessThanOrEqual(20));
  });

  it("prefers sentence starts for the overlap re-entry", () => {
    const text = "Aa. Bb. Cc. Dd. Ee.";
    const results = chunker.chunk(text, { chunkSize: 11, overlap: 4 });

    expect(results.map((c) => c.content)).toEqual(["Aa. Bb. Cc.", "Cc. Dd. Ee."]);
    expect(results[1]!.metadata.overlap).toBe(3);
  });

  it("reports progress after every closed chunk", () => {
    const onProgress = vi.fn();
    chunker.chunk(SCENARIO, { chunkSize: 20, overlap: 5, onProgress });

    expect(onProgress.mock.calls.map((call) => call[0])).toEqual([13 / 43, 27 / 43, 1]);
  });

  it("stops when the signal is aborted mid-scan", () => {
    const controller = new AbortController();
    const options: ChunkOptions = {
      chunkSize: 20,
      overlap: 5,
      signal: controller.signal,
      onProgress: () => controller.abort(new Error("cancelled by host")),
    };

    expect(() => chunker.chunk(SCENARIO, options)).toThrow("cancelled by host");
  });

  it("refuses to start with an already-aborted signal", () => {
    const controller = new AbortController();
    controller.abort(new Error("too late"));

    expect(() =>
      chunker.chunk(SCENARIO, { chunkSize: 20, overlap: 5, signal: controller.signal }),
    ).toThrow("too late");
  });

  describe("on a longer document", () => {
    const text = buildDocument(60);
    const options = { chunkSize: 300, overlap: 80 };
    const results = chunkText(text, options);

    it("produces several chunks", () => {
      expect(results.length).toBeGreaterThan(5);
    });

    it("keeps every chunk within chunkSize", () => {
      results.forEach((c) => expect(c.content.length).toBeLessThanOrEqual(options.chunkSize));
    });

    it("keeps offsets consistent with the content", () => {
      results.forEach((c) => {
        expect(text.slice(c.metadata.startChar, c.metadata.endChar)).toBe(c.content);
      });
    });

    it("overlaps adjacent chunks by at most the configured overlap", () => {
      for (let i = 1; i < results.length; i++) {
        const prev = results[i - 1]!;
        const cur = results[i]!;
        expect(cur.metadata.startChar).toBeGreaterThan(prev.metadata.startChar);
        expect(cur.metadata.endChar).toBeGreaterThan(prev.metadata.endChar);
        expect(cur.metadata.overlap).toBe(Math.max(0, prev.metadata.endChar - cur.metadata.startChar));
        expect(cur.metadata.overlap).toBeLessThanOrEqual(options.overlap);
        expect(cur.metadata.overlap).toBeGreaterThan(0);
      }
    });

    it("contains every sentence whole, in reading order", () => {
      let lastChunk = 0;
      for (const sentence of findSentences(text)) {
        const home = results.findIndex(
          (c) => c.metadata.startChar <= sentence.start && sentence.end <= c.metadata.endChar,
        );
        expect(home).toBeGreaterThanOrEqual(lastChunk);
        lastChunk = home;
      }
    });

    it("fills every chunk but the last to within one sentence of chunkSize", () => {
      const longest = Math.max(...findSentences(text).map((s) => s.end - s.start));
      results.slice(0, -1).forEach((c) => {
        expect(c.content.length).toBeGreaterThanOrEqual(options.chunkSize - longest - 1);
      });
    });

    it("is deterministic", () => {
      expect(chunkText(text, options)).toEqual(results);
    });
  });
});
