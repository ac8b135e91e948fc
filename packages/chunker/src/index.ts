export type { IChunker, ChunkOptions } from "./chunker.interface.js";
export { SentenceChunker, chunkText } from "./sentence-chunker.js";
export { normalize, countWords } from "./normalizer.js";
export { findSentences, splitOversized } from "./sentence-boundaries.js";
export type { SentenceSpan } from "./sentence-boundaries.js";
