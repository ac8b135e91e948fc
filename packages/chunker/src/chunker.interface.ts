import type { ChunkResult, ChunkingConfig } from "@quarry/types";

export interface ChunkOptions extends ChunkingConfig {
  /** Called after each closed chunk with the fraction of text consumed. */
  onProgress?: (fraction: number) => void;
  /** Aborting stops the scan; the signal's reason is thrown. */
  signal?: AbortSignal;
}

export interface IChunker {
  readonly strategy: string;
  chunk(content: string, options: ChunkOptions): ChunkResult[];
}
