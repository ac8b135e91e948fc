import type { EmbeddingResult } from "@quarry/types";

export interface EmbedOptions {
  signal?: AbortSignal;
}

export interface IEmbeddingProvider {
  readonly name: string;
  /** Nominal output size. The vector index checks what the provider actually returns. */
  readonly dimensions: number;

  /** Embed a search query. */
  embed(text: string, options?: EmbedOptions): Promise<EmbeddingResult>;
  /** Embed passages for indexing, one vector per input text, in order. */
  batchEmbed(texts: string[], options?: EmbedOptions): Promise<EmbeddingResult>;
}
