import { z } from "zod";
import { ExternalServiceError } from "@quarry/errors";
import type { EmbeddingResult } from "@quarry/types";
import type { EmbedOptions, IEmbeddingProvider } from "./embedding-provider.interface.js";

const DEFAULT_DIMENSIONS = 1024;
const SERVICE = "embedding-server";

export interface HttpProviderConfig {
  baseUrl: string;
  dimensions?: number;
}

const embedResponseSchema = z.object({
  embeddings: z.array(z.array(z.number())),
  model: z.string().optional(),
  tokens_used: z.number().int().nonnegative().default(0),
});

/**
 * Self-hosted embedding server reached over HTTP.
 * Contract: `POST {baseUrl}/embed` with `{ texts, dimensions }`, answered by
 * `{ embeddings, tokens_used }`; `GET {baseUrl}/health` for liveness.
 */
export class HttpEmbeddingProvider implements IEmbeddingProvider {
  readonly name = "http";
  readonly dimensions: number;
  private baseUrl: string;

  constructor(config: HttpProviderConfig) {
    this.baseUrl = config.baseUrl.replace(/\/$/, "");
    this.dimensions = config.dimensions ?? DEFAULT_DIMENSIONS;
  }

  async embed(text: string, options?: EmbedOptions): Promise<EmbeddingResult> {
    return this.batchEmbed([text], options);
  }

  async batchEmbed(texts: string[], options?: EmbedOptions): Promise<EmbeddingResult> {
    const response = await fetch(`${this.baseUrl}/embed`, {
      method: "POST",
      headers: { "Content-Type": "application/json" },
      body: JSON.stringify({ texts, dimensions: this.dimensions }),
      signal: options?.signal,
    });

    if (!response.ok) {
      throw new ExternalServiceError(
        `Embedding server returned ${String(response.status)} ${response.statusText}`,
        SERVICE,
        { details: { status: response.status } },
      );
    }

    const parsed = embedResponseSchema.safeParse(await response.json());
    if (!parsed.success) {
      throw new ExternalServiceError("Embedding server returned a malformed body", SERVICE, {
        details: { issues: parsed.error.issues.map((issue) => issue.message) },
      });
    }

    return {
      embeddings: parsed.data.embeddings,
      model: parsed.data.model ?? this.name,
      tokensUsed: parsed.data.tokens_used,
      dimensions: this.dimensions,
    };
  }
}
