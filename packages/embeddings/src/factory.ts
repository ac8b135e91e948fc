import { InvalidConfigurationError } from "@quarry/errors";
import type { IEmbeddingProvider } from "./embedding-provider.interface.js";
import { CohereEmbeddingProvider } from "./cohere-provider.js";
import type { CohereProviderConfig } from "./cohere-provider.js";
import { HttpEmbeddingProvider } from "./http-provider.js";
import type { HttpProviderConfig } from "./http-provider.js";

export type EmbeddingProviderType = "cohere" | "http";

export interface EmbeddingFactoryConfig {
  provider: EmbeddingProviderType;
  cohere?: CohereProviderConfig;
  http?: HttpProviderConfig;
}

export function createEmbeddingProvider(config: EmbeddingFactoryConfig): IEmbeddingProvider {
  switch (config.provider) {
    case "cohere":
      if (!config.cohere?.apiKey) {
        throw new InvalidConfigurationError("Cohere config is required when provider is 'cohere'", {
          "embeddings.cohere.apiKey": "Required",
        });
      }
      return new CohereEmbeddingProvider(config.cohere);
    case "http":
      if (!config.http?.baseUrl) {
        throw new InvalidConfigurationError("HTTP config is required when provider is 'http'", {
          "embeddings.http.baseUrl": "Required",
        });
      }
      return new HttpEmbeddingProvider(config.http);
    default:
      throw new InvalidConfigurationError(
        `Unknown embedding provider: ${String(config.provider)}`,
        { "embeddings.provider": "Unknown provider" },
      );
  }
}
