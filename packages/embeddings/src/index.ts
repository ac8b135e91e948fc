export type { IEmbeddingProvider, EmbedOptions } from "./embedding-provider.interface.js";
export { CohereEmbeddingProvider } from "./cohere-provider.js";
export type { CohereProviderConfig } from "./cohere-provider.js";
export { HttpEmbeddingProvider } from "./http-provider.js";
export type { HttpProviderConfig } from "./http-provider.js";
export { createEmbeddingProvider } from "./factory.js";
export type { EmbeddingFactoryConfig, EmbeddingProviderType } from "./factory.js";
