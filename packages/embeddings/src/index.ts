export type { IEmbeddingProvider, EncodeOptions } from "./embedding-provider.interface.js";
export { BaseEmbeddingProvider } from "./base-provider.js";
export { CohereEmbeddingProvider } from "./cohere-provider.js";
export type { CohereProviderConfig } from "./cohere-provider.js";
export { HttpEmbeddingProvider } from "./http-provider.js";
export type { HttpProviderConfig } from "./http-provider.js";
export { CachingEmbeddingProvider } from "./query-cache.js";
export { createEmbeddingProvider } from "./factory.js";
export type { EmbeddingFactoryConfig } from "./factory.js";
