import type { EmbeddingProviderType } from "@lexrag/types";
import type { Logger } from "@lexrag/logger";
import type { IEmbeddingProvider } from "./embedding-provider.interface.js";
import { CohereEmbeddingProvider } from "./cohere-provider.js";
import type { CohereProviderConfig } from "./cohere-provider.js";
import { HttpEmbeddingProvider } from "./http-provider.js";
import type { HttpProviderConfig } from "./http-provider.js";
import { CachingEmbeddingProvider } from "./query-cache.js";

export interface EmbeddingFactoryConfig {
  provider: EmbeddingProviderType;
  cohere?: CohereProviderConfig;
  http?: HttpProviderConfig;
  /** Query embeddings kept in memory; 0 disables the cache. */
  queryCacheSize?: number;
  logger?: Logger;
}

function createBaseProvider(config: EmbeddingFactoryConfig): IEmbeddingProvider {
  switch (config.provider) {
    case "cohere":
      if (!config.cohere) {
        throw new Error("Cohere config is required when provider is 'cohere'");
      }
      return new CohereEmbeddingProvider(config.cohere, config.logger);
    case "http":
      if (!config.http) {
        throw new Error("HTTP config is required when provider is 'http'");
      }
      return new HttpEmbeddingProvider(config.http, config.logger);
    default:
      throw new Error(`Unknown embedding provider: ${String(config.provider)}`);
  }
}

export function createEmbeddingProvider(config: EmbeddingFactoryConfig): IEmbeddingProvider {
  const provider = createBaseProvider(config);
  const cacheSize = config.queryCacheSize ?? 0;
  return cacheSize > 0 ? new CachingEmbeddingProvider(provider, cacheSize) : provider;
}
