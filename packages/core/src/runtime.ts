import type { AppConfig } from "@lexrag/types";
import { WordWindowChunker } from "@lexrag/chunker";
import { createEmbeddingProvider, type IEmbeddingProvider } from "@lexrag/embeddings";
import { GeminiGenerator } from "@lexrag/generator";
import { IndexStore } from "@lexrag/vector-index";
import type { Logger } from "@lexrag/logger";
import type { IngestionDependencies } from "./ingestion-pipeline.js";
import { QueryService, queryServiceConfig } from "./query-service.js";

export function embeddingProviderFor(config: AppConfig, logger?: Logger): IEmbeddingProvider {
  const { embedding } = config;
  return createEmbeddingProvider({
    provider: embedding.provider,
    cohere: embedding.cohereApiKey ? { apiKey: embedding.cohereApiKey, model: embedding.cohereModel } : undefined,
    http: embedding.serverUrl ? { baseUrl: embedding.serverUrl, model: embedding.model } : undefined,
    queryCacheSize: embedding.queryCacheSize,
    logger,
  });
}

export function indexStoreFor(config: AppConfig, logger?: Logger): IndexStore {
  return new IndexStore({ dir: config.paths.indexDir, logger });
}

/** Collaborators for an offline ingestion run; no generator is needed. */
export function ingestionDependenciesFor(
  config: AppConfig,
  logger: Logger,
): Pick<IngestionDependencies, "chunker" | "embeddingProvider" | "indexStore" | "logger"> {
  return {
    chunker: new WordWindowChunker(),
    embeddingProvider: embeddingProviderFor(config, logger),
    indexStore: indexStoreFor(config, logger),
    logger,
  };
}

/** Fully wired query service; the index still has to be loaded. */
export function createQueryService(config: AppConfig, logger: Logger): QueryService {
  return new QueryService(
    {
      chunker: new WordWindowChunker(),
      embeddingProvider: embeddingProviderFor(config, logger),
      generator: new GeminiGenerator(
        { apiKey: config.generation.geminiApiKey, model: config.generation.model },
        logger,
      ),
      indexStore: indexStoreFor(config, logger),
      logger,
    },
    queryServiceConfig(config),
  );
}
