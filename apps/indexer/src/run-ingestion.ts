import type { IngestionSummary } from "@lexrag/types";
import { ingest, type IngestionDependencies, type IngestionInput } from "@lexrag/core";
import type { Logger } from "@lexrag/logger";

export type IndexerDependencies = Pick<IngestionDependencies, "chunker" | "embeddingProvider" | "indexStore">;

/**
 * One offline build: the corpus at `input.dataPath` becomes the published
 * index pair. Progress goes to the log.
 */
export async function runIngestion(
  input: IngestionInput,
  deps: IndexerDependencies,
  logger: Logger,
): Promise<IngestionSummary> {
  logger.info({ dataPath: input.dataPath, indexDir: deps.indexStore.dir }, "Starting index build");

  const result = await ingest(input, {
    ...deps,
    logger,
    onRecordsLoaded: (loaded) => {
      if (loaded.dropped > 0) {
        logger.info(
          { dropped: loaded.dropped, minContentLength: input.minContentLength },
          "Dropped records below the minimum content length",
        );
      }
    },
    onEmbedProgress: (progress) => {
      logger.info(
        {
          batch: progress.batch,
          batches: progress.batches,
          percent: Math.round((progress.embedded / progress.total) * 100),
        },
        "Embedding progress",
      );
    },
    onPublished: (manifest) => {
      logger.info({ generation: manifest.generation, manifest: deps.indexStore.manifestPath }, "Index published");
    },
  });

  return {
    generation: result.generation,
    recordCount: result.recordCount,
    droppedCount: result.droppedCount,
    chunkCount: result.chunkCount,
    dimensions: result.dimensions,
    durationMs: result.durationMs,
  };
}
