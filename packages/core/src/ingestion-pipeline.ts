import type {
  ChunkingConfig,
  EmbeddingProgress,
  IndexManifest,
  IngestionSummary,
  RecordLoadResult,
} from "@lexrag/types";
import type { IChunker } from "@lexrag/chunker";
import type { IEmbeddingProvider } from "@lexrag/embeddings";
import { FlatL2Index, type IndexStore } from "@lexrag/vector-index";
import { ValidationError } from "@lexrag/errors";
import type { Logger } from "@lexrag/logger";
import type { IndexSnapshot } from "./index-holder.js";
import { extractChunks } from "./extract-chunks.js";
import { loadRecords } from "./record-loader.js";

type Hook<T> = (value: T) => void | Promise<void>;

export interface IngestionInput {
  dataPath: string;
  chunking: ChunkingConfig;
  minContentLength: number;
  /** Chunks sent to the embedder per request. */
  embedBatchSize: number;
}

export interface IngestionDependencies {
  chunker: IChunker;
  embeddingProvider: IEmbeddingProvider;
  indexStore: IndexStore;
  logger?: Logger;
  onRecordsLoaded?: Hook<RecordLoadResult>;
  onChunked?: Hook<readonly string[]>;
  onEmbedProgress?: Hook<EmbeddingProgress>;
  onPublished?: Hook<IndexManifest>;
}

export interface IngestionResult extends IngestionSummary {
  snapshot: IndexSnapshot;
}

/**
 * Embed `texts` in order, `batchSize` at a time, reporting after each batch.
 */
export async function embedInBatches(
  texts: readonly string[],
  provider: IEmbeddingProvider,
  batchSize: number,
  onProgress?: Hook<EmbeddingProgress>,
): Promise<number[][]> {
  if (!Number.isInteger(batchSize) || batchSize < 1) {
    throw new ValidationError(`Embedding batch size must be a positive integer, got ${String(batchSize)}`);
  }

  const vectors: number[][] = [];
  const batches = Math.ceil(texts.length / batchSize);

  for (let batch = 0; batch < batches; batch++) {
    const slice = texts.slice(batch * batchSize, (batch + 1) * batchSize);
    const rows = await provider.encode(slice, { inputType: "document" });
    vectors.push(...rows);

    if (onProgress) {
      await onProgress({ embedded: vectors.length, total: texts.length, batch: batch + 1, batches });
    }
  }

  return vectors;
}

/**
 * Ingestion pipeline: Load -> Chunk -> Embed -> Build -> Publish
 *
 * Each stage consumes the complete output of the previous one. Nothing
 * reaches disk until the index is built, and the pair becomes current only
 * when the store swaps its manifest, so a failed run leaves the previously
 * published pair in place.
 */
export async function ingest(
  input: IngestionInput,
  deps: IngestionDependencies,
): Promise<IngestionResult> {
  const startTime = Date.now();
  const log = deps.logger;

  // Phase 1: Load and filter
  const loaded = await loadRecords(input.dataPath, { minContentLength: input.minContentLength });
  log?.info(
    { total: loaded.total, kept: loaded.records.length, dropped: loaded.dropped },
    "Loaded corpus records",
  );
  if (deps.onRecordsLoaded) await deps.onRecordsLoaded(loaded);

  // Phase 2: Chunk
  const chunks = extractChunks(loaded.records, deps.chunker, input.chunking);
  log?.info({ chunks: chunks.length }, "Chunked records");
  if (deps.onChunked) await deps.onChunked(chunks);

  if (chunks.length === 0) {
    throw new ValidationError(`Corpus ${input.dataPath} produced no chunks; nothing to index`, {}, {
      details: { total: loaded.total, dropped: loaded.dropped },
    });
  }

  // Phase 3: Embed
  const vectors = await embedInBatches(chunks, deps.embeddingProvider, input.embedBatchSize, async (progress) => {
    log?.debug({ ...progress }, "Embedded batch");
    if (deps.onEmbedProgress) await deps.onEmbedProgress(progress);
  });

  // Phase 4: Build
  const index = FlatL2Index.build(vectors);

  // Phase 5: Publish
  const manifest = await deps.indexStore.publish(index, chunks);
  if (deps.onPublished) await deps.onPublished(manifest);

  const durationMs = Date.now() - startTime;
  log?.info(
    { generation: manifest.generation, chunks: chunks.length, dimensions: index.dimensions, durationMs },
    "Ingestion complete",
  );

  return {
    snapshot: { index, chunks, generation: manifest.generation, loadedAt: new Date() },
    generation: manifest.generation,
    recordCount: loaded.records.length,
    droppedCount: loaded.dropped,
    chunkCount: chunks.length,
    dimensions: index.dimensions,
    durationMs,
  };
}
