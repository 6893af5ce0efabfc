import type {
  AppConfig,
  ContextFormat,
  HealthStatus,
  IngestionSummary,
  RagResponse,
  RagSource,
  RetrievedChunk,
} from "@lexrag/types";
import type { IChunker } from "@lexrag/chunker";
import type { IEmbeddingProvider } from "@lexrag/embeddings";
import { buildPrompt, type IGenerator } from "@lexrag/generator";
import type { IndexStore } from "@lexrag/vector-index";
import {
  ConflictError,
  DimensionMismatchError,
  GenerationError,
  IndexOutOfRangeError,
  IndexUnavailableError,
  ReindexError,
  RetrievalError,
  createCircuitBreaker,
  errorMessage,
} from "@lexrag/errors";
import type { CircuitBreakerOptions } from "@lexrag/errors";
import { createChildLogger, createSilentLogger, type Logger } from "@lexrag/logger";
import { IndexHolder, type IndexSnapshot } from "./index-holder.js";
import { ingest, type IngestionInput } from "./ingestion-pipeline.js";
import { QueryRun } from "./query-state.js";
import { validateRagRequest, type RequestLimits } from "./request-validator.js";
import { retrieve } from "./retriever.js";

export const NO_CONTEXT_ANSWER = "No relevant context found.";

export interface QueryServiceConfig {
  ingestion: IngestionInput;
  limits: RequestLimits;
  /** Characters of chunk text kept in each source preview. */
  previewLength: number;
  maxDistance?: number;
  contextFormat: ContextFormat;
  generationTimeoutMs: number;
  /** Extra breaker settings; `timeout` comes from `generationTimeoutMs`. */
  breaker?: Omit<CircuitBreakerOptions, "timeout">;
}

export interface QueryServiceDependencies {
  embeddingProvider: IEmbeddingProvider;
  generator: IGenerator;
  indexStore: IndexStore;
  chunker: IChunker;
  logger?: Logger;
}

export interface AnswerContext {
  requestId?: string;
}

export function queryServiceConfig(config: AppConfig): QueryServiceConfig {
  return {
    ingestion: {
      dataPath: config.paths.dataPath,
      chunking: { size: config.chunking.size, overlap: config.chunking.overlap },
      minContentLength: config.chunking.minContentLength,
      embedBatchSize: config.chunking.embedBatchSize,
    },
    limits: {
      minQueryLength: config.query.minQueryLength,
      topKDefault: config.query.topKDefault,
      topKMax: config.query.topKMax,
    },
    previewLength: config.query.previewLength,
    maxDistance: config.query.maxDistance,
    contextFormat: config.generation.contextFormat,
    generationTimeoutMs: config.generation.timeoutMs,
  };
}

export function preview(text: string, length: number): string {
  return text.length > length ? `${text.slice(0, length)}…` : text;
}

/**
 * Serves grounded answers from the active index snapshot and owns the
 * lifecycle of that snapshot (initial load, rebuild and swap).
 */
export class QueryService {
  private readonly holder = new IndexHolder();
  private readonly logger: Logger;
  private readonly generation: ReturnType<typeof createCircuitBreaker<[string], string>>;
  private reindexing = false;
  private lastError: string | null = null;
  private embedderReachable: boolean | null = null;

  constructor(
    private readonly deps: QueryServiceDependencies,
    private readonly config: QueryServiceConfig,
  ) {
    this.logger = deps.logger ?? createSilentLogger();
    this.generation = createCircuitBreaker(
      "generation",
      (prompt: string) => deps.generator.generate(prompt),
      { ...config.breaker, timeout: config.generationTimeoutMs },
      this.logger,
    );
  }

  get snapshot(): IndexSnapshot | null {
    return this.holder.current;
  }

  get isReindexing(): boolean {
    return this.reindexing;
  }

  /**
   * Query lifecycle: validating -> retrieving -> generating -> responding.
   * Any failure moves the run to `failed` and rethrows.
   */
  async answer(body: unknown, context: AnswerContext = {}): Promise<RagResponse> {
    const log = context.requestId
      ? createChildLogger(this.logger, { requestId: context.requestId })
      : this.logger;
    const run = new QueryRun(log);

    try {
      run.transition("validating");
      const request = validateRagRequest(body, this.config.limits);

      // Captured once: a concurrent swap must not change the pair mid-query.
      const snapshot = this.holder.current;
      if (!snapshot) {
        throw new IndexUnavailableError("No index is loaded; run ingestion or reindex first");
      }

      run.transition("retrieving");
      const hits = await this.retrieveFrom(snapshot, request.query, request.topK);

      if (hits.length === 0) {
        run.transition("responding");
        log.info({ generation: snapshot.generation }, "No relevant context for query");
        return { answer: NO_CONTEXT_ANSWER, sources: [] };
      }

      run.transition("generating");
      const prompt = buildPrompt({
        query: request.query,
        chunks: hits.map((hit) => hit.text),
        formatJson: request.formatJson,
        contextFormat: this.config.contextFormat,
      });
      const answer = await this.generate(prompt);

      run.transition("responding");
      log.info(
        { generation: snapshot.generation, hits: hits.length, topK: request.topK },
        "Answered query",
      );
      return { answer, sources: hits.map((hit) => this.toSource(hit)) };
    } catch (err) {
      run.fail();
      log.debug({ phases: run.history, err }, "Query failed");
      throw err;
    }
  }

  /** Load the published pair from the store and make it active. */
  async load(): Promise<IndexSnapshot> {
    try {
      const pair = await this.deps.indexStore.load();
      const snapshot: IndexSnapshot = {
        index: pair.index,
        chunks: pair.chunks,
        generation: pair.generation,
        loadedAt: new Date(),
      };
      this.holder.swap(snapshot);
      this.lastError = null;
      this.logger.info(
        { generation: snapshot.generation, rows: snapshot.index.rowCount, dimensions: snapshot.index.dimensions },
        "Index loaded",
      );
      return snapshot;
    } catch (err) {
      this.lastError = errorMessage(err);
      throw err;
    }
  }

  /**
   * Rebuild from the corpus and swap the result in. The active snapshot keeps
   * serving queries throughout and is left untouched if the rebuild fails.
   */
  async reindex(): Promise<IngestionSummary> {
    if (this.reindexing) {
      throw new ConflictError("A reindex is already in progress");
    }
    this.reindexing = true;

    try {
      const result = await ingest(this.config.ingestion, {
        chunker: this.deps.chunker,
        embeddingProvider: this.deps.embeddingProvider,
        indexStore: this.deps.indexStore,
        logger: this.logger,
      });

      const previous = this.holder.swap(result.snapshot);
      this.lastError = null;
      this.logger.info(
        { generation: result.generation, previous: previous?.generation ?? null },
        "Swapped in rebuilt index",
      );

      return {
        generation: result.generation,
        recordCount: result.recordCount,
        droppedCount: result.droppedCount,
        chunkCount: result.chunkCount,
        dimensions: result.dimensions,
        durationMs: result.durationMs,
      };
    } catch (err) {
      this.lastError = errorMessage(err);
      this.logger.error({ err }, "Reindex failed; keeping the active index");
      throw new ReindexError(`Reindex failed: ${errorMessage(err)}`, { cause: err });
    } finally {
      this.reindexing = false;
    }
  }

  /**
   * Touch the embedder so the first query does not pay its start-up cost.
   * An unreachable embedder is logged and reported by `health()`.
   */
  async checkEmbedder(): Promise<boolean> {
    let reachable: boolean;
    try {
      reachable = await this.deps.embeddingProvider.healthCheck();
    } catch (err) {
      this.logger.warn({ err }, "Embedder health check failed");
      reachable = false;
    }

    if (!reachable) {
      this.logger.warn({ provider: this.deps.embeddingProvider.name }, "Embedder is not reachable");
    }
    this.embedderReachable = reachable;
    return reachable;
  }

  health(): HealthStatus {
    const snapshot = this.holder.current;
    const files = this.deps.indexStore.describe();
    return {
      ok: snapshot !== null,
      indexLoaded: snapshot !== null,
      chunksLoaded: snapshot !== null,
      chunksCount: snapshot?.chunks.length ?? 0,
      indexRows: snapshot?.index.rowCount ?? 0,
      dimensions: snapshot?.index.dimensions ?? null,
      generation: snapshot?.generation ?? null,
      loadedAt: snapshot?.loadedAt.toISOString() ?? null,
      indexDir: files.dir,
      manifestPath: files.manifestPath,
      indexPath: files.indexPath,
      chunksPath: files.chunksPath,
      embedderReachable: this.embedderReachable,
      reindexing: this.reindexing,
      lastError: this.lastError,
    };
  }

  /** Stop the generation breaker's timers. */
  close(): void {
    this.generation.shutdown();
  }

  private async retrieveFrom(snapshot: IndexSnapshot, query: string, topK: number): Promise<RetrievedChunk[]> {
    try {
      return await retrieve(
        query,
        snapshot,
        { embeddingProvider: this.deps.embeddingProvider, maxDistance: this.config.maxDistance },
        topK,
      );
    } catch (err) {
      // Consistency faults surface as they are.
      if (err instanceof DimensionMismatchError || err instanceof IndexOutOfRangeError) {
        throw err;
      }
      throw new RetrievalError(`Retrieval failed: ${errorMessage(err)}`, { cause: err });
    }
  }

  private async generate(prompt: string): Promise<string> {
    try {
      return await this.generation.fire(prompt);
    } catch (err) {
      throw new GenerationError(`Generation failed: ${errorMessage(err)}`, { cause: err });
    }
  }

  private toSource(hit: RetrievedChunk): RagSource {
    return {
      rank: hit.rank,
      score: hit.score,
      distance: hit.distance,
      preview: preview(hit.text, this.config.previewLength),
    };
  }
}
