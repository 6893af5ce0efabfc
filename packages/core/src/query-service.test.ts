import { mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, it, expect } from "vitest";
import {
  ConflictError,
  DimensionMismatchError,
  GenerationError,
  IndexUnavailableError,
  ReindexError,
  RetrievalError,
  ValidationError,
} from "@lexrag/errors";
import { WordWindowChunker } from "@lexrag/chunker";
import type { IEmbeddingProvider } from "@lexrag/embeddings";
import { FlatL2Index, IndexStore } from "@lexrag/vector-index";
import { NO_CONTEXT_ANSWER, QueryService, type QueryServiceConfig } from "./query-service.js";
import { FakeGenerator, KeywordEmbedder, StubEmbedder, deferred } from "./test-helpers.js";

const VOCABULARY = ["alpha", "beta"];

describe("QueryService", () => {
  let dir: string;
  let store: IndexStore;
  let generator: FakeGenerator;
  const services: QueryService[] = [];

  function configFor(overrides: Partial<QueryServiceConfig> = {}): QueryServiceConfig {
    return {
      ingestion: {
        dataPath: join(dir, "corpus.json"),
        chunking: { size: 10, overlap: 0 },
        minContentLength: 1,
        embedBatchSize: 8,
      },
      limits: { minQueryLength: 2, topKDefault: 8, topKMax: 64 },
      previewLength: 240,
      contextFormat: "plain",
      generationTimeoutMs: 1_000,
      ...overrides,
    };
  }

  function createService(
    embeddingProvider: IEmbeddingProvider,
    overrides: Partial<QueryServiceConfig> = {},
  ): QueryService {
    const service = new QueryService(
      { embeddingProvider, generator, indexStore: store, chunker: new WordWindowChunker() },
      configFor(overrides),
    );
    services.push(service);
    return service;
  }

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), "lexrag-service-"));
    store = new IndexStore({ dir: join(dir, "index") });
    generator = new FakeGenerator();
    await store.publish(
      FlatL2Index.build([
        [1, 0],
        [0, 1],
      ]),
      ["alpha clause from the lease", "beta clause from the lease"],
    );
  });

  afterEach(async () => {
    for (const service of services.splice(0)) service.close();
    await rm(dir, { recursive: true, force: true });
  });

  describe("answer", () => {
    it("requires a loaded index", async () => {
      const service = createService(new KeywordEmbedder(VOCABULARY));
      await expect(service.answer({ query: "alpha" })).rejects.toThrow(IndexUnavailableError);
    });

    it("answers from the best matching chunks", async () => {
      const service = createService(new KeywordEmbedder(VOCABULARY));
      await service.load();

      const response = await service.answer({ query: "alpha", top_k: 1 });

      expect(response).toEqual({
        answer: "generated answer",
        sources: [{ rank: 1, score: 1, distance: 0, preview: "alpha clause from the lease" }],
      });
      expect(generator.prompts).toHaveLength(1);
      expect(generator.prompts[0]).toContain(
        "--- START OF CONTEXT ---\nalpha clause from the lease\n--- END OF CONTEXT ---",
      );
      expect(generator.prompts[0]).toContain('"alpha"');
      expect(generator.prompts[0]?.endsWith("'answer', 'source_clause_excerpt'")).toBe(true);
    });

    it("truncates previews", async () => {
      const service = createService(new KeywordEmbedder(VOCABULARY), { previewLength: 5 });
      await service.load();

      const response = await service.answer({ query: "beta", top_k: 1, format_json: false });

      expect(response.sources[0]?.preview).toBe("beta …");
      expect(generator.prompts[0]?.endsWith("Respond naturally.")).toBe(true);
    });

    it("returns the canned answer without calling the generator when nothing is close", async () => {
      const service = createService(new StubEmbedder({ "far away": [10, 10] }), { maxDistance: 0.5 });
      await service.load();

      const response = await service.answer({ query: "far away" });

      expect(response).toEqual({ answer: NO_CONTEXT_ANSWER, sources: [] });
      expect(generator.prompts).toHaveLength(0);
    });

    it("rejects an invalid request before retrieving", async () => {
      const embedder = new KeywordEmbedder(VOCABULARY);
      const service = createService(embedder);
      await service.load();

      await expect(service.answer({ query: "a" })).rejects.toThrow(ValidationError);
      expect(embedder.calls).toHaveLength(0);
    });

    it("wraps embedder failures as retrieval errors", async () => {
      const embedder = new KeywordEmbedder(VOCABULARY);
      const service = createService(embedder);
      await service.load();
      embedder.failWith = new Error("connection reset");

      await expect(service.answer({ query: "alpha" })).rejects.toThrow(RetrievalError);
    });

    it("surfaces a dimension mismatch unwrapped", async () => {
      const service = createService(new KeywordEmbedder(["alpha", "beta", "gamma"]));
      await service.load();

      await expect(service.answer({ query: "alpha" })).rejects.toThrow(DimensionMismatchError);
    });

    it("reports a generator failure as a generation error", async () => {
      generator = new FakeGenerator(async () => {
        throw new Error("model overloaded");
      });
      const service = createService(new KeywordEmbedder(VOCABULARY));
      await service.load();

      await expect(service.answer({ query: "alpha" })).rejects.toThrow(
        "Generation failed: model overloaded",
      );
    });

    it("times out a generator that never answers", async () => {
      generator = new FakeGenerator(() => new Promise<string>(() => undefined));
      const service = createService(new KeywordEmbedder(VOCABULARY), { generationTimeoutMs: 20 });
      await service.load();

      await expect(service.answer({ query: "alpha" })).rejects.toThrow(GenerationError);
    });

    it("finishes an in-flight query on the snapshot it started with", async () => {
      await writeFile(join(dir, "corpus.json"), JSON.stringify([{ content: "alpha rebuilt text" }]));
      const gate = deferred<string>();
      generator = new FakeGenerator(() => gate.promise);
      const service = createService(new KeywordEmbedder(VOCABULARY));
      await service.load();

      const pending = service.answer({ query: "alpha", top_k: 1 });
      await service.reindex();
      gate.resolve("late answer");

      const response = await pending;
      expect(response.sources[0]?.preview).toBe("alpha clause from the lease");
      expect(service.snapshot?.chunks).toEqual(["alpha rebuilt text"]);
    });
  });

  describe("load", () => {
    it("records the failure when nothing is published", async () => {
      store = new IndexStore({ dir: join(dir, "empty") });
      const service = createService(new KeywordEmbedder(VOCABULARY));

      await expect(service.load()).rejects.toThrow(IndexUnavailableError);
      expect(service.health().lastError).toBe(`No index published in ${join(dir, "empty")}`);
    });
  });

  describe("reindex", () => {
    it("rebuilds from the corpus and swaps the new pair in", async () => {
      await writeFile(
        join(dir, "corpus.json"),
        JSON.stringify([{ content: "alpha alpha new" }, { content: "beta new" }]),
      );
      const service = createService(new KeywordEmbedder(VOCABULARY));
      const before = await service.load();

      const summary = await service.reindex();

      expect(summary.chunkCount).toBe(2);
      expect(summary.recordCount).toBe(2);
      expect(summary.droppedCount).toBe(0);
      expect(summary.dimensions).toBe(2);
      expect(summary.generation).not.toBe(before.generation);

      const after = service.snapshot;
      expect(after?.generation).toBe(summary.generation);
      expect(after?.chunks).toEqual(["alpha alpha new", "beta new"]);
      expect(after?.index.rowCount).toBe(after?.chunks.length);

      const response = await service.answer({ query: "alpha", top_k: 1 });
      expect(response.sources).toEqual([
        { rank: 1, score: 0.5, distance: 1, preview: "alpha alpha new" },
      ]);
    });

    it("keeps the active pair when the rebuild fails", async () => {
      const service = createService(new KeywordEmbedder(VOCABULARY));
      const before = await service.load();

      await expect(service.reindex()).rejects.toThrow(ReindexError);

      expect(service.snapshot).toBe(before);
      expect(service.health().lastError).toMatch(/^Cannot read corpus file/);
      expect(service.isReindexing).toBe(false);
    });

    it("refuses a second reindex while one is running", async () => {
      await writeFile(join(dir, "corpus.json"), JSON.stringify([{ content: "alpha" }]));
      const service = createService(new KeywordEmbedder(VOCABULARY));

      const first = service.reindex();
      expect(service.isReindexing).toBe(true);
      await expect(service.reindex()).rejects.toThrow(ConflictError);

      await first;
      expect(service.isReindexing).toBe(false);
    });
  });

  describe("health", () => {
    it("reports an unloaded service", () => {
      const service = createService(new KeywordEmbedder(VOCABULARY));

      expect(service.health()).toEqual({
        ok: false,
        indexLoaded: false,
        chunksLoaded: false,
        chunksCount: 0,
        indexRows: 0,
        dimensions: null,
        generation: null,
        loadedAt: null,
        indexDir: join(dir, "index"),
        manifestPath: join(dir, "index", "manifest.json"),
        indexPath: null,
        chunksPath: null,
        embedderReachable: null,
        reindexing: false,
        lastError: null,
      });
    });

    it("describes the loaded snapshot", async () => {
      const service = createService(new KeywordEmbedder(VOCABULARY));
      const snapshot = await service.load();

      expect(service.health()).toMatchObject({
        ok: true,
        chunksCount: 2,
        indexRows: 2,
        dimensions: 2,
        generation: snapshot.generation,
        loadedAt: snapshot.loadedAt.toISOString(),
        indexPath: join(dir, "index", snapshot.generation, "index.bin"),
        chunksPath: join(dir, "index", snapshot.generation, "chunks.json"),
      });
    });

    it("records whether the embedder answered its check", async () => {
      const embedder = new KeywordEmbedder(VOCABULARY);
      const service = createService(embedder);

      await expect(service.checkEmbedder()).resolves.toBe(true);
      expect(service.health().embedderReachable).toBe(true);

      embedder.reachable = false;
      await expect(service.checkEmbedder()).resolves.toBe(false);
      expect(service.health().embedderReachable).toBe(false);
    });
  });
});
