import { afterEach, describe, it, expect, vi } from "vitest";
import type { EmbeddingInputType } from "@lexrag/types";
import { DimensionMismatchError, ExternalServiceError } from "@lexrag/errors";
import { BaseEmbeddingProvider } from "./base-provider.js";
import { HttpEmbeddingProvider } from "./http-provider.js";
import { CachingEmbeddingProvider } from "./query-cache.js";
import { createEmbeddingProvider } from "./factory.js";

class ScriptedProvider extends BaseEmbeddingProvider {
  readonly name = "scripted";
  readonly calls: Array<{ texts: string[]; inputType: EmbeddingInputType }> = [];

  constructor(
    private readonly respond: (texts: string[]) => number[][],
    dimensions?: number,
  ) {
    super(dimensions);
  }

  protected async embedBatch(texts: string[], inputType: EmbeddingInputType): Promise<number[][]> {
    this.calls.push({ texts, inputType });
    return this.respond(texts);
  }

  async healthCheck(): Promise<boolean> {
    return true;
  }
}

function constant(dim: number): (texts: string[]) => number[][] {
  return (texts) => texts.map((_, i) => Array.from({ length: dim }, () => i + 1));
}

describe("BaseEmbeddingProvider", () => {
  it("discovers dimensions from the first encode", async () => {
    const provider = new ScriptedProvider(constant(3));
    expect(provider.dimensions).toBeNull();

    const vectors = await provider.encode(["a", "b"]);

    expect(vectors).toEqual([
      [1, 1, 1],
      [2, 2, 2],
    ]);
    expect(provider.dimensions).toBe(3);
  });

  it("defaults inputType to document", async () => {
    const provider = new ScriptedProvider(constant(2));
    await provider.encode(["a"]);
    await provider.encode(["q"], { inputType: "query" });

    expect(provider.calls.map((c) => c.inputType)).toEqual(["document", "query"]);
  });

  it("returns an empty matrix without calling the model", async () => {
    const provider = new ScriptedProvider(constant(2));

    expect(await provider.encode([])).toEqual([]);
    expect(provider.calls).toHaveLength(0);
  });

  it("rejects a later call whose dimension differs", async () => {
    let dim = 384;
    const provider = new ScriptedProvider((texts) => constant(dim)(texts));
    await provider.encode(["first"]);

    dim = 256;
    await expect(provider.encode(["second"])).rejects.toBeInstanceOf(DimensionMismatchError);
  });

  it("rejects rows of inconsistent length within one call", async () => {
    const provider = new ScriptedProvider(() => [
      [1, 2],
      [1, 2, 3],
    ]);

    await expect(provider.encode(["a", "b"])).rejects.toThrow(
      "Dimension mismatch: expected 2, got 3",
    );
  });

  it("enforces dimensions fixed up front", async () => {
    const provider = new ScriptedProvider(constant(4), 8);
    await expect(provider.encode(["a"])).rejects.toBeInstanceOf(DimensionMismatchError);
  });

  it("rejects a row count that differs from the input count", async () => {
    const provider = new ScriptedProvider(() => [[1, 2]]);
    await expect(provider.encode(["a", "b"])).rejects.toThrow(
      "scripted returned 1 embeddings for 2 texts",
    );
  });

  it("rejects non-finite values", async () => {
    const provider = new ScriptedProvider(() => [[1, Number.NaN]]);
    await expect(provider.encode(["a"])).rejects.toBeInstanceOf(ExternalServiceError);
  });
});

describe("HttpEmbeddingProvider", () => {
  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it("posts texts to /embed and returns the embeddings", async () => {
    const fetchMock = vi.fn().mockResolvedValue(
      new Response(JSON.stringify({ embeddings: [[0.5, 0.25]] }), { status: 200 }),
    );
    vi.stubGlobal("fetch", fetchMock);

    const provider = new HttpEmbeddingProvider({ baseUrl: "http://embedder.local/" });
    const vectors = await provider.encode(["hello"], { inputType: "query" });

    expect(vectors).toEqual([[0.5, 0.25]]);
    expect(provider.dimensions).toBe(2);
    expect(fetchMock).toHaveBeenCalledWith("http://embedder.local/embed", {
      method: "POST",
      headers: { "Content-Type": "application/json" },
      body: JSON.stringify({
        texts: ["hello"],
        model: "sentence-transformers/all-MiniLM-L6-v2",
        input_type: "query",
      }),
    });
  });

  it("rejects a malformed body", async () => {
    vi.stubGlobal(
      "fetch",
      vi.fn().mockImplementation(
        async () => new Response(JSON.stringify({ vectors: [] }), { status: 200 }),
      ),
    );

    const provider = new HttpEmbeddingProvider({
      baseUrl: "http://embedder.local",
      retry: { maxRetries: 0 },
    });
    await expect(provider.encode(["hello"])).rejects.toThrow(
      "Embedding server returned a malformed body",
    );
  });

  it("retries a failing server and surfaces the final error", async () => {
    const fetchMock = vi
      .fn()
      .mockImplementation(async () => new Response("down", { status: 503, statusText: "Unavailable" }));
    vi.stubGlobal("fetch", fetchMock);

    const provider = new HttpEmbeddingProvider({
      baseUrl: "http://embedder.local",
      retry: { maxRetries: 2, baseDelayMs: 1, maxDelayMs: 1 },
    });

    await expect(provider.encode(["hello"])).rejects.toThrow(
      "Embedding server failed: 503 Unavailable",
    );
    expect(fetchMock).toHaveBeenCalledTimes(3);
  });

  it("reports health from /health", async () => {
    vi.stubGlobal("fetch", vi.fn().mockResolvedValue(new Response("ok", { status: 200 })));
    expect(await new HttpEmbeddingProvider({ baseUrl: "http://embedder.local" }).healthCheck()).toBe(
      true,
    );

    vi.stubGlobal("fetch", vi.fn().mockRejectedValue(new Error("ECONNREFUSED")));
    expect(await new HttpEmbeddingProvider({ baseUrl: "http://embedder.local" }).healthCheck()).toBe(
      false,
    );
  });
});

describe("CachingEmbeddingProvider", () => {
  it("serves repeated query embeddings from the cache", async () => {
    const inner = new ScriptedProvider(constant(2));
    const cached = new CachingEmbeddingProvider(inner, 10);

    const first = await cached.encode(["what is a lien?"], { inputType: "query" });
    const second = await cached.encode(["what is a lien?"], { inputType: "query" });

    expect(second).toEqual(first);
    expect(inner.calls).toHaveLength(1);
    expect(cached.size).toBe(1);
    expect(cached.dimensions).toBe(2);
  });

  it("does not cache document batches", async () => {
    const inner = new ScriptedProvider(constant(2));
    const cached = new CachingEmbeddingProvider(inner, 10);

    await cached.encode(["doc"]);
    await cached.encode(["doc"]);

    expect(inner.calls).toHaveLength(2);
    expect(cached.size).toBe(0);
  });

  it("evicts the least recently used query", async () => {
    const inner = new ScriptedProvider(constant(2));
    const cached = new CachingEmbeddingProvider(inner, 1);

    await cached.encode(["q1"], { inputType: "query" });
    await cached.encode(["q2"], { inputType: "query" });
    await cached.encode(["q1"], { inputType: "query" });

    expect(inner.calls).toHaveLength(3);
  });
});

describe("createEmbeddingProvider factory", () => {
  it("creates CohereEmbeddingProvider for type 'cohere'", () => {
    const provider = createEmbeddingProvider({
      provider: "cohere",
      cohere: { apiKey: "test-key" },
    });
    expect(provider.name).toBe("cohere");
    expect(provider.dimensions).toBeNull();
  });

  it("creates HttpEmbeddingProvider for type 'http'", () => {
    const provider = createEmbeddingProvider({
      provider: "http",
      http: { baseUrl: "http://localhost:9000", dimensions: 384 },
    });
    expect(provider).toBeInstanceOf(HttpEmbeddingProvider);
    expect(provider.dimensions).toBe(384);
  });

  it("wraps the provider in a query cache when a size is given", () => {
    const provider = createEmbeddingProvider({
      provider: "http",
      http: { baseUrl: "http://localhost:9000" },
      queryCacheSize: 16,
    });
    expect(provider).toBeInstanceOf(CachingEmbeddingProvider);
    expect(provider.name).toBe("http");
  });

  it("throws for missing cohere config", () => {
    expect(() => createEmbeddingProvider({ provider: "cohere" })).toThrow(
      "Cohere config is required",
    );
  });

  it("throws for missing http config", () => {
    expect(() => createEmbeddingProvider({ provider: "http" })).toThrow(
      "HTTP config is required",
    );
  });

  it("throws for unknown provider", () => {
    expect(() => createEmbeddingProvider({ provider: "unknown" as "cohere" })).toThrow(
      "Unknown embedding provider",
    );
  });
});
