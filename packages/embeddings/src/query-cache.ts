import { LRUCache } from "lru-cache";
import type { EncodeOptions, IEmbeddingProvider } from "./embedding-provider.interface.js";

/**
 * Memoizes single-text query embeddings; document batches pass straight
 * through to the wrapped provider.
 */
export class CachingEmbeddingProvider implements IEmbeddingProvider {
  private cache: LRUCache<string, number[]>;

  constructor(
    private readonly inner: IEmbeddingProvider,
    maxEntries: number,
  ) {
    this.cache = new LRUCache<string, number[]>({ max: maxEntries });
  }

  get name(): string {
    return this.inner.name;
  }

  get dimensions(): number | null {
    return this.inner.dimensions;
  }

  get size(): number {
    return this.cache.size;
  }

  async encode(texts: string[], options?: EncodeOptions): Promise<number[][]> {
    const [text] = texts;
    if (options?.inputType !== "query" || texts.length !== 1 || text === undefined) {
      return this.inner.encode(texts, options);
    }

    const cached = this.cache.get(text);
    if (cached) return [cached];

    const vectors = await this.inner.encode(texts, options);
    const [vector] = vectors;
    if (vector) this.cache.set(text, vector);
    return vectors;
  }

  healthCheck(): Promise<boolean> {
    return this.inner.healthCheck();
  }
}
