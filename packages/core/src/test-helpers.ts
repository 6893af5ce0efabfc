import type { EmbeddingInputType } from "@lexrag/types";
import type { EncodeOptions, IEmbeddingProvider } from "@lexrag/embeddings";
import type { IGenerator } from "@lexrag/generator";

/**
 * Bag-of-words embedder over a fixed vocabulary: component `i` counts the
 * occurrences of `vocabulary[i]` in the lower-cased text.
 */
export class KeywordEmbedder implements IEmbeddingProvider {
  readonly name = "keyword";
  readonly calls: Array<{ texts: string[]; inputType: EmbeddingInputType }> = [];
  failWith: Error | null = null;
  reachable = true;

  constructor(private readonly vocabulary: readonly string[]) {}

  get dimensions(): number {
    return this.vocabulary.length;
  }

  async encode(texts: string[], options?: EncodeOptions): Promise<number[][]> {
    this.calls.push({ texts, inputType: options?.inputType ?? "document" });
    if (this.failWith) throw this.failWith;

    return texts.map((text) => {
      const tokens = text.toLowerCase().split(/\s+/);
      return this.vocabulary.map((word) => tokens.filter((token) => token === word).length);
    });
  }

  async healthCheck(): Promise<boolean> {
    return this.reachable;
  }
}

/** Returns the vector registered for each exact text. */
export class StubEmbedder implements IEmbeddingProvider {
  readonly name = "stub";
  readonly dimensions = null;
  readonly calls: Array<{ texts: string[]; inputType: EmbeddingInputType }> = [];

  constructor(private readonly vectors: Record<string, number[]>) {}

  async encode(texts: string[], options?: EncodeOptions): Promise<number[][]> {
    this.calls.push({ texts, inputType: options?.inputType ?? "document" });
    return texts.map((text) => {
      const vector = this.vectors[text];
      if (!vector) throw new Error(`No stub vector for "${text}"`);
      return vector;
    });
  }

  async healthCheck(): Promise<boolean> {
    return true;
  }
}

export class FakeGenerator implements IGenerator {
  readonly name = "fake";
  readonly prompts: string[] = [];

  constructor(private readonly reply: (prompt: string) => Promise<string> = async () => "generated answer") {}

  async generate(prompt: string): Promise<string> {
    this.prompts.push(prompt);
    return this.reply(prompt);
  }
}

/** A promise plus the function that settles it, for holding calls open. */
export function deferred<T>(): { promise: Promise<T>; resolve: (value: T) => void } {
  let resolve: (value: T) => void = () => undefined;
  const promise = new Promise<T>((res) => {
    resolve = res;
  });
  return { promise, resolve };
}
