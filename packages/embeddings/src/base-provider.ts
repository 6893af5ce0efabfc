import type { EmbeddingInputType } from "@lexrag/types";
import { DimensionMismatchError, ExternalServiceError } from "@lexrag/errors";
import type { EncodeOptions, IEmbeddingProvider } from "./embedding-provider.interface.js";

/**
 * Shared encode contract for providers: the vector length is learned from the
 * first response (or fixed up front) and every later row must match it.
 */
export abstract class BaseEmbeddingProvider implements IEmbeddingProvider {
  abstract readonly name: string;
  private fixedDimensions: number | null;

  protected constructor(dimensions?: number) {
    this.fixedDimensions = dimensions ?? null;
  }

  get dimensions(): number | null {
    return this.fixedDimensions;
  }

  async encode(texts: string[], options?: EncodeOptions): Promise<number[][]> {
    if (texts.length === 0) return [];

    const vectors = await this.embedBatch(texts, options?.inputType ?? "document");

    if (vectors.length !== texts.length) {
      throw new ExternalServiceError(
        `${this.name} returned ${String(vectors.length)} embeddings for ${String(texts.length)} texts`,
        this.name,
      );
    }

    for (const vector of vectors) {
      this.checkVector(vector);
    }

    return vectors;
  }

  abstract healthCheck(): Promise<boolean>;

  protected abstract embedBatch(
    texts: string[],
    inputType: EmbeddingInputType,
  ): Promise<number[][]>;

  private checkVector(vector: number[]): void {
    if (vector.length === 0 || !vector.every(Number.isFinite)) {
      throw new ExternalServiceError(`${this.name} returned an empty or non-finite embedding`, this.name);
    }

    if (this.fixedDimensions === null) {
      this.fixedDimensions = vector.length;
      return;
    }

    if (vector.length !== this.fixedDimensions) {
      throw new DimensionMismatchError(this.fixedDimensions, vector.length, {
        details: { provider: this.name },
      });
    }
  }
}
