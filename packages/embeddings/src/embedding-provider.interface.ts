import type { EmbeddingInputType } from "@lexrag/types";

export interface EncodeOptions {
  /** Some models embed queries and documents differently. Default: "document" */
  inputType?: EmbeddingInputType;
}

export interface IEmbeddingProvider {
  readonly name: string;
  /** Vector length; `null` until the first successful encode discovers it. */
  readonly dimensions: number | null;

  /** One row per input text, in input order. */
  encode(texts: string[], options?: EncodeOptions): Promise<number[][]>;
  healthCheck(): Promise<boolean>;
}
