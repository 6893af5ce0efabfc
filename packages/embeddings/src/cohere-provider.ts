import { CohereClient } from "cohere-ai";
import type { EmbeddingInputType } from "@lexrag/types";
import { ExternalServiceError, withRetry } from "@lexrag/errors";
import type { RetryOptions } from "@lexrag/errors";
import type { Logger } from "@lexrag/logger";
import { BaseEmbeddingProvider } from "./base-provider.js";

const DEFAULT_MODEL = "embed-v4.0";
const BATCH_SIZE = 96; // Cohere limit

const INPUT_TYPES = {
  document: "search_document",
  query: "search_query",
} as const;

export interface CohereProviderConfig {
  apiKey: string;
  model?: string;
  dimensions?: number;
  retry?: Pick<RetryOptions, "maxRetries" | "baseDelayMs" | "maxDelayMs">;
}

export class CohereEmbeddingProvider extends BaseEmbeddingProvider {
  readonly name = "cohere";
  private client: CohereClient;
  private model: string;
  private logger?: Logger;
  private retry: Pick<RetryOptions, "maxRetries" | "baseDelayMs" | "maxDelayMs">;

  constructor(config: CohereProviderConfig, logger?: Logger) {
    super(config.dimensions);
    this.client = new CohereClient({ token: config.apiKey });
    this.model = config.model ?? DEFAULT_MODEL;
    this.logger = logger;
    this.retry = config.retry ?? {};
  }

  protected async embedBatch(texts: string[], inputType: EmbeddingInputType): Promise<number[][]> {
    const allEmbeddings: number[][] = [];

    for (let i = 0; i < texts.length; i += BATCH_SIZE) {
      const batch = texts.slice(i, i + BATCH_SIZE);

      const response = await withRetry(
        () =>
          this.client.v2.embed({
            texts: batch,
            model: this.model,
            inputType: INPUT_TYPES[inputType],
            embeddingTypes: ["float"],
          }),
        { ...this.retry, operation: "cohere.embed", logger: this.logger },
      );

      const floats = response.embeddings.float;
      if (!floats) {
        throw new ExternalServiceError("Cohere response carried no float embeddings", this.name);
      }
      allEmbeddings.push(...floats);
    }

    return allEmbeddings;
  }

  async healthCheck(): Promise<boolean> {
    try {
      await this.encode(["health check"], { inputType: "query" });
      return true;
    } catch {
      return false;
    }
  }
}
