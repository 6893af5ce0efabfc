import { z } from "zod";
import type { EmbeddingInputType } from "@lexrag/types";
import { ExternalServiceError, withRetry } from "@lexrag/errors";
import type { RetryOptions } from "@lexrag/errors";
import type { Logger } from "@lexrag/logger";
import { BaseEmbeddingProvider } from "./base-provider.js";

const DEFAULT_MODEL = "sentence-transformers/all-MiniLM-L6-v2";

export interface HttpProviderConfig {
  baseUrl: string;
  model?: string;
  dimensions?: number;
  retry?: Pick<RetryOptions, "maxRetries" | "baseDelayMs" | "maxDelayMs">;
}

const embedResponseSchema = z.object({
  embeddings: z.array(z.array(z.number())),
});

/**
 * Self-hosted sentence-transformers model served over HTTP.
 *
 * `POST {baseUrl}/embed` with `{texts, model, input_type}` answers
 * `{embeddings: number[][]}`; `GET {baseUrl}/health` answers 2xx when ready.
 */
export class HttpEmbeddingProvider extends BaseEmbeddingProvider {
  readonly name = "http";
  readonly model: string;
  private baseUrl: string;
  private logger?: Logger;
  private retry: Pick<RetryOptions, "maxRetries" | "baseDelayMs" | "maxDelayMs">;

  constructor(config: HttpProviderConfig, logger?: Logger) {
    super(config.dimensions);
    this.baseUrl = config.baseUrl.replace(/\/$/, "");
    this.model = config.model ?? DEFAULT_MODEL;
    this.logger = logger;
    this.retry = config.retry ?? {};
  }

  protected async embedBatch(texts: string[], inputType: EmbeddingInputType): Promise<number[][]> {
    return withRetry(() => this.post(texts, inputType), {
      ...this.retry,
      operation: "http.embed",
      logger: this.logger,
    });
  }

  private async post(texts: string[], inputType: EmbeddingInputType): Promise<number[][]> {
    const response = await fetch(`${this.baseUrl}/embed`, {
      method: "POST",
      headers: { "Content-Type": "application/json" },
      body: JSON.stringify({ texts, model: this.model, input_type: inputType }),
    });

    if (!response.ok) {
      throw new ExternalServiceError(
        `Embedding server failed: ${String(response.status)} ${response.statusText}`,
        this.name,
        { details: { status: response.status } },
      );
    }

    const parsed = embedResponseSchema.safeParse(await response.json());
    if (!parsed.success) {
      throw new ExternalServiceError("Embedding server returned a malformed body", this.name, {
        cause: parsed.error,
      });
    }

    return parsed.data.embeddings;
  }

  async healthCheck(): Promise<boolean> {
    try {
      const response = await fetch(`${this.baseUrl}/health`);
      return response.ok;
    } catch {
      return false;
    }
  }
}
