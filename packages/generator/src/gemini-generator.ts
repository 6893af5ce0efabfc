import { GoogleGenerativeAI, type GenerativeModel } from "@google/generative-ai";
import { ExternalServiceError, errorMessage, withRetry } from "@lexrag/errors";
import type { RetryOptions } from "@lexrag/errors";
import type { Logger } from "@lexrag/logger";
import type { IGenerator } from "./generator.interface.js";

export const DEFAULT_GEMINI_MODEL = "gemini-2.0-flash-001";

export interface GeminiGeneratorConfig {
  apiKey: string;
  model?: string;
  retry?: Pick<RetryOptions, "maxRetries" | "baseDelayMs" | "maxDelayMs">;
}

export class GeminiGenerator implements IGenerator {
  readonly name = "gemini";
  readonly modelName: string;
  private model: GenerativeModel;
  private logger?: Logger;
  private retry: Pick<RetryOptions, "maxRetries" | "baseDelayMs" | "maxDelayMs">;

  constructor(config: GeminiGeneratorConfig, logger?: Logger) {
    if (!config.apiKey) {
      throw new Error("Gemini API key is required");
    }
    this.modelName = config.model ?? DEFAULT_GEMINI_MODEL;
    this.model = new GoogleGenerativeAI(config.apiKey).getGenerativeModel({ model: this.modelName });
    this.logger = logger;
    this.retry = config.retry ?? {};
  }

  async generate(prompt: string): Promise<string> {
    const result = await withRetry(
      async () => {
        try {
          return await this.model.generateContent(prompt);
        } catch (err) {
          throw new ExternalServiceError(
            `Gemini request failed: ${errorMessage(err)}`,
            this.name,
            { cause: err, details: { model: this.modelName } },
          );
        }
      },
      { ...this.retry, operation: "gemini.generateContent", logger: this.logger },
    );

    const text = result.response.text();
    if (!text.trim()) {
      throw new ExternalServiceError("Gemini returned an empty response", this.name, {
        details: { model: this.modelName },
      });
    }
    return text;
  }
}
