import { z } from "zod";
import type { AppConfig } from "@lexrag/types";

const intFromEnv = (fallback: string) =>
  z.string().min(1).default(fallback).transform(Number).pipe(z.number().int().positive());

const nonNegativeIntFromEnv = (fallback: string) =>
  z.string().min(1).default(fallback).transform(Number).pipe(z.number().int().nonnegative());

/**
 * Zod schema for the service environment. Validates, transforms, and provides
 * defaults so that the resulting object is a strongly-typed AppConfig.
 */
export const envSchema = z
  .object({
    // ---------- Core ----------
    NODE_ENV: z.enum(["development", "test", "production"]).default("development"),
    PORT: intFromEnv("8000"),
    LOG_LEVEL: z.enum(["debug", "info", "warn", "error"]).default("info"),

    // ---------- Paths ----------
    INDEX_DIR: z.string().min(1).default("index"),
    DATA_PATH: z.string().min(1).default("data/corpus.json"),

    // ---------- Chunking ----------
    CHUNK_SIZE: intFromEnv("800"),
    CHUNK_OVERLAP: nonNegativeIntFromEnv("160"),
    MIN_CONTENT_LENGTH: nonNegativeIntFromEnv("200"),
    EMBED_BATCH_SIZE: intFromEnv("64"),

    // ---------- Embeddings ----------
    EMBEDDING_PROVIDER: z.enum(["http", "cohere"]).default("http"),
    EMBEDDING_SERVER_URL: z.string().url().optional(),
    EMBEDDING_MODEL: z.string().default("sentence-transformers/all-MiniLM-L6-v2"),
    COHERE_API_KEY: z.string().optional(),
    COHERE_EMBED_MODEL: z.string().default("embed-v4.0"),
    QUERY_CACHE_SIZE: nonNegativeIntFromEnv("256"),

    // ---------- Generation ----------
    GEMINI_API_KEY: z.string().optional(),
    GEMINI_MODEL: z.string().default("gemini-2.0-flash-001"),
    GENERATION_TIMEOUT_MS: intFromEnv("30000"),
    CONTEXT_FORMAT: z.enum(["plain", "xml", "markdown"]).default("plain"),

    // ---------- Query ----------
    TOP_K_DEFAULT: intFromEnv("8"),
    TOP_K_MAX: intFromEnv("64"),
    MIN_QUERY_LENGTH: intFromEnv("2"),
    PREVIEW_LENGTH: intFromEnv("240"),
    MAX_DISTANCE: z.string().min(1).transform(Number).pipe(z.number().nonnegative()).optional(),

    // ---------- CORS ----------
    CORS_ORIGINS: z
      .string()
      .default("*")
      .transform((val) =>
        val
          .split(",")
          .map((origin) => origin.trim())
          .filter((origin) => origin.length > 0),
      ),
  })
  .superRefine((env, ctx) => {
    if (env.CHUNK_OVERLAP >= env.CHUNK_SIZE) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["CHUNK_OVERLAP"],
        message: "CHUNK_OVERLAP must be smaller than CHUNK_SIZE",
      });
    }
    if (env.TOP_K_DEFAULT > env.TOP_K_MAX) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["TOP_K_DEFAULT"],
        message: "TOP_K_DEFAULT must not exceed TOP_K_MAX",
      });
    }
    if (env.EMBEDDING_PROVIDER === "http" && !env.EMBEDDING_SERVER_URL) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["EMBEDDING_SERVER_URL"],
        message: "EMBEDDING_SERVER_URL is required when EMBEDDING_PROVIDER is 'http'",
      });
    }
    if (env.EMBEDDING_PROVIDER === "cohere" && !env.COHERE_API_KEY) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["COHERE_API_KEY"],
        message: "COHERE_API_KEY is required when EMBEDDING_PROVIDER is 'cohere'",
      });
    }
  });

/**
 * Parse and validate process.env (or any compatible record) against
 * the envSchema and return a strongly-typed {@link AppConfig}.
 *
 * Throws a ZodError with detailed messages when validation fails.
 */
export function parseEnv(env: Record<string, string | undefined> = process.env): AppConfig {
  const parsed = envSchema.parse(env);

  return {
    nodeEnv: parsed.NODE_ENV,
    port: parsed.PORT,
    logLevel: parsed.LOG_LEVEL,

    paths: {
      indexDir: parsed.INDEX_DIR,
      dataPath: parsed.DATA_PATH,
    },

    chunking: {
      size: parsed.CHUNK_SIZE,
      overlap: parsed.CHUNK_OVERLAP,
      minContentLength: parsed.MIN_CONTENT_LENGTH,
      embedBatchSize: parsed.EMBED_BATCH_SIZE,
    },

    embedding: {
      provider: parsed.EMBEDDING_PROVIDER,
      serverUrl: parsed.EMBEDDING_SERVER_URL,
      model: parsed.EMBEDDING_MODEL,
      cohereApiKey: parsed.COHERE_API_KEY ?? "",
      cohereModel: parsed.COHERE_EMBED_MODEL,
      queryCacheSize: parsed.QUERY_CACHE_SIZE,
    },

    generation: {
      geminiApiKey: parsed.GEMINI_API_KEY ?? "",
      model: parsed.GEMINI_MODEL,
      timeoutMs: parsed.GENERATION_TIMEOUT_MS,
      contextFormat: parsed.CONTEXT_FORMAT,
    },

    query: {
      topKDefault: parsed.TOP_K_DEFAULT,
      topKMax: parsed.TOP_K_MAX,
      minQueryLength: parsed.MIN_QUERY_LENGTH,
      previewLength: parsed.PREVIEW_LENGTH,
      maxDistance: parsed.MAX_DISTANCE,
    },

    cors: {
      origins: parsed.CORS_ORIGINS,
    },
  };
}
