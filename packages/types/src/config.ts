import type { ContextFormat } from "./query.js";

export type EmbeddingProviderType = "cohere" | "http";

export interface AppConfig {
  nodeEnv: "development" | "test" | "production";
  port: number;
  logLevel: "debug" | "info" | "warn" | "error";
  paths: PathsConfig;
  chunking: ChunkingSettings;
  embedding: EmbeddingConfig;
  generation: GenerationConfig;
  query: QueryConfig;
  cors: CorsConfig;
}

export interface PathsConfig {
  indexDir: string;
  dataPath: string;
}

export interface ChunkingSettings {
  size: number;
  overlap: number;
  minContentLength: number;
  embedBatchSize: number;
}

export interface EmbeddingConfig {
  provider: EmbeddingProviderType;
  serverUrl?: string;
  model: string;
  cohereApiKey: string;
  cohereModel: string;
  queryCacheSize: number;
}

export interface GenerationConfig {
  geminiApiKey: string;
  model: string;
  timeoutMs: number;
  contextFormat: ContextFormat;
}

export interface QueryConfig {
  topKDefault: number;
  topKMax: number;
  minQueryLength: number;
  previewLength: number;
  maxDistance?: number;
}

export interface CorsConfig {
  origins: string[];
}
