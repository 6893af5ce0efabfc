export interface EmbeddingProgress {
  embedded: number;
  total: number;
  batch: number;
  batches: number;
}

export interface IngestionSummary {
  generation: string;
  recordCount: number;
  droppedCount: number;
  chunkCount: number;
  dimensions: number;
  durationMs: number;
}
