export interface SearchHit {
  row: number;
  /** Squared Euclidean distance to the query vector. */
  distance: number;
}

export interface IndexManifest {
  formatVersion: number;
  generation: string;
  indexFile: string;
  chunksFile: string;
  rowCount: number;
  dimensions: number;
  createdAt: string;
  checksums: {
    index: string;
    chunks: string;
  };
}

export type EmbeddingInputType = "document" | "query";
