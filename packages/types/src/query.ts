export type ContextFormat = "plain" | "xml" | "markdown";

export type QueryPhase =
  | "idle"
  | "validating"
  | "retrieving"
  | "generating"
  | "responding"
  | "failed";

/** Body accepted by the query endpoint (snake_case on the wire). */
export interface RagRequest {
  query: string;
  top_k?: number;
  format_json?: boolean;
}

export interface RagSource {
  rank: number;
  score: number;
  distance: number;
  preview: string;
}

export interface RagResponse {
  answer: string;
  sources: RagSource[];
}

export interface RetrievedChunk {
  rank: number;
  row: number;
  text: string;
  distance: number;
  score: number;
}

export interface HealthStatus {
  ok: boolean;
  indexLoaded: boolean;
  chunksLoaded: boolean;
  chunksCount: number;
  indexRows: number;
  dimensions: number | null;
  generation: string | null;
  loadedAt: string | null;
  indexDir: string;
  manifestPath: string;
  /** Files of the active generation; `null` until a pair is loaded. */
  indexPath: string | null;
  chunksPath: string | null;
  /** Result of the last embedder check; `null` before the first one. */
  embedderReachable: boolean | null;
  reindexing: boolean;
  lastError: string | null;
}
