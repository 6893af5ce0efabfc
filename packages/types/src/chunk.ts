export type ChunkStrategy = "word-window";

/**
 * Word-window chunking parameters. `size` and `overlap` are counted in
 * whitespace-delimited tokens, not model tokens.
 */
export interface ChunkingConfig {
  size: number;
  overlap: number;
}

export interface ChunkResult {
  content: string;
  index: number;
  tokenCount: number;
  metadata: {
    startToken: number;
    endToken: number;
  };
}
