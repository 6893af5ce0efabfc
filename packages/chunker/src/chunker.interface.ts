import type { ChunkResult, ChunkingConfig, ChunkStrategy } from "@lexrag/types";

export interface IChunker {
  readonly strategy: ChunkStrategy;
  chunk(content: string, config: ChunkingConfig): ChunkResult[];
}
