import type { ChunkingConfig, CorpusRecord } from "@lexrag/types";
import type { IChunker } from "@lexrag/chunker";

/**
 * Chunk every record and flatten the result. Position in the returned list is
 * the chunk's identity from here on: it becomes the row in the index.
 */
export function extractChunks(
  records: readonly CorpusRecord[],
  chunker: IChunker,
  config: ChunkingConfig,
): string[] {
  return records.flatMap((record) => chunker.chunk(record.content, config).map((chunk) => chunk.content));
}
