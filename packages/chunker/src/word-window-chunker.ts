import type { ChunkResult, ChunkingConfig } from "@lexrag/types";
import type { IChunker } from "./chunker.interface.js";

const WHITESPACE = /\s+/;

function tokenize(text: string): string[] {
  return text.split(WHITESPACE).filter((token) => token.length > 0);
}

function assertWindow(size: number, overlap: number): void {
  if (!Number.isInteger(size) || size < 1) {
    throw new RangeError(`Chunk size must be a positive integer, got ${String(size)}`);
  }
  if (!Number.isInteger(overlap) || overlap < 0) {
    throw new RangeError(`Chunk overlap must be a non-negative integer, got ${String(overlap)}`);
  }
}

/**
 * Token windows of at most `size` tokens whose starts advance by
 * `max(1, size - overlap)`, so any overlap still makes progress.
 * Yields `[start, end)` token offsets.
 */
function* windows(tokenCount: number, size: number, overlap: number): Generator<[number, number]> {
  const step = Math.max(1, size - overlap);
  for (let start = 0; start < tokenCount; start += step) {
    yield [start, Math.min(start + size, tokenCount)];
  }
}

/**
 * Split `text` into overlapping windows of whitespace-delimited tokens.
 *
 * Each window is its tokens joined by single spaces, so the original
 * whitespace layout (line breaks, indentation, runs of spaces) is not
 * preserved. Callers that need exact quotes must go back to the source text.
 */
export function chunkText(text: string, size: number, overlap: number): string[] {
  assertWindow(size, overlap);

  const tokens = tokenize(text);
  const chunks: string[] = [];

  for (const [start, end] of windows(tokens.length, size, overlap)) {
    const chunk = tokens.slice(start, end).join(" ");
    if (chunk.trim().length > 0) {
      chunks.push(chunk);
    }
  }

  return chunks;
}

/**
 * Fixed-size word windows with overlap.
 */
export class WordWindowChunker implements IChunker {
  readonly strategy = "word-window";

  chunk(content: string, config: ChunkingConfig): ChunkResult[] {
    const { size, overlap } = config;
    assertWindow(size, overlap);

    const tokens = tokenize(content);
    const results: ChunkResult[] = [];

    for (const [startToken, endToken] of windows(tokens.length, size, overlap)) {
      results.push({
        content: tokens.slice(startToken, endToken).join(" "),
        index: results.length,
        tokenCount: endToken - startToken,
        metadata: { startToken, endToken },
      });
    }

    return results;
  }
}
