import { z } from "zod";
import { IndexUnavailableError, errorMessage } from "@lexrag/errors";
import { readFileIfExists, writeFileAtomic } from "./fs-utils.js";

const chunkListSchema = z.array(z.string());

/**
 * Chunk texts are stored as a plain JSON array; position `i` is the text of
 * index row `i`.
 */
export function encodeChunks(chunks: readonly string[]): string {
  return JSON.stringify(chunks);
}

export function decodeChunks(text: string, source = "chunk list"): string[] {
  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (err) {
    throw new IndexUnavailableError(`Corrupt ${source}: ${errorMessage(err)}`, { cause: err });
  }

  const parsed = chunkListSchema.safeParse(raw);
  if (!parsed.success) {
    throw new IndexUnavailableError(`Corrupt ${source}: expected a JSON array of strings`, {
      details: { issues: parsed.error.issues.slice(0, 5) },
    });
  }
  return parsed.data;
}

export async function saveChunks(path: string, chunks: readonly string[]): Promise<void> {
  await writeFileAtomic(path, encodeChunks(chunks));
}

export async function loadChunks(path: string): Promise<string[]> {
  const bytes = await readFileIfExists(path);
  if (bytes === null) {
    throw new IndexUnavailableError(`Chunk file not found: ${path}`);
  }
  return decodeChunks(bytes.toString("utf8"), path);
}
