import type { RetrievedChunk } from "@lexrag/types";
import type { IEmbeddingProvider } from "@lexrag/embeddings";
import { IndexOutOfRangeError, RetrievalError } from "@lexrag/errors";
import type { IndexSnapshot } from "./index-holder.js";

export interface RetrieverDependencies {
  embeddingProvider: IEmbeddingProvider;
  /** Hits farther than this squared distance are dropped. */
  maxDistance?: number;
}

/** Maps a squared L2 distance into (0, 1], higher meaning closer. */
export function distanceToScore(distance: number): number {
  return 1 / (1 + distance);
}

/**
 * Retrieval: Query -> Embed -> Exact search -> Chunk lookup
 *
 * Works only against the snapshot it is given, so the rows it returns always
 * index the chunk list they were built with.
 */
export async function retrieve(
  query: string,
  snapshot: IndexSnapshot,
  deps: RetrieverDependencies,
  topK: number,
): Promise<RetrievedChunk[]> {
  const [queryVector] = await deps.embeddingProvider.encode([query], { inputType: "query" });
  if (!queryVector) {
    throw new RetrievalError("Failed to generate embedding for query");
  }

  const hits = snapshot.index.search(queryVector, topK);
  const results: RetrievedChunk[] = [];

  for (const hit of hits) {
    if (deps.maxDistance !== undefined && hit.distance > deps.maxDistance) continue;

    const text = snapshot.chunks[hit.row];
    if (text === undefined) {
      throw new IndexOutOfRangeError(hit.row, snapshot.chunks.length, {
        details: { generation: snapshot.generation },
      });
    }

    results.push({
      rank: results.length + 1,
      row: hit.row,
      text,
      distance: hit.distance,
      score: distanceToScore(hit.distance),
    });
  }

  return results;
}
