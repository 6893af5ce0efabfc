import type { FlatL2Index } from "@lexrag/vector-index";

/**
 * One loaded index with the chunk list it was built from. Never mutated;
 * a reindex produces a new snapshot.
 */
export interface IndexSnapshot {
  readonly index: FlatL2Index;
  readonly chunks: readonly string[];
  readonly generation: string;
  readonly loadedAt: Date;
}

/**
 * Holds the snapshot queries are served from. Replacing it is a single
 * reference assignment, so a query that captured the previous snapshot
 * keeps a consistent index/chunk pair until it finishes.
 */
export class IndexHolder {
  private snapshot: IndexSnapshot | null = null;

  get current(): IndexSnapshot | null {
    return this.snapshot;
  }

  /** Install `next` and return the snapshot it replaced. */
  swap(next: IndexSnapshot): IndexSnapshot | null {
    if (next.chunks.length !== next.index.rowCount) {
      throw new RangeError(
        `Snapshot ${next.generation} pairs ${String(next.chunks.length)} chunks with ${String(next.index.rowCount)} rows`,
      );
    }
    const previous = this.snapshot;
    this.snapshot = next;
    return previous;
  }
}
