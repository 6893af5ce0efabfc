import type { SearchHit } from "@lexrag/types";
import { DimensionMismatchError, ValidationError } from "@lexrag/errors";
import { BoundedMaxHeap } from "./bounded-heap.js";

export interface BuildOptions {
  /** Required when building from an empty matrix. */
  dimensions?: number;
}

function compareHits(a: SearchHit, b: SearchHit): number {
  if (a.distance === b.distance) return a.row - b.row;
  return a.distance < b.distance ? -1 : 1;
}

/** Checked at float32 precision, since that is how the values are stored. */
function assertFinite(values: ArrayLike<number>, what: string): void {
  for (let i = 0; i < values.length; i++) {
    if (!Number.isFinite(Math.fround(values[i] ?? Number.NaN))) {
      throw new ValidationError(`${what} contains a non-finite value at position ${String(i)}`);
    }
  }
}

/**
 * Exact nearest-neighbour index over squared Euclidean distance.
 *
 * Vectors are held row-major in one Float32Array and every search scans all
 * rows: O(N·D) per query plus O(N log k) for selection. That is exact and
 * deterministic, and fine up to a few hundred thousand rows; corpora around
 * 10^6 vectors and beyond want an approximate index instead.
 *
 * Immutable after construction.
 */
export class FlatL2Index {
  private constructor(
    private readonly data: Float32Array,
    readonly dimensions: number,
    readonly rowCount: number,
  ) {}

  static build(vectors: ReadonlyArray<ArrayLike<number>>, options?: BuildOptions): FlatL2Index {
    const first = vectors[0];
    const dimensions = options?.dimensions ?? first?.length;

    if (dimensions === undefined) {
      throw new ValidationError("Dimensions must be given to build an empty index");
    }
    if (!Number.isInteger(dimensions) || dimensions < 1) {
      throw new ValidationError(`Invalid index dimensions: ${String(dimensions)}`);
    }

    const data = new Float32Array(vectors.length * dimensions);
    vectors.forEach((vector, row) => {
      if (vector.length !== dimensions) {
        throw new DimensionMismatchError(dimensions, vector.length, { details: { row } });
      }
      assertFinite(vector, `Vector ${String(row)}`);
      data.set(vector, row * dimensions);
    });

    return new FlatL2Index(data, dimensions, vectors.length);
  }

  /**
   * Wrap an already packed row-major matrix without copying it.
   */
  static fromPacked(data: Float32Array, dimensions: number): FlatL2Index {
    if (!Number.isInteger(dimensions) || dimensions < 1) {
      throw new ValidationError(`Invalid index dimensions: ${String(dimensions)}`);
    }
    if (data.length % dimensions !== 0) {
      throw new DimensionMismatchError(dimensions, data.length % dimensions, {
        details: { reason: "packed length is not a multiple of dimensions" },
      });
    }
    return new FlatL2Index(data, dimensions, data.length / dimensions);
  }

  /**
   * The `topK` rows closest to `query`, nearest first; equal distances are
   * ordered by row. `topK` larger than the index returns every row.
   */
  search(query: ArrayLike<number>, topK: number): SearchHit[] {
    if (query.length !== this.dimensions) {
      throw new DimensionMismatchError(this.dimensions, query.length);
    }
    if (!Number.isInteger(topK) || topK < 1) {
      throw new ValidationError(`topK must be a positive integer, got ${String(topK)}`, {
        topK: "must be a positive integer",
      });
    }
    assertFinite(query, "Query vector");

    const k = Math.min(topK, this.rowCount);
    if (k === 0) return [];

    // Same float32 rounding as the stored rows, so a stored vector is at distance 0 from itself.
    const q = Float32Array.from(query);
    const heap = new BoundedMaxHeap<SearchHit>(k, compareHits);

    for (let row = 0; row < this.rowCount; row++) {
      heap.offer({ row, distance: this.squaredDistance(q, row) });
    }

    return heap.toSortedArray();
  }

  /** Copy of the stored vector at `row`. */
  vectorAt(row: number): Float32Array {
    if (!Number.isInteger(row) || row < 0 || row >= this.rowCount) {
      throw new RangeError(`Row ${String(row)} is outside 0..${String(this.rowCount - 1)}`);
    }
    const offset = row * this.dimensions;
    return this.data.slice(offset, offset + this.dimensions);
  }

  /** Packed row-major storage; callers must not mutate it. */
  get packed(): Float32Array {
    return this.data;
  }

  private squaredDistance(query: Float32Array, row: number): number {
    const offset = row * this.dimensions;
    let sum = 0;
    for (let d = 0; d < this.dimensions; d++) {
      const diff = (query[d] ?? 0) - (this.data[offset + d] ?? 0);
      sum += diff * diff;
    }
    return sum;
  }
}
