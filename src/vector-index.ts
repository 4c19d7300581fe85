/** A neighbour returned by {@link CosineIndex.query}. */
export interface Neighbor {
  /** Row ordinal in the indexed matrix. */
  readonly index: number;
  /** Cosine distance, `1 - similarity`. */
  readonly distance: number;
}

function unit(v: Float32Array): Float32Array {
  let sq = 0;
  for (const x of v) sq += x * x;
  const norm = Math.sqrt(sq);
  const out = new Float32Array(v.length);
  if (norm === 0) return out; // zero vector: similarity 0 to everything
  for (let i = 0; i < v.length; i++) out[i] = v[i] / norm;
  return out;
}

/**
 * Exact nearest-neighbour index under cosine distance. Rows are normalised
 * once at construction into a single contiguous matrix, so a query is one
 * dot product per row. Read-only after construction.
 */
export class CosineIndex {
  public readonly size: number;
  public readonly dim: number;
  private readonly matrix: Float32Array;

  public constructor(vectors: readonly Float32Array[]) {
    this.size = vectors.length;
    this.dim = vectors[0]?.length ?? 0;
    this.matrix = new Float32Array(this.size * this.dim);
    vectors.forEach((v, i) => {
      if (v.length !== this.dim) {
        throw new Error(`Row ${i} has width ${v.length}, index width is ${this.dim}`);
      }
      this.matrix.set(unit(v), i * this.dim);
    });
  }

  /**
   * The `k` rows closest to `vector`, ascending by distance. Equal distances
   * keep row order.
   */
  public query(vector: Float32Array, k: number): Neighbor[] {
    if (this.size === 0 || k < 1) return [];
    if (vector.length !== this.dim) {
      throw new Error(`Query width ${vector.length} does not match index width ${this.dim}`);
    }
    const q = unit(vector);
    const scored: Neighbor[] = [];
    for (let row = 0; row < this.size; row++) {
      let dot = 0;
      const base = row * this.dim;
      for (let j = 0; j < this.dim; j++) dot += this.matrix[base + j] * q[j];
      scored.push({ index: row, distance: 1 - dot });
    }
    // Array.prototype.sort is stable, so ties stay in row order.
    scored.sort((a, b) => a.distance - b.distance);
    return scored.slice(0, Math.min(k, this.size));
  }
}
