// Exhaustive inner-product index over unit vectors.
// Rows live in one contiguous Float32Array; each row is tagged with a stable
// record handle, so callers never depend on row positions.

import { dot } from '../embedding/embedding-guard.js';

export interface ScoredHandle {
  handle: number;
  score: number;
}

export class FlatInnerProductIndex {
  readonly dimension: number;
  private matrix: Float32Array;
  private handles: number[] = [];

  constructor(dimension: number, initialCapacity = 64) {
    this.dimension = dimension;
    this.matrix = new Float32Array(dimension * Math.max(1, initialCapacity));
  }

  get size(): number {
    return this.handles.length;
  }

  /** Append a row. The vector is copied; it must already have the index dimension. */
  add(handle: number, vector: Float32Array): void {
    if (vector.length !== this.dimension) {
      throw new RangeError(`Vector dimension ${vector.length} does not match index dimension ${this.dimension}`);
    }
    const row = this.handles.length;
    this.ensureCapacity(row + 1);
    this.matrix.set(vector, row * this.dimension);
    this.handles.push(handle);
  }

  /**
   * Score every accepted row against the query and return the best k.
   * `accept` runs before scoring, so rejected rows never take a slot.
   * Equal scores keep insertion order.
   */
  search(query: Float32Array, k: number, accept?: (handle: number) => boolean): ScoredHandle[] {
    if (query.length !== this.dimension) {
      throw new RangeError(`Query dimension ${query.length} does not match index dimension ${this.dimension}`);
    }
    const limit = Math.floor(k);
    if (limit <= 0 || this.handles.length === 0) return [];

    const scored: ScoredHandle[] = [];
    for (let row = 0; row < this.handles.length; row++) {
      const handle = this.handles[row];
      if (accept && !accept(handle)) continue;
      scored.push({ handle, score: dot(query, this.matrix, row * this.dimension) });
    }

    // Array.prototype.sort is stable, which gives insertion order on ties
    scored.sort((a, b) => b.score - a.score);
    return scored.slice(0, limit);
  }

  /** Rows in insertion order, each a view into the matrix. */
  *entries(): IterableIterator<[number, Float32Array]> {
    for (let row = 0; row < this.handles.length; row++) {
      const start = row * this.dimension;
      yield [this.handles[row], this.matrix.subarray(start, start + this.dimension)];
    }
  }

  private ensureCapacity(rows: number): void {
    const needed = rows * this.dimension;
    if (needed <= this.matrix.length) return;
    let capacity = this.matrix.length;
    while (capacity < needed) capacity *= 2;
    const grown = new Float32Array(capacity);
    grown.set(this.matrix.subarray(0, this.handles.length * this.dimension));
    this.matrix = grown;
  }
}
