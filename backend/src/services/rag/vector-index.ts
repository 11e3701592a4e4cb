/**
 * In-memory vector index with exact k-nearest-neighbor search.
 *
 * Vectors live in one Float32Array, row i belonging to records[i]. An index
 * is never mutated after construction; a rebuild produces a new instance.
 */

import type { DistanceMetric, IndexManifest, IndexRecord, RetrievalHit } from '../../types/rag.js';
import { InvariantViolation } from '../../utils/errors.js';

export function cosineDistance(a: ArrayLike<number>, b: ArrayLike<number>): number {
  let dot = 0;
  let normA = 0;
  let normB = 0;
  for (let i = 0; i < a.length; i++) {
    dot += a[i] * b[i];
    normA += a[i] * a[i];
    normB += b[i] * b[i];
  }
  if (normA === 0 || normB === 0) return 1;
  return 1 - dot / (Math.sqrt(normA) * Math.sqrt(normB));
}

export function euclideanDistance(a: ArrayLike<number>, b: ArrayLike<number>): number {
  let sum = 0;
  for (let i = 0; i < a.length; i++) {
    const d = a[i] - b[i];
    sum += d * d;
  }
  return Math.sqrt(sum);
}

export function distance(metric: DistanceMetric, a: ArrayLike<number>, b: ArrayLike<number>): number {
  return metric === 'cosine' ? cosineDistance(a, b) : euclideanDistance(a, b);
}

export class VectorIndex {
  readonly manifest: Readonly<IndexManifest>;
  readonly records: readonly IndexRecord[];
  readonly vectors: Float32Array;

  constructor(manifest: IndexManifest, records: readonly IndexRecord[], vectors: Float32Array) {
    if (manifest.record_count !== records.length) {
      throw new InvariantViolation(`Manifest lists ${manifest.record_count} records, got ${records.length}`);
    }
    if (vectors.length !== records.length * manifest.dimension) {
      throw new InvariantViolation(
        `Expected ${records.length * manifest.dimension} vector values for ${records.length} records ` +
        `of dimension ${manifest.dimension}, got ${vectors.length}`
      );
    }
    this.manifest = Object.freeze({ ...manifest });
    this.records = Object.freeze([...records]);
    this.vectors = vectors;
  }

  get size(): number {
    return this.records.length;
  }

  vectorAt(position: number): Float32Array {
    const { dimension } = this.manifest;
    return this.vectors.subarray(position * dimension, (position + 1) * dimension);
  }

  /**
   * Up to k hits by ascending distance; equal distances keep ingestion order.
   */
  search(query: ArrayLike<number>, k: number): RetrievalHit[] {
    if (this.size === 0) return [];
    if (query.length !== this.manifest.dimension) {
      throw new InvariantViolation(`Query vector has dimension ${query.length}, index has ${this.manifest.dimension}`);
    }

    const scored = this.records.map((record, position) => ({
      position,
      distance: distance(this.manifest.metric, query, this.vectorAt(position)),
    }));

    scored.sort((a, b) => a.distance - b.distance || a.position - b.position);

    return scored.slice(0, k).map(({ position, distance: d }) => ({
      record: this.records[position],
      distance: d,
    }));
  }
}
