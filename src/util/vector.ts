// src/util/vector.ts
// What: Vector helpers for similarity scoring.
// How: cosineSimilarity defines the score of a zero vector as 0 instead of dividing by zero; clampSimilarity
//      keeps rounding noise inside [-1, 1]; averageNonZero mean-pools the non-zero rows of a field matrix.

import type { EmbeddingVector } from '../models/types.js';

export function isZeroVector(v: EmbeddingVector): boolean {
  for (const x of v) {
    if (x !== 0) return false;
  }
  return true;
}

export function zeroVector(dimension: number): number[] {
  return new Array<number>(dimension).fill(0);
}

export function clampSimilarity(sim: number): number {
  if (sim < -1) return -1;
  if (sim > 1) return 1;
  return sim;
}

/**
 * Cosine similarity in [-1, 1]. Either side being all zeros yields 0.
 * Throws on length mismatch.
 */
export function cosineSimilarity(a: EmbeddingVector, b: EmbeddingVector): number {
  if (a.length !== b.length) {
    throw new Error(`Vector length mismatch: ${a.length} vs ${b.length}`);
  }

  let dot = 0;
  let magA = 0;
  let magB = 0;
  for (let i = 0; i < a.length; i++) {
    dot += a[i] * b[i];
    magA += a[i] * a[i];
    magB += b[i] * b[i];
  }

  if (magA === 0 || magB === 0) return 0;
  return clampSimilarity(dot / (Math.sqrt(magA) * Math.sqrt(magB)));
}

/**
 * Element-wise mean of the rows that are not all zeros.
 * Returns a zero vector of `dimension` when every row is zero.
 */
export function averageNonZero(rows: readonly EmbeddingVector[], dimension: number): number[] {
  const usable = rows.filter((r) => !isZeroVector(r));
  if (usable.length === 0) return zeroVector(dimension);

  const sum = zeroVector(dimension);
  for (const row of usable) {
    if (row.length !== dimension) {
      throw new Error(`Vector length mismatch: ${row.length} vs ${dimension}`);
    }
    for (let i = 0; i < dimension; i++) sum[i] += row[i];
  }
  return sum.map((x) => x / usable.length);
}
