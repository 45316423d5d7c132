// src/services/modalityRanker.ts
// What: Brute-force cosine ranking of one modality's embedding map against a query vector.
// How: Linear scan over the map (optionally restricted to a candidate id set), skipping stored zero vectors,
//      then sorts by score descending with id ascending as the tie-break so equal scores order the same way
//      on every run.

import { DimensionMismatchError, NoSignalError } from '../errors.js';
import type { EmbeddingMap, EmbeddingVector, RankedHit, RecordId } from '../models/types.js';
import { cosineSimilarity, isZeroVector } from '../util/vector.js';

export function compareHits(a: RankedHit, b: RankedHit): number {
  if (b.score !== a.score) return b.score - a.score;
  if (a.id < b.id) return -1;
  return a.id > b.id ? 1 : 0;
}

/**
 * Rank every vector in `map` by cosine similarity to `query`.
 *
 * @throws NoSignalError when the query is empty or all zeros
 * @throws DimensionMismatchError when the query length differs from the map's
 */
export function rankByModality(
  query: EmbeddingVector,
  map: EmbeddingMap,
  restrictTo?: ReadonlySet<RecordId>,
): RankedHit[] {
  if (query.length === 0 || isZeroVector(query)) {
    throw new NoSignalError(`${map.modality} query vector is all zeros`);
  }
  if (map.vectors.size > 0 && query.length !== map.dimension) {
    throw new DimensionMismatchError(map.dimension, query.length);
  }

  const hits: RankedHit[] = [];
  for (const [id, vector] of map.vectors) {
    if (restrictTo && !restrictTo.has(id)) continue;
    if (isZeroVector(vector)) continue;
    hits.push({ id, score: cosineSimilarity(query, vector) });
  }

  hits.sort(compareHits);
  return hits;
}
