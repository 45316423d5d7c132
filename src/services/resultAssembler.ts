// src/services/resultAssembler.ts
// What: Turns ranked ids back into catalog records with scores attached.
// How: Walks hits in order, drops ids the catalog does not know (logged as a data-consistency warning) and
//      keeps only the first record per display name. Each output is a fresh object; catalog records stay untouched.

import logger from '../logging.js';
import type { CatalogSnapshot } from '../repositories/catalogRepository.js';
import type { RankedHit, ScoredRecord, SimilarityScores } from '../models/types.js';

export function singleScore(hit: RankedHit): SimilarityScores {
  return { similarity_score: hit.score };
}

export function assembleResults<H extends RankedHit>(
  hits: readonly H[],
  catalog: CatalogSnapshot,
  scoresOf: (hit: H) => SimilarityScores = singleScore,
): ScoredRecord[] {
  const out: ScoredRecord[] = [];
  const seenNames = new Set<string>();
  let orphans = 0;

  for (const hit of hits) {
    const record = catalog.byId(hit.id);
    if (!record) {
      orphans += 1;
      logger.warn({ id: hit.id }, 'Ranked id has no catalog record; skipping');
      continue;
    }
    if (seenNames.has(record.name)) continue;
    seenNames.add(record.name);
    out.push({ ...record, textFields: { ...record.textFields }, ...scoresOf(hit) });
  }

  if (orphans > 0) {
    logger.warn({ orphans, hits: hits.length }, 'Embedding store references ids missing from the catalog');
  }
  return out;
}
