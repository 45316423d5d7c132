// src/services/keywordFilter.ts
// What: Location prefilter for text search.
// How: Extracts keywords from the query and keeps records whose location contains one of them. An empty result
//      is not an error: the text ranker then searches the whole catalog.

import type { CatalogSnapshot } from '../repositories/catalogRepository.js';
import type { SpotRecord } from '../models/types.js';
import type { KeywordExtractor } from './keywords.js';

export interface KeywordFilterResult {
  keywords: Set<string>;
  candidates: SpotRecord[];
  matchedLocations: Set<string>;
}

export function filterByKeywords(
  queryText: string,
  catalog: CatalogSnapshot,
  extractor: KeywordExtractor,
): KeywordFilterResult {
  const keywords = extractor.extract(queryText);
  const candidates = keywords.size > 0 ? catalog.byLocationKeyword(keywords) : [];
  const matchedLocations = new Set(candidates.map((r) => r.location));
  return { keywords, candidates, matchedLocations };
}
