// src/__fixtures__/spots.ts
// What: Shared test data: a four-spot catalog with hand-picked text and image vectors.
// How: Text query [1, 0, 0] scores a=1, d≈0.98, b≈0.707, c=0. Image query [0, 0, 1] scores b=1, c≈0.707, a=0;
//      d has a zero image vector. a and d share the display name "Goryokaku".

import { CatalogSnapshot } from '../repositories/catalogRepository.js';
import type { EmbeddingMap, EmbeddingVector, Modality, SpotRecord } from '../models/types.js';
import { createKeywordExtractor, type KeywordExtractor } from '../services/keywords.js';

export function spot(id: string, name: string, location: string, textFields: Record<string, string> = {}): SpotRecord {
  return { id, name, location, textFields };
}

export const SPOTS: SpotRecord[] = [
  spot('a', 'Goryokaku', '函館市五稜郭町', { title: 'Star fort', tag: 'fort' }),
  spot('b', 'Mount Hakodate', '函館市元町', { explain: 'Night view' }),
  spot('c', 'Otaru Canal', '小樽市港町'),
  spot('d', 'Goryokaku', '函館市五稜郭町', { title: 'Tower' }),
];

export const RAW_CATALOG = {
  photo: [
    { id: 'a', name: 'Goryokaku', location: '函館市五稜郭町', title: 'Star fort', tag: 'fort' },
    { id: 'b', name: 'Mount Hakodate', location: '函館市元町', explain: 'Night view' },
    { id: 'c', name: 'Otaru Canal', location: '小樽市港町' },
    { id: 'd', name: 'Goryokaku', location: '函館市五稜郭町', title: 'Tower' },
  ],
};

export const TEXT_QUERY: EmbeddingVector = [1, 0, 0];
export const IMAGE_QUERY: EmbeddingVector = [0, 0, 1];

export function embeddingMap(modality: Modality, entries: Record<string, EmbeddingVector>): EmbeddingMap {
  const vectors = new Map(Object.entries(entries));
  const first = vectors.values().next();
  return { modality, dimension: first.done ? 0 : first.value.length, vectors };
}

export const TEXT_MAP = embeddingMap('text', {
  a: [1, 0, 0],
  b: [1, 1, 0],
  c: [0, 1, 0],
  d: [1, 0.2, 0],
});

export const IMAGE_MAP = embeddingMap('image', {
  a: [0, 1, 0],
  b: [0, 0, 1],
  c: [0, 1, 1],
  d: [0, 0, 0],
});

export function catalogSnapshot(records: readonly SpotRecord[] = SPOTS): CatalogSnapshot {
  return new CatalogSnapshot(records);
}

/** Splits on whitespace; tokens carry no part of speech. */
export function whitespaceExtractor(minLength = 2): KeywordExtractor {
  return createKeywordExtractor({
    tokenizer: {
      tokenize: (text) =>
        text
          .split(/\s+/)
          .filter((s) => s.length > 0)
          .map((surface) => ({ surface, pos: null })),
    },
    minLength,
    partsOfSpeech: ['名詞'],
  });
}
