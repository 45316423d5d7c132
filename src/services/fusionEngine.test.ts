import { describe, expect, it } from 'vitest';
import { EmbeddingRepository } from '../repositories/embeddingRepository.js';
import type { EmbeddingMap, SearchRequest } from '../models/types.js';
import { clampWeight, createFusionEngine, fuseRankings } from './fusionEngine.js';
import {
  IMAGE_MAP,
  IMAGE_QUERY,
  TEXT_MAP,
  TEXT_QUERY,
  catalogSnapshot,
  embeddingMap,
  spot,
  whitespaceExtractor,
} from '../__fixtures__/spots.js';

function engineWith(maps: { text?: EmbeddingMap; image?: EmbeddingMap }) {
  return createFusionEngine({
    embeddings: EmbeddingRepository.fromMaps(maps),
    keywordExtractor: whitespaceExtractor(),
  });
}

const catalog = catalogSnapshot();
const engine = engineWith({ text: TEXT_MAP, image: IMAGE_MAP });

// "札幌" matches no location, so text search widens to the whole catalog
const widened = { query: '札幌 夜景', vector: TEXT_QUERY };
const prefiltered = { query: '五稜郭', vector: TEXT_QUERY };

function search(weight: number, text: SearchRequest['text'], imageVector: SearchRequest['imageVector']) {
  return engine.search({ weight, text, imageVector }, catalog);
}

const ids = (records: { id: string }[]) => records.map((r) => r.id);

describe('clampWeight', () => {
  it('passes weights inside [0, 100] through', () => {
    expect(clampWeight(0)).toBe(0);
    expect(clampWeight(37.5)).toBe(37.5);
    expect(clampWeight(100)).toBe(100);
  });

  it('clamps out-of-range weights', () => {
    expect(clampWeight(-20)).toBe(0);
    expect(clampWeight(250)).toBe(100);
    expect(clampWeight(Number.NaN)).toBe(0);
  });
});

describe('fuseRankings', () => {
  it('blends the union of ids, scoring a missing side as 0', () => {
    const fused = fuseRankings(
      [
        { id: 'x', score: 0.8 },
        { id: 'y', score: 0.4 },
      ],
      [{ id: 'z', score: 0.9 }],
      0.25,
    );
    expect(fused.map((h) => h.id)).toEqual(['x', 'y', 'z']);
    expect(fused[0]).toEqual({ id: 'x', textScore: 0.8, imageScore: 0, score: 0.75 * 0.8 });
    expect(fused[2]).toEqual({ id: 'z', textScore: 0, imageScore: 0.9, score: 0.25 * 0.9 });
  });
});

describe('FusionEngine.search', () => {
  describe('text only (weight 0)', () => {
    it('ranks the location-matched candidates', () => {
      const results = search(0, prefiltered, null);
      // a and d share the name Goryokaku; a ranks higher
      expect(ids(results)).toEqual(['a']);
      expect(results[0].similarity_score).toBeCloseTo(1, 10);
    });

    it('searches the whole catalog when no location matches', () => {
      const results = search(0, widened, null);
      expect(ids(results)).toEqual(['a', 'b', 'c']);
      expect(results.map((r) => r.similarity_score)).toEqual([
        expect.closeTo(1, 10),
        expect.closeTo(1 / Math.sqrt(2), 10),
        0,
      ]);
    });

    it('ignores the image vector', () => {
      expect(search(0, widened, IMAGE_QUERY)).toEqual(search(0, widened, null));
    });

    it('returns nothing for a zero query vector', () => {
      expect(search(0, { query: '札幌', vector: [0, 0, 0] }, null)).toEqual([]);
    });

    it('returns nothing without text', () => {
      expect(search(0, null, IMAGE_QUERY)).toEqual([]);
    });
  });

  describe('image only (weight 100)', () => {
    it('ranks the full image map without a location prefilter', () => {
      const results = search(100, prefiltered, IMAGE_QUERY);
      expect(ids(results)).toEqual(['b', 'c', 'a']);
      expect(results[0].similarity_score).toBeCloseTo(1, 10);
    });

    it('returns nothing when the image store is unavailable', () => {
      const textOnly = engineWith({ text: TEXT_MAP });
      expect(textOnly.search({ weight: 100, text: widened, imageVector: IMAGE_QUERY }, catalog)).toEqual([]);
    });
  });

  describe('fused (1..99)', () => {
    it('blends both rankings and attaches all three scores', () => {
      const results = search(50, widened, IMAGE_QUERY);
      // b: .5*.707+.5*1, a: .5*1+.5*0, d (same name as a) dropped, c: .5*0+.5*.707
      expect(ids(results)).toEqual(['b', 'a', 'c']);
      expect(results[0].text_similarity).toBeCloseTo(1 / Math.sqrt(2), 10);
      expect(results[0].image_similarity).toBeCloseTo(1, 10);
      expect(results[0].combined_similarity).toBeCloseTo(0.5 / Math.sqrt(2) + 0.5, 10);
      expect(results[0].similarity_score).toBeUndefined();
    });

    it('weights the text side by (100 - weight) / 100', () => {
      const results = search(10, widened, IMAGE_QUERY);
      // a: .9*1 = .9, d: .9*.98, b: .9*.707+.1*1, c: .1*.707
      expect(ids(results)).toEqual(['a', 'b', 'c']);
      expect(results[0].combined_similarity).toBeCloseTo(0.9, 10);
    });

    it('keeps ids that only one modality ranked', () => {
      const imageOnlyId = engineWith({
        text: embeddingMap('text', { a: [1, 0, 0] }),
        image: embeddingMap('image', { c: [0, 0, 1] }),
      });
      const results = imageOnlyId.search({ weight: 30, text: widened, imageVector: IMAGE_QUERY }, catalog);
      expect(ids(results)).toEqual(['a', 'c']);
      expect(results[0].combined_similarity).toBeCloseTo(0.7, 10);
      expect(results[1].combined_similarity).toBeCloseTo(0.3, 10);
      expect(results[1].text_similarity).toBe(0);
    });

    it('falls back to text only when the image store is unavailable', () => {
      const textOnly = engineWith({ text: TEXT_MAP });
      const fused = textOnly.search({ weight: 50, text: widened, imageVector: IMAGE_QUERY }, catalog);
      expect(fused).toEqual(search(0, widened, null));
    });

    it('falls back to text only when there is no image', () => {
      for (const weight of [1, 50, 99]) {
        expect(ids(search(weight, widened, null))).toEqual(ids(search(0, widened, null)));
      }
    });

    it('falls back to text only when the image query has no signal', () => {
      expect(search(50, widened, [0, 0, 0])).toEqual(search(0, widened, null));
    });
  });

  describe('worked fusion example', () => {
    const c = Math.sqrt(1 - 0.81);
    const s = Math.sqrt(1 - 0.01);
    const example = createFusionEngine({
      embeddings: EmbeddingRepository.fromMaps({
        // text: A=0.9, B=0.1; image: A=0.1, B=0.9 against query [1, 0]
        text: embeddingMap('text', { A: [0.9, c], B: [0.1, s] }),
        image: embeddingMap('image', { A: [0.1, s], B: [0.9, c] }),
      }),
      keywordExtractor: whitespaceExtractor(),
    });
    const exampleCatalog = catalogSnapshot([spot('A', 'Spot A', ''), spot('B', 'Spot B', '')]);
    const run = (weight: number) =>
      example.search({ weight, text: { query: 'view', vector: [1, 0] }, imageVector: [1, 0] }, exampleCatalog);

    it('ties at weight 50', () => {
      const results = run(50);
      expect(results).toHaveLength(2);
      for (const r of results) expect(r.combined_similarity).toBeCloseTo(0.5, 10);
    });

    it('ranks A first at weight 20', () => {
      const results = run(20);
      expect(ids(results)).toEqual(['A', 'B']);
      expect(results[0].combined_similarity).toBeCloseTo(0.74, 10);
      expect(results[1].combined_similarity).toBeCloseTo(0.26, 10);
    });
  });

  describe('invariants', () => {
    const requests: [number, SearchRequest['text'], SearchRequest['imageVector']][] = [
      [0, widened, null],
      [0, prefiltered, null],
      [35, widened, IMAGE_QUERY],
      [100, null, IMAGE_QUERY],
    ];

    it('returns the same list on every call', () => {
      for (const [w, t, i] of requests) {
        expect(search(w, t, i)).toEqual(search(w, t, i));
      }
    });

    it('never returns two records with the same name', () => {
      for (const [w, t, i] of requests) {
        const names = search(w, t, i).map((r) => r.name);
        expect(new Set(names).size).toBe(names.length);
      }
    });

    it('keeps every score within [-1, 1]', () => {
      for (const [w, t, i] of requests) {
        for (const r of search(w, t, i)) {
          for (const v of [r.similarity_score, r.text_similarity, r.image_similarity, r.combined_similarity]) {
            if (v === undefined) continue;
            expect(Number.isNaN(v)).toBe(false);
            expect(Math.abs(v)).toBeLessThanOrEqual(1);
          }
        }
      }
    });

    it('treats out-of-range weights as the nearest bound', () => {
      expect(search(-5, widened, IMAGE_QUERY)).toEqual(search(0, widened, IMAGE_QUERY));
      expect(search(180, widened, IMAGE_QUERY)).toEqual(search(100, widened, IMAGE_QUERY));
    });
  });
});
