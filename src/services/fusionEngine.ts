// src/services/fusionEngine.ts
// What: Dispatches a search to the text, image or fused pipeline according to the blend weight.
// How: weight 0 -> text only (location prefilter, widened to the whole catalog on a miss); weight 100 -> image
//      only over the full image map; anything between runs both and blends their scores over the union of ids,
//      a missing side counting as 0. Recoverable modality errors collapse that modality to an empty ranking;
//      if the image side of a fused request ends up empty the text-only result is returned instead.

import logger from '../logging.js';
import { isRecoverable } from '../errors.js';
import type { CatalogSnapshot } from '../repositories/catalogRepository.js';
import type { EmbeddingRepository } from '../repositories/embeddingRepository.js';
import type {
  EmbeddingVector,
  FusedHit,
  Modality,
  RankedHit,
  RecordId,
  ScoredRecord,
  SearchRequest,
  TextQuery,
} from '../models/types.js';
import type { KeywordExtractor } from './keywords.js';
import { filterByKeywords } from './keywordFilter.js';
import { compareHits, rankByModality } from './modalityRanker.js';
import { assembleResults } from './resultAssembler.js';

export const MIN_WEIGHT = 0;
export const MAX_WEIGHT = 100;

export interface FusionEngineDeps {
  embeddings: EmbeddingRepository;
  keywordExtractor: KeywordExtractor;
}

export interface FusionEngine {
  search(request: SearchRequest, catalog: CatalogSnapshot): ScoredRecord[];
}

/** Out-of-range weights are a caller mistake we recover from locally. */
export function clampWeight(weight: number): number {
  if (weight >= MIN_WEIGHT && weight <= MAX_WEIGHT) return weight;
  const clamped = Number.isNaN(weight) ? MIN_WEIGHT : Math.max(MIN_WEIGHT, Math.min(MAX_WEIGHT, weight));
  logger.warn({ code: 'INVALID_WEIGHT', weight, clamped }, 'Weight out of range; clamping');
  return clamped;
}

/**
 * Blend two rankings. `imageWeight` is in [0, 1]; ids present on one side only
 * score 0 on the other.
 */
export function fuseRankings(
  textHits: readonly RankedHit[],
  imageHits: readonly RankedHit[],
  imageWeight: number,
): FusedHit[] {
  const textScores = new Map<RecordId, number>(textHits.map((h) => [h.id, h.score]));
  const imageScores = new Map<RecordId, number>(imageHits.map((h) => [h.id, h.score]));
  const ids = new Set<RecordId>([...textScores.keys(), ...imageScores.keys()]);

  const fused: FusedHit[] = [];
  for (const id of ids) {
    const textScore = textScores.get(id) ?? 0;
    const imageScore = imageScores.get(id) ?? 0;
    fused.push({
      id,
      textScore,
      imageScore,
      score: (1 - imageWeight) * textScore + imageWeight * imageScore,
    });
  }
  fused.sort(compareHits);
  return fused;
}

export function createFusionEngine(deps: FusionEngineDeps): FusionEngine {
  function rankSafely(
    modality: Modality,
    vector: EmbeddingVector,
    restrictTo?: ReadonlySet<RecordId>,
  ): RankedHit[] {
    try {
      return rankByModality(vector, deps.embeddings.allVectors(modality), restrictTo);
    } catch (err: unknown) {
      if (!isRecoverable(err)) throw err;
      logger.warn({ modality, code: err.code, err }, 'Modality skipped');
      return [];
    }
  }

  function textPipeline(text: TextQuery | null, catalog: CatalogSnapshot): RankedHit[] {
    if (!text) return [];
    const { keywords, candidates, matchedLocations } = filterByKeywords(text.query, catalog, deps.keywordExtractor);
    if (candidates.length === 0) {
      logger.debug({ keywords: [...keywords] }, 'No location match; searching the whole catalog');
      return rankSafely('text', text.vector);
    }
    logger.debug(
      { keywords: [...keywords], candidates: candidates.length, locations: [...matchedLocations] },
      'Location prefilter applied',
    );
    return rankSafely('text', text.vector, new Set(candidates.map((r) => r.id)));
  }

  function imagePipeline(vector: EmbeddingVector | null): RankedHit[] {
    return vector ? rankSafely('image', vector) : [];
  }

  return {
    search(request: SearchRequest, catalog: CatalogSnapshot): ScoredRecord[] {
      const weight = clampWeight(request.weight);

      if (weight === MIN_WEIGHT) {
        return assembleResults(textPipeline(request.text, catalog), catalog);
      }
      if (weight === MAX_WEIGHT) {
        return assembleResults(imagePipeline(request.imageVector), catalog);
      }

      const textHits = textPipeline(request.text, catalog);
      const imageHits = imagePipeline(request.imageVector);
      if (imageHits.length === 0) {
        logger.info({ weight }, 'Image ranking empty; falling back to text only');
        return assembleResults(textHits, catalog);
      }

      const imageWeight = weight / MAX_WEIGHT;
      const fused = fuseRankings(textHits, imageHits, imageWeight);
      logger.debug(
        { weight, text: textHits.length, image: imageHits.length, fused: fused.length, top: fused[0]?.score },
        'Rankings fused',
      );
      return assembleResults(fused, catalog, (hit) => ({
        text_similarity: hit.textScore,
        image_similarity: hit.imageScore,
        combined_similarity: hit.score,
      }));
    },
  };
}
