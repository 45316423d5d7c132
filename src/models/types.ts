// src/models/types.ts
// What: Shared TypeScript types for catalog records, embeddings and ranking results.
// How: Records are read-only snapshots; score fields use the snake_case names the service returns.

export type RecordId = string;

export type Modality = 'text' | 'image';

export const MODALITIES: readonly Modality[] = ['text', 'image'] as const;

export interface SpotRecord {
  readonly id: RecordId;
  readonly name: string; // display name, dedup key
  readonly location: string;
  // title, tag, explain, caption, caption_ja, description and any other string attribute
  readonly textFields: Readonly<Record<string, string>>;
}

/** Fixed-length vector; all zeros means "no usable signal". */
export type EmbeddingVector = readonly number[];

export interface EmbeddingMap {
  readonly modality: Modality;
  readonly dimension: number;
  readonly vectors: ReadonlyMap<RecordId, EmbeddingVector>;
}

export interface RankedHit {
  id: RecordId;
  score: number;
}

export interface FusedHit extends RankedHit {
  textScore: number;
  imageScore: number;
}

export interface SimilarityScores {
  similarity_score?: number;
  text_similarity?: number;
  image_similarity?: number;
  combined_similarity?: number;
}

export type ScoredRecord = SpotRecord & SimilarityScores;

export interface TextQuery {
  query: string;
  vector: EmbeddingVector;
}

export interface SearchRequest {
  weight: number; // 0 = text only, 100 = image only
  text: TextQuery | null;
  imageVector: EmbeddingVector | null;
}

export interface RecommendResult {
  request_id: string;
  weight: number;
  result: ScoredRecord[];
  total_found: number;
}
