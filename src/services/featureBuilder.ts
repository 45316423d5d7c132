// src/services/featureBuilder.ts
// What: Offline builders for the text and image embedding maps.
// How: Text: encodes each record's text fields (title, name, tag, explain, captions, location, description) and
//      mean-pools the non-zero field vectors into one vector per record. Image: looks up `<id>.jpg|.jpeg|.png` in
//      the photo directory and encodes it; records without a photo, or whose photo encodes to zeros, are left
//      out. Both run records through a p-limit pool and return the map in catalog order once every record is done.

import fs from 'node:fs/promises';
import path from 'node:path';
import pLimit from 'p-limit';
import logger from '../logging.js';
import type { EmbeddingMap, EmbeddingVector, RecordId, SpotRecord } from '../models/types.js';
import { averageNonZero, isZeroVector } from '../util/vector.js';
import type { ImageEncoder, TextEncoder } from './encoders.js';

export const TEXT_FIELDS = ['title', 'name', 'tag', 'explain', 'caption', 'caption_ja', 'location', 'description'] as const;

export const PHOTO_EXTENSIONS = ['.jpg', '.jpeg', '.png'] as const;

export function fieldTexts(record: SpotRecord): string[] {
  return TEXT_FIELDS.map((field) => {
    if (field === 'name') return record.name;
    if (field === 'location') return record.location;
    return record.textFields[field] ?? '';
  });
}

export interface BuildSummary {
  map: EmbeddingMap;
  encoded: number;
  empty: RecordId[]; // records whose every field encoded to zeros
  duration_ms: number;
}

export interface ImageBuildSummary {
  map: EmbeddingMap;
  encoded: number;
  missing: RecordId[]; // no photo on disk
  failed: RecordId[]; // photo encoded to zeros
  duration_ms: number;
}

function runPool<T>(
  records: readonly SpotRecord[],
  concurrency: number,
  task: (record: SpotRecord) => Promise<T>,
): Promise<T[]> {
  const limit = pLimit(Math.max(1, concurrency));
  return Promise.all(records.map((record) => limit(() => task(record))));
}

export async function buildTextEmbeddingMap(
  records: readonly SpotRecord[],
  encoder: TextEncoder,
  concurrency: number,
): Promise<BuildSummary> {
  const start = Date.now();

  const vectors = await runPool(records, concurrency, async (record): Promise<EmbeddingVector> => {
    // Fields of one record are encoded sequentially; the pool bounds requests in flight
    const rows: EmbeddingVector[] = [];
    for (const text of fieldTexts(record)) {
      rows.push(await encoder.encode(text));
    }
    return averageNonZero(rows, encoder.dimension);
  });

  const map = new Map<RecordId, EmbeddingVector>();
  const empty: RecordId[] = [];
  records.forEach((record, i) => {
    map.set(record.id, vectors[i]);
    if (isZeroVector(vectors[i])) empty.push(record.id);
  });

  if (empty.length > 0) {
    logger.warn({ count: empty.length, ids: empty.slice(0, 20) }, 'Records without usable text signal');
  }

  return {
    map: { modality: 'text', dimension: encoder.dimension, vectors: map },
    encoded: records.length - empty.length,
    empty,
    duration_ms: Date.now() - start,
  };
}

/** Map record id -> photo file, from the file names in `photoDir`. */
export async function indexPhotos(photoDir: string): Promise<Map<RecordId, string>> {
  const photos = new Map<RecordId, string>();
  const names = (await fs.readdir(photoDir)).sort();
  for (const name of names) {
    const ext = path.extname(name).toLowerCase();
    if (!PHOTO_EXTENSIONS.some((e) => e === ext)) continue;
    const id = path.basename(name, path.extname(name));
    if (!photos.has(id)) photos.set(id, path.join(photoDir, name));
  }
  return photos;
}

export async function buildImageEmbeddingMap(
  records: readonly SpotRecord[],
  photoDir: string,
  encoder: ImageEncoder,
  concurrency: number,
): Promise<ImageBuildSummary> {
  const start = Date.now();
  const photos = await indexPhotos(photoDir);

  const vectors = await runPool(records, concurrency, async (record): Promise<EmbeddingVector | null> => {
    const file = photos.get(record.id);
    return file ? encoder.encode(file) : null;
  });

  const map = new Map<RecordId, EmbeddingVector>();
  const missing: RecordId[] = [];
  const failed: RecordId[] = [];
  records.forEach((record, i) => {
    const vector = vectors[i];
    if (vector === null) missing.push(record.id);
    else if (isZeroVector(vector)) failed.push(record.id);
    else map.set(record.id, vector);
  });

  if (missing.length > 0) {
    logger.warn({ count: missing.length, ids: missing.slice(0, 20), photoDir }, 'Records without a photo');
  }
  if (failed.length > 0) {
    logger.warn({ count: failed.length, ids: failed.slice(0, 20) }, 'Photos that could not be encoded');
  }

  return {
    map: { modality: 'image', dimension: encoder.dimension, vectors: map },
    encoded: map.size,
    missing,
    failed,
    duration_ms: Date.now() - start,
  };
}
