// src/services/recommender.ts
// What: Request-level entry point: sentinel handling, query encoding, fusion, result capping.
// How: Validates the request with zod. The literal "null" marks a missing text or image (an empty string is a
//      supplied, empty text). Image references are resolved by basename inside the query image directory; with
//      no image, text present and an image weight above 0, the optional generator renders one from the text; that
//      file is deleted once encoded.
//      Both encodings run concurrently, then the catalog snapshot and embedding maps are handed to the engine.

import fs from 'node:fs/promises';
import path from 'node:path';
import { z } from 'zod';
import { v4 as uuidv4 } from 'uuid';
import logger from '../logging.js';
import { InvalidRequestError } from '../errors.js';
import type { CatalogRepository } from '../repositories/catalogRepository.js';
import type { EmbeddingRepository } from '../repositories/embeddingRepository.js';
import type { EmbeddingVector, RecommendResult } from '../models/types.js';
import type { ImageEncoder, TextEncoder } from './encoders.js';
import type { ImageGenerator } from './imageGenerator.js';
import type { KeywordExtractor } from './keywords.js';
import { clampWeight, createFusionEngine, MAX_WEIGHT, MIN_WEIGHT } from './fusionEngine.js';

export const NULL_SENTINEL = 'null';

const requestSchema = z
  .object({
    weight: z.number().finite(),
    text: z.string().max(2000),
    image: z.string().max(255),
  })
  .refine((r) => r.text !== NULL_SENTINEL || r.image !== NULL_SENTINEL, {
    message: 'At least one of text or image must be supplied',
  });

export type RecommendRequest = z.input<typeof requestSchema>;

export interface RecommenderDeps {
  catalog: CatalogRepository;
  embeddings: EmbeddingRepository;
  textEncoder: TextEncoder;
  imageEncoder: ImageEncoder;
  keywordExtractor: KeywordExtractor;
  imageGenerator?: ImageGenerator;
  queryImageDir: string;
  maxResults: number;
}

export interface Recommender {
  recommend(request: RecommendRequest): Promise<RecommendResult>;
}

/** Resolve a client-supplied file name inside `dir`, ignoring any path components it carries. */
export function resolveQueryImage(dir: string, ref: string): string {
  return path.join(dir, path.basename(ref));
}

export function createRecommender(deps: RecommenderDeps): Recommender {
  const engine = createFusionEngine({ embeddings: deps.embeddings, keywordExtractor: deps.keywordExtractor });

  async function imagePathFor(
    requestId: string,
    image: string | null,
    text: string | null,
  ): Promise<{ file: string; generated: boolean } | null> {
    if (image !== null) return { file: resolveQueryImage(deps.queryImageDir, image), generated: false };
    if (text === null || !text.trim() || !deps.imageGenerator) return null;
    try {
      return { file: await deps.imageGenerator.generate(text), generated: true };
    } catch (err: unknown) {
      logger.warn({ err, requestId }, 'Image generation failed; image modality skipped');
      return null;
    }
  }

  async function encodeImage(requestId: string, image: string | null, text: string | null): Promise<EmbeddingVector | null> {
    const source = await imagePathFor(requestId, image, text);
    if (source === null) return null;
    try {
      return await deps.imageEncoder.encode(source.file);
    } finally {
      if (source.generated) {
        await fs.rm(source.file, { force: true }).catch((err: unknown) => {
          logger.warn({ err, requestId, file: source.file }, 'Could not remove generated query image');
        });
      }
    }
  }

  return {
    async recommend(request: RecommendRequest): Promise<RecommendResult> {
      const parsed = requestSchema.safeParse(request);
      if (!parsed.success) {
        throw new InvalidRequestError(parsed.error.issues.map((i) => i.message).join('; '));
      }

      const requestId = uuidv4();
      const weight = clampWeight(parsed.data.weight);
      const text = parsed.data.text === NULL_SENTINEL ? null : parsed.data.text;
      const image = parsed.data.image === NULL_SENTINEL ? null : parsed.data.image;
      logger.info({ requestId, weight, text, image }, 'Recommendation requested');

      // Catalog failure is fatal, so it is checked before paying for any encoding
      const catalog = await deps.catalog.load();
      await deps.embeddings.preload();

      const [textVector, imageVector] = await Promise.all([
        weight < MAX_WEIGHT && text !== null ? deps.textEncoder.encode(text) : Promise.resolve(null),
        weight > MIN_WEIGHT ? encodeImage(requestId, image, text) : Promise.resolve(null),
      ]);

      const ranked = engine.search(
        {
          weight,
          text: text !== null && textVector !== null ? { query: text, vector: textVector } : null,
          imageVector,
        },
        catalog,
      );

      const result = ranked.slice(0, deps.maxResults);
      logger.info(
        { requestId, total_found: ranked.length, returned: result.length, top: result[0]?.id },
        'Recommendation finished',
      );
      return { request_id: requestId, weight, result, total_found: ranked.length };
    },
  };
}
