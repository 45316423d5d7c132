// src/services/encoders.ts
// What: Query encoders for both modalities.
// How: Text goes through the OpenAI embeddings endpoint; images are POSTed as raw bytes to a feature-extraction
//      endpoint (Hugging Face inference shape). Neither encoder rejects: empty input, transport errors and
//      unexpected sizes are logged and answered with a zero vector, which the ranker reads as "no signal".

import fs from 'node:fs/promises';
import OpenAI from 'openai';
import { z } from 'zod';
import logger from '../logging.js';
import type { EmbeddingVector } from '../models/types.js';
import { zeroVector } from '../util/vector.js';

export interface TextEncoder {
  readonly model: string;
  readonly dimension: number;
  encode(text: string): Promise<EmbeddingVector>;
}

export interface ImageEncoder {
  readonly dimension: number;
  encode(imagePath: string): Promise<EmbeddingVector>;
}

/** Subset of the OpenAI client the text encoder uses. */
export interface EmbeddingsClient {
  embeddings: {
    create(body: { model: string; input: string }): Promise<{ data: { embedding: number[] }[] }>;
  };
}

export interface OpenAITextEncoderOptions {
  apiKey?: string;
  client?: EmbeddingsClient;
  model: string;
  dimension: number;
}

export function createOpenAITextEncoder(opts: OpenAITextEncoderOptions): TextEncoder {
  const client: EmbeddingsClient = opts.client ?? new OpenAI({ apiKey: opts.apiKey });
  const { model, dimension } = opts;

  return {
    model,
    dimension,
    async encode(text: string): Promise<EmbeddingVector> {
      if (!text.trim()) return zeroVector(dimension);
      try {
        const res = await client.embeddings.create({ model, input: text });
        const vec = res.data[0]?.embedding;
        if (!vec || vec.length !== dimension) {
          logger.warn({ model, expected: dimension, got: vec?.length }, 'Unexpected text embedding size');
          return zeroVector(dimension);
        }
        return vec;
      } catch (err: unknown) {
        logger.error({ err, model }, 'Text encoding failed');
        return zeroVector(dimension);
      }
    },
  };
}

// Either a pooled vector or a token matrix whose first row is the [CLS] token
const featureResponse = z.union([z.array(z.number()), z.array(z.array(z.number())).nonempty()]);

export interface RemoteImageEncoderOptions {
  endpoint: string;
  apiToken?: string;
  dimension: number;
  timeoutMs?: number;
  fetchImpl?: typeof fetch;
}

export function createRemoteImageEncoder(opts: RemoteImageEncoderOptions): ImageEncoder {
  const { endpoint, dimension } = opts;
  const fetchImpl = opts.fetchImpl ?? fetch;
  const timeoutMs = opts.timeoutMs ?? 60_000;

  return {
    dimension,
    async encode(imagePath: string): Promise<EmbeddingVector> {
      try {
        const bytes = await fs.readFile(imagePath);
        const headers: Record<string, string> = { 'Content-Type': 'application/octet-stream' };
        if (opts.apiToken) headers.Authorization = `Bearer ${opts.apiToken}`;

        const response = await fetchImpl(endpoint, {
          method: 'POST',
          headers,
          body: bytes,
          signal: AbortSignal.timeout(timeoutMs),
        });
        if (!response.ok) {
          const body = await response.text();
          logger.error({ status: response.status, body: body.slice(0, 500), endpoint }, 'Image encoder request failed');
          return zeroVector(dimension);
        }

        const parsed = featureResponse.safeParse(await response.json());
        if (!parsed.success) {
          logger.error({ endpoint, issues: parsed.error.issues }, 'Unexpected image encoder response');
          return zeroVector(dimension);
        }
        const data = parsed.data;
        const vec = isMatrix(data) ? data[0] : data;
        if (vec.length !== dimension) {
          logger.warn({ expected: dimension, got: vec.length }, 'Unexpected image embedding size');
          return zeroVector(dimension);
        }
        return vec;
      } catch (err: unknown) {
        logger.error({ err, imagePath }, 'Image encoding failed');
        return zeroVector(dimension);
      }
    },
  };
}

function isMatrix(v: number[] | number[][]): v is number[][] {
  return v.length > 0 && Array.isArray(v[0]);
}
