// src/services/imageGenerator.ts
// What: Text-to-image generation for requests that carry text but no image.
// How: Optionally translates the prompt to English, POSTs { inputs: prompt } to a text-to-image inference endpoint
//      and writes the returned bytes into the output directory under a uuid file name. Unlike the encoders this
//      one rejects on failure; the recommender decides what a missing image means and removes the file once used.

import fs from 'node:fs/promises';
import path from 'node:path';
import { v4 as uuidv4 } from 'uuid';
import logger from '../logging.js';
import type { PromptTranslator } from './promptTranslator.js';

export interface ImageGenerator {
  /** Returns the absolute path of the generated image. */
  generate(prompt: string): Promise<string>;
}

export class ImageGenerationError extends Error {
  status?: number;
  constructor(message: string, status?: number) {
    super(message);
    this.name = 'ImageGenerationError';
    this.status = status;
  }
}

export interface RemoteImageGeneratorOptions {
  endpoint: string;
  apiToken: string;
  outputDir: string;
  translator?: PromptTranslator;
  timeoutMs?: number;
  fetchImpl?: typeof fetch;
}

export function createRemoteImageGenerator(opts: RemoteImageGeneratorOptions): ImageGenerator {
  const fetchImpl = opts.fetchImpl ?? fetch;
  const timeoutMs = opts.timeoutMs ?? 60_000;

  return {
    async generate(prompt: string): Promise<string> {
      if (!prompt.trim()) throw new ImageGenerationError('Cannot generate an image from an empty prompt');
      const inputs = opts.translator ? await opts.translator.translate(prompt) : prompt;

      const response = await fetchImpl(opts.endpoint, {
        method: 'POST',
        headers: {
          Authorization: `Bearer ${opts.apiToken}`,
          'Content-Type': 'application/json',
        },
        body: JSON.stringify({ inputs }),
        signal: AbortSignal.timeout(timeoutMs),
      });
      if (!response.ok) {
        const body = await response.text();
        throw new ImageGenerationError(
          `Image generation failed (${response.status}): ${body.slice(0, 500)}`,
          response.status,
        );
      }

      const bytes = Buffer.from(await response.arrayBuffer());
      await fs.mkdir(opts.outputDir, { recursive: true });
      const file = path.join(opts.outputDir, `${uuidv4()}.jpg`);
      await fs.writeFile(file, bytes);
      logger.info({ file, bytes: bytes.length, inputs }, 'Generated query image');
      return file;
    },
  };
}
