// src/container.ts
// What: Composition root.
// How: Builds repositories and collaborators from the validated environment and wires them into a Recommender.
//      Nothing below this file reads configuration or holds global model instances. The tokenizer dictionary
//      loads asynchronously, so building the recommender is async too.

import config from './config/env.js';
import { CatalogRepository } from './repositories/catalogRepository.js';
import { EmbeddingRepository } from './repositories/embeddingRepository.js';
import {
  createOpenAITextEncoder,
  createRemoteImageEncoder,
  type ImageEncoder,
  type TextEncoder,
} from './services/encoders.js';
import { createRemoteImageGenerator } from './services/imageGenerator.js';
import { createKeywordExtractor, createKuromojiTokenizer } from './services/keywords.js';
import { createOpenAITranslator } from './services/promptTranslator.js';
import { createRecommender, type Recommender } from './services/recommender.js';

const hfToken = config.HUGGING_API_KEY || undefined;

export function createTextEncoder(): TextEncoder {
  return createOpenAITextEncoder({
    apiKey: config.OPENAI_API_KEY,
    model: config.OPENAI_EMBED_MODEL,
    dimension: config.TEXT_EMBED_DIMS,
  });
}

export function createImageEncoder(): ImageEncoder {
  return createRemoteImageEncoder({
    endpoint: config.IMAGE_ENCODER_URL,
    apiToken: hfToken,
    dimension: config.IMAGE_EMBED_DIMS,
    timeoutMs: config.REMOTE_TIMEOUT_MS,
  });
}

export function createCatalogRepository(): CatalogRepository {
  return new CatalogRepository(config.CATALOG_PATH);
}

export async function buildRecommender(): Promise<Recommender> {
  const tokenizer = await createKuromojiTokenizer(config.KUROMOJI_DICT_PATH);

  return createRecommender({
    catalog: createCatalogRepository(),
    embeddings: new EmbeddingRepository({
      text: config.TEXT_EMBEDDINGS_PATH,
      image: config.IMAGE_EMBEDDINGS_PATH,
    }),
    textEncoder: createTextEncoder(),
    imageEncoder: createImageEncoder(),
    keywordExtractor: createKeywordExtractor({
      tokenizer,
      minLength: config.KEYWORD_MIN_LENGTH,
      partsOfSpeech: config.KEYWORD_POS,
    }),
    imageGenerator: hfToken
      ? createRemoteImageGenerator({
          endpoint: config.IMAGE_GENERATOR_URL,
          apiToken: hfToken,
          outputDir: config.QUERY_IMAGE_DIR,
          translator: createOpenAITranslator({ apiKey: config.OPENAI_API_KEY, model: config.OPENAI_CHAT_MODEL }),
          timeoutMs: config.REMOTE_TIMEOUT_MS,
        })
      : undefined,
    queryImageDir: config.QUERY_IMAGE_DIR,
    maxResults: config.MAX_RESULTS,
  });
}
