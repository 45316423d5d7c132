/**
 * src/config/env.ts
 * What: Environment configuration loader/validator for the recommender.
 * How: Loads .env via dotenv, validates with zod, then resolves every data path against process.cwd()
 *      so scripts behave the same regardless of the directory they are started from.
 *        - Catalog and embedding files default to data/ under the project root.
 *        - The image generator is only enabled when HUGGING_API_KEY is non-empty.
 *        - KEYWORD_POS is a comma-separated allow-list of part-of-speech tags; KUROMOJI_DICT_PATH overrides the
 *          dictionary bundled with kuromoji.
 */

import 'dotenv/config';
import path from 'node:path';
import { z } from 'zod';

const intWithDefault = (def: number) =>
  z.preprocess(
    (v: unknown) => {
      if (typeof v !== 'string') return v;
      // Treat "FOO=" in .env as unset so the default applies
      return v.trim() === '' ? undefined : Number.parseInt(v, 10);
    },
    z.number().int().positive().default(def),
  );

const listWithDefault = (def: [string, ...string[]]) =>
  z.preprocess(
    (v: unknown) =>
      typeof v === 'string'
        ? v
            .split(',')
            .map((s) => s.trim())
            .filter((s) => s.length > 0)
        : v,
    z.array(z.string().min(1)).nonempty().default(def),
  );

const schema = z.object({
  OPENAI_API_KEY: z.string().min(1, 'OPENAI_API_KEY is required'),
  OPENAI_EMBED_MODEL: z.string().min(1).default('text-embedding-3-small'),
  OPENAI_CHAT_MODEL: z.string().min(1).default('gpt-4o-mini'),
  TEXT_EMBED_DIMS: intWithDefault(1536),
  CATALOG_PATH: z.string().min(1).default('data/catalog.json'),
  TEXT_EMBEDDINGS_PATH: z.string().min(1).default('data/embeddings/text.json'),
  IMAGE_EMBEDDINGS_PATH: z.string().min(1).default('data/embeddings/image.json'),
  QUERY_IMAGE_DIR: z.string().min(1).default('data/query'),
  PHOTO_DIR: z.string().min(1).default('data/photo'),
  IMAGE_ENCODER_URL: z
    .string()
    .url()
    .default('https://api-inference.huggingface.co/models/google/vit-base-patch16-224'),
  IMAGE_EMBED_DIMS: intWithDefault(768),
  IMAGE_GENERATOR_URL: z
    .string()
    .url()
    .default('https://api-inference.huggingface.co/models/stabilityai/stable-diffusion-3.5-large-turbo'),
  HUGGING_API_KEY: z.string().default(''),
  REMOTE_TIMEOUT_MS: intWithDefault(60_000),
  MAX_RESULTS: intWithDefault(20),
  EMBED_CONCURRENCY: intWithDefault(20),
  KEYWORD_MIN_LENGTH: intWithDefault(2),
  KEYWORD_POS: listWithDefault(['名詞', '形容詞', '動詞', '形容動詞', '形状詞']),
  KUROMOJI_DICT_PATH: z.string().optional(),
  NODE_ENV: z.enum(['production', 'development', 'test']).optional().default('development'),
});

const parsed = schema.safeParse(process.env);
if (!parsed.success) {
  const issues = parsed.error.errors.map((e) => `${e.path.join('.')}: ${e.message}`).join('; ');
  throw new Error(`Invalid environment configuration: ${issues}`);
}

export type AppConfig = z.infer<typeof schema>;

const base = parsed.data;

const fromCwd = (p: string): string => (path.isAbsolute(p) ? p : path.resolve(process.cwd(), p));

const config: AppConfig = {
  ...base,
  CATALOG_PATH: fromCwd(base.CATALOG_PATH),
  TEXT_EMBEDDINGS_PATH: fromCwd(base.TEXT_EMBEDDINGS_PATH),
  IMAGE_EMBEDDINGS_PATH: fromCwd(base.IMAGE_EMBEDDINGS_PATH),
  QUERY_IMAGE_DIR: fromCwd(base.QUERY_IMAGE_DIR),
  PHOTO_DIR: fromCwd(base.PHOTO_DIR),
  KUROMOJI_DICT_PATH: base.KUROMOJI_DICT_PATH ? fromCwd(base.KUROMOJI_DICT_PATH) : undefined,
};

export default config;
