// scripts/build-text-embeddings.ts
// What: Rebuilds the text embedding file from the catalog.
// How: Loads .env and the catalog, encodes every record through the bounded builder pool, writes
//      TEXT_EMBEDDINGS_PATH in the format the embedding repository reads. Logs a summary and exits non-zero on error.

import config from '../src/config/env.js';
import logger from '../src/logging.js';
import { createCatalogRepository, createTextEncoder } from '../src/container.js';
import { saveEmbeddingMap } from '../src/repositories/embeddingRepository.js';
import { buildTextEmbeddingMap } from '../src/services/featureBuilder.js';

async function main(): Promise<void> {
  const catalog = await createCatalogRepository().load();
  const encoder = createTextEncoder();
  logger.info(
    { records: catalog.size, model: encoder.model, concurrency: config.EMBED_CONCURRENCY },
    'Building text embeddings',
  );

  const summary = await buildTextEmbeddingMap(catalog.allRecords(), encoder, config.EMBED_CONCURRENCY);
  await saveEmbeddingMap(config.TEXT_EMBEDDINGS_PATH, summary.map, encoder.model);

  logger.info(
    {
      file: config.TEXT_EMBEDDINGS_PATH,
      encoded: summary.encoded,
      empty: summary.empty.length,
      duration_ms: summary.duration_ms,
    },
    'Text embeddings written',
  );
}

main().catch((err: unknown) => {
  logger.error({ err }, 'Text embedding build failed');
  process.exitCode = 1;
});
