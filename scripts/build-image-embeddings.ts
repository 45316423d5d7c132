// scripts/build-image-embeddings.ts
// What: Rebuilds the image embedding file from the photo directory.
// How: Loads .env and the catalog, encodes `<id>.jpg|.jpeg|.png` for every record through the bounded builder pool
//      and writes IMAGE_EMBEDDINGS_PATH. Logs a summary and exits non-zero on error.

import config from '../src/config/env.js';
import logger from '../src/logging.js';
import { createCatalogRepository, createImageEncoder } from '../src/container.js';
import { saveEmbeddingMap } from '../src/repositories/embeddingRepository.js';
import { buildImageEmbeddingMap } from '../src/services/featureBuilder.js';

async function main(): Promise<void> {
  const catalog = await createCatalogRepository().load();
  const encoder = createImageEncoder();
  logger.info(
    { records: catalog.size, photoDir: config.PHOTO_DIR, concurrency: config.EMBED_CONCURRENCY },
    'Building image embeddings',
  );

  const summary = await buildImageEmbeddingMap(
    catalog.allRecords(),
    config.PHOTO_DIR,
    encoder,
    config.EMBED_CONCURRENCY,
  );
  await saveEmbeddingMap(config.IMAGE_EMBEDDINGS_PATH, summary.map, config.IMAGE_ENCODER_URL);

  logger.info(
    {
      file: config.IMAGE_EMBEDDINGS_PATH,
      encoded: summary.encoded,
      missing: summary.missing.length,
      failed: summary.failed.length,
      duration_ms: summary.duration_ms,
    },
    'Image embeddings written',
  );
}

main().catch((err: unknown) => {
  logger.error({ err }, 'Image embedding build failed');
  process.exitCode = 1;
});
