// scripts/recommend.ts
// What: Runs one recommendation from the command line.
// How: Usage: recommend <weight 0-100> <text|null> [image file name|null]. Prints the result JSON to stdout.

import logger from '../src/logging.js';
import { buildRecommender } from '../src/container.js';
import { NULL_SENTINEL } from '../src/services/recommender.js';

async function main(): Promise<void> {
  const [weightArg, text = NULL_SENTINEL, image = NULL_SENTINEL] = process.argv.slice(2);
  const weight = Number(weightArg);
  if (weightArg === undefined || Number.isNaN(weight)) {
    console.error('Usage: recommend <weight 0-100> <text|null> [image|null]');
    process.exitCode = 2;
    return;
  }

  const recommender = await buildRecommender();
  const result = await recommender.recommend({ weight, text, image });
  process.stdout.write(`${JSON.stringify(result, null, 2)}\n`);
}

main().catch((err: unknown) => {
  logger.error({ err }, 'Recommendation failed');
  process.exitCode = 1;
});
