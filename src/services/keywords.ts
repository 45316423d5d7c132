// src/services/keywords.ts
// What: Keyword extraction for the location prefilter.
// How: A Tokenizer splits text into surface forms with a part-of-speech tag. The extractor keeps tokens of at least
//      minLength code points whose tag is in the allow-list. The bundled tokenizer is kuromoji over the IPADIC
//      dictionary shipped inside the package; its `pos` is the coarse tag (名詞, 動詞, 助詞, ...).

import { createRequire } from 'node:module';
import path from 'node:path';
import kuromoji from 'kuromoji';
import logger from '../logging.js';

export interface Token {
  surface: string;
  pos: string | null; // null when the tokenizer cannot tag
}

export interface Tokenizer {
  tokenize(text: string): Token[];
}

export interface KeywordExtractor {
  extract(text: string): Set<string>;
}

export interface KeywordExtractorOptions {
  tokenizer: Tokenizer;
  minLength: number;
  partsOfSpeech: readonly string[];
}

/** Directory of the IPADIC files bundled with the installed kuromoji package. */
export function bundledDictionaryPath(): string {
  const require = createRequire(import.meta.url);
  return path.join(path.dirname(require.resolve('kuromoji/package.json')), 'dict');
}

/**
 * Build a morphological tokenizer. Loading the dictionary takes a moment, so build
 * once and share the result.
 */
export function createKuromojiTokenizer(dicPath: string = bundledDictionaryPath()): Promise<Tokenizer> {
  const start = Date.now();
  return new Promise((resolve, reject) => {
    kuromoji.builder({ dicPath }).build((err, analyzer) => {
      if (err) {
        reject(new Error(`Cannot load kuromoji dictionary from ${dicPath}`, { cause: err }));
        return;
      }
      logger.debug({ dicPath, duration_ms: Date.now() - start }, 'Tokenizer dictionary loaded');
      resolve({
        tokenize: (text: string): Token[] =>
          analyzer.tokenize(text).map((t) => ({ surface: t.surface_form, pos: t.pos })),
      });
    });
  });
}

export function createKeywordExtractor(opts: KeywordExtractorOptions): KeywordExtractor {
  const allowed = new Set(opts.partsOfSpeech);
  return {
    extract(text: string): Set<string> {
      const keywords = new Set<string>();
      if (!text.trim()) return keywords;
      for (const { surface, pos } of opts.tokenizer.tokenize(text)) {
        if (!surface.trim()) continue;
        if ([...surface].length < opts.minLength) continue;
        if (pos !== null && !allowed.has(pos)) continue;
        keywords.add(surface);
      }
      return keywords;
    },
  };
}
