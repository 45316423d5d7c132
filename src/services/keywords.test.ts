import { beforeAll, describe, expect, it } from 'vitest';
import { createKeywordExtractor, createKuromojiTokenizer, type Token, type Tokenizer } from './keywords.js';
import { filterByKeywords } from './keywordFilter.js';
import { catalogSnapshot, whitespaceExtractor } from '../__fixtures__/spots.js';

const TAGGED: Token[] = [
  { surface: '函館', pos: '名詞' },
  { surface: 'の', pos: '助詞' },
  { surface: '夜景', pos: '名詞' },
  { surface: '綺麗', pos: '形容動詞' },
  { surface: 'です', pos: '助動詞' },
  { surface: '見る', pos: '動詞' },
  { surface: '山', pos: '名詞' },
];

describe('createKeywordExtractor', () => {
  const extractor = createKeywordExtractor({
    tokenizer: { tokenize: () => TAGGED },
    minLength: 2,
    partsOfSpeech: ['名詞', '形容詞', '動詞', '形容動詞', '形状詞'],
  });

  it('keeps allowed parts of speech at or above the minimum length', () => {
    expect(extractor.extract('函館の夜景が綺麗です')).toEqual(new Set(['函館', '夜景', '綺麗', '見る']));
  });

  it('returns an empty set for blank text', () => {
    expect(extractor.extract('   ')).toEqual(new Set());
  });

  it('counts length in code points', () => {
    const ext = createKeywordExtractor({
      tokenizer: { tokenize: () => [{ surface: '𠮷野', pos: null }] },
      minLength: 3,
      partsOfSpeech: [],
    });
    expect(ext.extract('𠮷野')).toEqual(new Set());
  });

  it('lets untagged tokens through on length alone', () => {
    const ext = createKeywordExtractor({
      tokenizer: { tokenize: () => [{ surface: 'Hakodate', pos: null }, { surface: 'view', pos: null }] },
      minLength: 6,
      partsOfSpeech: ['名詞'],
    });
    expect(ext.extract('Hakodate view')).toEqual(new Set(['Hakodate']));
  });
});

describe('createKuromojiTokenizer', () => {
  let tokenizer: Tokenizer;

  beforeAll(async () => {
    tokenizer = await createKuromojiTokenizer();
  }, 30_000);

  it('tags each token with its coarse part of speech', () => {
    const tokens = tokenizer.tokenize('函館から小樽まで');
    expect(tokens).toEqual([
      { surface: '函館', pos: '名詞' },
      { surface: 'から', pos: '助詞' },
      { surface: '小樽', pos: '名詞' },
      { surface: 'まで', pos: '助詞' },
    ]);
  });

  it('drops particles and auxiliaries from keywords', () => {
    const ext = createKeywordExtractor({ tokenizer, minLength: 2, partsOfSpeech: ['名詞'] });
    const keywords = ext.extract('函館から小樽まで行きたいです');

    expect(keywords).toEqual(new Set(['函館', '小樽']));
  });

  it('keeps verbs when they are allowed', () => {
    const ext = createKeywordExtractor({ tokenizer, minLength: 2, partsOfSpeech: ['名詞', '動詞'] });
    const keywords = ext.extract('函館から小樽まで行きたいです');

    expect(keywords.has('行き')).toBe(true);
    expect(keywords.has('から')).toBe(false);
    expect(keywords.has('です')).toBe(false);
  });
});

describe('filterByKeywords', () => {
  const catalog = catalogSnapshot();

  it('returns records whose location contains a keyword', () => {
    const result = filterByKeywords('五稜郭 タワー', catalog, whitespaceExtractor());
    expect(result.keywords).toEqual(new Set(['五稜郭', 'タワー']));
    expect(result.candidates.map((r) => r.id)).toEqual(['a', 'd']);
    expect(result.matchedLocations).toEqual(new Set(['函館市五稜郭町']));
  });

  it('returns no candidates when nothing matches', () => {
    const result = filterByKeywords('札幌 夜景', catalog, whitespaceExtractor());
    expect(result.candidates).toEqual([]);
    expect(result.matchedLocations.size).toBe(0);
  });

  it('returns no candidates when no keyword survives extraction', () => {
    const result = filterByKeywords('函 館', catalog, whitespaceExtractor());
    expect(result.keywords.size).toBe(0);
    expect(result.candidates).toEqual([]);
  });
});
