import { describe, it, expect, vi, afterEach } from 'vitest';
import { loadEngineConfig } from '../src/config.js';

describe('loadEngineConfig', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('applies defaults for an empty environment', () => {
    const config = loadEngineConfig({});
    expect(config).toMatchObject({
      shingleSize: 5,
      numPerm: 128,
      lshThreshold: 0.5,
      bands: 25,
      rows: 5,
      indexPath: './data/index/lsh.tgix',
      cacheDir: './data/page-cache',
      cacheTtlMs: 86_400_000,
      minPageWords: 50,
      fallbackSeeds: [],
      defaults: { maxPhrases: 5, maxCandidateURLs: 10, useSemantic: false, topK: 5 },
      search: { provider: 'auto', serperApiKey: undefined },
    });
    expect(config.scoring).toEqual({
      shingleSize: 5,
      acceptJaccard: 0.15,
      acceptSemantic: 0.6,
      lexicalWeight: 0.6,
      semanticWeight: 0.4,
      semanticWindowChars: 2_000,
    });
  });

  it('derives bands from the threshold', () => {
    expect(loadEngineConfig({ LSH_THRESHOLD: '0.8' })).toMatchObject({ bands: 12, rows: 10 });
    expect(loadEngineConfig({ NUM_PERM: '64' })).toMatchObject({ numPerm: 64, bands: 12, rows: 5 });
  });

  it('reads explicit values', () => {
    const config = loadEngineConfig({
      SHINGLE_SIZE: '3',
      FALLBACK_SEED_URLS: 'https://a.test/, https://b.test/ ,',
      DEFAULT_USE_SEMANTIC: 'true',
      SEARCH_PROVIDER: 'DuckDuckGo',
      LITELLM_PROXY_URL: 'http://proxy.test/v1',
    });
    expect(config.shingleSize).toBe(3);
    expect(config.scoring.shingleSize).toBe(3);
    expect(config.fallbackSeeds).toEqual(['https://a.test/', 'https://b.test/']);
    expect(config.defaults.useSemantic).toBe(true);
    expect(config.search.provider).toBe('duckduckgo');
    expect(config.semantic.proxyUrl).toBe('http://proxy.test/v1');
  });

  it('warns and keeps the default for malformed numbers', () => {
    const write = vi.spyOn(process.stderr, 'write').mockReturnValue(true);
    const config = loadEngineConfig({ MIN_PAGE_WORDS: 'lots', SCORE_ACCEPT_JACCARD: '1.5' });
    expect(config.minPageWords).toBe(50);
    expect(config.scoring.acceptJaccard).toBe(0.15);
    expect(write).toHaveBeenCalledWith('WARN: MIN_PAGE_WORDS=lots is not an integer >= 0; using 50\n');
  });

  it('rejects a band table larger than the sketch', () => {
    expect(() => loadEngineConfig({ LSH_BANDS: '30', LSH_ROWS: '5' })).toThrow(/exceeds NUM_PERM=128/);
  });
});
