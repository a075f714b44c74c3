import { describe, it, expect, vi } from 'vitest';
import { extractPhrases } from '../src/discovery/phrases.js';
import {
  discoverCandidates,
  createSearchProvider,
  resolveDuckDuckGoHref,
  SerperSearchProvider,
  DuckDuckGoSearchProvider,
} from '../src/discovery/search.js';
import type { SearchProvider } from '../src/discovery/search.js';
import { routeFetch, html } from './helpers/fetch-stub.js';

function numbered(count: number): string {
  return Array.from({ length: count }, (_, i) => `w${i}`).join(' ');
}

function provider(search: SearchProvider['search']): SearchProvider {
  return { name: 'stub', search };
}

const SEEDS = ['https://seed.test/one', 'https://seed.test/two'];

describe('extractPhrases', () => {
  it('spreads windows evenly from the first to the last full window', () => {
    expect(extractPhrases(numbered(30), 3)).toEqual([
      'w0 w1 w2 w3 w4 w5 w6 w7 w8 w9',
      'w10 w11 w12 w13 w14 w15 w16 w17 w18 w19',
      'w20 w21 w22 w23 w24 w25 w26 w27 w28 w29',
    ]);
  });

  it('returns the whole text when it is shorter than a phrase', () => {
    expect(extractPhrases('Only five words right here', 5)).toEqual(['only five words right here']);
  });

  it('starts at the first token when one phrase is wanted', () => {
    expect(extractPhrases(numbered(30), 1)).toEqual(['w0 w1 w2 w3 w4 w5 w6 w7 w8 w9']);
  });

  it('drops duplicate phrases', () => {
    const repeated = 'a b c d e f g h i j '.repeat(3);
    expect(extractPhrases(repeated, 3)).toEqual(['a b c d e f g h i j']);
  });

  it('returns nothing for no words or no phrases wanted', () => {
    expect(extractPhrases('...', 3)).toEqual([]);
    expect(extractPhrases(numbered(30), 0)).toEqual([]);
  });
});

describe('discoverCandidates', () => {
  const text = numbered(40);

  it('collects URLs from every phrase search', async () => {
    const search = vi.fn<SearchProvider['search']>(async (query) => [
      'https://shared.test/page',
      `https://site.test/${query.split(' ')[0]}`,
    ]);
    const result = await discoverCandidates(text, provider(search), {
      maxPhrases: 2,
      maxUrls: 10,
      timeoutMs: 1_000,
      fallbackSeeds: SEEDS,
    });

    expect(search).toHaveBeenCalledTimes(2);
    expect(result.fallback).toBe(false);
    expect(new Set(result.urls)).toEqual(new Set([
      'https://shared.test/page',
      'https://site.test/w0',
      'https://site.test/w30',
    ]));
    expect(result.urls).toHaveLength(3);
  });

  it('caps the URL list', async () => {
    const search = async (query: string) => [`https://a.test/${query.length}`, `https://b.test/${query}`];
    const result = await discoverCandidates(text, provider(search), {
      maxPhrases: 3,
      maxUrls: 2,
      timeoutMs: 1_000,
      fallbackSeeds: [],
    });
    expect(result.urls).toHaveLength(2);
  });

  it('uses fallback seeds when no provider is configured', async () => {
    const result = await discoverCandidates(text, null, {
      maxPhrases: 2,
      maxUrls: 1,
      timeoutMs: 1_000,
      fallbackSeeds: SEEDS,
    });
    expect(result).toEqual({
      urls: ['https://seed.test/one'],
      phrases: extractPhrases(text, 2),
      fallback: true,
      reason: 'no search provider configured',
    });
  });

  it('returns what arrived before the deadline plus seeds on timeout', async () => {
    const search = vi.fn<SearchProvider['search']>((query, _limit, signal) => {
      if (query.startsWith('w0 ')) return Promise.resolve(['https://fast.test/']);
      return new Promise<string[]>((_, reject) => {
        signal.addEventListener('abort', () => reject(new Error('aborted')));
      });
    });
    const result = await discoverCandidates(text, provider(search), {
      maxPhrases: 2,
      maxUrls: 10,
      timeoutMs: 30,
      fallbackSeeds: SEEDS,
    });
    expect(result.fallback).toBe(true);
    expect(result.reason).toBe('search timed out');
    expect(result.urls).toEqual(['https://fast.test/', ...SEEDS]);
  });

  it('falls back when every search fails', async () => {
    const result = await discoverCandidates(text, provider(() => Promise.reject(new Error('429'))), {
      maxPhrases: 2,
      maxUrls: 10,
      timeoutMs: 1_000,
      fallbackSeeds: SEEDS,
    });
    expect(result).toMatchObject({ fallback: true, reason: 'search provider failed', urls: SEEDS });
  });

  it('keeps partial results when only some searches fail', async () => {
    const search = vi.fn<SearchProvider['search']>(async (query) => {
      if (query.startsWith('w0 ')) throw new Error('429');
      return ['https://ok.test/'];
    });
    const result = await discoverCandidates(text, provider(search), {
      maxPhrases: 2,
      maxUrls: 10,
      timeoutMs: 1_000,
      fallbackSeeds: SEEDS,
    });
    expect(result).toMatchObject({ fallback: false, urls: ['https://ok.test/'] });
  });

  it('does not search once the request budget is spent', async () => {
    const search = vi.fn<SearchProvider['search']>(async () => ['https://never.test/']);
    const result = await discoverCandidates(text, provider(search), {
      maxPhrases: 2,
      maxUrls: 10,
      timeoutMs: 1_000,
      fallbackSeeds: SEEDS,
      signal: AbortSignal.abort(),
    });
    expect(search).not.toHaveBeenCalled();
    expect(result).toMatchObject({ fallback: true, reason: 'request budget exhausted', urls: SEEDS });
  });
});

describe('search providers', () => {
  it('queries Serper with the quoted phrase', async () => {
    const fetchImpl = routeFetch({
      'https://google.serper.dev/search': () => Response.json({
        organic: [{ link: 'https://found.test/a' }, { link: 'mailto:x@y.z' }, { title: 'no link' }],
      }),
    });
    const serper = new SerperSearchProvider('test-secret', fetchImpl);
    const urls = await serper.search('some "exact" phrase', 5, new AbortController().signal);

    expect(urls).toEqual(['https://found.test/a']);
    const init = fetchImpl.mock.calls[0]?.[1];
    expect(init?.body).toBe(JSON.stringify({ q: '"some exact phrase"', num: 5 }));
    expect(init?.headers).toMatchObject({ 'X-API-KEY': 'test-secret' });
  });

  it('throws when Serper answers with an error', async () => {
    const serper = new SerperSearchProvider('test-secret', routeFetch({}));
    await expect(serper.search('q', 5, new AbortController().signal)).rejects.toThrow('Serper returned 404');
  });

  it('unwraps DuckDuckGo redirect links', () => {
    expect(resolveDuckDuckGoHref('//duckduckgo.com/l/?uddg=https%3A%2F%2Fexample.com%2Fpage&rut=abc'))
      .toBe('https://example.com/page');
    expect(resolveDuckDuckGoHref('https://direct.test/x')).toBe('https://direct.test/x');
  });

  it('parses DuckDuckGo result anchors', async () => {
    const query = '"hello world"';
    const fetchImpl = routeFetch({
      [`https://html.duckduckgo.com/html/?q=${encodeURIComponent(query)}`]: () => html(`
        <a class="result__a" href="//duckduckgo.com/l/?uddg=https%3A%2F%2Fone.test%2F">One</a>
        <a class="result__a" href="https://two.test/">Two</a>
        <a class="result__a" href="https://three.test/">Three</a>`),
    });
    const ddg = new DuckDuckGoSearchProvider(fetchImpl);
    expect(await ddg.search('hello world', 2, new AbortController().signal)).toEqual([
      'https://one.test/',
      'https://two.test/',
    ]);
  });

  it('picks a provider from settings', () => {
    expect(createSearchProvider({ provider: 'none', serperApiKey: 'test-secret' })).toBeNull();
    expect(createSearchProvider({ provider: 'auto' })).toBeNull();
    expect(createSearchProvider({ provider: 'auto', serperApiKey: 'test-secret' })?.name).toBe('serper');
    expect(createSearchProvider({ provider: 'duckduckgo' })?.name).toBe('duckduckgo');
    expect(createSearchProvider({ provider: 'serper' })).toBeNull();
  });
});
