/**
 * FILE PURPOSE: Engine configuration from environment variables
 *
 * HOW: Parsed once at startup with defaults for every value. Malformed
 *      numbers fall back to the default with a WARN line; structurally
 *      impossible combinations (band table larger than the sketch) throw.
 */

import { bandsForThreshold, DEFAULT_LSH_THRESHOLD } from './index/banded-index.js';
import { DEFAULT_NUM_PERM } from './sketch/seed-table.js';
import { DEFAULT_SHINGLE_SIZE } from './text/shingles.js';
import { DEFAULT_CACHE_TTL_MS } from './crawl/page-cache.js';
import type { ScoringConfig } from './scoring/types.js';
import type { SearchProviderName } from './discovery/search.js';

export interface CheckDefaults {
  maxPhrases: number;
  maxCandidateURLs: number;
  useSemantic: boolean;
  topK: number;
}

export interface EngineConfig {
  shingleSize: number;
  numPerm: number;
  lshThreshold: number;
  bands: number;
  rows: number;

  indexPath: string;
  cacheDir: string;
  cacheTtlMs: number;

  minPageWords: number;
  fetchTimeoutMs: number;
  searchTimeoutMs: number;
  crawlDelayMs: number;
  requestBudgetMs: number;
  maxTextChars: number;
  userAgent: string;
  fallbackSeeds: string[];

  scoring: ScoringConfig;
  defaults: CheckDefaults;

  search: { provider: SearchProviderName | 'auto'; serperApiKey?: string };
  semantic: { proxyUrl?: string; apiKey?: string; model?: string };
  extraction: { unstructuredApiUrl?: string; unstructuredApiKey?: string };
}

type Env = Record<string, string | undefined>;

function intEnv(env: Env, name: string, fallback: number, min = 0): number {
  const raw = env[name];
  if (raw === undefined || raw === '') return fallback;
  const value = parseInt(raw, 10);
  if (Number.isNaN(value) || value < min) {
    process.stderr.write(`WARN: ${name}=${raw} is not an integer >= ${min}; using ${fallback}\n`);
    return fallback;
  }
  return value;
}

function floatEnv(env: Env, name: string, fallback: number, min = 0, max = 1): number {
  const raw = env[name];
  if (raw === undefined || raw === '') return fallback;
  const value = parseFloat(raw);
  if (Number.isNaN(value) || value < min || value > max) {
    process.stderr.write(`WARN: ${name}=${raw} is outside [${min}, ${max}]; using ${fallback}\n`);
    return fallback;
  }
  return value;
}

function boolEnv(env: Env, name: string, fallback: boolean): boolean {
  const raw = env[name]?.trim().toLowerCase();
  if (!raw) return fallback;
  return raw === '1' || raw === 'true' || raw === 'yes';
}

function listEnv(env: Env, name: string): string[] {
  const raw = env[name];
  if (!raw) return [];
  return raw.split(',').map((s) => s.trim()).filter(Boolean);
}

function searchProviderEnv(env: Env): SearchProviderName | 'auto' {
  const raw = (env.SEARCH_PROVIDER ?? 'auto').trim().toLowerCase();
  if (raw === 'serper' || raw === 'duckduckgo' || raw === 'none' || raw === 'auto') return raw;
  process.stderr.write(`WARN: Unknown SEARCH_PROVIDER=${raw}; using auto\n`);
  return 'auto';
}

export function loadEngineConfig(env: Env = process.env): EngineConfig {
  const shingleSize = intEnv(env, 'SHINGLE_SIZE', DEFAULT_SHINGLE_SIZE, 1);
  const numPerm = intEnv(env, 'NUM_PERM', DEFAULT_NUM_PERM, 1);
  const lshThreshold = floatEnv(env, 'LSH_THRESHOLD', DEFAULT_LSH_THRESHOLD);
  const preset = bandsForThreshold(lshThreshold, numPerm);
  const bands = intEnv(env, 'LSH_BANDS', preset.bands, 1);
  const rows = intEnv(env, 'LSH_ROWS', preset.rows, 1);
  if (bands * rows > numPerm) {
    throw new Error(`FATAL: LSH bands×rows (${bands}×${rows}) exceeds NUM_PERM=${numPerm}`);
  }

  return {
    shingleSize,
    numPerm,
    lshThreshold,
    bands,
    rows,

    indexPath: env.INDEX_PATH || './data/index/lsh.tgix',
    cacheDir: env.CACHE_DIR || './data/page-cache',
    cacheTtlMs: intEnv(env, 'CACHE_TTL_MS', DEFAULT_CACHE_TTL_MS, 0),

    minPageWords: intEnv(env, 'MIN_PAGE_WORDS', 50, 0),
    fetchTimeoutMs: intEnv(env, 'FETCH_TIMEOUT_MS', 10_000, 1),
    searchTimeoutMs: intEnv(env, 'SEARCH_TIMEOUT_MS', 8_000, 1),
    crawlDelayMs: intEnv(env, 'CRAWL_DELAY_MS', 1_000, 0),
    requestBudgetMs: intEnv(env, 'REQUEST_BUDGET_MS', 60_000, 1),
    maxTextChars: intEnv(env, 'MAX_TEXT_CHARS', 500_000, 1),
    userAgent: env.CRAWLER_USER_AGENT || 'TextGuardBot/1.0 (+https://textguard.invalid/bot)',
    fallbackSeeds: listEnv(env, 'FALLBACK_SEED_URLS'),

    scoring: {
      shingleSize,
      acceptJaccard: floatEnv(env, 'SCORE_ACCEPT_JACCARD', 0.15),
      acceptSemantic: floatEnv(env, 'SCORE_ACCEPT_SEMANTIC', 0.6),
      lexicalWeight: floatEnv(env, 'SCORE_LEXICAL_WEIGHT', 0.6),
      semanticWeight: floatEnv(env, 'SCORE_SEMANTIC_WEIGHT', 0.4),
      semanticWindowChars: intEnv(env, 'SEMANTIC_WINDOW_CHARS', 2_000, 1),
    },
    defaults: {
      maxPhrases: intEnv(env, 'DEFAULT_MAX_PHRASES', 5, 0),
      maxCandidateURLs: intEnv(env, 'DEFAULT_MAX_CANDIDATE_URLS', 10, 0),
      useSemantic: boolEnv(env, 'DEFAULT_USE_SEMANTIC', false),
      topK: intEnv(env, 'DEFAULT_TOP_K', 5, 1),
    },

    search: { provider: searchProviderEnv(env), serperApiKey: env.SERPER_API_KEY || undefined },
    semantic: {
      proxyUrl: env.LITELLM_PROXY_URL || undefined,
      apiKey: env.LITELLM_API_KEY || undefined,
      model: env.SEMANTIC_EMBEDDING_MODEL || undefined,
    },
    extraction: {
      unstructuredApiUrl: env.UNSTRUCTURED_API_URL || undefined,
      unstructuredApiKey: env.UNSTRUCTURED_API_KEY || undefined,
    },
  };
}
