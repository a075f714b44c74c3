import { mkdtemp, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { loadEngineConfig } from '../../src/config.js';
import type { EngineConfig } from '../../src/config.js';
import { PlagiarismEngine } from '../../src/engine/plagiarism-engine.js';
import type { EngineDeps } from '../../src/engine/plagiarism-engine.js';
import { MemoryStore } from './memory-store.js';

export interface EngineFixture {
  dir: string;
  config: EngineConfig;
  store: MemoryStore;
  create(overrides?: Partial<EngineDeps>): PlagiarismEngine;
  cleanup(): Promise<void>;
}

/** Temp-dir config with a low word floor, no crawl delay and web search off unless overridden. */
export async function engineFixture(env: Record<string, string> = {}): Promise<EngineFixture> {
  const dir = await mkdtemp(join(tmpdir(), 'engine-test-'));
  const config = loadEngineConfig({
    INDEX_PATH: join(dir, 'index', 'lsh.tgix'),
    CACHE_DIR: join(dir, 'cache'),
    MIN_PAGE_WORDS: '5',
    CRAWL_DELAY_MS: '0',
    FETCH_TIMEOUT_MS: '1000',
    SEARCH_PROVIDER: 'none',
    ...env,
  });
  const store = new MemoryStore();
  return {
    dir,
    config,
    store,
    create: (overrides = {}) => new PlagiarismEngine({
      config,
      store,
      searchProvider: null,
      semantic: null,
      generatorSeed: 7,
      ...overrides,
    }),
    cleanup: () => rm(dir, { recursive: true, force: true }),
  };
}
