/**
 * @textguard/similarity: near-duplicate detection engine
 *
 * USAGE:
 *   import { PlagiarismEngine, loadEngineConfig } from '@textguard/similarity';
 *   const engine = new PlagiarismEngine({ config: loadEngineConfig(), store });
 *   await engine.init();
 *   const report = await engine.checkText(text, { topK: 5 });
 */

// ─── Text ───
export { tokenize, shingle, shingleText, jaccard, sharedShingles, DEFAULT_SHINGLE_SIZE } from './text/shingles.js';
export { computeContentHash } from './text/content-hash.js';

// ─── Sketches ───
export { SeedTable, DEFAULT_NUM_PERM } from './sketch/seed-table.js';
export {
  SketchBuilder,
  EMPTY_SLOT,
  baseHash,
  isEmptySketch,
  estimateSimilarity,
  encodeSketch,
  decodeSketch,
} from './sketch/minhash.js';
export type { Sketch } from './sketch/minhash.js';

// ─── Banded index ───
export {
  BandedIndex,
  BAND_PRESETS,
  DEFAULT_LSH_THRESHOLD,
  approximateThreshold,
  bandsForThreshold,
} from './index/banded-index.js';
export type { BandParams } from './index/banded-index.js';
export { encodeSnapshot, decodeSnapshot, SNAPSHOT_VERSION } from './index/snapshot-codec.js';
export type { IndexSnapshot, SnapshotExpectations } from './index/snapshot-codec.js';

// ─── Scoring ───
export { CandidateScorer, round } from './scoring/candidate-scorer.js';
export {
  EmbeddingSimilarity,
  createSemanticSimilarity,
  cosineSimilarity,
  DEFAULT_EMBEDDING_MODEL,
} from './scoring/semantic.js';
export type { SemanticSimilarity, SemanticSettings } from './scoring/semantic.js';
export { DEFAULT_SCORING } from './scoring/types.js';
export type {
  Candidate,
  Match,
  PageOrigin,
  ScoreOptions,
  ScoreResult,
  ScoringConfig,
} from './scoring/types.js';

// ─── Crawl ───
export { CrawlManager, emptyCrawlStats, tallyOutcome } from './crawl/crawl-manager.js';
export type { CrawlOutcome, CrawlStats, CrawlManagerOptions } from './crawl/crawl-manager.js';
export { DiskPageCache, cacheKey, DEFAULT_CACHE_TTL_MS } from './crawl/page-cache.js';
export type { CachedPage, CacheLookup } from './crawl/page-cache.js';
export { RobotsPolicy, parseRobots, isPathAllowed, productToken } from './crawl/robots.js';
export type { RobotsRules, RobotsRule } from './crawl/robots.js';
export { fetchPage } from './crawl/fetcher.js';
export type { FetchResult, FetchFn, FetchFailureReason } from './crawl/fetcher.js';
export { extractMainText, loadHtml } from './crawl/html-extract.js';
export type { HtmlExtraction } from './crawl/html-extract.js';

// ─── Discovery ───
export { extractPhrases } from './discovery/phrases.js';
export {
  discoverCandidates,
  createSearchProvider,
  SerperSearchProvider,
  DuckDuckGoSearchProvider,
} from './discovery/search.js';
export type { SearchProvider, DiscoveryResult, DiscoveryOptions } from './discovery/search.js';

// ─── Document parsing ───
export {
  DocumentExtractor,
  formatFromFilename,
  formatFromContentType,
  decodeText,
} from './parsing/document-parser.js';
export type { DocumentFormat, ExtractResult } from './parsing/document-parser.js';

// ─── Store ───
export { IndexSnapshotFile } from './store/index-snapshot-file.js';
export type {
  PersistentStore,
  PageRecord,
  PageInput,
  PageSummary,
  SubmissionRecord,
  SubmissionInput,
  SubmissionSummary,
  ReportRecord,
  ReportInput,
} from './store/types.js';

// ─── Engine ───
export { PlagiarismEngine, corpusUrl } from './engine/plagiarism-engine.js';
export type {
  CheckOptions,
  ResolvedCheckOptions,
  MatchReport,
  IndexUrlResult,
  EngineStats,
  EngineDeps,
} from './engine/plagiarism-engine.js';
export { loadEngineConfig } from './config.js';
export type { EngineConfig, CheckDefaults } from './config.js';
export { PlagiarismInputError, IndexSnapshotError, isInputError } from './errors.js';
export type { InputErrorCode } from './errors.js';

// ─── Concurrency ───
export { ReadWriteLock, Mutex } from './concurrency/rw-lock.js';

// ─── Monitoring ───
export {
  FallbackMonitor,
  alertLevelFor,
  SEARCH_FEATURE,
  SEMANTIC_FEATURE,
  EXTRACTION_FEATURE,
} from './fallback-monitor.js';
export type { FallbackEvent, FallbackStats, AlertLevel, DegradedFeature } from './fallback-monitor.js';

// ─── LLM client ───
export { createLLMClient } from './llm-client.js';
export type { LLMClientOptions } from './llm-client.js';

// ─── Corpus pipeline ───
export { CorpusJobType } from './pipeline/jobs.js';
export type { CorpusJobData, IndexUrlJobData } from './pipeline/jobs.js';
export { createCorpusQueue, enqueueUrls, CORPUS_QUEUE_NAME } from './pipeline/queue.js';
export { createCorpusWorker, processCorpusJob } from './pipeline/worker.js';
export type { CorpusJobResult } from './pipeline/worker.js';
export { parseRedisConnection } from './pipeline/connection.js';
