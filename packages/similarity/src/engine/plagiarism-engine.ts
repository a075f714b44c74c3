/**
 * FILE PURPOSE: The plagiarism engine service object
 *
 * WHY: One authoritative in-memory index, seed table, page cache and store
 *      shared by every concurrent check. The host constructs it, calls
 *      init() before serving and shutdown() on exit, and injects it into the
 *      HTTP handlers and the corpus worker.
 *
 * HOW:
 *   check:  validate → shingle + sketch → index query (read lock) → search
 *           discovery → crawl (no lock held) → persist each fresh page
 *           (write lock) → exact re-scoring → audit records.
 *   persist: store upsert, index insert and snapshot flush run inside one
 *           write section, so a query sees a page only once both its text
 *           and its sketch exist.
 *   budget: each check carries an AbortSignal; once it fires no further
 *           search or fetch starts and the partial report is returned.
 */

import { BandedIndex } from '../index/banded-index.js';
import { SeedTable } from '../sketch/seed-table.js';
import { SketchBuilder } from '../sketch/minhash.js';
import type { Sketch } from '../sketch/minhash.js';
import { shingle, tokenize } from '../text/shingles.js';
import { computeContentHash } from '../text/content-hash.js';
import { ReadWriteLock } from '../concurrency/rw-lock.js';
import { CandidateScorer } from '../scoring/candidate-scorer.js';
import { createSemanticSimilarity } from '../scoring/semantic.js';
import type { SemanticSimilarity } from '../scoring/semantic.js';
import type { Candidate, Match, PageOrigin } from '../scoring/types.js';
import { CrawlManager, emptyCrawlStats, tallyOutcome } from '../crawl/crawl-manager.js';
import type { CrawlOutcome, CrawlStats } from '../crawl/crawl-manager.js';
import { DiskPageCache } from '../crawl/page-cache.js';
import { RobotsPolicy } from '../crawl/robots.js';
import type { FetchFn } from '../crawl/fetcher.js';
import { createSearchProvider, discoverCandidates } from '../discovery/search.js';
import type { SearchProvider } from '../discovery/search.js';
import { DocumentExtractor } from '../parsing/document-parser.js';
import { IndexSnapshotFile } from '../store/index-snapshot-file.js';
import type {
  PageRecord,
  PageSummary,
  PersistentStore,
  ReportRecord,
  SubmissionSummary,
} from '../store/types.js';
import { FallbackMonitor, SEARCH_FEATURE, EXTRACTION_FEATURE } from '../fallback-monitor.js';
import type { FallbackStats } from '../fallback-monitor.js';
import { PlagiarismInputError } from '../errors.js';
import type { EngineConfig } from '../config.js';

// ─── Public types ───

export interface CheckOptions {
  maxPhrases?: number;
  maxCandidateURLs?: number;
  useSemantic?: boolean;
  topK?: number;
  /** Search the web for sources. Defaults to true when a provider is configured. */
  searchWeb?: boolean;
  /** Overall wall-clock budget for this check. */
  budgetMs?: number;
}

export interface ResolvedCheckOptions {
  maxPhrases: number;
  maxCandidateURLs: number;
  useSemantic: boolean;
  topK: number;
  searchWeb: boolean;
  budgetMs: number;
}

export interface ReportCrawlStats extends CrawlStats {
  discoveryFallback: boolean;
  partial: boolean;
}

export interface MatchReport {
  submissionId: string | null;
  reportId: string | null;
  score: number;
  percent: number;
  matches: Match[];
  candidatesCount: number;
  acceptedCount: number;
  queryShingles: number;
  semanticUsed: boolean;
  crawl: ReportCrawlStats;
  elapsedMs: number;
}

export type IndexUrlResult =
  | { outcome: 'fetched' | 'cached'; docId: string }
  | { outcome: Exclude<CrawlOutcome['kind'], 'fetched' | 'cached'> };

export interface EngineStats {
  documents: number;
  bands: number;
  rows: number;
  numPerm: number;
  fallbacks: FallbackStats[];
}

export interface EngineDeps {
  config: EngineConfig;
  store: PersistentStore;
  snapshotFile?: IndexSnapshotFile;
  /** null disables web search; undefined builds the configured provider. */
  searchProvider?: SearchProvider | null;
  /** null disables semantic scoring; undefined builds the configured collaborator. */
  semantic?: SemanticSimilarity | null;
  extractor?: DocumentExtractor;
  fetchImpl?: FetchFn;
  monitor?: FallbackMonitor;
  now?: () => number;
  /** Fixes the seed table of a fresh index. */
  generatorSeed?: number;
}

interface EngineState {
  index: BandedIndex;
  seedTable: SeedTable;
  builder: SketchBuilder;
}

interface PageDraft {
  url: string;
  text: string;
  label: string | null;
  origin: PageOrigin;
  fetchedAt: Date;
}

const LIMITS = {
  maxPhrases: 20,
  maxCandidateURLs: 50,
  topK: 100,
};

function clampInt(value: number | undefined, fallback: number, min: number, max: number): number {
  if (value === undefined || !Number.isFinite(value)) return fallback;
  return Math.min(max, Math.max(min, Math.trunc(value)));
}

function domainOf(url: string): string | null {
  try {
    const { protocol, hostname } = new URL(url);
    return protocol === 'http:' || protocol === 'https:' ? hostname : null;
  } catch {
    return null;
  }
}

export function corpusUrl(label: string): string {
  return `corpus:${label}`;
}

// ─── Engine ───

export class PlagiarismEngine {
  readonly config: EngineConfig;
  readonly monitor: FallbackMonitor;

  private readonly store: PersistentStore;
  private readonly snapshotFile: IndexSnapshotFile;
  private readonly searchProvider: SearchProvider | null;
  private readonly scorer: CandidateScorer;
  private readonly extractor: DocumentExtractor;
  private readonly cache: DiskPageCache;
  private readonly robots: RobotsPolicy;
  private readonly crawler: CrawlManager;
  private readonly lock = new ReadWriteLock();
  private readonly now: () => number;
  private readonly generatorSeed: number | undefined;
  private state: EngineState | null = null;

  constructor(deps: EngineDeps) {
    const { config } = deps;
    this.config = config;
    this.store = deps.store;
    this.now = deps.now ?? Date.now;
    this.monitor = deps.monitor ?? new FallbackMonitor();
    this.generatorSeed = deps.generatorSeed;
    this.snapshotFile = deps.snapshotFile ?? new IndexSnapshotFile(config.indexPath);

    const fetchImpl = deps.fetchImpl ?? fetch;
    this.searchProvider = deps.searchProvider === undefined
      ? createSearchProvider({ ...config.search, userAgent: config.userAgent }, fetchImpl)
      : deps.searchProvider;
    const semantic = deps.semantic === undefined
      ? createSemanticSimilarity(config.semantic)
      : deps.semantic;
    this.scorer = new CandidateScorer(config.scoring, semantic, this.monitor);
    this.extractor = deps.extractor ?? new DocumentExtractor({ ...config.extraction, fetchImpl });

    this.cache = new DiskPageCache(config.cacheDir, config.cacheTtlMs, this.now);
    this.robots = new RobotsPolicy({
      userAgent: config.userAgent,
      timeoutMs: config.fetchTimeoutMs,
      ttlMs: config.cacheTtlMs,
      fetchImpl,
      now: this.now,
    });
    this.crawler = new CrawlManager({
      cache: this.cache,
      robots: this.robots,
      extractor: this.extractor,
      userAgent: config.userAgent,
      fetchTimeoutMs: config.fetchTimeoutMs,
      minWords: config.minPageWords,
      delayMs: config.crawlDelayMs,
      fetchImpl,
      now: this.now,
    });
  }

  get initialized(): boolean {
    return this.state !== null;
  }

  // ─── Lifecycle ───

  /**
   * Load the snapshot (or start empty when none exists), then reconcile the
   * index with the store. A corrupt or incompatible snapshot throws
   * IndexSnapshotError and the engine stays uninitialized.
   */
  async init(): Promise<void> {
    if (this.state) return;
    const { bands, rows, numPerm } = this.config;

    const snapshot = await this.snapshotFile.load({ bands, rows, numPerm });
    let state: EngineState;
    if (snapshot) {
      state = { ...snapshot, builder: new SketchBuilder(snapshot.seedTable) };
      process.stdout.write(`INFO: Loaded index snapshot with ${snapshot.index.size} documents from ${this.snapshotFile.path}\n`);
    } else {
      const seedTable = SeedTable.generate(numPerm, this.generatorSeed);
      state = { index: new BandedIndex({ bands, rows }), seedTable, builder: new SketchBuilder(seedTable) };
      process.stdout.write(`INFO: No index snapshot at ${this.snapshotFile.path}; starting with an empty index\n`);
    }

    await this.lock.write(async () => {
      const changed = await this.reconcile(state);
      this.state = state;
      if (changed || !snapshot) await this.flush();
    });
  }

  /** Flush the snapshot and close the store. Waits for in-flight mutations. */
  async shutdown(): Promise<void> {
    if (!this.state) return;
    await this.lock.write(async () => {
      await this.flush();
      this.state = null;
    });
    await this.store.close();
  }

  // ─── Operations ───

  async checkText(
    text: string,
    options: CheckOptions = {},
    userRef: string | null = null,
    filename: string | null = null,
  ): Promise<MatchReport> {
    const state = this.requireState();
    this.validateText(text);
    const opts = this.resolveOptions(options);
    const startedAt = this.now();

    const budget = new AbortController();
    const timer = setTimeout(() => budget.abort(), opts.budgetMs);
    timer.unref();

    try {
      const queryShingles = shingle(tokenize(text), this.config.shingleSize);
      const querySketch = state.builder.build(queryShingles);
      const crawl: ReportCrawlStats = { ...emptyCrawlStats(), discoveryFallback: false, partial: false };

      const candidates = new Map<string, Candidate>();
      if (queryShingles.size > 0) {
        for (const c of await this.localCandidates(querySketch)) candidates.set(c.id, c);
        if (opts.searchWeb && opts.maxCandidateURLs > 0) {
          for (const c of await this.webCandidates(text, opts, crawl, budget.signal)) {
            if (!candidates.has(c.id)) candidates.set(c.id, c);
          }
        }
      }

      const scored = await this.scorer.score(text, queryShingles, [...candidates.values()], {
        useSemantic: opts.useSemantic,
        topK: opts.topK,
        signal: budget.signal,
      });
      crawl.partial = budget.signal.aborted || crawl.skipped > 0;

      const { submissionId, reportId } = await this.recordAudit(text, querySketch, scored.score, scored.matches, userRef, filename);

      return {
        submissionId,
        reportId,
        score: scored.score,
        percent: scored.percent,
        matches: scored.matches,
        candidatesCount: scored.candidatesScored,
        acceptedCount: scored.acceptedCount,
        queryShingles: scored.queryShingles,
        semanticUsed: scored.semanticUsed,
        crawl,
        elapsedMs: this.now() - startedAt,
      };
    } finally {
      clearTimeout(timer);
    }
  }

  async checkDocument(
    bytes: Uint8Array,
    filename: string,
    options: CheckOptions = {},
    userRef: string | null = null,
  ): Promise<MatchReport> {
    this.requireState();
    const text = await this.extractOrReject(bytes, filename);
    return this.checkText(text, options, userRef, filename);
  }

  /** Add or replace a labelled corpus document. Returns its page id. */
  async indexDocument(input: string | Uint8Array, label: string, filename?: string): Promise<string> {
    this.requireState();
    const cleanLabel = label.trim();
    if (!cleanLabel) throw new PlagiarismInputError('EMPTY_LABEL', 'A document label is required');

    const text = typeof input === 'string'
      ? input
      : filename ? await this.extractOrReject(input, filename) : Buffer.from(input).toString('utf-8');
    this.validateText(text);

    const page = await this.persistPage({
      url: corpusUrl(cleanLabel),
      text,
      label: cleanLabel,
      origin: 'corpus',
      fetchedAt: new Date(this.now()),
    });
    return page.id;
  }

  /** Crawl one URL into the corpus (cache, robots and length floor apply). */
  async indexUrl(url: string, budgetMs = this.config.requestBudgetMs): Promise<IndexUrlResult> {
    this.requireState();
    if (domainOf(url) === null) throw new PlagiarismInputError('INVALID_URL', `Not an http(s) URL: ${url}`);

    const budget = new AbortController();
    const timer = setTimeout(() => budget.abort(), budgetMs);
    timer.unref();
    try {
      const outcome = await this.crawler.crawl(url, budget.signal);
      if (outcome.kind !== 'fetched' && outcome.kind !== 'cached') return { outcome: outcome.kind };
      const page = await this.pageForOutcome(outcome);
      return { outcome: outcome.kind, docId: page.id };
    } finally {
      clearTimeout(timer);
    }
  }

  /**
   * Empty the page table, the index and the page cache in one write section,
   * then flush. Submissions and reports are kept.
   */
  async clearCorpus(): Promise<{ pagesRemoved: number }> {
    const state = this.requireState();
    return this.lock.write(async () => {
      const pagesRemoved = await this.store.clearPages();
      state.index.clear();
      this.robots.clear();
      try {
        await this.cache.clear();
      } catch (err) {
        process.stderr.write(`WARN: Page cache clear failed: ${err}\n`);
      }
      await this.flush();
      return { pagesRemoved };
    });
  }

  async listCorpus(limit = 20, offset = 0): Promise<PageSummary[]> {
    return this.store.listPages(Math.min(Math.max(1, limit), 100), Math.max(0, offset));
  }

  async listSubmissions(limit = 20): Promise<SubmissionSummary[]> {
    return this.store.listSubmissions(Math.min(Math.max(1, limit), 100));
  }

  async getReport(id: string): Promise<ReportRecord | null> {
    return this.store.getReport(id);
  }

  async ping(): Promise<boolean> {
    return this.store.ping();
  }

  stats(): EngineStats {
    const state = this.requireState();
    return {
      documents: state.index.size,
      bands: state.index.bands,
      rows: state.index.rows,
      numPerm: state.seedTable.numPerm,
      fallbacks: this.monitor.getAllStats(),
    };
  }

  // ─── Internals ───

  private requireState(): EngineState {
    if (!this.state) throw new Error('PlagiarismEngine is not initialized; call init() first');
    return this.state;
  }

  private validateText(text: string): void {
    if (tokenize(text).length === 0) {
      throw new PlagiarismInputError('EMPTY_TEXT', 'Text is empty or has no words to analyze');
    }
    if (text.length > this.config.maxTextChars) {
      throw new PlagiarismInputError(
        'TEXT_TOO_LARGE',
        `Text has ${text.length} characters; the limit is ${this.config.maxTextChars}`,
      );
    }
  }

  resolveOptions(options: CheckOptions): ResolvedCheckOptions {
    const d = this.config.defaults;
    return {
      maxPhrases: clampInt(options.maxPhrases, d.maxPhrases, 0, LIMITS.maxPhrases),
      maxCandidateURLs: clampInt(options.maxCandidateURLs, d.maxCandidateURLs, 0, LIMITS.maxCandidateURLs),
      useSemantic: options.useSemantic ?? d.useSemantic,
      topK: clampInt(options.topK, d.topK, 1, LIMITS.topK),
      searchWeb: (options.searchWeb ?? true) && (this.searchProvider !== null || this.config.fallbackSeeds.length > 0),
      budgetMs: clampInt(options.budgetMs, this.config.requestBudgetMs, 1, this.config.requestBudgetMs),
    };
  }

  private async extractOrReject(bytes: Uint8Array, filename: string): Promise<string> {
    const result = await this.extractor.extract(filename, bytes);
    if (result.ok) {
      this.monitor.recordPrimary(EXTRACTION_FEATURE);
      return result.text;
    }
    if (result.reason === 'unsupported-format') {
      throw new PlagiarismInputError('UNSUPPORTED_FORMAT', result.message);
    }
    this.monitor.recordFallback(EXTRACTION_FEATURE, `${result.reason}: ${result.message}`);
    throw new PlagiarismInputError('EXTRACTION_FAILED', `Could not analyze ${filename}: ${result.message}`);
  }

  private async localCandidates(sketch: Sketch): Promise<Candidate[]> {
    const ids = await this.lock.read(() => this.requireState().index.query(sketch));
    if (ids.size === 0) return [];
    try {
      const pages = await this.store.getPages([...ids]);
      return pages.map((p) => ({ id: p.id, url: p.url, label: p.label, origin: p.origin, text: p.text }));
    } catch (err) {
      process.stderr.write(`WARN: Loading ${ids.size} indexed candidates failed: ${err}\n`);
      return [];
    }
  }

  private async webCandidates(
    text: string,
    opts: ResolvedCheckOptions,
    stats: ReportCrawlStats,
    signal: AbortSignal,
  ): Promise<Candidate[]> {
    const discovery = await discoverCandidates(text, this.searchProvider, {
      maxPhrases: opts.maxPhrases,
      maxUrls: opts.maxCandidateURLs,
      timeoutMs: this.config.searchTimeoutMs,
      fallbackSeeds: this.config.fallbackSeeds,
      signal,
    });
    if (this.searchProvider) {
      if (discovery.fallback) this.monitor.recordFallback(SEARCH_FEATURE, discovery.reason ?? 'fallback');
      else this.monitor.recordPrimary(SEARCH_FEATURE);
    }
    stats.discoveryFallback = discovery.fallback;
    stats.discovered = discovery.urls.length;

    const candidates: Candidate[] = [];
    for (const url of discovery.urls) {
      const outcome = signal.aborted
        ? { kind: 'skipped' as const, url }
        : await this.crawler.crawl(url, signal);
      tallyOutcome(stats, outcome);
      if (outcome.kind !== 'fetched' && outcome.kind !== 'cached') continue;

      try {
        const page = await this.pageForOutcome(outcome);
        candidates.push({ id: page.id, url: page.url, label: page.label, origin: page.origin, text: page.text });
      } catch (err) {
        // Storage failure: the page still competes for this request only.
        process.stderr.write(`WARN: Persisting ${url} failed: ${err}\n`);
        candidates.push({ id: url, url, label: null, origin: 'web', text: outcome.text });
      }
    }
    return candidates;
  }

  /** Fetched pages are always written back; cache hits only when the store lost them. */
  private async pageForOutcome(
    outcome: Extract<CrawlOutcome, { kind: 'fetched' | 'cached' }>,
  ): Promise<PageRecord> {
    if (outcome.kind === 'cached') {
      const existing = await this.store.getPageByUrl(outcome.url);
      if (existing && existing.text === outcome.text && this.state?.index.has(existing.id)) return existing;
    }
    return this.persistPage({
      url: outcome.url,
      text: outcome.text,
      label: null,
      origin: 'web',
      fetchedAt: new Date(outcome.fetchedAt),
    });
  }

  /** Store upsert + index insert + flush, as one write section. */
  private async persistPage(draft: PageDraft): Promise<PageRecord> {
    const state = this.requireState();
    const tokens = tokenize(draft.text);
    const sketch = state.builder.build(shingle(tokens, this.config.shingleSize));

    return this.lock.write(async () => {
      const page = await this.store.upsertPage({
        url: draft.url,
        text: draft.text,
        contentHash: computeContentHash(draft.text),
        sketch,
        wordCount: tokens.length,
        fetchedAt: draft.fetchedAt,
        domain: domainOf(draft.url),
        label: draft.label,
        origin: draft.origin,
      });
      state.index.insert(page.id, sketch);
      await this.flush();
      return page;
    });
  }

  private async recordAudit(
    text: string,
    sketch: Sketch,
    score: number,
    matches: Match[],
    userRef: string | null,
    filename: string | null,
  ): Promise<{ submissionId: string | null; reportId: string | null }> {
    let submissionId: string | null = null;
    try {
      const submission = await this.store.createSubmission({ userRef, text, sketch, score, filename });
      submissionId = submission.id;
      const report = await this.store.createReport({ submissionId, matches });
      return { submissionId, reportId: report.id };
    } catch (err) {
      process.stderr.write(`WARN: Recording submission failed; returning unsaved report: ${err}\n`);
      return { submissionId, reportId: null };
    }
  }

  /** Caller holds the write lock. Durability is best-effort: failures are logged. */
  private async flush(): Promise<void> {
    const state = this.state;
    if (!state) return;
    try {
      await this.snapshotFile.save(state.index, state.seedTable);
    } catch (err) {
      process.stderr.write(`ERROR: Index snapshot flush failed: ${err}\n`);
    }
  }

  /**
   * Make the index match the store: drop entries without a page, sketch
   * pages the index lacks. Returns true when anything changed.
   */
  private async reconcile(state: EngineState): Promise<boolean> {
    const storeIds = new Set(await this.store.listPageIds());
    let changed = false;

    for (const id of [...state.index.ids()]) {
      if (!storeIds.has(id)) {
        state.index.remove(id);
        changed = true;
      }
    }

    const missing = [...storeIds].filter((id) => !state.index.has(id));
    const BATCH = 200;
    for (let i = 0; i < missing.length; i += BATCH) {
      const pages = await this.store.getPages(missing.slice(i, i + BATCH));
      for (const page of pages) {
        const tokens = tokenize(page.text);
        const sketch = state.builder.build(shingle(tokens, this.config.shingleSize));
        // Seeds may differ from the ones the stored sketch was built with.
        await this.store.upsertPage({ ...page, sketch, wordCount: tokens.length });
        state.index.insert(page.id, sketch);
        changed = true;
      }
    }

    if (changed) {
      process.stdout.write(`INFO: Reconciled index with store: ${state.index.size} documents indexed\n`);
    }
    return changed;
  }
}
