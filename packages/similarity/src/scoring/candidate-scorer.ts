/**
 * FILE PURPOSE: Exact re-scoring, acceptance and ranking of candidates
 *
 * HOW: Jaccard is always recomputed from text; sketches only pick
 *      candidates. When enabled, a semantic score on the leading window of
 *      each side is blended in. A candidate is accepted when either signal
 *      clears its threshold. Each candidate is scored in isolation: a
 *      failure is logged and that candidate is dropped.
 */

import { jaccard, sharedShingles, shingleText } from '../text/shingles.js';
import { SEMANTIC_FEATURE } from '../fallback-monitor.js';
import type { FallbackMonitor } from '../fallback-monitor.js';
import type { SemanticSimilarity } from './semantic.js';
import type { Candidate, Match, ScoreOptions, ScoreResult, ScoringConfig } from './types.js';
import { DEFAULT_SCORING } from './types.js';

export function round(value: number, digits: number): number {
  const f = 10 ** digits;
  return Math.round(value * f) / f;
}

interface Scored {
  match: Match;
  accepted: boolean;
  shared: string[];
  rawCombined: number;
  rawJaccard: number;
}

export class CandidateScorer {
  readonly config: ScoringConfig;

  constructor(
    config: Partial<ScoringConfig> = {},
    private readonly semantic: SemanticSimilarity | null = null,
    private readonly monitor?: FallbackMonitor,
  ) {
    this.config = { ...DEFAULT_SCORING, ...config };
  }

  get semanticAvailable(): boolean {
    return this.semantic !== null;
  }

  async score(
    queryText: string,
    queryShingles: ReadonlySet<string>,
    candidates: readonly Candidate[],
    options: ScoreOptions,
  ): Promise<ScoreResult> {
    const empty: ScoreResult = {
      matches: [],
      score: 0,
      percent: 0,
      queryShingles: queryShingles.size,
      candidatesScored: 0,
      acceptedCount: 0,
      semanticUsed: false,
    };
    if (queryShingles.size === 0 || candidates.length === 0) return empty;

    const semantic = options.useSemantic ? this.semantic : null;
    if (options.useSemantic && !semantic) {
      this.monitor?.recordFallback(SEMANTIC_FEATURE, 'no embedding collaborator configured');
    }
    const queryWindow = queryText.slice(0, this.config.semanticWindowChars);

    const settled = await Promise.all(candidates.map(async (candidate) => {
      try {
        return await this.scoreOne(queryWindow, queryShingles, candidate, semantic, options.signal);
      } catch (err) {
        process.stderr.write(`WARN: Scoring candidate ${candidate.url} failed: ${err}\n`);
        return null;
      }
    }));

    const scored = settled.filter((s): s is Scored => s !== null);
    const accepted = scored.filter((s) => s.accepted);

    const matchedUnion = new Set<string>();
    for (const s of accepted) {
      for (const sh of s.shared) matchedUnion.add(sh);
    }
    const aggregate = Math.min(1, Math.max(0, matchedUnion.size / queryShingles.size));

    accepted.sort((a, b) =>
      b.rawCombined - a.rawCombined
      || b.rawJaccard - a.rawJaccard
      || a.match.docId.localeCompare(b.match.docId));

    return {
      matches: accepted.slice(0, Math.max(0, options.topK)).map((s) => s.match),
      score: round(aggregate, 5),
      percent: round(aggregate * 100, 2),
      queryShingles: queryShingles.size,
      candidatesScored: scored.length,
      acceptedCount: accepted.length,
      semanticUsed: semantic !== null,
    };
  }

  private async scoreOne(
    queryWindow: string,
    queryShingles: ReadonlySet<string>,
    candidate: Candidate,
    semantic: SemanticSimilarity | null,
    signal?: AbortSignal,
  ): Promise<Scored> {
    const shingles = candidate.shingles ?? shingleText(candidate.text, this.config.shingleSize);
    const j = jaccard(queryShingles, shingles);

    let sem: number | null = null;
    if (semantic && !signal?.aborted) {
      try {
        const raw = await semantic.similarity(
          queryWindow,
          candidate.text.slice(0, this.config.semanticWindowChars),
          signal,
        );
        sem = Math.min(1, Math.max(0, raw));
        this.monitor?.recordPrimary(SEMANTIC_FEATURE);
      } catch (err) {
        process.stderr.write(`WARN: Semantic similarity unavailable for ${candidate.url}: ${err}\n`);
        this.monitor?.recordFallback(SEMANTIC_FEATURE, String(err));
      }
    }

    const combined = sem === null
      ? j
      : this.config.lexicalWeight * j + this.config.semanticWeight * sem;
    const accepted = j > this.config.acceptJaccard || (sem !== null && sem > this.config.acceptSemantic);
    const shared = accepted ? sharedShingles(queryShingles, shingles) : [];

    return {
      accepted,
      shared,
      rawCombined: combined,
      rawJaccard: j,
      match: {
        docId: candidate.id,
        url: candidate.url,
        label: candidate.label,
        origin: candidate.origin,
        jaccard: round(j, 5),
        semantic: sem === null ? null : round(sem, 5),
        combined: round(combined, 5),
        percent: round(j * 100, 2),
        matchedShingles: shared.length,
      },
    };
  }
}
