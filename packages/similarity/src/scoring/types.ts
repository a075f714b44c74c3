/**
 * FILE PURPOSE: Shared types for candidate scoring and match reports
 */

export type PageOrigin = 'corpus' | 'web';

/** A page offered to the scorer: from the local index or freshly crawled. */
export interface Candidate {
  id: string;
  url: string;
  label: string | null;
  origin: PageOrigin;
  text: string;
  /** Precomputed shingles; recomputed from `text` when absent. */
  shingles?: ReadonlySet<string>;
}

export interface Match {
  docId: string;
  url: string;
  label: string | null;
  origin: PageOrigin;
  /** Exact Jaccard of shingle sets, 5 decimals. */
  jaccard: number;
  /** Embedding similarity in [0,1], or null when not computed. */
  semantic: number | null;
  /** Blended score used for ranking, 5 decimals. */
  combined: number;
  /** jaccard × 100, 2 decimals. */
  percent: number;
  /** Query shingles also present in this candidate. */
  matchedShingles: number;
}

export interface ScoringConfig {
  shingleSize: number;
  acceptJaccard: number;
  acceptSemantic: number;
  lexicalWeight: number;
  semanticWeight: number;
  /** Leading characters of each side sent to the embedding collaborator. */
  semanticWindowChars: number;
}

export const DEFAULT_SCORING: ScoringConfig = {
  shingleSize: 5,
  acceptJaccard: 0.15,
  acceptSemantic: 0.6,
  lexicalWeight: 0.6,
  semanticWeight: 0.4,
  semanticWindowChars: 2000,
};

export interface ScoreOptions {
  useSemantic: boolean;
  topK: number;
  signal?: AbortSignal;
}

export interface ScoreResult {
  matches: Match[];
  /** |query shingles matched by any accepted candidate| / |query shingles|, 5 decimals. */
  score: number;
  percent: number;
  queryShingles: number;
  candidatesScored: number;
  /** Accepted matches before top-k truncation. */
  acceptedCount: number;
  semanticUsed: boolean;
}
