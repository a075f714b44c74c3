/**
 * FILE PURPOSE: Track how often checks run on a degraded path
 *
 * WHY: Search timeouts, missing embeddings and failed extraction all degrade
 *      quietly. Users still get a report, so operators need the rate, and
 *      /api/health surfaces any feature that is past the warn level.
 * HOW: One counter pair per degraded feature plus a bounded list of the most
 *      recent fallback reasons. Alert levels at 10% (warn), 30% (page),
 *      50% (rollback).
 */

// ─── Features ───

export const SEARCH_FEATURE = 'search-discovery';
export const SEMANTIC_FEATURE = 'semantic-scoring';
export const EXTRACTION_FEATURE = 'document-extraction';

export type DegradedFeature = typeof SEARCH_FEATURE | typeof SEMANTIC_FEATURE | typeof EXTRACTION_FEATURE;

const FEATURES: readonly DegradedFeature[] = [SEARCH_FEATURE, SEMANTIC_FEATURE, EXTRACTION_FEATURE];

// ─── Types ───

export type AlertLevel = 'ok' | 'warn' | 'page' | 'rollback';

export interface FallbackEvent {
  reason: string;
  at: number;
}

export interface FallbackStats {
  feature: DegradedFeature;
  primaryCount: number;
  fallbackCount: number;
  fallbackRate: number;
  alertLevel: AlertLevel;
  recentFallbacks: FallbackEvent[];
}

export interface FallbackMonitorOptions {
  maxRecentEvents?: number;
  now?: () => number;
}

interface FeatureCounters {
  primary: number;
  fallback: number;
  recent: FallbackEvent[];
}

export function alertLevelFor(fallbackRate: number): AlertLevel {
  if (fallbackRate >= 0.5) return 'rollback';
  if (fallbackRate >= 0.3) return 'page';
  if (fallbackRate >= 0.1) return 'warn';
  return 'ok';
}

// ─── Monitor ───

export class FallbackMonitor {
  private readonly counters = new Map<DegradedFeature, FeatureCounters>();
  private readonly maxRecentEvents: number;
  private readonly now: () => number;

  constructor(options: FallbackMonitorOptions = {}) {
    this.maxRecentEvents = options.maxRecentEvents ?? 50;
    this.now = options.now ?? Date.now;
  }

  recordPrimary(feature: DegradedFeature): void {
    this.countersFor(feature).primary++;
  }

  recordFallback(feature: DegradedFeature, reason: string): void {
    const c = this.countersFor(feature);
    c.fallback++;
    c.recent.push({ reason, at: this.now() });
    if (c.recent.length > this.maxRecentEvents) c.recent.shift();
  }

  getStats(feature: DegradedFeature): FallbackStats {
    const c = this.counters.get(feature);
    const primaryCount = c?.primary ?? 0;
    const fallbackCount = c?.fallback ?? 0;
    const total = primaryCount + fallbackCount;
    const fallbackRate = total > 0 ? fallbackCount / total : 0;
    return {
      feature,
      primaryCount,
      fallbackCount,
      fallbackRate,
      alertLevel: alertLevelFor(fallbackRate),
      recentFallbacks: c ? c.recent.map((e) => ({ ...e })) : [],
    };
  }

  /** Features seen so far, worst fallback rate first. */
  getAllStats(): FallbackStats[] {
    return FEATURES
      .filter((feature) => this.counters.has(feature))
      .map((feature) => this.getStats(feature))
      .sort((a, b) => b.fallbackRate - a.fallbackRate);
  }

  private countersFor(feature: DegradedFeature): FeatureCounters {
    let c = this.counters.get(feature);
    if (!c) {
      c = { primary: 0, fallback: 0, recent: [] };
      this.counters.set(feature, c);
    }
    return c;
  }
}
