import { describe, it, expect, beforeEach } from 'vitest';
import {
  FallbackMonitor,
  alertLevelFor,
  SEARCH_FEATURE,
  SEMANTIC_FEATURE,
  EXTRACTION_FEATURE,
} from '../src/fallback-monitor.js';

describe('alertLevelFor', () => {
  it('maps fallback rates to alert levels', () => {
    expect(alertLevelFor(0)).toBe('ok');
    expect(alertLevelFor(0.05)).toBe('ok');
    expect(alertLevelFor(0.1)).toBe('warn');
    expect(alertLevelFor(0.3)).toBe('page');
    expect(alertLevelFor(0.5)).toBe('rollback');
    expect(alertLevelFor(1)).toBe('rollback');
  });
});

describe('FallbackMonitor', () => {
  let monitor: FallbackMonitor;

  beforeEach(() => {
    monitor = new FallbackMonitor({ now: () => 1_000 });
  });

  it('tracks primary and fallback invocations separately', () => {
    monitor.recordPrimary(SEARCH_FEATURE);
    monitor.recordPrimary(SEARCH_FEATURE);
    monitor.recordFallback(SEARCH_FEATURE, 'search timed out');
    expect(monitor.getStats(SEARCH_FEATURE)).toEqual({
      feature: SEARCH_FEATURE,
      primaryCount: 2,
      fallbackCount: 1,
      fallbackRate: 1 / 3,
      alertLevel: 'page',
      recentFallbacks: [{ reason: 'search timed out', at: 1_000 }],
    });
  });

  it('reports an unused feature as ok with no data', () => {
    expect(monitor.getStats(EXTRACTION_FEATURE)).toEqual({
      feature: EXTRACTION_FEATURE,
      primaryCount: 0,
      fallbackCount: 0,
      fallbackRate: 0,
      alertLevel: 'ok',
      recentFallbacks: [],
    });
  });

  it('keeps only the most recent fallback events', () => {
    const small = new FallbackMonitor({ maxRecentEvents: 3 });
    for (let i = 1; i <= 4; i++) small.recordFallback(EXTRACTION_FEATURE, `reason-${i}`);
    const events = small.getStats(EXTRACTION_FEATURE).recentFallbacks;
    expect(events.map((e) => e.reason)).toEqual(['reason-2', 'reason-3', 'reason-4']);
  });

  it('hands out copies of the recent events', () => {
    monitor.recordFallback(SEMANTIC_FEATURE, 'proxy down');
    const stats = monitor.getStats(SEMANTIC_FEATURE);
    stats.recentFallbacks.push({ reason: 'tampered', at: 0 });
    const first = stats.recentFallbacks[0];
    if (first) first.reason = 'edited';
    expect(monitor.getStats(SEMANTIC_FEATURE).recentFallbacks).toEqual([{ reason: 'proxy down', at: 1_000 }]);
  });

  it('lists only features seen so far, worst first', () => {
    expect(monitor.getAllStats()).toEqual([]);
    monitor.recordPrimary(SEMANTIC_FEATURE);
    monitor.recordPrimary(SEMANTIC_FEATURE);
    monitor.recordFallback(SEMANTIC_FEATURE, 'proxy down');
    monitor.recordFallback(SEARCH_FEATURE, 'no search provider configured');
    expect(monitor.getAllStats().map((s) => s.feature)).toEqual([SEARCH_FEATURE, SEMANTIC_FEATURE]);
  });
});
