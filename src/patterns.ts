import type { FrequencyEntry, PatternSummary, SimilarityResult } from './types';

/** A match above this score marks the failure as recurring. */
export const RECURRING_SCORE = 0.85;
export const TOP_AFFECTED = 5;

/**
 * Occurrence counts by key, most frequent first. Equal counts keep the order
 * in which the key was first seen.
 */
export function rankBy<T>(items: T[], key: (item: T) => string, limit?: number): FrequencyEntry[] {
  const counts = new Map<string, number>();
  for (const item of items) {
    const k = key(item);
    counts.set(k, (counts.get(k) || 0) + 1);
  }
  const ranked = [...counts].map(([name, count]) => ({ name, count })).sort((a, b) => b.count - a.count);
  return limit === undefined ? ranked : ranked.slice(0, limit);
}

export function extractPatterns(similar: SimilarityResult[]): PatternSummary {
  if (!similar.length) {
    return { recurring: false, frequency: 0, affectedTests: [], affectedClasses: [], avgSimilarity: 0 };
  }
  const total = similar.reduce((sum, s) => sum + s.score, 0);
  return {
    recurring: similar.some(s => s.score > RECURRING_SCORE),
    frequency: similar.length,
    affectedTests: rankBy(similar, s => s.testName, TOP_AFFECTED),
    affectedClasses: rankBy(similar, s => s.className, TOP_AFFECTED),
    avgSimilarity: total / similar.length,
  };
}
