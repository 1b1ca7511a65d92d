import { TestResult } from '../types';

/**
 * Share of passed tests. Returns 0 for an empty run.
 */
export function calculatePassRate(results: TestResult[]): number {
  if (results.length === 0) return 0;
  return results.filter(r => r.passed).length / results.length;
}

/** Mean total over results that produced a score; 0 when none did. */
export function averageQualityScore(results: TestResult[]): number {
  const totals = results.flatMap(r => (r.score ? [r.score.total] : []));
  if (totals.length === 0) return 0;
  return totals.reduce((sum, t) => sum + t, 0) / totals.length;
}

export function formatPercent(rate: number, digits = 1): string {
  return `${(rate * 100).toFixed(digits)}%`;
}
