import { describe, it, expect } from 'vitest';
import { averageQualityScore, calculatePassRate, formatPercent } from '../../src/utils/pass-rate';
import { scoreEmail } from '../../src/scoring/quality-scorer';
import { TestResult } from '../../src/types';
import { asEmail, milan, strongOutput } from '../helpers/fixtures';

function result(passed: boolean, withScore: boolean): TestResult {
  return {
    prospect: milan(),
    passed,
    score: withScore ? scoreEmail(asEmail(strongOutput()), { linkedinConfidence: 80 }, milan()) : null,
    output: null,
    criticalFailures: [],
    durationMs: 0,
    error: null,
  };
}

describe('pass-rate helpers', () => {
  it('computes the pass rate', () => {
    expect(calculatePassRate([])).toBe(0);
    expect(calculatePassRate([result(true, true), result(false, false), result(false, true), result(true, true)])).toBe(0.5);
  });

  it('averages only scored results', () => {
    expect(averageQualityScore([result(true, true), result(false, false)])).toBe(89);
    expect(averageQualityScore([result(false, false)])).toBe(0);
  });

  it('formats percentages', () => {
    expect(formatPercent(0.9)).toBe('90.0%');
    expect(formatPercent(0.5, 0)).toBe('50%');
  });
});
