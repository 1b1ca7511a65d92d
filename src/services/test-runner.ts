import { EmailGenerator, withTimeout } from './email-generator';
import { extractIntentKeywords, scoreEmail } from '../scoring/quality-scorer';
import { DIMENSION_MAX, MIN_CTA_SCORE, MIN_INTENT_SCORE, PASS_THRESHOLD, WEAK_DIMENSION_RATIO } from '../scoring/rules';
import { averageQualityScore, calculatePassRate, formatPercent } from '../utils/pass-rate';
import { errorMessage } from '../errors';
import {
  FailurePatternCounts,
  GenerationResult,
  ProspectInput,
  ResearchMetadata,
  ScoreBreakdown,
  TestResult,
  TestSuiteResults,
} from '../types';

export const DEFAULT_TIMEOUT_MS = 180_000;
export const DEFAULT_TARGET_PASS_RATE = 0.95;

const ASSUMED_LINKEDIN_CONFIDENCE = 80;
const VALIDATED_LINKEDIN_CONFIDENCE = 95;

export function assembleEmail(output: GenerationResult): string {
  return `Subject: ${output.subjectLine}\n\n${output.emailBody}`;
}

/** Research metadata implied by a generation result; achievements are not extracted. */
export function researchFromOutput(output: GenerationResult): ResearchMetadata {
  return {
    linkedinConfidence: output.validatedLinkedinProfile ? VALIDATED_LINKEDIN_CONFIDENCE : ASSUMED_LINKEDIN_CONFIDENCE,
    achievements: [],
    companyAchievements: [],
  };
}

export function findCriticalFailures(
  output: GenerationResult,
  prospect: ProspectInput,
  score: ScoreBreakdown
): string[] {
  const failures: string[] = [];

  if (!output.subjectLine) failures.push('Missing subject line');
  if (!output.emailBody) failures.push('Missing email body');

  const firstName = prospect.firstName;
  const body = output.emailBody;
  if (firstName && !(body.includes(`Hi ${firstName}`) || body.includes(`${firstName},`))) {
    failures.push('First name not properly capitalized in greeting');
  }

  const intent = (prospect.sellingIntent ?? '').trim();
  if (intent && score.intent < MIN_INTENT_SCORE) {
    failures.push(`Intent compliance too low: ${score.intent}/15 (required: >= ${MIN_INTENT_SCORE})`);
  }

  if (score.details.structure.callToAction < MIN_CTA_SCORE) {
    failures.push('Missing or weak call-to-action');
  }

  if (intent) {
    const bodyLower = body.toLowerCase();
    if (!extractIntentKeywords(intent).some(k => bodyLower.includes(k))) {
      failures.push('Generic messaging used despite specific selling intent');
    }
  }

  return failures;
}

const CRITICAL_FAILURE_PATTERNS: ReadonlyArray<[string, string]> = [
  ['Intent compliance', 'critical_intent_failure'],
  ['First name', 'capitalization_error'],
  ['call-to-action', 'missing_cta'],
  ['Generic messaging', 'generic_messaging'],
];

function isWeak(value: number, max: number): boolean {
  return value < max * WEAK_DIMENSION_RATIO;
}

export function countFailurePatterns(results: TestResult[]): FailurePatternCounts {
  const counts: FailurePatternCounts = {};
  const bump = (key: string) => {
    counts[key] = (counts[key] ?? 0) + 1;
  };

  for (const result of results) {
    if (result.passed) continue;

    if (!result.score) {
      bump('execution_failure');
    } else {
      if (result.score.intent < MIN_INTENT_SCORE) bump('intent_compliance_low');
      if (isWeak(result.score.structure, DIMENSION_MAX.structure)) bump('structure_issues');
      if (isWeak(result.score.personalization, DIMENSION_MAX.personalization)) bump('personalization_weak');
      if (isWeak(result.score.message, DIMENSION_MAX.message)) bump('message_quality_low');
    }

    for (const failure of result.criticalFailures) {
      const match = CRITICAL_FAILURE_PATTERNS.find(([marker]) => failure.includes(marker));
      if (match) bump(match[1]);
    }
  }

  return counts;
}

export interface TestRunnerOptions {
  timeoutMs?: number;
  passThreshold?: number;
}

/**
 * Runs prospects through the generator and grades each email with the scorer.
 */
export class TestRunner {
  private timeoutMs: number;
  private passThreshold: number;

  constructor(
    private generator: EmailGenerator,
    options: TestRunnerOptions = {}
  ) {
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.passThreshold = options.passThreshold ?? PASS_THRESHOLD;
  }

  async runSingleTest(prospect: ProspectInput, timeoutMs: number = this.timeoutMs): Promise<TestResult> {
    const startedAt = Date.now();

    const failed = (reason: string, err: unknown, output: GenerationResult | null): TestResult => {
      const message = errorMessage(err);
      return {
        prospect,
        passed: false,
        score: null,
        output,
        criticalFailures: [`${reason}: ${message}`],
        durationMs: Date.now() - startedAt,
        error: message,
      };
    };

    let output: GenerationResult;
    try {
      output = await withTimeout(this.generator.generate(prospect), timeoutMs);
    } catch (err) {
      return failed('Generation failed', err, null);
    }

    let score: ScoreBreakdown;
    let criticalFailures: string[];
    try {
      score = scoreEmail(assembleEmail(output), researchFromOutput(output), prospect);
      criticalFailures = findCriticalFailures(output, prospect, score);
    } catch (err) {
      return failed('Scoring failed', err, output);
    }

    return {
      prospect,
      passed: criticalFailures.length === 0 && score.total >= this.passThreshold,
      score,
      output,
      criticalFailures,
      durationMs: Date.now() - startedAt,
      error: null,
    };
  }

  async runTestSuite(
    prospects: ProspectInput[],
    targetPassRate: number = DEFAULT_TARGET_PASS_RATE
  ): Promise<TestSuiteResults> {
    console.log(
      `[test-runner] Running ${prospects.length} prospects (target ${formatPercent(targetPassRate, 0)}, threshold ${this.passThreshold}/100)`
    );

    const results: TestResult[] = [];
    for (const [index, prospect] of prospects.entries()) {
      const result = await this.runSingleTest(prospect);
      const label = `${prospect.firstName} ${prospect.lastName} at ${prospect.company}`;
      const scoreText = result.score ? `${result.score.total}/100` : 'N/A';
      console.log(`[test-runner] [${index + 1}/${prospects.length}] ${result.passed ? 'PASS' : 'FAIL'} ${label} - ${scoreText}`);
      for (const failure of result.criticalFailures.slice(0, 3)) {
        console.log(`[test-runner]     - ${failure}`);
      }
      results.push(result);
    }

    const passedTests = results.filter(r => r.passed).length;
    const passRate = calculatePassRate(results);
    // Rounded so 0.95 - 0.9 reads as 0.05.
    const shortfall = Math.round(Math.max(0, targetPassRate - passRate) * 1e6) / 1e6;
    const suite: TestSuiteResults = {
      totalTests: results.length,
      passedTests,
      failedTests: results.length - passedTests,
      passRate,
      avgQualityScore: averageQualityScore(results),
      results,
      failurePatterns: countFailurePatterns(results),
      targetPassRate,
      targetMet: passRate >= targetPassRate,
      shortfall,
      timestamp: new Date().toISOString(),
    };

    console.log(
      `[test-runner] Passed ${suite.passedTests}/${suite.totalTests} (${formatPercent(passRate)}), avg quality ${suite.avgQualityScore.toFixed(1)}/100`
    );
    if (!suite.targetMet) {
      console.log(`[test-runner] Below target by ${(shortfall * 100).toFixed(1)} percentage points`);
    }
    return suite;
  }
}
