import { EmailGenerator } from './email-generator';
import { assembleEmail, researchFromOutput } from './test-runner';
import { scoreEmail } from '../scoring/quality-scorer';
import { buildRetryHints, getImprovementSuggestions, shouldRegenerate } from '../scoring/regeneration-policy';
import { errorMessage } from '../errors';
import { GenerationResult, ProspectInput, RegenerationDecision, ScoreBreakdown } from '../types';

export interface QualityGateOptions {
  maxAttempts?: number;
}

export interface QualityGateResult {
  output: GenerationResult;
  score: ScoreBreakdown;
  decision: RegenerationDecision;
  attempts: number;
  success: boolean;
}

const DEFAULT_MAX_ATTEMPTS = 3;

/**
 * Generate, score and regenerate with FOCUS hints until the policy accepts the
 * email or attempts run out; the last scored attempt is returned. The caller's
 * prospect is never modified.
 */
export async function runWithQualityValidation(
  generator: EmailGenerator,
  prospect: ProspectInput,
  options: QualityGateOptions = {}
): Promise<QualityGateResult> {
  const maxAttempts = Math.max(1, options.maxAttempts ?? DEFAULT_MAX_ATTEMPTS);
  let request: ProspectInput = { ...prospect };
  let last: QualityGateResult | null = null;

  for (let attempt = 1; attempt <= maxAttempts; attempt++) {
    let output: GenerationResult;
    try {
      output = await generator.generate(request);
    } catch (err) {
      if (attempt === maxAttempts) throw err;
      console.warn(`[quality-gate] Attempt ${attempt} failed: ${errorMessage(err)}; retrying`);
      continue;
    }

    const score = scoreEmail(assembleEmail(output), researchFromOutput(output), prospect);
    const decision = shouldRegenerate(score);
    last = { output, score, decision, attempts: attempt, success: !decision.regenerate };
    if (!decision.regenerate) {
      return last;
    }

    console.log(`[quality-gate] Attempt ${attempt}: ${score.total}/100 (${decision.reason})`);
    const hints = buildRetryHints(getImprovementSuggestions(score));
    request = {
      ...prospect,
      retryHints: { enhancements: hints, attempt: attempt + 1 },
    };
  }

  if (!last) {
    throw new Error('Quality gate produced no result');
  }
  console.warn(`[quality-gate] Maximum attempts reached. Final score: ${last.score.total}/100`);
  return last;
}
