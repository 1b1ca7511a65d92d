import { RegenerationDecision, ScoreBreakdown } from '../types';
import {
  DIMENSION_MAX,
  MIN_INTENT_SCORE,
  PASS_THRESHOLD,
  REGENERATE_IMMEDIATELY_BELOW,
  WEAK_DIMENSION_RATIO,
} from './rules';

export type SuggestionTag =
  | 'structure'
  | 'personalization'
  | 'message'
  | 'intent'
  | 'firstName'
  | 'achievement'
  | 'industryContext'
  | 'cta';

export type ImprovementSuggestions = Partial<Record<SuggestionTag, string>>;

const WEAK_ACHIEVEMENT_BELOW = 7;
const WEAK_INDUSTRY_CONTEXT_BELOW = 8;

export function shouldRegenerate(score: ScoreBreakdown): RegenerationDecision {
  if (score.total < REGENERATE_IMMEDIATELY_BELOW) {
    return { regenerate: true, reason: 'Low quality score - immediate regeneration required', tier: 'low' };
  }
  if (score.total < PASS_THRESHOLD) {
    return { regenerate: true, reason: 'Medium quality score - single optimization attempt', tier: 'medium' };
  }
  return { regenerate: false, reason: 'Quality score acceptable', tier: 'acceptable' };
}

function isWeak(value: number, max: number): boolean {
  return value < max * WEAK_DIMENSION_RATIO;
}

export function getImprovementSuggestions(score: ScoreBreakdown): ImprovementSuggestions {
  const suggestions: ImprovementSuggestions = {};

  if (isWeak(score.structure, DIMENSION_MAX.structure)) {
    suggestions.structure =
      'Improve email structure - ensure proper greeting, achievement recognition, industry context, value proposition, and CTA';
  }
  if (isWeak(score.personalization, DIMENSION_MAX.personalization)) {
    suggestions.personalization =
      'Enhance personalization - improve LinkedIn research and company-specific context';
  }
  if (isWeak(score.message, DIMENSION_MAX.message)) {
    suggestions.message = 'Improve message quality - work on tone, flow, length and subject line';
  }
  if (score.details.intent.intentSpecified && score.intent < MIN_INTENT_SCORE) {
    suggestions.intent = 'Use the selling intent keywords in the subject line and body; avoid generic platform messaging';
  }

  const structure = score.details.structure;
  if (structure.firstName === 0) {
    suggestions.firstName = 'Ensure first name is capitalized and properly formatted in greeting';
  }
  if (structure.achievement < WEAK_ACHIEVEMENT_BELOW) {
    suggestions.achievement = 'Add specific achievement recognition or improve generic pleasing message';
  }
  if (structure.industryContext < WEAK_INDUSTRY_CONTEXT_BELOW) {
    suggestions.industryContext = 'Include a specific customer use case from a similar industry';
  }
  if (structure.callToAction === 0) {
    suggestions.cta = 'Add clear meeting request call-to-action';
  }

  return suggestions;
}

const FOCUS_BY_TAG: ReadonlyArray<[SuggestionTag, string]> = [
  ['structure', 'FOCUS: Ensure exact 5-paragraph structure'],
  ['achievement', 'FOCUS: Include specific achievement recognition'],
  ['industryContext', 'FOCUS: Include a customer use case with metrics'],
  ['cta', 'FOCUS: Include clear 15-minute meeting request'],
  ['intent', 'FOCUS: Repeat the selling intent keywords in subject and body'],
];

/** Turn suggestion tags into FOCUS lines passed to the next generation attempt. */
export function buildRetryHints(suggestions: ImprovementSuggestions): string[] {
  return FOCUS_BY_TAG.filter(([tag]) => suggestions[tag] !== undefined).map(([, hint]) => hint);
}
