import {
  IntentDetails,
  MessageDetails,
  PersonalizationDetails,
  ProspectInput,
  ResearchMetadata,
  ScoreBreakdown,
  StructureDetails,
} from '../types';
import {
  ACHIEVEMENT_KEYWORDS,
  ACHIEVEMENT_RULES,
  ACTION_VALUE_PHRASES,
  BUSINESS_ROLES,
  BUSINESS_VOCABULARY,
  CLOSING_PATTERN,
  COMPANY_RESEARCH_POINTS,
  CONVERSATIONAL_PHRASES,
  CTA_PATTERNS,
  CTA_POINTS,
  DATA_PLATFORM_TERMS,
  GENERIC_INTENT_FOCUS_POINTS,
  GENERIC_PENALTY_RULES,
  GENERIC_VALUE_WORDS,
  GREETING_PATTERN,
  GREETING_POINTS,
  INDUSTRY_CONTEXT_POINTS,
  INTENT_FAMILIES,
  KEYWORD_COVERAGE_BANDS,
  LENGTH_POINTS,
  LINKEDIN_CONFIDENCE_BANDS,
  MIN_INTENT_TOKEN_LENGTH,
  PARAGRAPH_COUNT_BANDS,
  RangeBand,
  REFERENCE_CUSTOMERS,
  RESULT_METRICS,
  ROLE_RELEVANCE_POINTS,
  SOFT_RESEARCH_PHRASES,
  SUBJECT_MARKER,
  SUBJECT_POINTS,
  SUBJECT_VALUE_TOKENS,
  TECHNICAL_ROLES,
  TECHNICAL_VOCABULARY,
  TONE_POINTS,
  TRANSITION_WORDS,
  USE_CASE_FOCUS_CAP,
  VALUE_PROPOSITION_POINTS,
  WORD_COUNT_BANDS,
  DIMENSION_MAX,
} from './rules';

interface DimensionScore<T> {
  total: number;
  details: T;
}

// --- Matching helpers ---

function containsAny(haystack: string, needles: readonly string[]): boolean {
  return needles.some(needle => haystack.includes(needle));
}

function bandPoints(value: number, bands: RangeBand[], fallback: number): number {
  const band = bands.find(b => value >= b.min && value <= b.max);
  return band ? band.points : fallback;
}

function startsWithUppercase(value: string): boolean {
  return /^\p{Lu}/u.test(value);
}

/** Lower-cased intent words longer than two characters. */
export function extractIntentKeywords(sellingIntent: string): string[] {
  return sellingIntent
    .toLowerCase()
    .split(/\s+/)
    .filter(word => word.length >= MIN_INTENT_TOKEN_LENGTH);
}

/** Text after the first line that starts with the subject marker, or '' when there is none. */
export function extractSubjectLine(email: string): string {
  const line = email
    .trim()
    .split('\n')
    .find(l => l.startsWith(SUBJECT_MARKER));
  return line ? line.split(SUBJECT_MARKER).join('').trim() : '';
}

// --- Structure (35) ---

export function scoreAchievementRecognition(email: string, research: ResearchMetadata): number {
  const lower = email.toLowerCase();
  const achievements = research.achievements ?? [];
  const confidence = research.linkedinConfidence ?? 0;
  const hasKeyword = containsAny(lower, ACHIEVEMENT_KEYWORDS);

  if (confidence >= ACHIEVEMENT_RULES.highConfidenceThreshold) {
    if (hasKeyword && achievements.length > 0) {
      const verbatim = achievements
        .slice(0, ACHIEVEMENT_RULES.achievementsConsidered)
        .some(a => a.length > 0 && lower.includes(a.toLowerCase()));
      return verbatim ? ACHIEVEMENT_RULES.verbatimMatch : ACHIEVEMENT_RULES.keywordOnly;
    }
    return ACHIEVEMENT_RULES.missingForHighConfidence;
  }

  return hasKeyword ? ACHIEVEMENT_RULES.lowConfidenceKeyword : ACHIEVEMENT_RULES.lowConfidenceNone;
}

export function scoreIndustryContext(email: string): number {
  const lower = email.toLowerCase();
  if (containsAny(lower, REFERENCE_CUSTOMERS)) return INDUSTRY_CONTEXT_POINTS.referenceCustomer;
  if (containsAny(lower, RESULT_METRICS)) return INDUSTRY_CONTEXT_POINTS.resultMetric;
  if (containsAny(lower, DATA_PLATFORM_TERMS)) return INDUSTRY_CONTEXT_POINTS.dataPlatform;
  return 0;
}

/** Raw value-proposition points before the cap is applied. */
export function scoreValueProposition(email: string, company: string): number {
  const lower = email.toLowerCase();
  const companyLower = company.trim().toLowerCase();

  if (companyLower && lower.includes(companyLower) && containsAny(lower, ACTION_VALUE_PHRASES)) {
    return VALUE_PROPOSITION_POINTS.companySpecific;
  }
  if (containsAny(lower, GENERIC_VALUE_WORDS)) {
    return VALUE_PROPOSITION_POINTS.generic;
  }
  return 0;
}

export function scoreCallToAction(email: string): number {
  const lower = email.toLowerCase();
  return CTA_PATTERNS.some(pattern => pattern.test(lower)) ? CTA_POINTS : 0;
}

function scoreStructure(
  email: string,
  research: ResearchMetadata,
  prospect: ProspectInput
): DimensionScore<StructureDetails> {
  const firstName = (prospect.firstName ?? '').trim();
  const greeting =
    firstName && startsWithUppercase(firstName) && email.includes(`Hi ${firstName}`) ? GREETING_POINTS : 0;

  const details: StructureDetails = {
    firstName: greeting,
    achievement: scoreAchievementRecognition(email, research),
    industryContext: scoreIndustryContext(email),
    valueProposition: Math.min(
      VALUE_PROPOSITION_POINTS.cap,
      scoreValueProposition(email, prospect.company ?? '')
    ),
    callToAction: scoreCallToAction(email),
  };

  const total =
    details.firstName +
    details.achievement +
    details.industryContext +
    details.valueProposition +
    details.callToAction;

  return { total, details };
}

// --- Personalization (25) ---

export function scoreLinkedinConfidence(confidence: number): number {
  const band = LINKEDIN_CONFIDENCE_BANDS.find(b => confidence >= b.min);
  return band ? band.points : 0;
}

/** Raw company-research points before the cap is applied. */
export function scoreCompanyResearch(email: string, research: ResearchMetadata): number {
  const facts = research.companyAchievements ?? [];
  if (facts.length >= 2) return COMPANY_RESEARCH_POINTS.multipleFacts;
  if (facts.length === 1) return COMPANY_RESEARCH_POINTS.singleFact;
  if (containsAny(email.toLowerCase(), SOFT_RESEARCH_PHRASES)) return COMPANY_RESEARCH_POINTS.softPhrase;
  return 0;
}

export function scoreRoleRelevance(email: string, title: string): number {
  const lower = email.toLowerCase();
  const role = title.toLowerCase();

  if (containsAny(role, TECHNICAL_ROLES)) {
    if (containsAny(lower, TECHNICAL_VOCABULARY)) return ROLE_RELEVANCE_POINTS.matched;
  } else if (containsAny(role, BUSINESS_ROLES)) {
    if (containsAny(lower, BUSINESS_VOCABULARY)) return ROLE_RELEVANCE_POINTS.matched;
  } else if (containsAny(lower, [...TECHNICAL_VOCABULARY, ...BUSINESS_VOCABULARY])) {
    return ROLE_RELEVANCE_POINTS.unmatchedRoleWithVocabulary;
  }

  return ROLE_RELEVANCE_POINTS.floor;
}

function scorePersonalization(
  email: string,
  research: ResearchMetadata,
  prospect: ProspectInput
): DimensionScore<PersonalizationDetails> {
  const details: PersonalizationDetails = {
    linkedinConfidence: scoreLinkedinConfidence(research.linkedinConfidence ?? 0),
    companyResearch: Math.min(COMPANY_RESEARCH_POINTS.cap, scoreCompanyResearch(email, research)),
    roleRelevance: scoreRoleRelevance(email, prospect.title ?? ''),
  };

  return {
    total: details.linkedinConfidence + details.companyResearch + details.roleRelevance,
    details,
  };
}

// --- Message (25) ---

/** Raw tone points, already limited to the raw ceiling but not to the dimension cap. */
export function scoreToneAndFlow(email: string): number {
  const lower = email.toLowerCase();
  let score = 0;

  if (GREETING_PATTERN.test(email)) score += TONE_POINTS.greeting;
  if (containsAny(lower, TRANSITION_WORDS)) score += TONE_POINTS.transition;
  if (CLOSING_PATTERN.test(email)) score += TONE_POINTS.closing;
  if (containsAny(lower, CONVERSATIONAL_PHRASES)) score += TONE_POINTS.conversational;

  return Math.min(score, TONE_POINTS.rawCap);
}

export function countWords(email: string): number {
  return email.split(/\s+/).filter(Boolean).length;
}

export function countParagraphs(email: string): number {
  return email.split('\n\n').filter(p => p.trim().length > 0).length;
}

/** Raw length points (word band + paragraph band) before the cap is applied. */
export function scoreLengthAndCrispness(email: string): number {
  const wordScore = bandPoints(countWords(email), WORD_COUNT_BANDS, LENGTH_POINTS.outOfBand);
  const paragraphScore = bandPoints(countParagraphs(email), PARAGRAPH_COUNT_BANDS, LENGTH_POINTS.outOfBand);
  return wordScore + paragraphScore;
}

export function scoreSubjectLine(email: string, prospect: ProspectInput): number {
  const subject = extractSubjectLine(email);
  if (!subject) return 0;

  const firstName = (prospect.firstName ?? '').trim();
  const company = (prospect.company ?? '').trim();
  let score = 0;

  if (firstName && subject.includes(firstName)) score += SUBJECT_POINTS.firstName;
  if (company && subject.includes(company)) score += SUBJECT_POINTS.company;
  if (containsAny(subject.toLowerCase(), SUBJECT_VALUE_TOKENS)) score += SUBJECT_POINTS.valueToken;

  return Math.min(score, SUBJECT_POINTS.cap);
}

function scoreMessage(email: string, prospect: ProspectInput): DimensionScore<MessageDetails> {
  const details: MessageDetails = {
    toneFlow: Math.min(TONE_POINTS.cap, scoreToneAndFlow(email)),
    lengthCrispness: Math.min(LENGTH_POINTS.cap, scoreLengthAndCrispness(email)),
    subjectLine: scoreSubjectLine(email, prospect),
  };

  return {
    total: details.toneFlow + details.lengthCrispness + details.subjectLine,
    details,
  };
}

// --- Selling intent (15) ---

export function scoreKeywordCoverage(coverage: number): number {
  const band = KEYWORD_COVERAGE_BANDS.find(b => coverage >= b.min);
  return band ? band.points : 0;
}

export function scoreUseCaseFocus(emailLower: string, intent: string, keywords: string[]): number {
  const family = INTENT_FAMILIES.find(f => intent.includes(f.trigger));

  let score = 0;
  if (family) {
    for (const rule of family.rules) {
      if (containsAny(emailLower, rule.terms)) score += rule.points;
    }
  } else if (containsAny(emailLower, keywords)) {
    score = GENERIC_INTENT_FOCUS_POINTS;
  }

  return Math.min(USE_CASE_FOCUS_CAP, score);
}

export function genericMessagingPenalty(emailLower: string, intent: string): number {
  const rules = GENERIC_PENALTY_RULES;
  if (!intent.includes(rules.trigger) || emailLower.includes(rules.exemptWord)) return 0;
  if (containsAny(emailLower, rules.strong.terms)) return rules.strong.points;
  if (containsAny(emailLower, rules.mild.terms)) return rules.mild.points;
  return 0;
}

function scoreSellingIntent(email: string, prospect: ProspectInput): DimensionScore<IntentDetails> {
  const intent = (prospect.sellingIntent ?? '').toLowerCase().trim();

  if (!intent) {
    return {
      total: DIMENSION_MAX.intent,
      details: { intentSpecified: false, keywordCoverage: DIMENSION_MAX.intent, useCaseFocus: 0, genericPenalty: 0 },
    };
  }

  const emailLower = email.toLowerCase();
  const keywords = extractIntentKeywords(intent);
  const found = keywords.filter(k => emailLower.includes(k)).length;
  const coverage = keywords.length > 0 ? found / keywords.length : 0;

  const details: IntentDetails = {
    intentSpecified: true,
    keywordCoverage: scoreKeywordCoverage(coverage),
    useCaseFocus: scoreUseCaseFocus(emailLower, intent, keywords),
    genericPenalty: genericMessagingPenalty(emailLower, intent),
  };

  return {
    total: Math.max(0, details.keywordCoverage + details.useCaseFocus + details.genericPenalty),
    details,
  };
}

/**
 * Score an outreach email (subject line included as a `Subject:` line) on the
 * 100-point rubric: structure 35, personalization 25, message 25, selling intent 15.
 */
export function scoreEmail(
  email: string,
  research: ResearchMetadata,
  prospect: ProspectInput
): ScoreBreakdown {
  const text = email ?? '';
  const structure = scoreStructure(text, research, prospect);
  const personalization = scorePersonalization(text, research, prospect);
  const message = scoreMessage(text, prospect);
  const intent = scoreSellingIntent(text, prospect);

  return Object.freeze({
    total: structure.total + personalization.total + message.total + intent.total,
    structure: structure.total,
    personalization: personalization.total,
    message: message.total,
    intent: intent.total,
    details: Object.freeze({
      structure: Object.freeze(structure.details),
      personalization: Object.freeze(personalization.details),
      message: Object.freeze(message.details),
      intent: Object.freeze(intent.details),
    }),
  });
}
