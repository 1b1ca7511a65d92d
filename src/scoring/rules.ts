// Scoring rule tables. The scorer's control flow reads every keyword list and
// numeric band from here so the rubric can be tuned without touching it.

export const DIMENSION_MAX = {
  structure: 35,
  personalization: 25,
  message: 25,
  intent: 15,
} as const;

/** Below this share of a dimension's maximum the dimension counts as weak. */
export const WEAK_DIMENSION_RATIO = 0.8;

export const PASS_THRESHOLD = 85;
export const REGENERATE_IMMEDIATELY_BELOW = 70;
export const MIN_INTENT_SCORE = 12;
export const MIN_CTA_SCORE = 3;

// --- Structure ---

export const GREETING_POINTS = 5;

export const ACHIEVEMENT_KEYWORDS = [
  'congratulations',
  'impressive',
  'notable',
  'achievement',
  'success',
  'proud',
  'recognized',
];

export const ACHIEVEMENT_RULES = {
  highConfidenceThreshold: 70,
  /** Only the first few supplied achievements are matched against the email. */
  achievementsConsidered: 3,
  verbatimMatch: 10,
  keywordOnly: 8,
  missingForHighConfidence: 4,
  lowConfidenceKeyword: 7,
  lowConfidenceNone: 3,
} as const;

export const REFERENCE_CUSTOMERS = ['home credit', 'rohlik', 'p3 logistic', 'brix'];
export const RESULT_METRICS = ['70%', '80%', '50%', 'reduction', 'unified data', 'days vs months'];
export const DATA_PLATFORM_TERMS = ['data platform', 'data stack', 'data operations', 'analytics'];

export const INDUSTRY_CONTEXT_POINTS = {
  referenceCustomer: 10,
  resultMetric: 8,
  dataPlatform: 5,
} as const;

export const ACTION_VALUE_PHRASES = ['help you', 'achieve similar', 'opportunities', 'optimize', 'streamline'];
export const GENERIC_VALUE_WORDS = ['data costs', 'efficiency', 'operations', 'similar results'];

export const VALUE_PROPOSITION_POINTS = {
  companySpecific: 10,
  generic: 6,
  cap: 8,
} as const;

export const CTA_PATTERNS: RegExp[] = [
  /15[-\s]?minute call/,
  /brief call/,
  /quick call/,
  /demo/,
  /consultation/,
  /meeting/,
  /discuss/,
  /explore/,
];

export const CTA_POINTS = 5;

// --- Personalization ---

export const LINKEDIN_CONFIDENCE_BANDS: ReadonlyArray<{ min: number; points: number }> = [
  { min: 90, points: 12 },
  { min: 70, points: 10 },
  { min: -Infinity, points: 6 },
];

export const SOFT_RESEARCH_PHRASES = ['impressive work', 'doing well'];

export const COMPANY_RESEARCH_POINTS = {
  multipleFacts: 10,
  singleFact: 7,
  softPhrase: 4,
  cap: 8,
} as const;

export const TECHNICAL_ROLES = ['cto', 'engineer', 'developer', 'architect', 'technical', 'data'];
export const BUSINESS_ROLES = ['ceo', 'cmo', 'vp', 'director', 'manager', 'head'];
export const TECHNICAL_VOCABULARY = ['technical', 'integration', 'api', 'automation', 'platform'];
export const BUSINESS_VOCABULARY = ['business', 'roi', 'efficiency', 'costs', 'revenue'];

export const ROLE_RELEVANCE_POINTS = {
  matched: 5,
  unmatchedRoleWithVocabulary: 4,
  floor: 2,
} as const;

// --- Message ---

export const GREETING_PATTERN = /Hi [A-Z][a-z]+,/;
export const CLOSING_PATTERN = /Best regards|Best|Regards|Sincerely/;
export const TRANSITION_WORDS = ['given', 'since', 'because', 'therefore', 'recently', 'we helped'];
export const CONVERSATIONAL_PHRASES = ['i believe', 'would you', 'i noticed', 'given your'];

export const TONE_POINTS = {
  greeting: 3,
  transition: 4,
  closing: 3,
  conversational: 5,
  rawCap: 15,
  cap: 12,
} as const;

export interface RangeBand {
  min: number;
  max: number;
  points: number;
}

export const WORD_COUNT_BANDS: RangeBand[] = [
  { min: 120, max: 180, points: 5 },
  { min: 100, max: 220, points: 3 },
];

export const PARAGRAPH_COUNT_BANDS: RangeBand[] = [
  { min: 4, max: 6, points: 5 },
  { min: 3, max: 7, points: 3 },
];

export const LENGTH_POINTS = {
  outOfBand: 1,
  cap: 8,
} as const;

export const SUBJECT_MARKER = 'Subject:';
export const SUBJECT_VALUE_TOKENS = ['50%', '70%', '80%', 'cut costs', 'reduce', 'data'];

export const SUBJECT_POINTS = {
  firstName: 2,
  company: 1,
  valueToken: 2,
  cap: 5,
} as const;

// --- Selling intent ---

/** Intent words shorter than this are ignored. */
export const MIN_INTENT_TOKEN_LENGTH = 3;

export const KEYWORD_COVERAGE_BANDS: ReadonlyArray<{ min: number; points: number }> = [
  { min: 0.8, points: 8 },
  { min: 0.6, points: 6 },
  { min: 0.4, points: 4 },
  { min: 0.2, points: 2 },
];

export interface UseCaseRule {
  /** Term group that must appear in the email. */
  terms: string[];
  points: number;
}

export interface IntentFamily {
  /** Substring of the selling intent that selects this family. */
  trigger: string;
  rules: UseCaseRule[];
}

export const INTENT_FAMILIES: IntentFamily[] = [
  {
    trigger: 'coffee machine',
    rules: [
      { terms: ['coffee'], points: 2 },
      { terms: ['facilities', 'consumption', 'maintenance', 'machine'], points: 2 },
      { terms: ['predictive', 'analytics', 'monitoring'], points: 1 },
    ],
  },
  {
    trigger: 'crm',
    rules: [
      { terms: ['crm'], points: 3 },
      { terms: ['customer', 'segmentation', 'lead scoring'], points: 2 },
    ],
  },
  {
    trigger: 'supply chain',
    rules: [
      { terms: ['supply chain', 'logistics', 'inventory'], points: 3 },
      { terms: ['optimization', 'visibility', 'tracking'], points: 2 },
    ],
  },
];

export const GENERIC_INTENT_FOCUS_POINTS = 3;
export const USE_CASE_FOCUS_CAP = 5;

export const GENERIC_PENALTY_RULES = {
  trigger: 'coffee machine',
  /** The penalty only applies when the email never mentions this word. */
  exemptWord: 'coffee',
  strong: { terms: ['data platform'], points: -3 },
  mild: { terms: ['generic data', 'data transformation', 'analytics platform'], points: -2 },
} as const;
