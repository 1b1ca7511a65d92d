// Core domain types shared by the scorer, test runner, analyzer and orchestrator

// --- Prospects & generation ---

export interface RetryHints {
  enhancements: string[];
  attempt: number;
}

export interface ProspectInput {
  firstName: string;
  lastName: string;
  company: string;
  title?: string;
  phone?: string;
  country?: string;
  linkedinProfile?: string;
  sellingIntent?: string;
  retryHints?: RetryHints;
}

export interface GenerationResult {
  subjectLine: string;
  emailBody: string;
  followUpNotes: string;
  validatedTitle: string | null;
  validatedLinkedinProfile: string | null;
  validatedCountry: string | null;
}

export interface ResearchMetadata {
  linkedinConfidence?: number;
  achievements?: string[];
  companyAchievements?: string[];
}

// --- Scoring ---

export interface StructureDetails {
  firstName: number;
  achievement: number;
  industryContext: number;
  valueProposition: number;
  callToAction: number;
}

export interface PersonalizationDetails {
  linkedinConfidence: number;
  companyResearch: number;
  roleRelevance: number;
}

export interface MessageDetails {
  toneFlow: number;
  lengthCrispness: number;
  subjectLine: number;
}

export interface IntentDetails {
  intentSpecified: boolean;
  keywordCoverage: number;
  useCaseFocus: number;
  genericPenalty: number;
}

export interface ScoreBreakdown {
  total: number;
  structure: number;
  personalization: number;
  message: number;
  intent: number;
  details: {
    structure: StructureDetails;
    personalization: PersonalizationDetails;
    message: MessageDetails;
    intent: IntentDetails;
  };
}

export type QualityTier = 'low' | 'medium' | 'acceptable';

export interface RegenerationDecision {
  regenerate: boolean;
  reason: string;
  tier: QualityTier;
}

// --- Test runs ---

export interface TestResult {
  prospect: ProspectInput;
  passed: boolean;
  score: ScoreBreakdown | null;
  output: GenerationResult | null;
  criticalFailures: string[];
  durationMs: number;
  error: string | null;
}

export type FailurePatternCounts = Record<string, number>;

export interface TestSuiteResults {
  totalTests: number;
  passedTests: number;
  failedTests: number;
  passRate: number;
  avgQualityScore: number;
  results: TestResult[];
  failurePatterns: FailurePatternCounts;
  targetPassRate: number;
  targetMet: boolean;
  shortfall: number;
  timestamp: string;
}

// --- Analysis & adaptation ---

export type Severity = 'critical' | 'high' | 'medium' | 'low';

export type AnalysisSource = 'llm' | 'rules';

export interface FailurePattern {
  patternType: string;
  frequency: number;
  percentage: number;
  affectedAgents: string[];
  affectedTasks: string[];
  exampleFailures: string[];
  rootCause: string;
  severity: Severity;
}

export type WeaknessMap = Record<string, string[]>;

export interface AnalysisReport {
  totalFailures: number;
  failurePatterns: FailurePattern[];
  agentWeaknesses: WeaknessMap;
  taskWeaknesses: WeaknessMap;
  priorityFixes: string[];
  summary: string;
  source: AnalysisSource;
}

/** Entity name → field name → prompt text, as stored in agents.yaml / tasks.yaml. */
export type PromptDefinitions = Record<string, Record<string, string>>;

export interface PromptConfigSnapshot {
  agents: PromptDefinitions;
  tasks: PromptDefinitions;
  agentsText: string;
  tasksText: string;
}

export type ImprovementTarget = 'agent' | 'task';

export interface PromptImprovement {
  target: ImprovementTarget;
  name: string;
  field: string;
  originalText: string;
  improvedText: string;
  rationale: string;
}

export interface PromptImprovements {
  improvements: PromptImprovement[];
  summary: string;
  expectedImpact: string;
  source: AnalysisSource;
}

// --- Improvement cycle ---

export type ImprovementStatus = 'SUCCESS' | 'EARLY_STOP' | 'MAX_ITERATIONS' | 'TEST_ONLY';

export interface IterationSnapshot {
  iteration: number;
  passRate: number;
  avgQuality: number;
  passed: number;
  failed: number;
  failurePatterns: FailurePatternCounts;
  timestamp: string;
  analysis?: {
    failurePatterns: FailurePattern[];
    priorityFixes: string[];
    summary: string;
    source: AnalysisSource;
  };
  improvements?: {
    numImprovements: number;
    summary: string;
    expectedImpact: string;
    applied: string[];
    skipped: string[];
  };
}

export interface ImprovementReport {
  success: boolean;
  status: ImprovementStatus;
  iterations: number;
  initialPassRate: number;
  finalPassRate: number;
  targetPassRate: number;
  improvement: number;
  finalAvgQuality: number;
  totalTestsRun: number;
  timestamp: string;
  iterationHistory: IterationSnapshot[];
  message: string;
}
