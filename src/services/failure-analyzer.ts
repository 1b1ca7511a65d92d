import { LLMService, fillTemplate } from './llm-service';
import { PROMPT_TEMPLATES } from './prompt-templates';
import { AnalysisFindings, isEmptyFindings, parseAnalysisResponse } from './analysis-parser';
import { DIMENSION_MAX, MIN_INTENT_SCORE, WEAK_DIMENSION_RATIO } from '../scoring/rules';
import { errorMessage } from '../errors';
import {
  AnalysisReport,
  AnalysisSource,
  FailurePattern,
  PromptConfigSnapshot,
  Severity,
  TestResult,
  TestSuiteResults,
} from '../types';

const EXAMPLES_PER_PATTERN = 3;
const EXAMPLES_FOR_LLM = 5;
const YAML_CONTEXT_CHARS = 2000;

interface PatternRule {
  patternType: string;
  matches: (result: TestResult) => boolean;
  affectedAgents: string[];
  affectedTasks: string[];
  rootCause: string;
  severity: Severity;
}

const weakerThan = (value: number, max: number) => value < max * WEAK_DIMENSION_RATIO;

const PATTERN_RULES: PatternRule[] = [
  {
    patternType: 'intent_compliance',
    matches: r => r.score !== null && r.score.intent < MIN_INTENT_SCORE,
    affectedAgents: ['content_personalizer', 'email_copywriter'],
    affectedTasks: ['personalize_content_task', 'write_email_task'],
    rootCause: 'Agents not properly using selling_intent keywords',
    severity: 'critical',
  },
  {
    patternType: 'personalization_weak',
    matches: r => r.score !== null && weakerThan(r.score.personalization, DIMENSION_MAX.personalization),
    affectedAgents: ['linkedin_researcher', 'prospect_researcher'],
    affectedTasks: ['linkedin_research_task', 'research_prospect_task'],
    rootCause: 'Insufficient research or low-confidence findings',
    severity: 'high',
  },
  {
    patternType: 'structure_issues',
    matches: r => r.score !== null && weakerThan(r.score.structure, DIMENSION_MAX.structure),
    affectedAgents: ['email_copywriter'],
    affectedTasks: ['write_email_task'],
    rootCause: 'Email structure requirements not followed',
    severity: 'medium',
  },
  {
    patternType: 'message_quality_low',
    matches: r => r.score !== null && weakerThan(r.score.message, DIMENSION_MAX.message),
    affectedAgents: ['email_copywriter'],
    affectedTasks: ['write_email_task'],
    rootCause: 'Poor tone, length, or subject line quality',
    severity: 'medium',
  },
  {
    patternType: 'missing_cta',
    matches: r => r.criticalFailures.join(' ').toLowerCase().includes('call-to-action'),
    affectedAgents: ['email_copywriter'],
    affectedTasks: ['write_email_task'],
    rootCause: 'Missing or weak call-to-action',
    severity: 'high',
  },
];

export function describeFailure(result: TestResult): string {
  const p = result.prospect;
  let text = `Prospect: ${p.firstName} ${p.lastName} at ${p.company}`;
  if (result.score) text += ` | Score: ${result.score.total}/100`;
  if (result.criticalFailures.length > 0) text += ` | Issues: ${result.criticalFailures.slice(0, 2).join(', ')}`;
  return text;
}

export function identifyFailurePatterns(suite: TestSuiteResults): FailurePattern[] {
  const failures = suite.results.filter(r => !r.passed);
  if (failures.length === 0) return [];

  const patterns: FailurePattern[] = [];
  for (const rule of PATTERN_RULES) {
    const matching = failures.filter(rule.matches);
    if (matching.length === 0) continue;
    patterns.push({
      patternType: rule.patternType,
      frequency: matching.length,
      percentage: (matching.length / failures.length) * 100,
      affectedAgents: rule.affectedAgents,
      affectedTasks: rule.affectedTasks,
      exampleFailures: matching.slice(0, EXAMPLES_PER_PATTERN).map(describeFailure),
      rootCause: rule.rootCause,
      severity: rule.severity,
    });
  }
  return patterns;
}

// --- Strategies ---

export interface AnalysisInput {
  patterns: FailurePattern[];
  failures: TestResult[];
  prompts: PromptConfigSnapshot;
}

export interface AnalysisStrategy {
  readonly source: AnalysisSource;
  analyze(input: AnalysisInput): Promise<AnalysisFindings>;
}

export class LlmAnalysisStrategy implements AnalysisStrategy {
  readonly source = 'llm';

  constructor(private llmService: LLMService) {}

  buildPrompt(input: AnalysisInput): string {
    const patterns = input.patterns
      .map(p => `- ${p.patternType}: ${p.frequency} failures (${p.percentage.toFixed(0)}%) - ${p.rootCause}`)
      .join('\n');
    const examples = input.failures
      .slice(0, EXAMPLES_FOR_LLM)
      .map(f => `- ${describeFailure(f)}`)
      .join('\n');

    return fillTemplate(PROMPT_TEMPLATES.ANALYZE_FAILURES, {
      patterns: patterns || '(none)',
      examples: examples || '(none)',
      agentsYaml: input.prompts.agentsText.slice(0, YAML_CONTEXT_CHARS),
      tasksYaml: input.prompts.tasksText.slice(0, YAML_CONTEXT_CHARS),
    });
  }

  async analyze(input: AnalysisInput): Promise<AnalysisFindings> {
    const response = await this.llmService.complete({
      system: PROMPT_TEMPLATES.ANALYZE_FAILURES_SYSTEM,
      user: this.buildPrompt(input),
    });
    const findings = parseAnalysisResponse(response);
    if (isEmptyFindings(findings)) {
      throw new Error('LLM analysis response contained no recognizable sections');
    }
    return findings;
  }
}

interface RuleFindings {
  agentWeaknesses: Record<string, string[]>;
  priorityFix: string;
}

const RULE_FINDINGS: Record<string, RuleFindings> = {
  intent_compliance: {
    agentWeaknesses: {
      content_personalizer: [
        'Not consistently using selling_intent keywords',
        'May be using generic messaging instead of specific use case',
      ],
      email_copywriter: [
        'Not enforcing selling_intent keywords in subject and body',
        'Allowing generic data platform messaging when specific intent provided',
      ],
    },
    priorityFix: 'Strengthen selling_intent enforcement in content_personalizer and email_copywriter',
  },
  personalization_weak: {
    agentWeaknesses: {
      linkedin_researcher: [
        'May not be finding LinkedIn profiles consistently',
        'Confidence threshold may be too conservative',
      ],
    },
    priorityFix: 'Improve LinkedIn research reliability and confidence assessment',
  },
  missing_cta: {
    agentWeaknesses: {
      email_copywriter: [
        'Not consistently including strong CTAs',
        'May be using weak permission-seeking language',
      ],
    },
    priorityFix: 'Add explicit CTA requirements with examples to email_copywriter',
  },
};

export class RuleBasedAnalysisStrategy implements AnalysisStrategy {
  readonly source = 'rules';

  async analyze(input: AnalysisInput): Promise<AnalysisFindings> {
    const agentWeaknesses: Record<string, string[]> = {};
    const priorityFixes: string[] = [];

    for (const pattern of input.patterns) {
      const rule = RULE_FINDINGS[pattern.patternType];
      if (!rule) continue;
      for (const [agent, weaknesses] of Object.entries(rule.agentWeaknesses)) {
        const existing = agentWeaknesses[agent] ?? [];
        agentWeaknesses[agent] = [...existing, ...weaknesses.filter(w => !existing.includes(w))];
      }
      priorityFixes.push(rule.priorityFix);
    }

    const primary = input.patterns.slice(0, 3).map(p => p.patternType).join(', ');
    return {
      agentWeaknesses,
      taskWeaknesses: {},
      priorityFixes,
      summary: `Found ${input.patterns.length} failure patterns. Primary issues are ${primary}.`,
    };
  }
}

/**
 * Groups failed tests into patterns and explains them. Strategies are tried
 * in order; the last one must not fail.
 */
export class FailureAnalyzer {
  private strategies: AnalysisStrategy[];

  constructor(llmService: LLMService, strategies?: AnalysisStrategy[]) {
    this.strategies = strategies ?? [new LlmAnalysisStrategy(llmService), new RuleBasedAnalysisStrategy()];
  }

  async analyzeFailures(suite: TestSuiteResults, prompts: PromptConfigSnapshot): Promise<AnalysisReport> {
    const failures = suite.results.filter(r => !r.passed);
    const patterns = identifyFailurePatterns(suite);
    console.log(`[failure-analyzer] Analyzing ${failures.length} failures (${patterns.length} patterns)`);

    const input: AnalysisInput = { patterns, failures, prompts };
    let lastError: unknown = null;

    for (const strategy of this.strategies) {
      try {
        const findings = await strategy.analyze(input);
        return {
          totalFailures: failures.length,
          failurePatterns: patterns,
          ...findings,
          source: strategy.source,
        };
      } catch (err) {
        lastError = err;
        console.warn(`[failure-analyzer] ${strategy.source} analysis failed: ${errorMessage(err)}`);
      }
    }

    throw new Error(`All analysis strategies failed: ${errorMessage(lastError)}`);
  }
}
