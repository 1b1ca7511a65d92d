import { LLMService, fillTemplate } from './llm-service';
import { PROMPT_TEMPLATES } from './prompt-templates';
import { parseImprovementResponse } from './improvement-parser';
import { EditOutcome, PromptStore } from './prompt-store';
import { errorMessage } from '../errors';
import {
  AnalysisReport,
  AnalysisSource,
  ImprovementTarget,
  PromptDefinitions,
  PromptImprovement,
  PromptImprovements,
} from '../types';

const EXAMPLES_FOR_LLM = 3;

export interface AdaptationInput {
  analysis: AnalysisReport;
  agents: PromptDefinitions;
  tasks: PromptDefinitions;
  failureExamples: string[];
}

export interface AdaptationStrategy {
  readonly source: AnalysisSource;
  propose(input: AdaptationInput): Promise<PromptImprovements>;
}

export class LlmAdaptationStrategy implements AdaptationStrategy {
  readonly source = 'llm';

  constructor(private llmService: LLMService) {}

  buildPrompt(input: AdaptationInput): string {
    const { analysis } = input;
    return fillTemplate(PROMPT_TEMPLATES.IMPROVE_PROMPTS, {
      summary: analysis.summary || '(none)',
      patterns:
        analysis.failurePatterns
          .map(p => `- ${p.patternType} (${p.severity}): ${p.frequency} failures - ${p.rootCause}`)
          .join('\n') || '(none)',
      priorityFixes: analysis.priorityFixes.map((fix, i) => `${i + 1}. ${fix}`).join('\n') || '(none)',
      examples: input.failureExamples.slice(0, EXAMPLES_FOR_LLM).map(e => `- ${e}`).join('\n') || '(none)',
      agentNames: Object.keys(input.agents).join(', '),
      taskNames: Object.keys(input.tasks).join(', '),
    });
  }

  async propose(input: AdaptationInput): Promise<PromptImprovements> {
    const response = await this.llmService.complete({
      system: PROMPT_TEMPLATES.IMPROVE_PROMPTS_SYSTEM,
      user: this.buildPrompt(input),
    });
    const parsed = parseImprovementResponse(response, input.agents, input.tasks);
    if (parsed.improvements.length === 0) {
      console.warn('[prompt-adapter] LLM response contained no parsable improvements; iteration makes no changes');
    }
    return { ...parsed, source: this.source };
  }
}

interface CatalogueEntry {
  patternType: string;
  target: ImprovementTarget;
  name: string;
  field: string;
  addition: string;
  rationale: string;
}

const FALLBACK_CATALOGUE: CatalogueEntry[] = [
  {
    patternType: 'intent_compliance',
    target: 'agent',
    name: 'email_copywriter',
    field: 'backstory',
    addition:
      '\n\nCRITICAL SELLING INTENT ENFORCEMENT:\n' +
      'When selling_intent is provided, you MUST use those EXACT keywords throughout the email.\n' +
      'Subject line MUST contain keywords from selling_intent.\n' +
      'Email body MUST mention selling_intent keywords multiple times.\n' +
      'NO generic data platform messaging when specific intent provided.',
    rationale: 'Add explicit selling_intent enforcement to prevent generic messaging',
  },
  {
    patternType: 'personalization_weak',
    target: 'agent',
    name: 'linkedin_researcher',
    field: 'backstory',
    addition:
      '\n\nMANDATORY: You MUST return LinkedIn profiles for unique name + company combinations.\n' +
      "Don't be overly cautious - if the profile clearly matches, return it with high confidence.",
    rationale: 'Increase aggressiveness in LinkedIn research',
  },
  {
    patternType: 'missing_cta',
    target: 'task',
    name: 'write_email_task',
    field: 'description',
    addition:
      '\n\nMANDATORY CTA: Every email MUST end with a strong assumptive call-to-action.\n' +
      "Examples: 'When's the best time this week for a 15-minute call?'\n" +
      "FORBIDDEN: Weak CTAs like 'Would you be open to...'",
    rationale: 'Add explicit CTA requirements with examples',
  },
];

export class RuleBasedAdaptationStrategy implements AdaptationStrategy {
  readonly source = 'rules';

  async propose(input: AdaptationInput): Promise<PromptImprovements> {
    const present = new Set(input.analysis.failurePatterns.map(p => p.patternType));
    const improvements: PromptImprovement[] = [];

    for (const entry of FALLBACK_CATALOGUE) {
      if (!present.has(entry.patternType)) continue;
      const entity = (entry.target === 'agent' ? input.agents : input.tasks)[entry.name];
      if (!entity) continue;
      const originalText = entity[entry.field] ?? '';
      improvements.push({
        target: entry.target,
        name: entry.name,
        field: entry.field,
        originalText,
        improvedText: originalText + entry.addition,
        rationale: entry.rationale,
      });
    }

    return {
      improvements,
      summary: 'Applied rule-based improvements for identified failure patterns',
      expectedImpact: 'Improvements should address critical failure patterns',
      source: this.source,
    };
  }
}

/**
 * Proposes prompt rewrites from an analysis report. Strategies are tried in
 * order; the rule catalogue always answers.
 */
export class PromptAdapter {
  private strategies: AdaptationStrategy[];

  constructor(llmService: LLMService, strategies?: AdaptationStrategy[]) {
    this.strategies = strategies ?? [new LlmAdaptationStrategy(llmService), new RuleBasedAdaptationStrategy()];
  }

  async adaptPrompts(input: AdaptationInput): Promise<PromptImprovements> {
    let lastError: unknown = null;
    for (const strategy of this.strategies) {
      try {
        const result = await strategy.propose(input);
        console.log(`[prompt-adapter] ${result.improvements.length} improvements from ${strategy.source}`);
        return result;
      } catch (err) {
        lastError = err;
        console.warn(`[prompt-adapter] ${strategy.source} adaptation failed: ${errorMessage(err)}`);
      }
    }
    throw new Error(`All adaptation strategies failed: ${errorMessage(lastError)}`);
  }
}

/** Write each improvement into its entity's field. Unknown entities are skipped. */
export async function applyImprovements(improvements: PromptImprovements, store: PromptStore): Promise<EditOutcome> {
  const outcome = await store.updateFields(
    improvements.improvements.map(i => ({ target: i.target, name: i.name, field: i.field, text: i.improvedText }))
  );
  console.log(`[prompt-adapter] Applied ${outcome.applied.length} improvements, skipped ${outcome.skipped.length}`);
  return outcome;
}
