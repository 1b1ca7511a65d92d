import { z } from 'zod';
import { LLMService, fillTemplate, parseJsonResponse } from './llm-service';
import { PromptStore } from './prompt-store';
import { PROMPT_TEMPLATES } from './prompt-templates';
import { GenerationTimeoutError } from '../errors';
import { GenerationResult, ProspectInput } from '../types';

export interface EmailGenerator {
  generate(prospect: ProspectInput): Promise<GenerationResult>;
}

/** Race a promise against a timer; the timer is always cleared. */
export async function withTimeout<T>(promise: Promise<T>, timeoutMs: number): Promise<T> {
  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<never>((_resolve, reject) => {
    timer = setTimeout(() => reject(new GenerationTimeoutError(timeoutMs)), timeoutMs);
  });
  try {
    return await Promise.race([promise, timeout]);
  } finally {
    clearTimeout(timer);
  }
}

const optionalText = z
  .string()
  .nullish()
  .transform((v) => (v && v.trim() ? v : null));

const GenerationOutputSchema = z.object({
  subjectLine: z.string().default(''),
  emailBody: z.string().default(''),
  followUpNotes: z.string().nullish().transform((v) => v ?? ''),
  validatedTitle: optionalText,
  validatedLinkedinProfile: optionalText,
  validatedCountry: optionalText,
});

export function parseGenerationOutput(raw: string): GenerationResult {
  const parsed = GenerationOutputSchema.safeParse(parseJsonResponse(raw));
  if (!parsed.success) {
    throw new Error(`Generator returned an invalid email payload: ${parsed.error.issues[0]?.message ?? 'unknown'}`);
  }
  return parsed.data;
}

/** `{first_name}`-style placeholders filled from a prospect. */
export function prospectVariables(prospect: ProspectInput): Record<string, string> {
  return {
    first_name: prospect.firstName,
    last_name: prospect.lastName,
    name: `${prospect.firstName} ${prospect.lastName}`.trim(),
    company: prospect.company,
    title: prospect.title ?? '',
    phone: prospect.phone ?? '',
    country: prospect.country ?? '',
    linkedin_url: prospect.linkedinProfile ?? '',
    selling_intent: prospect.sellingIntent ?? '',
  };
}

export function interpolate(text: string, vars: Record<string, string>): string {
  return text.replace(/\{([a-z_]+)\}/g, (match, key: string) => vars[key] ?? match);
}

/**
 * Runs every task definition in document order. Each task is answered by the
 * agent named in its `agent` field; earlier outputs are passed on as context
 * and the last task must return the email as JSON.
 */
export class PipelineEmailGenerator implements EmailGenerator {
  constructor(
    private llmService: LLMService,
    private promptStore: PromptStore
  ) {}

  async generate(prospect: ProspectInput): Promise<GenerationResult> {
    const { agents, tasks } = await this.promptStore.load();
    const taskNames = Object.keys(tasks);
    if (taskNames.length === 0) {
      throw new Error('No tasks configured');
    }

    const vars = prospectVariables(prospect);
    const outputs: string[] = [];
    let last = '';

    for (const [index, taskName] of taskNames.entries()) {
      const task = tasks[taskName];
      const agentName = task.agent ?? '';
      const agent: Record<string, string> = Object.hasOwn(agents, agentName) ? agents[agentName] : {};
      const isFinal = index === taskNames.length - 1;

      const system = fillTemplate(PROMPT_TEMPLATES.AGENT_SYSTEM, {
        role: interpolate(agent.role ?? taskName, vars),
        goal: interpolate(agent.goal ?? '', vars),
        backstory: interpolate(agent.backstory ?? '', vars),
      });

      let user = fillTemplate(PROMPT_TEMPLATES.TASK, {
        description: interpolate(task.description ?? '', vars),
        expectedOutput: interpolate(task.expected_output ?? '', vars),
        context: outputs.length > 0 ? outputs.join('\n\n') : '(none)',
      });
      if (isFinal) {
        if (prospect.retryHints && prospect.retryHints.enhancements.length > 0) {
          user += '\n\n' + fillTemplate(PROMPT_TEMPLATES.RETRY_GUIDANCE, {
            attempt: String(prospect.retryHints.attempt),
            enhancements: prospect.retryHints.enhancements.map((e) => `- ${e}`).join('\n'),
          });
        }
        user += '\n\n' + PROMPT_TEMPLATES.EMAIL_OUTPUT_FORMAT;
      }

      last = await this.llmService.complete({ system, user });
      outputs.push(`[${taskName}]\n${last}`);
    }

    return parseGenerationOutput(last);
  }
}
