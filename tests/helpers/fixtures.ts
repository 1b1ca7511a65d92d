import fs from 'fs/promises';
import os from 'os';
import path from 'path';
import { EmailGenerator } from '../../src/services/email-generator';
import { CompletionRequest, LLMService } from '../../src/services/llm-service';
import { GenerationResult, ProspectInput } from '../../src/types';

export const COFFEE_INTENT = 'coffee machine monitoring';

export function milan(overrides: Partial<ProspectInput> = {}): ProspectInput {
  return {
    firstName: 'Milan',
    lastName: 'Novak',
    company: 'Brewtech',
    title: 'CTO',
    sellingIntent: COFFEE_INTENT,
    ...overrides,
  };
}

// Scores 89/100 for milan(): structure 32, personalization 19, message 25, intent 13.
export const STRONG_SUBJECT = 'Milan, cut coffee machine downtime at Brewtech by 50%';
export const STRONG_BODY = [
  'Hi Milan,\nI noticed the impressive work your team at Brewtech has done recently on connected coffee machine fleets across your office and hospitality customers.',
  'We helped Rohlik cut machine maintenance costs by 50% with predictive monitoring of consumption and facilities signals. Their engineers finished the integration in days vs months, and service visits now happen before a machine fails instead of after.',
  'Given your focus on coffee machine uptime, I believe we can help you bring the same monitoring and automation to Brewtech without adding headcount to your engineering team or replacing the hardware you already run.',
  'Would you be open to a 15-minute call next week to walk through how this could work for your machines?',
  'Best regards,\nAnna',
].join('\n\n');

// Scores 26/100 for milan(): structure 9, personalization 15, message 2, intent 0.
export const WEAK_SUBJECT = 'Quick question';
export const WEAK_BODY = 'Hello there,\nOur data platform unifies analytics for teams like yours.';

export function strongOutput(overrides: Partial<GenerationResult> = {}): GenerationResult {
  return {
    subjectLine: STRONG_SUBJECT,
    emailBody: STRONG_BODY,
    followUpNotes: 'Mention the Rohlik rollout.',
    validatedTitle: null,
    validatedLinkedinProfile: null,
    validatedCountry: null,
    ...overrides,
  };
}

export function weakOutput(overrides: Partial<GenerationResult> = {}): GenerationResult {
  return strongOutput({ subjectLine: WEAK_SUBJECT, emailBody: WEAK_BODY, followUpNotes: '', ...overrides });
}

export function asEmail(output: GenerationResult): string {
  return `Subject: ${output.subjectLine}\n\n${output.emailBody}`;
}

/** Generator answering from a queue; a queued Error is thrown instead of returned. */
export class ScriptedGenerator implements EmailGenerator {
  readonly requests: ProspectInput[] = [];

  constructor(private script: Array<GenerationResult | Error>) {}

  async generate(prospect: ProspectInput): Promise<GenerationResult> {
    this.requests.push(prospect);
    const next = this.script.shift();
    if (!next) throw new Error('script exhausted');
    if (next instanceof Error) throw next;
    return next;
  }
}

/** LLM stand-in answering from a queue of strings or errors. */
export class ScriptedLLM implements LLMService {
  readonly requests: CompletionRequest[] = [];

  constructor(private script: Array<string | Error>) {}

  async complete(request: CompletionRequest): Promise<string> {
    this.requests.push(request);
    const next = this.script.shift();
    if (next === undefined) throw new Error('script exhausted');
    if (next instanceof Error) throw next;
    return next;
  }
}

export const AGENTS_YAML = `# agent prompts
email_copywriter:
  role: Copywriter
  goal: Write emails
  backstory: Writes short emails.
  allow_delegation: false
linkedin_researcher:
  role: Researcher
  goal: Find profiles
  backstory: Careful researcher.
`;

export const TASKS_YAML = `write_email_task:
  agent: email_copywriter
  description: Write the email to {first_name} at {company}.
  expected_output: Subject, body, notes.
`;

export async function makeTempDir(prefix = 'outreach-test-'): Promise<string> {
  return fs.mkdtemp(path.join(os.tmpdir(), prefix));
}

export async function writePromptFiles(dir: string, agents = AGENTS_YAML, tasks = TASKS_YAML) {
  const agentsPath = path.join(dir, 'agents.yaml');
  const tasksPath = path.join(dir, 'tasks.yaml');
  await fs.writeFile(agentsPath, agents, 'utf-8');
  await fs.writeFile(tasksPath, tasks, 'utf-8');
  return { agentsPath, tasksPath };
}
