import { describe, it, expect, beforeEach } from 'vitest';
import {
  PipelineEmailGenerator,
  interpolate,
  parseGenerationOutput,
  prospectVariables,
  withTimeout,
} from '../../src/services/email-generator';
import { PromptStore } from '../../src/services/prompt-store';
import { PROMPT_TEMPLATES } from '../../src/services/prompt-templates';
import { GenerationTimeoutError } from '../../src/errors';
import { AGENTS_YAML, ScriptedLLM, makeTempDir, milan, writePromptFiles } from '../helpers/fixtures';

const TWO_TASKS = `linkedin_research_task:
  agent: linkedin_researcher
  description: Find {name} at {company}.
  expected_output: Profile URL.
write_email_task:
  agent: email_copywriter
  description: Write the email to {first_name} about {selling_intent}.
  expected_output: Subject, body, notes.
`;

const EMAIL_JSON = JSON.stringify({
  subjectLine: 'Milan, coffee machine uptime',
  emailBody: 'Hi Milan,',
  followUpNotes: 'none',
  validatedTitle: 'CTO',
  validatedLinkedinProfile: '',
  validatedCountry: null,
});

describe('PipelineEmailGenerator', () => {
  let store: PromptStore;

  beforeEach(async () => {
    const dir = await makeTempDir();
    const { agentsPath, tasksPath } = await writePromptFiles(dir, AGENTS_YAML, TWO_TASKS);
    store = new PromptStore(agentsPath, tasksPath);
  });

  it('runs the tasks in order and parses the final answer', async () => {
    const llm = new ScriptedLLM(['linkedin.com/in/milan-novak', EMAIL_JSON]);
    const result = await new PipelineEmailGenerator(llm, store).generate(milan());

    expect(result).toEqual({
      subjectLine: 'Milan, coffee machine uptime',
      emailBody: 'Hi Milan,',
      followUpNotes: 'none',
      validatedTitle: 'CTO',
      validatedLinkedinProfile: null,
      validatedCountry: null,
    });

    const [research, write] = llm.requests;
    expect(research.system.startsWith('You are the Researcher.')).toBe(true);
    expect(research.user).toContain('Find Milan Novak at Brewtech.');
    expect(research.user).not.toContain(PROMPT_TEMPLATES.EMAIL_OUTPUT_FORMAT);
    expect(write.system.startsWith('You are the Copywriter.')).toBe(true);
    expect(write.user).toContain('Write the email to Milan about coffee machine monitoring.');
    expect(write.user).toContain('[linkedin_research_task]\nlinkedin.com/in/milan-novak');
    expect(write.user.endsWith(PROMPT_TEMPLATES.EMAIL_OUTPUT_FORMAT)).toBe(true);
  });

  it('adds retry guidance to the final task', async () => {
    const llm = new ScriptedLLM(['profile', EMAIL_JSON]);
    await new PipelineEmailGenerator(llm, store).generate(
      milan({ retryHints: { attempt: 2, enhancements: ['FOCUS: Include clear 15-minute meeting request'] } })
    );

    expect(llm.requests[0].user).not.toContain('RETRY GUIDANCE');
    expect(llm.requests[1].user).toContain('RETRY GUIDANCE (attempt 2):');
    expect(llm.requests[1].user).toContain('- FOCUS: Include clear 15-minute meeting request');
  });

  it('propagates LLM failures', async () => {
    const llm = new ScriptedLLM([new Error('No LLM API key configured')]);
    await expect(new PipelineEmailGenerator(llm, store).generate(milan())).rejects.toThrow('No LLM API key configured');
  });
});

describe('parseGenerationOutput', () => {
  it('reads fenced JSON and fills defaults', () => {
    const raw = 'Here you go:\n```json\n{"subjectLine": "Hi", "emailBody": "Body", "validatedCountry": "Czechia"}\n```';
    expect(parseGenerationOutput(raw)).toEqual({
      subjectLine: 'Hi',
      emailBody: 'Body',
      followUpNotes: '',
      validatedTitle: null,
      validatedLinkedinProfile: null,
      validatedCountry: 'Czechia',
    });
  });

  it('rejects payloads with the wrong shape', () => {
    expect(() => parseGenerationOutput('{"subjectLine": 5}')).toThrow('Generator returned an invalid email payload');
  });

  it('rejects text that is not JSON', () => {
    expect(() => parseGenerationOutput('I cannot write this email.')).toThrow('Failed to parse LLM response as JSON');
  });
});

describe('placeholders', () => {
  it('fills known prospect placeholders and keeps unknown ones', () => {
    expect(interpolate('{first_name} at {company} {unknown}', prospectVariables(milan()))).toBe('Milan at Brewtech {unknown}');
  });

  it('uses empty strings for missing optional fields', () => {
    const vars = prospectVariables(milan({ title: undefined }));
    expect(vars.title).toBe('');
    expect(vars.name).toBe('Milan Novak');
  });
});

describe('withTimeout', () => {
  it('resolves with the value of a fast promise', async () => {
    await expect(withTimeout(Promise.resolve('ok'), 50)).resolves.toBe('ok');
  });

  it('rejects a slow promise with a timeout error', async () => {
    const slow = new Promise<string>(resolve => setTimeout(() => resolve('late'), 200));
    const error = await withTimeout(slow, 10).catch((err: unknown) => err);

    expect(error).toBeInstanceOf(GenerationTimeoutError);
    expect(error instanceof Error && error.message).toBe('Generation timed out after 10ms');
  });
});
