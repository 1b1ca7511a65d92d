import fs from 'fs/promises';
import path from 'path';
import { describe, it, expect, beforeEach } from 'vitest';
import { PromptStore, editLabel } from '../../src/services/prompt-store';
import { PromptConfigError } from '../../src/errors';
import { AGENTS_YAML, TASKS_YAML, makeTempDir, writePromptFiles } from '../helpers/fixtures';

describe('PromptStore', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await makeTempDir();
  });

  it('loads text fields and the raw documents', async () => {
    const { agentsPath, tasksPath } = await writePromptFiles(dir);
    const snapshot = await new PromptStore(agentsPath, tasksPath).load();

    expect(snapshot.agents).toEqual({
      email_copywriter: { role: 'Copywriter', goal: 'Write emails', backstory: 'Writes short emails.' },
      linkedin_researcher: { role: 'Researcher', goal: 'Find profiles', backstory: 'Careful researcher.' },
    });
    expect(snapshot.tasks.write_email_task.agent).toBe('email_copywriter');
    expect(snapshot.agentsText).toBe(AGENTS_YAML);
    expect(snapshot.tasksText).toBe(TASKS_YAML);
  });

  it('treats an empty document as having no entities', async () => {
    const { agentsPath, tasksPath } = await writePromptFiles(dir, '', TASKS_YAML);
    const snapshot = await new PromptStore(agentsPath, tasksPath).load();
    expect(snapshot.agents).toEqual({});
  });

  it('keeps comments, key order and non-text fields when updating', async () => {
    const { agentsPath, tasksPath } = await writePromptFiles(dir);
    const store = new PromptStore(agentsPath, tasksPath);

    const outcome = await store.updateFields([
      { target: 'agent', name: 'email_copywriter', field: 'backstory', text: 'Writes about coffee.' },
      { target: 'agent', name: 'ghost_writer', field: 'goal', text: 'x' },
    ]);

    expect(outcome).toEqual({
      applied: ['agent:email_copywriter.backstory'],
      skipped: ['agent:ghost_writer.goal'],
    });
    const text = await fs.readFile(agentsPath, 'utf-8');
    expect(text).toContain('# agent prompts');
    expect(text).toContain('  backstory: Writes about coffee.\n  allow_delegation: false\n');
    expect(text.indexOf('email_copywriter:')).toBeLessThan(text.indexOf('linkedin_researcher:'));
    expect((await store.load()).tasks.write_email_task.description).toBe('Write the email to {first_name} at {company}.');
  });

  it('adds a field that the entity does not have yet', async () => {
    const { agentsPath, tasksPath } = await writePromptFiles(dir);
    const store = new PromptStore(agentsPath, tasksPath);

    await store.updateFields([{ target: 'task', name: 'write_email_task', field: 'notes', text: 'Keep it short.' }]);

    expect((await store.load()).tasks.write_email_task.notes).toBe('Keep it short.');
  });

  it('reports a missing document', async () => {
    const store = new PromptStore(path.join(dir, 'nope.yaml'), path.join(dir, 'tasks.yaml'));
    await expect(store.load()).rejects.toBeInstanceOf(PromptConfigError);
    await expect(store.load()).rejects.toThrow('Cannot read prompt configuration');
  });

  it('reports malformed YAML with the file path', async () => {
    const { agentsPath, tasksPath } = await writePromptFiles(dir, 'email_copywriter:\n  role: [unclosed\n');
    const error = await new PromptStore(agentsPath, tasksPath).load().catch((err: unknown) => err);

    expect(error).toBeInstanceOf(PromptConfigError);
    expect(error instanceof PromptConfigError && error.filePath).toBe(agentsPath);
    expect(error instanceof Error && error.message.startsWith('Malformed YAML: ')).toBe(true);
  });

  it('rejects documents that are not maps of fields', async () => {
    const { agentsPath, tasksPath } = await writePromptFiles(dir, '- just\n- a list\n');
    await expect(new PromptStore(agentsPath, tasksPath).load()).rejects.toThrow(
      'Prompt configuration must map each name to a set of fields'
    );
  });

  it('backs up both documents into a timestamped directory', async () => {
    const { agentsPath, tasksPath } = await writePromptFiles(dir);
    const backupDir = path.join(dir, 'backups');
    const target = await new PromptStore(agentsPath, tasksPath).backup(backupDir, new Date('2026-03-01T10:20:30.456Z'));

    expect(target).toBe(path.join(backupDir, '2026-03-01T10-20-30-456Z'));
    expect(await fs.readFile(path.join(target, 'agents.yaml'), 'utf-8')).toBe(AGENTS_YAML);
    expect(await fs.readFile(path.join(target, 'tasks.yaml'), 'utf-8')).toBe(TASKS_YAML);
  });

  it('labels edits', () => {
    expect(editLabel({ target: 'task', name: 'write_email_task', field: 'description' })).toBe(
      'task:write_email_task.description'
    );
  });
});
