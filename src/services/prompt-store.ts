import fs from 'fs/promises';
import path from 'path';
import { parseDocument, Document, isMap } from 'yaml';
import { z } from 'zod';
import { PromptConfigError, errorMessage } from '../errors';
import { ImprovementTarget, PromptConfigSnapshot, PromptDefinitions } from '../types';

const DocumentShape = z.record(z.string(), z.record(z.string(), z.unknown()));

export interface FieldEdit {
  target: ImprovementTarget;
  name: string;
  field: string;
  text: string;
}

export interface EditOutcome {
  applied: string[];
  skipped: string[];
}

export function editLabel(edit: Pick<FieldEdit, 'target' | 'name' | 'field'>): string {
  return `${edit.target}:${edit.name}.${edit.field}`;
}

interface LoadedDocument {
  doc: Document;
  text: string;
  definitions: PromptDefinitions;
}

/**
 * Agent and task prompt documents on disk (entity -> field -> text).
 * Documents are edited in place through the YAML AST so key order, comments
 * and non-text fields survive a rewrite.
 */
export class PromptStore {
  constructor(
    readonly agentsPath: string,
    readonly tasksPath: string
  ) {}

  async load(): Promise<PromptConfigSnapshot> {
    const [agents, tasks] = await Promise.all([
      this.readDocument(this.agentsPath),
      this.readDocument(this.tasksPath),
    ]);
    return {
      agents: agents.definitions,
      tasks: tasks.definitions,
      agentsText: agents.text,
      tasksText: tasks.text,
    };
  }

  /**
   * Overwrite fields of existing entities. Edits naming an unknown entity are
   * skipped. Both documents are rewritten.
   */
  async updateFields(edits: FieldEdit[]): Promise<EditOutcome> {
    const agents = await this.readDocument(this.agentsPath);
    const tasks = await this.readDocument(this.tasksPath);
    const outcome: EditOutcome = { applied: [], skipped: [] };

    for (const edit of edits) {
      const loaded = edit.target === 'agent' ? agents : tasks;
      const label = editLabel(edit);
      if (!isMap(loaded.doc.get(edit.name))) {
        console.warn(`[prompt-store] Skipping ${label}: unknown ${edit.target}`);
        outcome.skipped.push(label);
        continue;
      }
      loaded.doc.setIn([edit.name, edit.field], edit.text);
      outcome.applied.push(label);
    }

    await this.writeDocument(this.agentsPath, agents.doc);
    await this.writeDocument(this.tasksPath, tasks.doc);
    return outcome;
  }

  /** Copy both documents into `<backupDir>/<timestamp>/` and return that directory. */
  async backup(backupDir: string, now: Date = new Date()): Promise<string> {
    const target = path.join(backupDir, now.toISOString().replace(/[:.]/g, '-'));
    try {
      await fs.mkdir(target, { recursive: true });
      await fs.copyFile(this.agentsPath, path.join(target, path.basename(this.agentsPath)));
      await fs.copyFile(this.tasksPath, path.join(target, path.basename(this.tasksPath)));
    } catch (err) {
      throw new PromptConfigError(`Failed to back up prompt configuration: ${errorMessage(err)}`, target);
    }
    console.log(`[prompt-store] Backed up prompt configuration to ${target}`);
    return target;
  }

  private async readDocument(filePath: string): Promise<LoadedDocument> {
    let text: string;
    try {
      text = await fs.readFile(filePath, 'utf-8');
    } catch (err) {
      throw new PromptConfigError(`Cannot read prompt configuration: ${errorMessage(err)}`, filePath);
    }

    const doc = parseDocument(text);
    if (doc.errors.length > 0) {
      throw new PromptConfigError(`Malformed YAML: ${doc.errors[0].message}`, filePath);
    }

    const data: unknown = doc.toJS();
    const parsed = DocumentShape.safeParse(data ?? {});
    if (!parsed.success) {
      throw new PromptConfigError('Prompt configuration must map each name to a set of fields', filePath);
    }

    return { doc, text, definitions: textFields(parsed.data) };
  }

  private async writeDocument(filePath: string, doc: Document): Promise<void> {
    try {
      await fs.writeFile(filePath, doc.toString(), 'utf-8');
    } catch (err) {
      throw new PromptConfigError(`Cannot write prompt configuration: ${errorMessage(err)}`, filePath);
    }
  }
}

function textFields(raw: Record<string, Record<string, unknown>>): PromptDefinitions {
  return Object.fromEntries(
    Object.entries(raw).map(([name, fields]): [string, Record<string, string>] => [name, stringFields(fields)])
  );
}

function stringFields(fields: Record<string, unknown>): Record<string, string> {
  const entries: Array<[string, string]> = [];
  for (const [field, value] of Object.entries(fields)) {
    if (typeof value === 'string') entries.push([field, value]);
  }
  return Object.fromEntries(entries);
}
