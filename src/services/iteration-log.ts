import fs from 'fs/promises';
import path from 'path';
import { diffText, formatDiff } from '../utils/diff';
import { ImprovementReport, IterationSnapshot, PromptImprovement } from '../types';

export interface PromptChangeRecord {
  target: string;
  rationale: string;
  added: number;
  removed: number;
  diff: string[];
}

export interface IterationLogEntry extends IterationSnapshot {
  promptChanges: PromptChangeRecord[];
}

export function describeChanges(improvements: PromptImprovement[]): PromptChangeRecord[] {
  return improvements.map(i => {
    const diff = diffText(i.originalText, i.improvedText);
    return {
      target: `${i.target}:${i.name}.${i.field}`,
      rationale: i.rationale,
      added: diff.added,
      removed: diff.removed,
      diff: formatDiff(diff),
    };
  });
}

export function iterationFileName(iteration: number): string {
  return `iteration_${String(iteration).padStart(3, '0')}.json`;
}

/** JSON files for one improvement run under `<logDir>/<runId>/`. */
export class IterationLog {
  readonly runDir: string;

  constructor(logDir: string, readonly runId: string) {
    this.runDir = path.join(logDir, runId);
  }

  async writeIteration(snapshot: IterationSnapshot, improvements: PromptImprovement[] = []): Promise<string> {
    const entry: IterationLogEntry = { ...snapshot, promptChanges: describeChanges(improvements) };
    return this.writeJson(iterationFileName(snapshot.iteration), entry);
  }

  async writeReport(report: ImprovementReport): Promise<string> {
    return this.writeJson('report.json', report);
  }

  private async writeJson(fileName: string, data: unknown): Promise<string> {
    await fs.mkdir(this.runDir, { recursive: true });
    const filePath = path.join(this.runDir, fileName);
    await fs.writeFile(filePath, JSON.stringify(data, null, 2), 'utf-8');
    return filePath;
  }
}
