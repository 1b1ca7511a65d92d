import { ImprovementTarget, PromptDefinitions, PromptImprovement } from '../types';

export interface ParsedImprovements {
  improvements: PromptImprovement[];
  summary: string;
  expectedImpact: string;
}

interface Draft {
  target?: string;
  name?: string;
  field?: string;
  textLines: string[];
  inText: boolean;
  rationale?: string;
  sawText: boolean;
}

function newDraft(): Draft {
  return { textLines: [], inText: false, sawText: false };
}

function toTarget(value: string | undefined): ImprovementTarget | null {
  const v = (value ?? '').toLowerCase();
  if (v.startsWith('agent')) return 'agent';
  if (v.startsWith('task')) return 'task';
  return null;
}

function stripMarkup(line: string): string {
  return line.replace(/^[#*\s]+/, '').replace(/\*\*/g, '').trim();
}

function valueAfterLabel(line: string): string {
  return line.slice(line.indexOf(':') + 1).trim().replace(/^`|`$/g, '');
}

function lookupField(defs: PromptDefinitions, name: string, field: string): string {
  if (!Object.hasOwn(defs, name)) return '';
  const entity = defs[name];
  return Object.hasOwn(entity, field) ? entity[field] : '';
}

/**
 * Reads `IMPROVEMENT N:` blocks (Target, Name, Field, Improved Text, Rationale)
 * followed by SUMMARY and EXPECTED IMPACT sections. Blocks missing a target,
 * name, field or text are dropped. Never throws.
 */
export function parseImprovementResponse(text: string, agents: PromptDefinitions, tasks: PromptDefinitions): ParsedImprovements {
  const improvements: PromptImprovement[] = [];
  const summaryParts: string[] = [];
  const impactParts: string[] = [];
  let section: 'improvements' | 'summary' | 'impact' = 'improvements';
  let draft: Draft | null = null;

  const finish = () => {
    if (!draft) return;
    const target = toTarget(draft.target);
    const improvedText = draft.textLines.join('\n').trim();
    if (target && draft.name && draft.field && draft.sawText && improvedText) {
      const defs = target === 'agent' ? agents : tasks;
      improvements.push({
        target,
        name: draft.name,
        field: draft.field,
        originalText: lookupField(defs, draft.name, draft.field),
        improvedText,
        rationale: draft.rationale ?? '',
      });
    }
    draft = null;
  };

  for (const rawLine of (text ?? '').split(/\r?\n/)) {
    const line = stripMarkup(rawLine);
    const upper = line.toUpperCase();

    if (/^IMPROVEMENT\s*\d*\s*:?$/.test(upper) || /^IMPROVEMENT\s+\d+\s*:/.test(upper)) {
      finish();
      section = 'improvements';
      draft = newDraft();
      continue;
    }
    if (upper.startsWith('SUMMARY:')) {
      finish();
      section = 'summary';
      const rest = valueAfterLabel(line);
      if (rest) summaryParts.push(rest);
      continue;
    }
    if (upper.startsWith('EXPECTED IMPACT:')) {
      finish();
      section = 'impact';
      const rest = valueAfterLabel(line);
      if (rest) impactParts.push(rest);
      continue;
    }

    if (section === 'summary') {
      if (line) summaryParts.push(line);
      continue;
    }
    if (section === 'impact') {
      if (line) impactParts.push(line);
      continue;
    }
    if (!draft) continue;

    if (upper.startsWith('TARGET:')) {
      draft.target = valueAfterLabel(line);
      draft.inText = false;
    } else if (upper.startsWith('NAME:')) {
      draft.name = valueAfterLabel(line);
      draft.inText = false;
    } else if (upper.startsWith('FIELD:')) {
      draft.field = valueAfterLabel(line);
      draft.inText = false;
    } else if (upper.startsWith('IMPROVED TEXT:')) {
      draft.inText = true;
      draft.sawText = true;
      draft.textLines = [];
      const rest = valueAfterLabel(line);
      if (rest && !rest.startsWith('```')) draft.textLines.push(rest);
    } else if (upper.startsWith('RATIONALE:')) {
      draft.inText = false;
      draft.rationale = valueAfterLabel(line);
    } else if (draft.inText && !rawLine.trim().startsWith('```')) {
      draft.textLines.push(rawLine);
    }
  }
  finish();

  return {
    improvements,
    summary: summaryParts.join(' '),
    expectedImpact: impactParts.join(' '),
  };
}
