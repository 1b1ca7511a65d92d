import { WeaknessMap } from '../types';

export interface AnalysisFindings {
  agentWeaknesses: WeaknessMap;
  taskWeaknesses: WeaknessMap;
  priorityFixes: string[];
  summary: string;
}

type Section = 'agents' | 'tasks' | 'priorities' | 'summary';

const SECTION_HEADERS: ReadonlyArray<[string, Section]> = [
  ['AGENT WEAKNESSES:', 'agents'],
  ['TASK WEAKNESSES:', 'tasks'],
  ['PRIORITY FIXES:', 'priorities'],
  ['SUMMARY:', 'summary'],
];

/** Drop markdown emphasis, heading marks and list numbering around a header line. */
function normalizeHeader(line: string): string {
  return line.replace(/^[#*\s]+/, '').replace(/^\d+[.)]\s*/, '').replace(/\*+/g, '').trim();
}

function matchHeader(line: string): { section: Section; rest: string } | null {
  const normalized = normalizeHeader(line);
  for (const [header, section] of SECTION_HEADERS) {
    if (normalized.toUpperCase().startsWith(header)) {
      return { section, rest: normalized.slice(header.length).trim() };
    }
  }
  return null;
}

function splitWeaknesses(value: string): string[] {
  const trimmed = value.trim();
  const bracketed = trimmed.match(/^\[(.*)\]$/);
  const items = bracketed ? bracketed[1].split(',') : [trimmed];
  return items.map(item => item.trim().replace(/^["']|["']$/g, '')).filter(Boolean);
}

function addWeakness(target: Map<string, string[]>, line: string): void {
  const colon = line.indexOf(':');
  if (colon <= 0) return;
  const name = line.slice(0, colon).replace(/^[-*\s`]+/, '').replace(/[`*]+/g, '').trim();
  if (!name) return;
  const items = splitWeaknesses(line.slice(colon + 1));
  if (items.length === 0) return;
  target.set(name, [...(target.get(name) ?? []), ...items]);
}

function toWeaknessMap(entries: Map<string, string[]>): WeaknessMap {
  return Object.fromEntries(entries);
}

function parsePriority(line: string): string | null {
  const numbered = line.match(/^\d+[.)]\s*(.+)$/);
  if (numbered) return numbered[1].trim();
  const bullet = line.match(/^[-*]\s+(.+)$/);
  return bullet ? bullet[1].trim() : null;
}

/**
 * Read the AGENT WEAKNESSES / TASK WEAKNESSES / PRIORITY FIXES / SUMMARY
 * sections out of free text. Unrecognized lines are ignored; never throws.
 */
export function parseAnalysisResponse(text: string): AnalysisFindings {
  // Names come from model output, so collect them off-prototype.
  const agentWeaknesses = new Map<string, string[]>();
  const taskWeaknesses = new Map<string, string[]>();
  const priorityFixes: string[] = [];
  const summaryParts: string[] = [];
  let section: Section | null = null;

  for (const rawLine of (text ?? '').split(/\r?\n/)) {
    const line = rawLine.trim();
    if (!line) continue;

    const header = matchHeader(line);
    if (header) {
      section = header.section;
      if (section === 'summary' && header.rest) summaryParts.push(header.rest);
      continue;
    }

    switch (section) {
      case 'agents':
        addWeakness(agentWeaknesses, line);
        break;
      case 'tasks':
        addWeakness(taskWeaknesses, line);
        break;
      case 'priorities': {
        const fix = parsePriority(line);
        if (fix) priorityFixes.push(fix);
        break;
      }
      case 'summary':
        summaryParts.push(line);
        break;
      default:
        break;
    }
  }

  return {
    agentWeaknesses: toWeaknessMap(agentWeaknesses),
    taskWeaknesses: toWeaknessMap(taskWeaknesses),
    priorityFixes,
    summary: summaryParts.join(' '),
  };
}

export function isEmptyFindings(findings: AnalysisFindings): boolean {
  return (
    Object.keys(findings.agentWeaknesses).length === 0 &&
    Object.keys(findings.taskWeaknesses).length === 0 &&
    findings.priorityFixes.length === 0 &&
    findings.summary === ''
  );
}
