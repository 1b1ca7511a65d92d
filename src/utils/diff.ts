export type DiffOp = 'added' | 'removed' | 'same';

export interface DiffLine {
  op: DiffOp;
  text: string;
}

export interface TextDiff {
  lines: DiffLine[];
  added: number;
  removed: number;
}

/** Longest-common-subsequence table over two line arrays. */
function lcsTable(a: string[], b: string[]): number[][] {
  const table: number[][] = [];
  for (let i = 0; i <= a.length; i++) table.push(new Array<number>(b.length + 1).fill(0));
  for (let i = a.length - 1; i >= 0; i--) {
    for (let j = b.length - 1; j >= 0; j--) {
      table[i][j] = a[i] === b[j] ? table[i + 1][j + 1] + 1 : Math.max(table[i + 1][j], table[i][j + 1]);
    }
  }
  return table;
}

/**
 * Line diff of a prompt field before and after an improvement.
 * Identical inputs give an empty diff.
 */
export function diffText(before: string, after: string): TextDiff {
  if (before === after) return { lines: [], added: 0, removed: 0 };

  const a = before.split('\n');
  const b = after.split('\n');
  const table = lcsTable(a, b);
  const lines: DiffLine[] = [];
  let i = 0;
  let j = 0;

  while (i < a.length && j < b.length) {
    if (a[i] === b[j]) {
      lines.push({ op: 'same', text: a[i] });
      i++;
      j++;
    } else if (table[i + 1][j] >= table[i][j + 1]) {
      lines.push({ op: 'removed', text: a[i++] });
    } else {
      lines.push({ op: 'added', text: b[j++] });
    }
  }
  while (i < a.length) lines.push({ op: 'removed', text: a[i++] });
  while (j < b.length) lines.push({ op: 'added', text: b[j++] });

  return {
    lines,
    added: lines.filter(l => l.op === 'added').length,
    removed: lines.filter(l => l.op === 'removed').length,
  };
}

const PREFIX: Record<DiffOp, string> = { added: '+ ', removed: '- ', same: '  ' };

export function formatDiff(diff: TextDiff): string[] {
  return diff.lines.map(l => PREFIX[l.op] + l.text);
}
