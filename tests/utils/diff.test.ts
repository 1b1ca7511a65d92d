import { describe, it, expect } from 'vitest';
import { diffText, formatDiff } from '../../src/utils/diff';

describe('diffText', () => {
  it('returns an empty diff for identical text', () => {
    expect(diffText('same\ntext', 'same\ntext')).toEqual({ lines: [], added: 0, removed: 0 });
  });

  it('marks appended lines', () => {
    const diff = diffText('Write emails.', 'Write emails.\n\nMANDATORY CTA: ask for a call.');
    expect(diff.added).toBe(2);
    expect(diff.removed).toBe(0);
    expect(formatDiff(diff)).toEqual(['  Write emails.', '+ ', '+ MANDATORY CTA: ask for a call.']);
  });

  it('marks replaced lines', () => {
    const diff = diffText('a\nb\nc', 'a\nx\nc');
    expect(formatDiff(diff)).toEqual(['  a', '- b', '+ x', '  c']);
    expect(diff).toMatchObject({ added: 1, removed: 1 });
  });
});
