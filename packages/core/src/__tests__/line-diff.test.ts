import { describe, it, expect } from 'vitest';
import { diffLines, diffStats, formatDiff } from '../tools/line-diff.js';

describe('diffLines()', () => {
  it('compares lines by position', () => {
    expect(diffLines('a\nb\nc', 'a\nB\nc\nd')).toEqual([
      { line: 2, before: 'b', after: 'B' },
      { line: 4, after: 'd' },
    ]);
  });

  it('treats empty text as having no lines', () => {
    expect(diffLines('', 'a')).toEqual([{ line: 1, after: 'a' }]);
    expect(diffLines('a', '')).toEqual([{ line: 1, before: 'a' }]);
    expect(diffLines('', '')).toEqual([]);
  });
});

describe('diffStats()', () => {
  it('counts changed positions on each side', () => {
    expect(diffStats('a\nb\nc', 'a\nB\nc\nd')).toEqual({ added: 2, removed: 1 });
  });
});

describe('formatDiff()', () => {
  it('reports identical files', () => {
    expect(formatDiff(diffLines('same\ntext', 'same\ntext'))).toBe('Files are identical');
  });

  it('renders each differing line', () => {
    expect(formatDiff(diffLines('a\nb\nc', 'a\nB\nc\nd'))).toBe('Line 2:\n- b\n+ B\nLine 4:\n+ d');
  });

  it('caps the report at 50 differences', () => {
    const before = Array.from({ length: 60 }, (_, i) => `x${i}`).join('\n');
    const after = Array.from({ length: 60 }, (_, i) => `y${i}`).join('\n');
    const lines = formatDiff(diffLines(before, after)).split('\n');
    expect(lines.filter((line) => line.startsWith('Line '))).toHaveLength(50);
    expect(lines[lines.length - 1]).toBe('... (10 more differences)');
    expect(lines[lines.length - 2]).toBe('+ y49');
  });
});
