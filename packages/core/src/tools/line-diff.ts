import type { DiffStats } from '@loomwork/shared';

export const MAX_REPORTED_DIFFERENCES = 50;

export interface LineDifference {
  /** 1-based line number */
  line: number;
  /** Absent when the line only exists in the new text */
  before?: string;
  /** Absent when the line only exists in the old text */
  after?: string;
}

function splitLines(text: string): string[] {
  return text.length === 0 ? [] : text.split('\n');
}

/** Positional comparison: line n of one text against line n of the other. No alignment. */
export function diffLines(before: string, after: string): LineDifference[] {
  const a = splitLines(before);
  const b = splitLines(after);
  const diffs: LineDifference[] = [];
  for (let i = 0; i < Math.max(a.length, b.length); i++) {
    if (a[i] === b[i]) continue;
    const diff: LineDifference = { line: i + 1 };
    if (i < a.length) diff.before = a[i];
    if (i < b.length) diff.after = b[i];
    diffs.push(diff);
  }
  return diffs;
}

export function diffStats(before: string, after: string): DiffStats {
  let added = 0;
  let removed = 0;
  for (const diff of diffLines(before, after)) {
    if (diff.after !== undefined) added++;
    if (diff.before !== undefined) removed++;
  }
  return { added, removed };
}

export function formatDiff(diffs: LineDifference[], limit = MAX_REPORTED_DIFFERENCES): string {
  if (diffs.length === 0) return 'Files are identical';
  const shown = diffs.slice(0, limit).map((diff) => {
    const rows = [`Line ${diff.line}:`];
    if (diff.before !== undefined) rows.push(`- ${diff.before}`);
    if (diff.after !== undefined) rows.push(`+ ${diff.after}`);
    return rows.join('\n');
  });
  if (diffs.length > limit) {
    shown.push(`... (${diffs.length - limit} more differences)`);
  }
  return shown.join('\n');
}
