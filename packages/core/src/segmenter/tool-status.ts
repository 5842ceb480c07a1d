import type { DiffStats, ToolCallStatus } from '@loomwork/shared';

export const TOOL_MARKER = '🔧';
export const SUCCESS_GLYPH = '✅';
export const ERROR_GLYPH = '❌';
export const RUNNING_GLYPH = '⏳';

/** Precedes every tool-status line in a message transcript. */
export const TOOL_BOUNDARY = `\n\n${TOOL_MARKER}`;

const STATUS_GLYPHS: Record<ToolCallStatus, string> = {
  success: SUCCESS_GLYPH,
  error: ERROR_GLYPH,
  running: RUNNING_GLYPH,
};

const DIFF_STATS_SUFFIX = /\s*\(\+(\d+) -(\d+)\)$/;

export interface ToolStatusLine {
  name: string;
  status: ToolCallStatus;
  output?: string;
  diffStats?: DiffStats;
}

/**
 * Render a tool-status entry for the transcript:
 * `\n\n🔧 **name**\n✅ output (+a -r)`.
 *
 * Blank lines in the output are collapsed so the entry cannot be mistaken
 * for the end of the tool segment.
 */
export function formatToolStatus(line: ToolStatusLine): string {
  const glyph = STATUS_GLYPHS[line.status];
  let detail = (line.output ?? '').replace(/\n\s*\n/g, '\n').trim();
  if (line.diffStats) {
    detail = `${detail} (+${line.diffStats.added} -${line.diffStats.removed})`.trim();
  }
  const statusLine = detail ? `${glyph} ${detail}` : glyph;
  return `${TOOL_BOUNDARY} **${line.name}**\n${statusLine}`;
}

/** Split a trailing "(+a -r)" off a status detail. */
export function splitDiffStats(detail: string): { text: string; diffStats?: DiffStats } {
  const match = DIFF_STATS_SUFFIX.exec(detail);
  if (!match) return { text: detail };
  return {
    text: detail.slice(0, match.index),
    diffStats: { added: Number(match[1]), removed: Number(match[2]) },
  };
}
