import type { ContentBlock, ToolCallBlock, ToolCallStatus } from '@loomwork/shared';
import {
  ERROR_GLYPH,
  RUNNING_GLYPH,
  SUCCESS_GLYPH,
  TOOL_BOUNDARY,
  TOOL_MARKER,
  splitDiffStats,
} from './tool-status.js';

// ---------------------------------------------------------------------------
// Patterns
// ---------------------------------------------------------------------------

/** Accepted reasoning tag names; `<think>` and `<thinking>` are both common. */
export const REASONING_TAGS = ['thinking', 'reasoning', 'think', 'thought'] as const;

const TAG_ALTERNATION = REASONING_TAGS.join('|');
const CLOSED_REASONING = `<(${TAG_ALTERNATION})>([\\s\\S]*?)</\\1>`;
const OPEN_REASONING = new RegExp(`<(${TAG_ALTERNATION})>`, 'i');
const CODE_FENCE = '```([\\w+#.-]*)[^\\n]*\\n([\\s\\S]*?)```';
const TOOL_HEADER = new RegExp(`^${TOOL_MARKER}\\s*\\*\\*(.+?)\\*\\*[^\\n]*(?:\\n([\\s\\S]*))?$`);
const FILE_PATH = /([a-zA-Z0-9_\-./]+\.[a-zA-Z0-9]+)/;

/** Answer text with reasoning spans removed, an unterminated trailing one included. */
export function stripReasoning(text: string): string {
  const withoutClosed = text.replace(new RegExp(CLOSED_REASONING, 'gi'), '');
  const open = OPEN_REASONING.exec(withoutClosed);
  return (open ? withoutClosed.slice(0, open.index) : withoutClosed).trim();
}

const FILE_TOOLS = new Set([
  'read_file',
  'write_file',
  'delete_file',
  'create_folder',
  'rename_file',
  'copy_file',
  'move_file',
  'patch_file',
  'get_file_info',
  'insert_at_line',
  'append_to_file',
  'read_lines',
]);

// ---------------------------------------------------------------------------
// Text segments
// ---------------------------------------------------------------------------

function pushProse(blocks: ContentBlock[], raw: string): void {
  const fence = new RegExp(CODE_FENCE, 'g');
  let last = 0;
  let match: RegExpExecArray | null;
  while ((match = fence.exec(raw)) !== null) {
    const before = raw.slice(last, match.index).trim();
    if (before) blocks.push({ type: 'text', text: before });
    const code = match[2].replace(/\n$/, '');
    const language = match[1];
    blocks.push(language ? { type: 'code', code, language } : { type: 'code', code });
    last = match.index + match[0].length;
  }
  const rest = raw.slice(last).trim();
  if (rest) blocks.push({ type: 'text', text: rest });
}

function parseTextSegment(text: string, isStreaming: boolean): ContentBlock[] {
  const blocks: ContentBlock[] = [];
  const closed = new RegExp(CLOSED_REASONING, 'gi');
  let last = 0;
  let match: RegExpExecArray | null;

  while ((match = closed.exec(text)) !== null) {
    pushProse(blocks, text.slice(last, match.index));
    const inner = match[2].trim();
    if (inner) blocks.push({ type: 'reasoning', text: inner, isActive: false });
    last = match.index + match[0].length;
  }

  const rest = text.slice(last);
  if (isStreaming) {
    const open = OPEN_REASONING.exec(rest);
    if (open) {
      pushProse(blocks, rest.slice(0, open.index));
      blocks.push({ type: 'reasoning', text: rest.slice(open.index + open[0].length).trim(), isActive: true });
      return blocks;
    }
  }

  pushProse(blocks, rest);
  return blocks;
}

// ---------------------------------------------------------------------------
// Tool segments
// ---------------------------------------------------------------------------

function statusOf(line: string): { status: ToolCallStatus; detail: string } {
  for (const [glyph, status] of [
    [SUCCESS_GLYPH, 'success'],
    [ERROR_GLYPH, 'error'],
    [RUNNING_GLYPH, 'running'],
  ] as const) {
    if (line.startsWith(glyph)) {
      return { status, detail: line.slice(glyph.length).trim() };
    }
  }
  return { status: 'running', detail: line.trim() };
}

function parseToolSegment(segment: string): ContentBlock[] {
  const match = TOOL_HEADER.exec(segment.trim());
  if (!match) {
    const text = segment.trim();
    return text ? [{ type: 'text', text }] : [];
  }

  const name = match[1].trim();
  const { status, detail } = statusOf((match[2] ?? '').trim());
  const { text: output, diffStats } = splitDiffStats(detail);

  const block: ToolCallBlock = { type: 'tool_call', name, status };
  if (output) block.output = output;
  if (diffStats) block.diffStats = diffStats;
  if (output && FILE_TOOLS.has(name)) {
    const path = FILE_PATH.exec(output);
    if (path) block.filePath = path[1];
  }
  return [block];
}

/** Index where a tool segment ends: the first blank line after its header. */
function toolSegmentEnd(body: string): number {
  const headerEnd = body.indexOf('\n');
  if (headerEnd === -1) return body.length;
  const blank = body.indexOf('\n\n', headerEnd);
  return blank === -1 ? body.length : blank;
}

// ---------------------------------------------------------------------------
// Parts
// ---------------------------------------------------------------------------

/**
 * Parse one boundary-delimited part. The first part of a message is plain
 * text; every later part starts with a tool-status entry and may carry
 * prose after it.
 */
export function parsePart(part: string, isFirst: boolean, isStreaming: boolean): ContentBlock[] {
  if (isFirst) return parseTextSegment(part, isStreaming);

  const body = TOOL_MARKER + part;
  const end = toolSegmentEnd(body);
  const blocks = parseToolSegment(body.slice(0, end));
  if (end < body.length) {
    blocks.push(...parseTextSegment(body.slice(end), isStreaming));
  }
  return blocks;
}

/** Never drop content: an input that yields no blocks becomes one text block. */
export function ensureNonEmpty(blocks: ContentBlock[], fullText: string): ContentBlock[] {
  return blocks.length > 0 ? blocks : [{ type: 'text', text: fullText }];
}

/**
 * Segment a message into ordered content blocks.
 *
 * Stateless: each call re-parses `fullText` from the start. See
 * IncrementalSegmenter for the streaming variant.
 */
export function parseContent(fullText: string, isStreaming: boolean): ContentBlock[] {
  const parts = fullText.split(TOOL_BOUNDARY);
  const blocks = parts.flatMap((part, i) => parsePart(part, i === 0, isStreaming));
  return ensureNonEmpty(blocks, fullText);
}
