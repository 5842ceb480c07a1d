import type { ContentBlock } from '@loomwork/shared';
import { ensureNonEmpty, parsePart } from './content-segmenter.js';
import { TOOL_BOUNDARY } from './tool-status.js';

/**
 * Streaming counterpart of `parseContent`.
 *
 * Text before the last tool boundary can no longer change as deltas are
 * appended, so its blocks are cached and only the tail after that boundary
 * is re-parsed. The boundary search resumes just before the previous end
 * of text, which catches a boundary split across two deltas.
 *
 * For every prefix, `blocks()` equals `parseContent(text, isStreaming)`.
 */
export class IncrementalSegmenter {
  private text = '';
  private settled: ContentBlock[] = [];
  private tailStart = 0;
  private tailIsFirst = true;
  private streaming: boolean;

  constructor(isStreaming = true) {
    this.streaming = isStreaming;
  }

  get fullText(): string {
    return this.text;
  }

  push(delta: string, isStreaming = this.streaming): ContentBlock[] {
    if (isStreaming !== this.streaming) {
      this.streaming = isStreaming;
      this.resettle();
    }

    const searchFrom = Math.max(this.tailStart, this.text.length - TOOL_BOUNDARY.length + 1);
    this.text += delta;
    this.settleFrom(searchFrom);
    return this.blocks();
  }

  /** Mark the stream finished; an unclosed reasoning tag reverts to text. */
  finish(): ContentBlock[] {
    return this.push('', false);
  }

  blocks(): ContentBlock[] {
    const tail = parsePart(this.text.slice(this.tailStart), this.tailIsFirst, this.streaming);
    return ensureNonEmpty([...this.settled, ...tail], this.text);
  }

  reset(): void {
    this.text = '';
    this.resettle();
  }

  private resettle(): void {
    this.settled = [];
    this.tailStart = 0;
    this.tailIsFirst = true;
    this.settleFrom(0);
  }

  private settleFrom(from: number): void {
    let boundary = this.text.indexOf(TOOL_BOUNDARY, from);
    while (boundary !== -1) {
      const part = this.text.slice(this.tailStart, boundary);
      this.settled.push(...parsePart(part, this.tailIsFirst, this.streaming));
      this.tailStart = boundary + TOOL_BOUNDARY.length;
      this.tailIsFirst = false;
      boundary = this.text.indexOf(TOOL_BOUNDARY, this.tailStart);
    }
  }
}
