import { describe, it, expect } from 'vitest';
import { parseContent } from '../segmenter/content-segmenter.js';
import { IncrementalSegmenter } from '../segmenter/incremental-segmenter.js';
import { formatToolStatus } from '../segmenter/tool-status.js';

const TRANSCRIPT =
  '<thinking>Look at the files first.</thinking>I will check the layout.' +
  formatToolStatus({ name: 'list_files', status: 'success', output: '📁 src/\n  📄 main.js' }) +
  '\n\nNow the entry point:\n```js\nconsole.log(1);\n```' +
  formatToolStatus({ name: 'write_file', status: 'success', output: 'File updated successfully: src/main.js', diffStats: { added: 1, removed: 1 } }) +
  '\n\n<think>Double-check</think>All set.';

function chunks(text: string, size: number): string[] {
  const out: string[] = [];
  for (let i = 0; i < text.length; i += size) out.push(text.slice(i, i + size));
  return out;
}

describe('IncrementalSegmenter', () => {
  it.each([1, 2, 3, 7, 50])('matches parseContent at every step with %i-character deltas', (size) => {
    const segmenter = new IncrementalSegmenter();
    let prefix = '';
    for (const delta of chunks(TRANSCRIPT, size)) {
      prefix += delta;
      expect(segmenter.push(delta)).toEqual(parseContent(prefix, true));
    }
    expect(segmenter.finish()).toEqual(parseContent(TRANSCRIPT, false));
    expect(segmenter.fullText).toBe(TRANSCRIPT);
  });

  it('reverts an unclosed reasoning tag to text on finish', () => {
    const segmenter = new IncrementalSegmenter();
    expect(segmenter.push('Hi <thinking>still going')).toEqual([
      { type: 'text', text: 'Hi' },
      { type: 'reasoning', text: 'still going', isActive: true },
    ]);
    expect(segmenter.finish()).toEqual([{ type: 'text', text: 'Hi <thinking>still going' }]);
  });

  it('starts over after reset', () => {
    const segmenter = new IncrementalSegmenter();
    segmenter.push('first' + formatToolStatus({ name: 'list_files', status: 'success', output: 'x' }));
    segmenter.reset();
    expect(segmenter.push('second')).toEqual([{ type: 'text', text: 'second' }]);
    expect(segmenter.fullText).toBe('second');
  });
});
