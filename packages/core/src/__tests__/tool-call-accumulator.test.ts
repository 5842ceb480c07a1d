import { describe, it, expect } from 'vitest';
import { ToolCallAccumulator } from '../stream/tool-call-accumulator.js';

describe('ToolCallAccumulator', () => {
  it('starts idle', () => {
    const acc = new ToolCallAccumulator();
    expect(acc.isIdle).toBe(true);
    expect(acc.finalize()).toEqual([]);
  });

  it('concatenates argument fragments per index in arrival order', () => {
    const acc = new ToolCallAccumulator();
    acc.add({ index: 0, id: 'call_1', name: 'write_file', argumentsFragment: '{"path":' });
    acc.add({ index: 1, id: 'call_2', name: 'read_file', argumentsFragment: '{"path":"b"}' });
    acc.add({ index: 0, argumentsFragment: '"a","content":"x"}' });
    expect(acc.openSlotCount).toBe(2);

    expect(acc.finalize()).toEqual([
      { id: 'call_1', name: 'write_file', arguments: '{"path":"a","content":"x"}' },
      { id: 'call_2', name: 'read_file', arguments: '{"path":"b"}' },
    ]);
  });

  it('takes id and name from whichever fragment carries them', () => {
    const acc = new ToolCallAccumulator();
    acc.add({ index: 0, argumentsFragment: '{' });
    acc.add({ index: 0, name: 'list_files' });
    acc.add({ index: 0, argumentsFragment: '}' });
    expect(acc.finalize()).toEqual([{ id: 'call_0', name: 'list_files', arguments: '{}' }]);
  });

  it('does not validate argument JSON', () => {
    const acc = new ToolCallAccumulator();
    acc.add({ index: 0, id: 'x', name: 'read_file', argumentsFragment: '{"path": ' });
    expect(acc.finalize()).toEqual([{ id: 'x', name: 'read_file', arguments: '{"path": ' }]);
  });

  it('is empty again after finalize', () => {
    const acc = new ToolCallAccumulator();
    acc.add({ index: 0, id: 'x', name: 'read_file' });
    acc.finalize();
    expect(acc.isIdle).toBe(true);
    expect(acc.finalize()).toEqual([]);
  });

  it('reset discards open slots', () => {
    const acc = new ToolCallAccumulator();
    acc.add({ index: 3, id: 'x', name: 'read_file' });
    acc.reset();
    expect(acc.finalize()).toEqual([]);
  });
});
