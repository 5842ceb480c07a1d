import { logger, type ToolCallDelta, type ToolCallResponse } from '@loomwork/shared';

const log = logger.child({ module: 'tool-call-accumulator' });

interface Slot {
  id: string;
  name: string;
  argumentsBuffer: string;
}

/**
 * Reassembles index-keyed tool-call fragments from one model turn.
 *
 * Each index owns one slot. Fragments append to their slot's argument
 * buffer in arrival order; id and name are taken from whichever fragment
 * carries them. `finalize()` snapshots every open slot (ordered by index)
 * and empties the accumulator, so a second call returns nothing.
 * Argument JSON is not validated here.
 */
export class ToolCallAccumulator {
  private readonly slots = new Map<number, Slot>();

  get isIdle(): boolean {
    return this.slots.size === 0;
  }

  get openSlotCount(): number {
    return this.slots.size;
  }

  add(delta: ToolCallDelta): void {
    let slot = this.slots.get(delta.index);
    if (!slot) {
      slot = { id: '', name: '', argumentsBuffer: '' };
      this.slots.set(delta.index, slot);
      log.debug({ index: delta.index }, 'opened tool call slot');
    }
    if (delta.id) slot.id = delta.id;
    if (delta.name) slot.name = delta.name;
    if (delta.argumentsFragment) slot.argumentsBuffer += delta.argumentsFragment;
  }

  finalize(): ToolCallResponse[] {
    if (this.slots.size === 0) return [];

    const calls = [...this.slots.entries()]
      .sort(([a], [b]) => a - b)
      .map(([index, slot]) => ({
        id: slot.id || `call_${index}`,
        name: slot.name,
        arguments: slot.argumentsBuffer,
      }));

    this.slots.clear();
    log.debug({ count: calls.length, tools: calls.map((c) => c.name) }, 'finalized tool calls');
    return calls;
  }

  reset(): void {
    this.slots.clear();
  }
}
