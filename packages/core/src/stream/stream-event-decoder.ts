import {
  logger,
  networkError,
  type StreamEvent,
  type ToolCallDelta,
} from '@loomwork/shared';
import { sseData } from './sse-line-reader.js';
import { ToolCallAccumulator } from './tool-call-accumulator.js';
import { humanizeProviderMessage } from './http-errors.js';

const log = logger.child({ module: 'stream-decoder' });

const DONE_SENTINEL = '[DONE]';

/** Reasoning deltas are re-emitted as content wrapped in this tag. */
export const REASONING_OPEN = '<thinking>';
export const REASONING_CLOSE = '</thinking>';

// ---------------------------------------------------------------------------
// Chunk shape guards
// ---------------------------------------------------------------------------

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function optionalString(value: unknown): string | undefined {
  return typeof value === 'string' && value.length > 0 ? value : undefined;
}

function toToolCallDelta(value: unknown): ToolCallDelta | undefined {
  if (!isRecord(value) || typeof value.index !== 'number') return undefined;
  const fn = isRecord(value.function) ? value.function : {};
  return {
    index: value.index,
    id: optionalString(value.id),
    name: optionalString(fn.name),
    argumentsFragment: optionalString(fn.arguments),
  };
}

// ---------------------------------------------------------------------------
// Decoder
// ---------------------------------------------------------------------------

/**
 * Turns SSE lines of an OpenAI-compatible completion stream into
 * StreamEvents. One instance per model turn.
 *
 * A malformed `data:` payload is logged and skipped. After `[DONE]` (or a
 * provider error payload) the decoder is done and ignores further input.
 */
export class StreamEventDecoder {
  private readonly accumulator = new ToolCallAccumulator();
  private reasoningOpen = false;
  private done = false;
  private skipped = 0;

  get isDone(): boolean {
    return this.done;
  }

  /** Number of payloads dropped as malformed so far. */
  get skippedCount(): number {
    return this.skipped;
  }

  decodeLine(line: string): StreamEvent[] {
    if (this.done) return [];

    const data = sseData(line);
    if (data === undefined) return [];

    if (data.trim() === DONE_SENTINEL) {
      this.done = true;
      const events = this.closeReasoning();
      const calls = this.accumulator.finalize();
      if (calls.length > 0) {
        events.push({ type: 'tool_calls', calls });
      }
      events.push({ type: 'completed' });
      return events;
    }

    let payload: unknown;
    try {
      payload = JSON.parse(data);
    } catch (err) {
      this.skipped++;
      log.warn({ err, length: data.length }, 'skipping malformed stream chunk');
      return [];
    }

    if (!isRecord(payload)) {
      this.skipped++;
      log.warn('skipping stream chunk that is not an object');
      return [];
    }

    if (isRecord(payload.error)) {
      const raw = optionalString(payload.error.message) ?? 'Provider reported an error';
      const error = networkError(humanizeProviderMessage(raw));
      this.done = true;
      log.warn({ raw }, 'provider error inside stream');
      return [{ type: 'error', error, message: error.message }];
    }

    const choices = Array.isArray(payload.choices) ? payload.choices : [];
    const choice: unknown = choices[0];
    if (!isRecord(choice)) return [];

    const events: StreamEvent[] = [];
    const delta = isRecord(choice.delta) ? choice.delta : undefined;

    if (delta) {
      const reasoning = optionalString(delta.reasoning_content);
      if (reasoning) {
        const prefix = this.reasoningOpen ? '' : REASONING_OPEN;
        this.reasoningOpen = true;
        events.push({ type: 'content_delta', text: prefix + reasoning });
      }

      const content = optionalString(delta.content);
      if (content) {
        const closing = this.reasoningOpen ? REASONING_CLOSE : '';
        this.reasoningOpen = false;
        events.push({ type: 'content_delta', text: closing + content });
      }

      if (Array.isArray(delta.tool_calls)) {
        for (const raw of delta.tool_calls) {
          const toolDelta = toToolCallDelta(raw);
          if (toolDelta) {
            this.accumulator.add(toolDelta);
          } else {
            log.warn('skipping malformed tool call delta');
          }
        }
      }
    }

    const finishReason = optionalString(choice.finish_reason);
    if (finishReason) {
      events.push(...this.closeReasoning());
      if (finishReason === 'tool_calls') {
        const calls = this.accumulator.finalize();
        if (calls.length > 0) {
          events.push({ type: 'tool_calls', calls });
        }
      }
      events.push({ type: 'finish_reason', reason: finishReason });
    }

    return events;
  }

  private closeReasoning(): StreamEvent[] {
    if (!this.reasoningOpen) return [];
    this.reasoningOpen = false;
    return [{ type: 'content_delta', text: REASONING_CLOSE }];
  }
}

/**
 * Decode a whole line stream. Stops reading once the decoder is done; if
 * the lines run out first, no terminal event is produced.
 */
export async function* decodeStream(lines: AsyncIterable<string>): AsyncGenerator<StreamEvent> {
  const decoder = new StreamEventDecoder();
  for await (const line of lines) {
    yield* decoder.decodeLine(line);
    if (decoder.isDone) return;
  }
}
