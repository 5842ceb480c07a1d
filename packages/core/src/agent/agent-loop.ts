import {
  errorMessage,
  logger,
  type ChatRequestMessage,
  type ContentBlock,
  type DiffStats,
  type EngineConfig,
  type FileChangeEvent,
  type StreamEvent,
  type ToolCallResponse,
} from '@loomwork/shared';
import type { ChatParams } from '../provider-client.js';
import { parseContent, stripReasoning } from '../segmenter/content-segmenter.js';
import { IncrementalSegmenter } from '../segmenter/incremental-segmenter.js';
import { formatToolStatus } from '../segmenter/tool-status.js';
import type { ToolExecutor } from '../tool-executor.js';
import { diffStats } from '../tools/line-diff.js';
import type { ToolInteractionCallback } from '../tools/types.js';
import { assistantMessage, summarizeForTranscript, systemMessage, toolResultMessage, userMessage } from './messages.js';
import { buildSystemPrompt } from './system-prompt.js';

const log = logger.child({ module: 'agent' });

export type TurnOutcome = 'completed' | 'finished' | 'cancelled' | 'error' | 'iteration_limit';

export interface TurnResult {
  outcome: TurnOutcome;
  /** Visible transcript: model prose interleaved with tool-status lines */
  text: string;
  blocks: ContentBlock[];
  /** Conversation without the system prompt; pass as `history` to continue it */
  messages: ChatRequestMessage[];
  iterations: number;
  /** Set when outcome is 'error' */
  error?: string;
}

/** The part of ProviderClient the loop needs. */
export interface CompletionStream {
  stream(params: ChatParams, signal?: AbortSignal): AsyncIterable<StreamEvent>;
}

export interface AgentCallbacks extends ToolInteractionCallback {
  /** Called with the full block list whenever the visible transcript changes */
  onUpdate?(blocks: ContentBlock[]): void;
}

export interface AgentOptions {
  client: CompletionStream;
  executor: ToolExecutor;
  config: EngineConfig;
  callbacks?: AgentCallbacks;
  /** Overrides the bundled prompts/system.md */
  promptPath?: string;
}

export interface TurnOptions {
  signal?: AbortSignal;
  /** Earlier messages of the conversation, oldest first */
  history?: ChatRequestMessage[];
}

export interface Agent {
  runTurn(projectId: string, message: string, opts?: TurnOptions): Promise<TurnResult>;
}

/**
 * Visible transcript of one turn. With the incrementalSegmenter flag on,
 * settled blocks are cached between deltas; otherwise the whole text is
 * re-parsed on every change.
 */
class Transcript {
  private full = '';
  private readonly segmenter: IncrementalSegmenter | undefined;

  constructor(incremental: boolean) {
    this.segmenter = incremental ? new IncrementalSegmenter(true) : undefined;
  }

  get text(): string {
    return this.full;
  }

  append(delta: string): ContentBlock[] {
    this.full += delta;
    return this.segmenter ? this.segmenter.push(delta, true) : parseContent(this.full, true);
  }

  finish(): ContentBlock[] {
    return this.segmenter ? this.segmenter.finish() : parseContent(this.full, false);
  }
}

function totalDiffStats(changes: FileChangeEvent[]): DiffStats | undefined {
  let added = 0;
  let removed = 0;
  for (const change of changes) {
    const stats = diffStats(change.oldContent ?? '', change.newContent ?? '');
    added += stats.added;
    removed += stats.removed;
  }
  return added + removed > 0 ? { added, removed } : undefined;
}

export function createAgent(opts: AgentOptions): Agent {
  const { client, executor, config } = opts;
  const callbacks = opts.callbacks ?? {};

  async function runTurn(projectId: string, message: string, turnOpts: TurnOptions = {}): Promise<TurnResult> {
    const { signal } = turnOpts;
    const prompt = await buildSystemPrompt({
      projectId,
      repository: executor.repository,
      memory: executor.memory,
      features: config.features,
      promptPath: opts.promptPath,
    });
    const conversation: ChatRequestMessage[] = [...(turnOpts.history ?? []), userMessage(message)];
    const tools = executor.definitions();
    const transcript = new Transcript(config.features.isEnabled('incrementalSegmenter'));
    let blocks: ContentBlock[] = [];
    let afterToolLine = false;
    let iterations = 0;

    const show = (delta: string) => {
      blocks = transcript.append(delta);
      callbacks.onUpdate?.(blocks);
    };

    const end = (outcome: TurnOutcome, error?: string): TurnResult => {
      blocks = transcript.finish();
      callbacks.onUpdate?.(blocks);
      log.info({ projectId, outcome, iterations }, 'agent turn ended');
      const result: TurnResult = { outcome, text: transcript.text, blocks, messages: conversation, iterations };
      if (error !== undefined) result.error = error;
      return result;
    };

    log.info({ projectId, tools: tools.length, historyLength: turnOpts.history?.length ?? 0 }, 'agent turn started');

    try {
      while (iterations < config.maxIterations) {
        iterations++;
        let assistantText = '';
        const calls: ToolCallResponse[] = [];
        let completed = false;

        for await (const event of client.stream(
          { messages: [systemMessage(prompt), ...conversation], tools },
          signal,
        )) {
          switch (event.type) {
            case 'content_delta':
              if (event.text.length === 0) break;
              assistantText += event.text;
              show(afterToolLine ? `\n\n${event.text}` : event.text);
              afterToolLine = false;
              break;
            case 'tool_calls':
              calls.push(...event.calls);
              break;
            case 'finish_reason':
              log.debug({ projectId, reason: event.reason }, 'model finished');
              break;
            case 'error':
              log.error({ projectId, error: event.message }, 'completion stream failed');
              return end('error', event.message);
            case 'completed':
              completed = true;
              break;
            case 'started':
              break;
          }
        }

        // A stream that stops without a terminal event was cancelled.
        if (!completed || signal?.aborted) return end('cancelled');

        conversation.push(assistantMessage(stripReasoning(assistantText), calls));
        if (calls.length === 0) return end('completed');

        let finished = false;
        for (const call of calls) {
          if (signal?.aborted) return end('cancelled');

          callbacks.onUpdate?.([...blocks, { type: 'tool_call', name: call.name, status: 'running' }]);
          const changes: FileChangeEvent[] = [];
          const result = await executor.execute(projectId, call, {
            ...callbacks,
            onFileChanged: (event) => {
              changes.push(event);
              callbacks.onFileChanged?.(event);
            },
          });

          show(
            formatToolStatus({
              name: call.name,
              status: result.success ? 'success' : 'error',
              output: summarizeForTranscript(result.success ? result.output : (result.error ?? '')),
              diffStats: totalDiffStats(changes),
            }),
          );
          afterToolLine = true;
          conversation.push(toolResultMessage(call, result));
          if (call.name === 'finish_task' && result.success) finished = true;
        }

        if (finished) return end('finished');
      }
    } catch (error) {
      if (signal?.aborted) return end('cancelled');
      log.error({ err: error, projectId }, 'agent turn failed');
      return end('error', errorMessage(error));
    }

    log.warn({ projectId, maxIterations: config.maxIterations }, 'agent reached iteration limit');
    return end('iteration_limit');
  }

  return { runTurn };
}
