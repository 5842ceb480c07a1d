import { describe, it, expect, beforeEach } from 'vitest';
import {
  networkError,
  parseEngineConfig,
  type ContentBlock,
  type FileChangeEvent,
  type StreamEvent,
  type ToolCallResponse,
} from '@loomwork/shared';
import { createAgent, type AgentCallbacks, type CompletionStream } from '../agent/agent-loop.js';
import { clearSystemPromptCache } from '../agent/system-prompt.js';
import type { ChatParams } from '../provider-client.js';
import { createHarness, PROJECT } from './fixtures.js';

const MISSING_PROMPT = '/nonexistent/loomwork/system.md';

/** Plays back one scripted event list per model round. */
class ScriptedStream implements CompletionStream {
  readonly requests: ChatParams[] = [];
  private round = 0;

  constructor(private readonly rounds: StreamEvent[][]) {}

  async *stream(params: ChatParams): AsyncGenerator<StreamEvent> {
    this.requests.push({ ...params, messages: [...params.messages] });
    const events = this.rounds[Math.min(this.round, this.rounds.length - 1)];
    this.round++;
    yield* events;
  }
}

function call(name: string, args: Record<string, unknown>, id = 'call_1'): ToolCallResponse {
  return { id, name, arguments: JSON.stringify(args) };
}

function reply(text: string, calls: ToolCallResponse[] = []): StreamEvent[] {
  const events: StreamEvent[] = [{ type: 'started' }];
  if (text) events.push({ type: 'content_delta', text });
  if (calls.length > 0) events.push({ type: 'tool_calls', calls });
  events.push({ type: 'completed' });
  return events;
}

function setup(rounds: StreamEvent[][], files: Record<string, string> = {}, maxIterations = 5, callbacks?: AgentCallbacks) {
  const harness = createHarness(files);
  const client = new ScriptedStream(rounds);
  const agent = createAgent({
    client,
    executor: harness.executor,
    config: parseEngineConfig({ maxIterations }),
    callbacks,
    promptPath: MISSING_PROMPT,
  });
  return { harness, client, agent };
}

describe('agent loop', () => {
  beforeEach(() => {
    clearSystemPromptCache();
  });

  it('ends a turn that calls no tools as completed', async () => {
    const { agent, client } = setup([reply('Hello there.')]);
    const result = await agent.runTurn(PROJECT, 'hi');

    expect(result.outcome).toBe('completed');
    expect(result.text).toBe('Hello there.');
    expect(result.blocks).toEqual([{ type: 'text', text: 'Hello there.' }]);
    expect(result.iterations).toBe(1);
    expect(result.messages).toEqual([
      { role: 'user', content: 'hi' },
      { role: 'assistant', content: 'Hello there.' },
    ]);
    expect(client.requests[0].messages[0].role).toBe('system');
    expect(client.requests[0].tools).toHaveLength(28);
  });

  it('runs tool calls and feeds their results back to the model', async () => {
    const changes: FileChangeEvent[] = [];
    const { agent, client, harness } = setup(
      [reply('Creating file.', [call('write_file', { path: 'a.txt', content: 'x\ny' })]), reply('Done.')],
      {},
      5,
      { onFileChanged: (event) => changes.push(event) },
    );
    const result = await agent.runTurn(PROJECT, 'make a file');

    expect(result.outcome).toBe('completed');
    expect(result.iterations).toBe(2);
    expect(harness.repository.peek(PROJECT, 'a.txt')).toBe('x\ny');
    expect(result.text).toBe(
      'Creating file.\n\n🔧 **write_file**\n✅ File created and written successfully: a.txt (+2 -0)\n\nDone.',
    );
    expect(result.blocks).toEqual([
      { type: 'text', text: 'Creating file.' },
      {
        type: 'tool_call',
        name: 'write_file',
        status: 'success',
        output: 'File created and written successfully: a.txt',
        diffStats: { added: 2, removed: 0 },
        filePath: 'a.txt',
      },
      { type: 'text', text: 'Done.' },
    ]);
    expect(client.requests[1].messages.slice(1)).toEqual([
      { role: 'user', content: 'make a file' },
      {
        role: 'assistant',
        content: 'Creating file.',
        tool_calls: [
          { id: 'call_1', type: 'function', function: { name: 'write_file', arguments: '{"path":"a.txt","content":"x\\ny"}' } },
        ],
      },
      {
        role: 'tool',
        tool_call_id: 'call_1',
        name: 'write_file',
        content: 'File created and written successfully: a.txt',
      },
    ]);
    expect(changes).toEqual([{ path: 'a.txt', changeType: 'created', newContent: 'x\ny' }]);
  });

  it('reports a failed tool call to the model as an error', async () => {
    const { agent, client } = setup([reply('', [call('read_file', { path: 'missing.txt' })]), reply('Sorry.')]);
    const result = await agent.runTurn(PROJECT, 'read it');

    expect(result.text).toBe('\n\n🔧 **read_file**\n❌ Failed to read file: File not found: missing.txt\n\nSorry.');
    expect(client.requests[1].messages.at(-1)).toEqual({
      role: 'tool',
      tool_call_id: 'call_1',
      name: 'read_file',
      content: 'Error: Failed to read file: File not found: missing.txt',
    });
    expect(result.messages[1]).toEqual({
      role: 'assistant',
      content: null,
      tool_calls: [{ id: 'call_1', type: 'function', function: { name: 'read_file', arguments: '{"path":"missing.txt"}' } }],
    });
  });

  it('redacts keys from tool results sent to the model', async () => {
    const { agent, client } = setup(
      [reply('', [call('read_file', { path: 'config.txt' })]), reply('ok')],
      { 'config.txt': 'key=sk-ant-REDACTED' },
    );
    await agent.runTurn(PROJECT, 'read config');
    expect(client.requests[1].messages.at(-1)?.content).toBe('key=[REDACTED]');
  });

  it('ends as finished after a successful finish_task', async () => {
    const summaries: string[] = [];
    const { agent, client } = setup([reply('', [call('finish_task', { summary: 'All done' })]), reply('unreachable')], {}, 5, {
      onTaskFinished: (summary) => summaries.push(summary),
    });
    const result = await agent.runTurn(PROJECT, 'finish');

    expect(result.outcome).toBe('finished');
    expect(result.iterations).toBe(1);
    expect(client.requests).toHaveLength(1);
    expect(summaries).toEqual(['All done']);
    expect(result.messages.at(-1)).toEqual({
      role: 'tool',
      tool_call_id: 'call_1',
      name: 'finish_task',
      content: 'Task completed: All done',
    });
  });

  it('stops at the iteration limit', async () => {
    const { agent, client } = setup([reply('', [call('list_files', {})])], {}, 2);
    const result = await agent.runTurn(PROJECT, 'loop');

    expect(result.outcome).toBe('iteration_limit');
    expect(result.iterations).toBe(2);
    expect(client.requests).toHaveLength(2);
  });

  it('ends as error on a stream error event', async () => {
    const failure = networkError('Rate limit exceeded. Please try again later.', 429);
    const { agent } = setup([
      [
        { type: 'started' },
        { type: 'content_delta', text: 'Partial' },
        { type: 'error', error: failure, message: failure.message },
      ],
    ]);
    const result = await agent.runTurn(PROJECT, 'hi');

    expect(result.outcome).toBe('error');
    expect(result.error).toBe('Rate limit exceeded. Please try again later.');
    expect(result.text).toBe('Partial');
    expect(result.messages).toEqual([{ role: 'user', content: 'hi' }]);
  });

  it('ends as cancelled when the stream stops without a terminal event', async () => {
    const { agent } = setup([[{ type: 'started' }, { type: 'content_delta', text: 'Part' }]]);
    const result = await agent.runTurn(PROJECT, 'hi');
    expect(result.outcome).toBe('cancelled');
    expect(result.error).toBeUndefined();
  });

  it('does not run tools once the caller has aborted', async () => {
    const controller = new AbortController();
    const { agent, harness } = setup([reply('', [call('write_file', { path: 'a.txt', content: 'x' })])]);
    controller.abort();
    const result = await agent.runTurn(PROJECT, 'hi', { signal: controller.signal });

    expect(result.outcome).toBe('cancelled');
    expect(harness.repository.peek(PROJECT, 'a.txt')).toBeUndefined();
  });

  it('shows a running block before a tool executes', async () => {
    const updates: ContentBlock[][] = [];
    const { agent } = setup([reply('', [call('list_files', {})]), reply('ok')], {}, 5, {
      onUpdate: (blocks) => updates.push(blocks),
    });
    await agent.runTurn(PROJECT, 'list');
    expect(updates[0]).toEqual([{ type: 'tool_call', name: 'list_files', status: 'running' }]);
  });

  it('continues from earlier history', async () => {
    const { agent, client } = setup([reply('Again.')]);
    const history = [
      { role: 'user' as const, content: 'first' },
      { role: 'assistant' as const, content: 'reply' },
    ];
    const result = await agent.runTurn(PROJECT, 'second', { history });

    expect(client.requests[0].messages.slice(1)).toEqual([...history, { role: 'user', content: 'second' }]);
    expect(result.messages).toHaveLength(4);
  });

  it('keeps reasoning in the transcript but not in the conversation', async () => {
    const { agent } = setup([
      [
        { type: 'started' },
        { type: 'content_delta', text: '<thinking>secret plan' },
        { type: 'content_delta', text: '</thinking>Answer.' },
        { type: 'completed' },
      ],
    ]);
    const result = await agent.runTurn(PROJECT, 'hi');

    expect(result.text).toBe('<thinking>secret plan</thinking>Answer.');
    expect(result.messages[1]).toEqual({ role: 'assistant', content: 'Answer.' });
  });

  it('runs tool calls from every tool_calls event in a round', async () => {
    const { agent, harness } = setup([
      [
        { type: 'started' },
        { type: 'tool_calls', calls: [call('write_file', { path: 'a.txt', content: 'a' }, 'call_1')] },
        { type: 'tool_calls', calls: [call('write_file', { path: 'b.txt', content: 'b' }, 'call_2')] },
        { type: 'completed' },
      ],
      reply('Done.'),
    ]);
    const result = await agent.runTurn(PROJECT, 'two files');

    expect(result.outcome).toBe('completed');
    expect(harness.repository.peek(PROJECT, 'a.txt')).toBe('a');
    expect(harness.repository.peek(PROJECT, 'b.txt')).toBe('b');
    expect(result.messages.filter((m) => m.role === 'tool').map((m) => m.tool_call_id)).toEqual(['call_1', 'call_2']);
  });
});

