import { describe, it, expect, vi } from 'vitest';
import { parseEngineConfig } from '@loomwork/shared';
import { clearSystemPromptCache } from '../agent/system-prompt.js';
import { createEngine } from '../engine.js';
import { InMemoryMemoryStorage } from '../memory/in-memory-storage.js';
import { InMemoryProjectRepository } from '../repository/memory-project-repository.js';

function sse(lines: string[]): Response {
  const encoder = new TextEncoder();
  return new Response(
    new ReadableStream<Uint8Array>({
      start(controller) {
        for (const line of lines) controller.enqueue(encoder.encode(`${line}\n\n`));
        controller.close();
      },
    }),
    { status: 200 },
  );
}

describe('createEngine()', () => {
  it('runs a tool round trip against a stubbed provider', async () => {
    clearSystemPromptCache();
    const repository = new InMemoryProjectRepository();
    repository.seed('p1', { 'notes.txt': 'remember me' });
    const rounds = [
      sse([
        `data: ${JSON.stringify({
          choices: [
            {
              delta: { tool_calls: [{ index: 0, id: 'call_7', function: { name: 'read_file', arguments: '{"path":"notes.txt"}' } }] },
              finish_reason: 'tool_calls',
            },
          ],
        })}`,
        'data: [DONE]',
      ]),
      sse([`data: ${JSON.stringify({ choices: [{ delta: { content: 'It says remember me.' } }] })}`, 'data: [DONE]']),
    ];
    const fetch = vi.fn(async (_url: string, _init: RequestInit): Promise<Response> => {
      const next = rounds.shift();
      if (!next) throw new Error('unexpected request');
      return next;
    });

    const engine = createEngine({
      config: parseEngineConfig({ baseUrl: 'https://llm.test/v1', apiKey: 'test-secret' }),
      repository,
      memory: new InMemoryMemoryStorage(),
      fetch,
    });
    const result = await engine.agent.runTurn('p1', 'what is in notes.txt?');

    expect(result.outcome).toBe('completed');
    expect(result.text).toBe('\n\n🔧 **read_file**\n✅ remember me\n\nIt says remember me.');
    expect(fetch).toHaveBeenCalledTimes(2);
    expect(engine.executor.definitions()).toHaveLength(28);
    expect(engine.sessions.activeProjects()).toEqual(['p1']);
  });
});
