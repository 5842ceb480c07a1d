import { describe, it, expect, vi } from 'vitest';
import { createFeatures, parseEngineConfig, type StreamEvent, type ToolDefinition } from '@loomwork/shared';
import { ProviderClient, type ChatParams } from '../provider-client.js';

const config = parseEngineConfig(
  { baseUrl: 'https://llm.test/v1', apiKey: 'test-secret', model: 'test-model' },
  createFeatures({ FEATURE_PROVIDER_CIRCUIT_BREAKER: 'false' }),
);

const readTool: ToolDefinition = {
  name: 'read_file',
  description: 'Read a file',
  input_schema: { type: 'object', properties: { path: { type: 'string', description: 'File path' } }, required: ['path'] },
};

const params: ChatParams = { messages: [{ role: 'user', content: 'hi' }], tools: [readTool] };

function data(payload: unknown): string {
  return `data: ${JSON.stringify(payload)}\n\n`;
}

function sseResponse(chunks: string[]): Response {
  const encoder = new TextEncoder();
  const body = new ReadableStream<Uint8Array>({
    start(controller) {
      for (const chunk of chunks) controller.enqueue(encoder.encode(chunk));
      controller.close();
    },
  });
  return new Response(body, { status: 200, headers: { 'Content-Type': 'text/event-stream' } });
}

function clientReturning(response: Response | Error) {
  const fetch = vi.fn(async (_url: string, _init: RequestInit): Promise<Response> => {
    if (response instanceof Error) throw response;
    return response;
  });
  return { client: new ProviderClient({ config, fetch }), fetch };
}

async function collect(stream: AsyncIterable<StreamEvent>): Promise<StreamEvent[]> {
  const events: StreamEvent[] = [];
  for await (const event of stream) events.push(event);
  return events;
}

describe('ProviderClient.stream()', () => {
  it('yields content, reassembled tool calls and a terminal event', async () => {
    const { client } = clientReturning(
      sseResponse([
        ': keep-alive\n\n',
        data({ choices: [{ delta: { content: 'Hel' } }] }),
        data({ choices: [{ delta: { content: 'lo' } }] }),
        data({
          choices: [
            { delta: { tool_calls: [{ index: 0, id: 'call_1', function: { name: 'read_file', arguments: '{"pa' } }] } },
          ],
        }),
        data({
          choices: [{ delta: { tool_calls: [{ index: 0, function: { arguments: 'th":"a.txt"}' } }] }, finish_reason: 'tool_calls' }],
        }),
        'data: [DONE]\n\n',
      ]),
    );

    expect(await collect(client.stream(params))).toEqual([
      { type: 'started' },
      { type: 'content_delta', text: 'Hel' },
      { type: 'content_delta', text: 'lo' },
      { type: 'tool_calls', calls: [{ id: 'call_1', name: 'read_file', arguments: '{"path":"a.txt"}' }] },
      { type: 'finish_reason', reason: 'tool_calls' },
      { type: 'completed' },
    ]);
  });

  it('posts an authenticated streaming request with wire tools', async () => {
    const { client, fetch } = clientReturning(sseResponse(['data: [DONE]\n\n']));
    await collect(client.stream(params));

    expect(fetch).toHaveBeenCalledTimes(1);
    const [url, init] = fetch.mock.calls[0];
    expect(url).toBe('https://llm.test/v1/chat/completions');
    expect(init.method).toBe('POST');
    expect(init.headers).toMatchObject({
      Authorization: 'Bearer test-secret',
      Accept: 'text/event-stream',
      'Content-Type': 'application/json',
    });
    expect(JSON.parse(String(init.body))).toEqual({
      model: 'test-model',
      messages: [{ role: 'user', content: 'hi' }],
      stream: true,
      temperature: 0.7,
      tools: [{ type: 'function', function: { name: 'read_file', description: 'Read a file', parameters: readTool.input_schema } }],
      tool_choice: 'auto',
    });
  });

  it('leaves tools out for a model without tool support', () => {
    const { client } = clientReturning(sseResponse([]));
    const request = client.buildRequest(
      { ...params, model: { id: 'plain-model', supportsToolCalls: false, maxTokens: 512 } },
      false,
    );
    expect(request).toEqual({
      model: 'plain-model',
      messages: [{ role: 'user', content: 'hi' }],
      stream: false,
      temperature: 0.7,
      max_tokens: 512,
    });
  });

  it('maps an HTTP status to a user-facing error', async () => {
    const { client } = clientReturning(new Response('{"error":{"message":"bad key"}}', { status: 401 }));
    const message = 'Invalid API key. Please check your API key in Settings.';
    expect(await collect(client.stream(params))).toEqual([
      { type: 'error', error: { kind: 'network_error', status: 401, message }, message },
    ]);
  });

  it('reports a stream that ends before [DONE]', async () => {
    const { client } = clientReturning(sseResponse([data({ choices: [{ delta: { content: 'Hi' } }] })]));
    const message = 'Connection closed before the response completed';
    expect(await collect(client.stream(params))).toEqual([
      { type: 'started' },
      { type: 'content_delta', text: 'Hi' },
      { type: 'error', error: { kind: 'network_error', message }, message },
    ]);
  });

  it('reports a transport failure', async () => {
    const { client } = clientReturning(new Error('socket hang up'));
    expect(await collect(client.stream(params))).toEqual([
      { type: 'error', error: { kind: 'network_error', message: 'socket hang up' }, message: 'socket hang up' },
    ]);
  });

  it('stops without a terminal event when the caller aborts', async () => {
    const { client } = clientReturning(
      sseResponse([data({ choices: [{ delta: { content: 'Hi' } }] }), 'data: [DONE]\n\n']),
    );
    const controller = new AbortController();
    const events: StreamEvent[] = [];
    for await (const event of client.stream(params, controller.signal)) {
      events.push(event);
      if (event.type === 'started') controller.abort();
    }
    expect(events).toEqual([{ type: 'started' }]);
  });

  it('does not fetch when the signal is already aborted', async () => {
    const { client, fetch } = clientReturning(sseResponse(['data: [DONE]\n\n']));
    const controller = new AbortController();
    controller.abort();
    expect(await collect(client.stream(params, controller.signal))).toEqual([]);
    expect(fetch).not.toHaveBeenCalled();
  });

  it('does not trip the circuit breaker on cancelled turns', async () => {
    const guarded = parseEngineConfig(
      { baseUrl: 'https://llm.test/v1', apiKey: 'test-secret', model: 'test-model' },
      createFeatures({}),
    );
    let current = new AbortController();
    let cancelling = true;
    const fetch = vi.fn(async (_url: string, _init: RequestInit): Promise<Response> => {
      if (cancelling) {
        current.abort();
        throw new DOMException('This operation was aborted', 'AbortError');
      }
      return sseResponse(['data: [DONE]\n\n']);
    });
    const client = new ProviderClient({ config: guarded, fetch });

    for (let turn = 0; turn < 6; turn++) {
      current = new AbortController();
      expect(await collect(client.stream(params, current.signal))).toEqual([]);
    }

    cancelling = false;
    current = new AbortController();
    expect(await collect(client.stream(params, current.signal))).toEqual([
      { type: 'started' },
      { type: 'completed' },
    ]);
    expect(fetch).toHaveBeenCalledTimes(7);
  });
});

describe('ProviderClient.complete()', () => {
  it('returns the parsed completion', async () => {
    const body = { choices: [{ message: { role: 'assistant', content: 'Hello' }, finish_reason: 'stop' }] };
    const { client, fetch } = clientReturning(new Response(JSON.stringify(body), { status: 200 }));
    expect(await client.complete(params)).toEqual({ ok: true, value: body });
    expect(fetch.mock.calls[0][1].headers).toMatchObject({ Accept: 'application/json' });
  });

  it('returns a cancellation without fetching when the signal is already aborted', async () => {
    const { client, fetch } = clientReturning(new Response('{}', { status: 200 }));
    const controller = new AbortController();
    controller.abort();
    expect(await client.complete(params, controller.signal)).toEqual({
      ok: false,
      error: { kind: 'network_error', message: 'Request cancelled' },
    });
    expect(fetch).not.toHaveBeenCalled();
  });

  it('rejects a response without choices', async () => {
    const { client } = clientReturning(new Response('{"object":"list"}', { status: 200 }));
    expect(await client.complete(params)).toEqual({
      ok: false,
      error: { kind: 'parse_error', message: 'Unexpected completion response shape' },
    });
  });

  it('humanizes a provider message for an unlisted status', async () => {
    const { client } = clientReturning(
      new Response('{"error":{"message":"model foo does not exist"}}', { status: 404 }),
    );
    expect(await client.complete(params)).toEqual({
      ok: false,
      error: {
        kind: 'network_error',
        status: 404,
        message: 'Model not found. The selected model may not be available. Please try a different model.',
      },
    });
  });
});
