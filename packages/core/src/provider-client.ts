import {
  CircuitBreaker,
  CircuitOpenError,
  err,
  errorMessage,
  getTracer,
  logger,
  markSpanFailed,
  networkError,
  ok,
  parseError,
  withSpan,
  type ChatCompletion,
  type ChatCompletionRequest,
  type ChatRequestMessage,
  type EngineConfig,
  type EngineError,
  type ModelInfo,
  type NetworkError,
  type Result,
  type StreamEvent,
  type ToolDefinition,
  type WireTool,
} from '@loomwork/shared';
import { readLines } from './stream/sse-line-reader.js';
import { StreamEventDecoder } from './stream/stream-event-decoder.js';
import { mapHttpError, mapTransportError } from './stream/http-errors.js';

const log = logger.child({ module: 'provider-client' });

export type FetchLike = (input: string, init: RequestInit) => Promise<Response>;

export interface ChatParams {
  messages: ChatRequestMessage[];
  tools?: ToolDefinition[];
  /** Overrides the configured model for this request */
  model?: ModelInfo;
  temperature?: number;
  maxTokens?: number;
}

export interface ProviderClientOptions {
  config: EngineConfig;
  /** Injected for tests; defaults to the global fetch */
  fetch?: FetchLike;
}

const TIMED_OUT = networkError('Request timed out. The model took too long to respond.');
const CANCELLED = networkError('Request cancelled');
const CIRCUIT_OPEN_MESSAGE = 'The provider is failing repeatedly. Please try again in a moment.';

export function toWireTools(tools: ToolDefinition[]): WireTool[] {
  return tools.map((tool) => ({
    type: 'function',
    function: {
      name: tool.name,
      description: tool.description,
      parameters: tool.input_schema,
    },
  }));
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isChatCompletion(value: unknown): value is ChatCompletion {
  if (!isRecord(value) || !Array.isArray(value.choices)) return false;
  return value.choices.every((choice) => isRecord(choice) && isRecord(choice.message));
}

/** A transport rejection caused by the caller's own signal. */
class RequestCancelledError extends Error {
  constructor(cause: unknown) {
    super('Request cancelled', { cause });
    this.name = 'RequestCancelledError';
  }
}

/**
 * Timer that aborts a controller when it fires. Re-armed with a new
 * duration as the request moves from connecting to reading.
 */
class Deadline {
  private timer: ReturnType<typeof setTimeout> | undefined;
  fired = false;

  constructor(private readonly controller: AbortController) {}

  arm(ms: number): void {
    this.clear();
    this.timer = setTimeout(() => {
      this.fired = true;
      this.controller.abort(new Error('deadline exceeded'));
    }, ms);
  }

  clear(): void {
    if (this.timer !== undefined) clearTimeout(this.timer);
    this.timer = undefined;
  }
}

/**
 * OpenAI-compatible chat-completions client.
 *
 * `stream()` yields `started`, then decoded events, and always ends in a
 * terminal `completed` or `error` event unless the caller's signal aborts,
 * in which case iteration stops with no further events.
 */
export class ProviderClient {
  private readonly config: EngineConfig;
  private readonly fetchImpl: FetchLike;
  private readonly breaker: CircuitBreaker | undefined;

  constructor(opts: ProviderClientOptions) {
    this.config = opts.config;
    this.fetchImpl = opts.fetch ?? ((input, init) => fetch(input, init));
    this.breaker = opts.config.features.isEnabled('providerCircuitBreaker')
      ? new CircuitBreaker({
          name: 'provider',
          isFailure: (res) => res instanceof Response && res.status >= 500,
          isIgnored: (error) => error instanceof RequestCancelledError,
        })
      : undefined;
  }

  get defaultModel(): ModelInfo {
    return {
      id: this.config.model,
      supportsToolCalls: this.config.supportsToolCalls,
      maxTokens: this.config.maxTokens,
    };
  }

  buildRequest(params: ChatParams, stream: boolean): ChatCompletionRequest {
    const model = params.model ?? this.defaultModel;
    const request: ChatCompletionRequest = {
      model: model.id,
      messages: params.messages,
      stream,
      temperature: params.temperature ?? this.config.temperature,
    };
    const maxTokens = params.maxTokens ?? model.maxTokens;
    if (maxTokens !== undefined) {
      request.max_tokens = maxTokens;
    }
    if (model.supportsToolCalls && params.tools && params.tools.length > 0) {
      request.tools = toWireTools(params.tools);
      request.tool_choice = 'auto';
    }
    return request;
  }

  private headers(stream: boolean): Record<string, string> {
    const headers: Record<string, string> = {
      'Content-Type': 'application/json',
      Accept: stream ? 'text/event-stream' : 'application/json',
      'User-Agent': `${this.config.appName}/0.1`,
      'HTTP-Referer': this.config.appUrl,
      'X-Title': this.config.appName,
    };
    if (this.config.apiKey) {
      headers['Authorization'] = `Bearer ${this.config.apiKey}`;
    }
    return headers;
  }

  private open(request: ChatCompletionRequest, signal: AbortSignal, cancelled: () => boolean): Promise<Response> {
    const send = async () => {
      try {
        return await this.fetchImpl(`${this.config.baseUrl}/chat/completions`, {
          method: 'POST',
          headers: this.headers(request.stream),
          body: JSON.stringify(request),
          signal,
        });
      } catch (error) {
        throw cancelled() ? new RequestCancelledError(error) : error;
      }
    };
    return this.breaker ? this.breaker.execute(send) : send();
  }

  private failure(error: unknown, deadline: Deadline): NetworkError {
    if (deadline.fired) return TIMED_OUT;
    if (error instanceof RequestCancelledError) return CANCELLED;
    if (error instanceof CircuitOpenError) return networkError(CIRCUIT_OPEN_MESSAGE);
    return mapTransportError(error);
  }

  async *stream(params: ChatParams, signal?: AbortSignal): AsyncGenerator<StreamEvent> {
    if (signal?.aborted) return;
    const request = this.buildRequest(params, true);
    const controller = new AbortController();
    const onAbort = () => controller.abort(signal?.reason);
    signal?.addEventListener('abort', onAbort, { once: true });
    const deadline = new Deadline(controller);
    const span = getTracer().startSpan('provider.stream', {
      attributes: { model: request.model, messages: request.messages.length },
    });
    const cancelled = () => signal?.aborted === true;

    log.info(
      { model: request.model, messages: request.messages.length, tools: request.tools?.length ?? 0 },
      'opening completion stream',
    );

    try {
      let response: Response;
      deadline.arm(this.config.timeouts.connectMs);
      try {
        response = await this.open(request, controller.signal, cancelled);
      } catch (error) {
        if (cancelled()) return;
        const failure = this.failure(error, deadline);
        log.error({ err: error }, 'completion request failed');
        markSpanFailed(span, failure.message);
        yield { type: 'error', error: failure, message: failure.message };
        return;
      }

      if (!response.ok) {
        const body = await response.text().catch(() => '');
        const failure = mapHttpError(response.status, body);
        log.error({ status: response.status }, 'completion request rejected');
        markSpanFailed(span, failure.message);
        yield { type: 'error', error: failure, message: failure.message };
        return;
      }

      if (!response.body) {
        const failure = networkError('Streaming is not supported by the provider response');
        markSpanFailed(span, failure.message);
        yield { type: 'error', error: failure, message: failure.message };
        return;
      }

      if (cancelled()) return;
      yield { type: 'started' };

      const decoder = new StreamEventDecoder();
      const readMs = this.config.timeouts.readMs;
      deadline.arm(readMs);
      try {
        for await (const line of readLines(response.body, () => deadline.arm(readMs))) {
          for (const event of decoder.decodeLine(line)) {
            if (cancelled()) return;
            yield event;
          }
          if (decoder.isDone) break;
        }
      } catch (error) {
        if (cancelled()) return;
        const failure = this.failure(error, deadline);
        log.error({ err: error }, 'completion stream failed');
        markSpanFailed(span, failure.message);
        yield { type: 'error', error: failure, message: failure.message };
        return;
      }

      if (cancelled()) return;
      if (!decoder.isDone) {
        const failure = networkError('Connection closed before the response completed');
        markSpanFailed(span, failure.message);
        yield { type: 'error', error: failure, message: failure.message };
        return;
      }

      log.info({ model: request.model, skipped: decoder.skippedCount }, 'completion stream finished');
    } finally {
      deadline.clear();
      signal?.removeEventListener('abort', onAbort);
      controller.abort();
      span.end();
    }
  }

  /** Non-streaming completion. Failures come back as a Result, never thrown. */
  async complete(params: ChatParams, signal?: AbortSignal): Promise<Result<ChatCompletion, EngineError>> {
    if (signal?.aborted) return err(CANCELLED);
    const request = this.buildRequest(params, false);
    const controller = new AbortController();
    const onAbort = () => controller.abort(signal?.reason);
    signal?.addEventListener('abort', onAbort, { once: true });
    const deadline = new Deadline(controller);

    try {
      return await withSpan<Result<ChatCompletion, EngineError>>('provider.complete', { model: request.model }, async (span) => {
        deadline.arm(this.config.timeouts.connectMs + this.config.timeouts.readMs);
        let response: Response;
        let body: string;
        try {
          response = await this.open(request, controller.signal, () => signal?.aborted === true && !deadline.fired);
          body = await response.text();
        } catch (error) {
          const failure = this.failure(error, deadline);
          markSpanFailed(span, failure.message);
          return err(failure);
        }

        if (!response.ok) {
          const failure = mapHttpError(response.status, body);
          markSpanFailed(span, failure.message);
          return err(failure);
        }

        let parsed: unknown;
        try {
          parsed = JSON.parse(body);
        } catch (error) {
          return err(parseError(errorMessage(error)));
        }
        if (!isChatCompletion(parsed)) {
          return err(parseError('Unexpected completion response shape'));
        }

        log.info({ model: request.model, usage: parsed.usage }, 'completion finished');
        return ok(parsed);
      });
    } finally {
      deadline.clear();
      signal?.removeEventListener('abort', onAbort);
    }
  }
}
