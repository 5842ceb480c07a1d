import type { ChatRequestMessage, ToolCallResponse, ToolResult, WireToolCall } from '@loomwork/shared';

/** Patterns matching common API keys and tokens that should not leak to the model */
const SENSITIVE_PATTERNS = [
  /sk-ant-[a-zA-Z0-9_-]{20,}/g, // Anthropic API keys
  /sk-or-v1-[a-f0-9]{32,}/g, // OpenRouter API keys
  /sk-[a-zA-Z0-9]{32,}/g, // OpenAI API keys
  /\b[a-f0-9]{64}\b/g, // 64-char hex tokens
];

/** Longest tool detail shown in the visible transcript */
export const TRANSCRIPT_DETAIL_LIMIT = 200;

/** Strip sensitive tokens/keys from tool output before sending to the model */
export function sanitizeToolOutput(text: string): string {
  let sanitized = text;
  for (const pattern of SENSITIVE_PATTERNS) {
    sanitized = sanitized.replace(pattern, '[REDACTED]');
  }
  return sanitized;
}

export function summarizeForTranscript(text: string, limit = TRANSCRIPT_DETAIL_LIMIT): string {
  return text.length > limit ? text.slice(0, limit) + '...' : text;
}

export function systemMessage(content: string): ChatRequestMessage {
  return { role: 'system', content };
}

export function userMessage(content: string): ChatRequestMessage {
  return { role: 'user', content };
}

export function toWireToolCalls(calls: ToolCallResponse[]): WireToolCall[] {
  return calls.map((call) => ({
    id: call.id,
    type: 'function',
    function: { name: call.name, arguments: call.arguments },
  }));
}

/** Assistant turn as sent back to the provider; content is null when it only called tools. */
export function assistantMessage(text: string, calls: ToolCallResponse[]): ChatRequestMessage {
  const message: ChatRequestMessage = { role: 'assistant', content: text.length > 0 ? text : null };
  if (calls.length > 0) message.tool_calls = toWireToolCalls(calls);
  return message;
}

export function toolResultMessage(call: ToolCallResponse, result: ToolResult): ChatRequestMessage {
  const body = result.success ? result.output : `Error: ${result.error ?? 'unknown error'}`;
  return { role: 'tool', tool_call_id: call.id, name: call.name, content: sanitizeToolOutput(body) };
}
