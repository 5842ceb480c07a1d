/**
 * Wire types for OpenAI-compatible chat completions.
 *
 * Field names follow the JSON payloads exactly so values can be sent and
 * received without remapping.
 */

// ---------------------------------------------------------------------------
// Request
// ---------------------------------------------------------------------------

export type ChatRole = 'system' | 'user' | 'assistant' | 'tool';

export interface WireToolCall {
  id: string;
  type: 'function';
  function: {
    name: string;
    arguments: string;
  };
}

export interface ChatRequestMessage {
  role: ChatRole;
  content?: string | null;
  tool_calls?: WireToolCall[];
  tool_call_id?: string;
  name?: string;
}

/** Tool definition in the `tools` array of a request */
export interface ToolDefinition {
  name: string;
  description: string;
  input_schema: {
    type: 'object';
    properties: Record<string, JsonSchemaProperty>;
    required: string[];
  };
}

export interface JsonSchemaProperty {
  type: 'string' | 'integer' | 'boolean' | 'array';
  description: string;
  enum?: readonly string[];
  items?: { type: 'string' };
}

export interface WireTool {
  type: 'function';
  function: {
    name: string;
    description: string;
    parameters: ToolDefinition['input_schema'];
  };
}

export interface ChatCompletionRequest {
  model: string;
  messages: ChatRequestMessage[];
  stream: boolean;
  temperature: number;
  max_tokens?: number;
  tools?: WireTool[];
  tool_choice?: 'auto' | 'none';
}

// ---------------------------------------------------------------------------
// Non-streaming response
// ---------------------------------------------------------------------------

export interface ChatUsage {
  prompt_tokens: number;
  completion_tokens: number;
  total_tokens: number;
}

export interface ChatCompletion {
  id?: string;
  model?: string;
  choices: Array<{
    index?: number;
    message: {
      role: ChatRole;
      content: string | null;
      tool_calls?: WireToolCall[];
    };
    finish_reason?: string | null;
  }>;
  usage?: ChatUsage;
}

// ---------------------------------------------------------------------------
// Model description
// ---------------------------------------------------------------------------

export interface ModelInfo {
  /** Model string sent to the provider (e.g. "deepseek/deepseek-chat") */
  id: string;
  /** When false, tool definitions are left out of requests */
  supportsToolCalls: boolean;
  maxTokens?: number;
}
