import type { EngineError } from './result.js';

// ---------------------------------------------------------------------------
// Stream events
// ---------------------------------------------------------------------------

/** A fragment of one tool call as it arrives in a streamed chunk. */
export interface ToolCallDelta {
  index: number;
  id?: string;
  name?: string;
  argumentsFragment?: string;
}

/** A finalized tool call; `arguments` is the concatenation of every fragment. */
export interface ToolCallResponse {
  id: string;
  name: string;
  arguments: string;
}

export type StreamEvent =
  | { type: 'started' }
  | { type: 'content_delta'; text: string }
  | { type: 'tool_calls'; calls: ToolCallResponse[] }
  | { type: 'finish_reason'; reason: string }
  | { type: 'error'; error: EngineError; message: string }
  | { type: 'completed' };

// ---------------------------------------------------------------------------
// Tools
// ---------------------------------------------------------------------------

export interface ToolResult {
  success: boolean;
  output: string;
  error?: string;
}

export function toolSuccess(output: string): ToolResult {
  return { success: true, output };
}

export function toolFailure(error: string, output = ''): ToolResult {
  return { success: false, output, error };
}

// ---------------------------------------------------------------------------
// Todos and memory
// ---------------------------------------------------------------------------

export const TODO_STATUSES = ['pending', 'in_progress', 'completed'] as const;

export type TodoStatus = (typeof TODO_STATUSES)[number];

export interface TodoItem {
  id: string;
  title: string;
  description: string;
  status: TodoStatus;
}

// ---------------------------------------------------------------------------
// File changes
// ---------------------------------------------------------------------------

export type FileChangeType = 'created' | 'modified' | 'deleted' | 'renamed' | 'copied' | 'moved';

export interface FileChangeEvent {
  path: string;
  changeType: FileChangeType;
  oldContent?: string;
  newContent?: string;
}

// ---------------------------------------------------------------------------
// Content blocks
// ---------------------------------------------------------------------------

export type ToolCallStatus = 'running' | 'success' | 'error';

export interface DiffStats {
  added: number;
  removed: number;
}

export type ContentBlock =
  | { type: 'reasoning'; text: string; isActive: boolean }
  | {
      type: 'tool_call';
      name: string;
      status: ToolCallStatus;
      output?: string;
      filePath?: string;
      diffStats?: DiffStats;
    }
  | { type: 'text'; text: string }
  | { type: 'code'; code: string; language?: string };

export type ToolCallBlock = Extract<ContentBlock, { type: 'tool_call' }>;
