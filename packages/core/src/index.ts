/**
 * @loomwork/core — agent orchestration engine.
 *
 * - ProviderClient: OpenAI-compatible streaming chat completions
 * - StreamEventDecoder / ToolCallAccumulator: SSE lines to StreamEvents
 * - ToolExecutor: validated dispatch of tool calls against a project
 * - parseContent / IncrementalSegmenter: transcript text to ContentBlocks
 * - createAgent: the model/tool loop tying them together
 */

// Provider
export { ProviderClient, toWireTools } from './provider-client.js';
export type { ChatParams, FetchLike, ProviderClientOptions } from './provider-client.js';
export { readLines, sseData } from './stream/sse-line-reader.js';
export { StreamEventDecoder, decodeStream, REASONING_OPEN, REASONING_CLOSE } from './stream/stream-event-decoder.js';
export { ToolCallAccumulator } from './stream/tool-call-accumulator.js';
export { mapHttpError, mapTransportError, humanizeProviderMessage, parseErrorBodyMessage } from './stream/http-errors.js';

// Segmentation
export { parseContent, stripReasoning, REASONING_TAGS } from './segmenter/content-segmenter.js';
export { IncrementalSegmenter } from './segmenter/incremental-segmenter.js';
export {
  formatToolStatus,
  splitDiffStats,
  TOOL_MARKER,
  TOOL_BOUNDARY,
  SUCCESS_GLYPH,
  ERROR_GLYPH,
  RUNNING_GLYPH,
} from './segmenter/tool-status.js';
export type { ToolStatusLine } from './segmenter/tool-status.js';

// Tools
export { ToolExecutor } from './tool-executor.js';
export type { ToolExecutorOptions } from './tool-executor.js';
export * from './tools/index.js';
export { defineTool, normalizeProjectPath, missingArgument } from './tools/args.js';
export { globToRegex, createPathMatcher, optionalPathMatcher } from './tools/glob.js';
export type { PathMatcher } from './tools/glob.js';
export { diffLines, diffStats, formatDiff, MAX_REPORTED_DIFFERENCES } from './tools/line-diff.js';
export type { LineDifference } from './tools/line-diff.js';

// Guardrails and audit
export type { ToolGuard, ToolGuardContext, ToolGuardDecision, AuditSink, ToolAuditEvent } from './guardrails.js';
export { allowAllGuard, noopAuditSink } from './guardrails.js';

// Collaborators
export type {
  ProjectRepository,
  RepoResult,
  FileNode,
  FolderNode,
  FileTreeNode,
  SearchReplaceSummary,
  ReplacementFile,
} from './repository/project-repository.js';
export { flattenFiles } from './repository/project-repository.js';
export { InMemoryProjectRepository } from './repository/memory-project-repository.js';
export { FsProjectRepository } from './repository/fs-project-repository.js';
export type { MemoryStorage, MemoryResult } from './memory/memory-storage.js';
export { renderMemoryContext } from './memory/memory-storage.js';
export { InMemoryMemoryStorage } from './memory/in-memory-storage.js';
export { JsonFileMemoryStorage } from './memory/json-file-storage.js';

// Sessions
export { ProjectSession, SessionRegistry } from './session/project-session.js';
export type { SessionRegistryOptions } from './session/project-session.js';
export { TodoList } from './session/todo-list.js';
export { SerialQueue, KeyedSerialQueue } from './session/serial-queue.js';

// Engine
export { createEngine } from './engine.js';
export type { Engine, EngineOptions } from './engine.js';

// Agent
export { createAgent } from './agent/agent-loop.js';
export type { Agent, AgentCallbacks, AgentOptions, CompletionStream, TurnOptions, TurnOutcome, TurnResult } from './agent/agent-loop.js';
export { buildSystemPrompt, clearSystemPromptCache, DEFAULT_PROMPT_PATH } from './agent/system-prompt.js';
export { sanitizeToolOutput } from './agent/messages.js';
