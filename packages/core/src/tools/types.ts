import type { z } from 'zod';
import type {
  EngineError,
  FileChangeEvent,
  Result,
  TodoItem,
  ToolDefinition,
  ToolResult,
} from '@loomwork/shared';
import type { ProjectRepository } from '../repository/project-repository.js';
import type { MemoryStorage } from '../memory/memory-storage.js';
import type { ProjectSession } from '../session/project-session.js';

/**
 * Hooks into the host application. All optional; an absent hook is
 * skipped (ask_user then answers with the question text).
 */
export interface ToolInteractionCallback {
  askUser?(question: string, options?: string[]): Promise<string | undefined>;
  onFileChanged?(event: FileChangeEvent): void;
  onTodoCreated?(todo: TodoItem): void;
  onTodoUpdated?(todo: TodoItem): void;
  onTaskFinished?(summary: string): void;
}

export interface ToolContext {
  projectId: string;
  repository: ProjectRepository;
  memory: MemoryStorage;
  session: ProjectSession;
  callbacks: ToolInteractionCallback;
}

export type ToolHandler<Args> = (args: Args, ctx: ToolContext) => Promise<ToolResult>;

/**
 * A tool as the registry stores it. `invoke` validates raw arguments
 * against `schema` and only then calls the typed handler.
 */
export interface RegisteredTool {
  readonly definition: ToolDefinition;
  readonly schema: z.AnyZodObject;
  invoke(input: Record<string, unknown>, ctx: ToolContext): Promise<Result<ToolResult, EngineError>>;
}

export interface ToolSpec<S extends z.AnyZodObject> {
  definition: ToolDefinition;
  schema: S;
  handler: ToolHandler<z.output<S>>;
}
