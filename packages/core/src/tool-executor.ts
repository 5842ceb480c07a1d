import {
  describeError,
  errorMessage,
  logger,
  toolFailure,
  withSpan,
  type ToolCallResponse,
  type ToolDefinition,
  type ToolResult,
} from '@loomwork/shared';
import { allowAllGuard, noopAuditSink, type AuditSink, type ToolAuditEvent, type ToolGuard } from './guardrails.js';
import type { MemoryStorage } from './memory/memory-storage.js';
import type { ProjectRepository } from './repository/project-repository.js';
import type { SessionRegistry } from './session/project-session.js';
import type { ToolRegistry } from './tools/registry.js';
import type { ToolInteractionCallback } from './tools/types.js';

const log = logger.child({ module: 'tool-executor' });

export interface ToolExecutorOptions {
  registry: ToolRegistry;
  repository: ProjectRepository;
  memory: MemoryStorage;
  sessions: SessionRegistry;
  callbacks?: ToolInteractionCallback;
  guard?: ToolGuard;
  audit?: AuditSink;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/** Blank arguments count as `{}`; anything but a JSON object is rejected. */
function parseArguments(raw: string): Record<string, unknown> | string {
  if (raw.trim() === '') return {};
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (error) {
    return errorMessage(error);
  }
  return isRecord(parsed) ? parsed : 'Tool arguments must be a JSON object';
}

/**
 * Runs finalized tool calls against a project. Never throws: every
 * failure, including a handler that throws, comes back as a failed
 * ToolResult the model can read.
 */
export class ToolExecutor {
  readonly repository: ProjectRepository;
  readonly memory: MemoryStorage;
  readonly sessions: SessionRegistry;
  private readonly registry: ToolRegistry;
  private readonly callbacks: ToolInteractionCallback;
  private readonly guard: ToolGuard;
  private readonly audit: AuditSink;

  constructor(opts: ToolExecutorOptions) {
    this.registry = opts.registry;
    this.repository = opts.repository;
    this.memory = opts.memory;
    this.sessions = opts.sessions;
    this.callbacks = opts.callbacks ?? {};
    this.guard = opts.guard ?? allowAllGuard;
    this.audit = opts.audit ?? noopAuditSink;
  }

  definitions(): ToolDefinition[] {
    return this.registry.definitions();
  }

  /**
   * Execute one call. `callbacks` given here take precedence over the ones
   * the executor was built with, hook by hook.
   */
  async execute(
    projectId: string,
    call: ToolCallResponse,
    callbacks?: ToolInteractionCallback,
  ): Promise<ToolResult> {
    const args = parseArguments(call.arguments);
    if (typeof args === 'string') {
      log.warn({ tool: call.name, callId: call.id }, 'tool arguments are not a JSON object');
      return toolFailure(`Error executing tool: ${args}`);
    }

    const tool = this.registry.get(call.name);
    if (!tool) {
      log.warn({ tool: call.name }, 'model called an unknown tool');
      return toolFailure(describeError({ kind: 'unknown_tool', name: call.name }));
    }

    const session = this.sessions.forProject(projectId);
    const ctx = {
      projectId,
      repository: this.repository,
      memory: this.memory,
      session,
      callbacks: { ...this.callbacks, ...callbacks },
    };
    const guardCtx = { projectId, toolName: call.name, callId: call.id, toolInput: args };
    const started = Date.now();
    const record = (action: ToolAuditEvent['action'], result: ToolResult): ToolResult => {
      const durationMs = Date.now() - started;
      log.info({ tool: call.name, projectId, action, success: result.success, durationMs }, 'tool executed');
      const event: ToolAuditEvent = {
        timestamp: new Date().toISOString(),
        action,
        projectId,
        toolName: call.name,
        success: result.success,
        durationMs,
      };
      if (result.error !== undefined) event.error = result.error;
      this.audit.emit(event);
      return result;
    };

    try {
      return await session.run(() =>
        withSpan('tool.execute', { 'tool.name': call.name, projectId }, async () => {
          const decision = await this.guard.beforeToolExecution(guardCtx);
          if (!decision.allow) {
            return record('blocked', toolFailure(`Tool call blocked: ${decision.reason ?? 'not allowed'}`));
          }
          const outcome = await tool.invoke(args, ctx);
          if (!outcome.ok) return record('rejected', toolFailure(describeError(outcome.error)));
          return record('executed', await this.guard.afterToolExecution(guardCtx, outcome.value));
        }),
      );
    } catch (error) {
      log.error({ err: error, tool: call.name, projectId }, 'tool threw');
      return record('executed', toolFailure(`Error executing tool: ${errorMessage(error)}`));
    }
  }
}
