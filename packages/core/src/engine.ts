import type { EngineConfig } from '@loomwork/shared';
import { createAgent, type Agent, type AgentCallbacks } from './agent/agent-loop.js';
import type { AuditSink, ToolGuard } from './guardrails.js';
import type { MemoryStorage } from './memory/memory-storage.js';
import { ProviderClient, type FetchLike } from './provider-client.js';
import type { ProjectRepository } from './repository/project-repository.js';
import { SessionRegistry } from './session/project-session.js';
import { ToolExecutor } from './tool-executor.js';
import { createAllTools } from './tools/index.js';
import { ToolRegistry } from './tools/registry.js';

export interface EngineOptions {
  config: EngineConfig;
  repository: ProjectRepository;
  memory: MemoryStorage;
  callbacks?: AgentCallbacks;
  guard?: ToolGuard;
  audit?: AuditSink;
  fetch?: FetchLike;
  promptPath?: string;
}

export interface Engine {
  client: ProviderClient;
  executor: ToolExecutor;
  sessions: SessionRegistry;
  agent: Agent;
}

/** Wire the provider client, the full tool set and the agent loop. */
export function createEngine(opts: EngineOptions): Engine {
  const client = new ProviderClient({ config: opts.config, fetch: opts.fetch });
  const sessions = new SessionRegistry();
  const executor = new ToolExecutor({
    registry: new ToolRegistry(createAllTools()),
    repository: opts.repository,
    memory: opts.memory,
    sessions,
    callbacks: opts.callbacks,
    guard: opts.guard,
    audit: opts.audit,
  });
  const agent = createAgent({
    client,
    executor,
    config: opts.config,
    callbacks: opts.callbacks,
    promptPath: opts.promptPath,
  });
  return { client, executor, sessions, agent };
}
