import type { FileChangeEvent, ToolResult } from '@loomwork/shared';
import { InMemoryMemoryStorage } from '../memory/in-memory-storage.js';
import { InMemoryProjectRepository } from '../repository/memory-project-repository.js';
import { SessionRegistry } from '../session/project-session.js';
import { ToolExecutor, type ToolExecutorOptions } from '../tool-executor.js';
import { createAllTools } from '../tools/index.js';
import { ToolRegistry } from '../tools/registry.js';
import type { ToolInteractionCallback } from '../tools/types.js';

export const PROJECT = 'p1';

export function sequentialIds(prefix = 'todo'): () => string {
  let n = 0;
  return () => `${prefix}-${++n}`;
}

export interface ToolHarness {
  repository: InMemoryProjectRepository;
  memory: InMemoryMemoryStorage;
  sessions: SessionRegistry;
  executor: ToolExecutor;
  changes: FileChangeEvent[];
  run(name: string, args: Record<string, unknown> | string, callbacks?: ToolInteractionCallback): Promise<ToolResult>;
}

export function createHarness(
  files: Record<string, string> = {},
  extra: Partial<Pick<ToolExecutorOptions, 'guard' | 'audit' | 'callbacks'>> = {},
): ToolHarness {
  const repository = new InMemoryProjectRepository();
  repository.seed(PROJECT, files);
  const memory = new InMemoryMemoryStorage();
  const sessions = new SessionRegistry({ newId: sequentialIds() });
  const changes: FileChangeEvent[] = [];
  const executor = new ToolExecutor({
    registry: new ToolRegistry(createAllTools()),
    repository,
    memory,
    sessions,
    callbacks: { onFileChanged: (event) => changes.push(event), ...extra.callbacks },
    guard: extra.guard,
    audit: extra.audit,
  });

  return {
    repository,
    memory,
    sessions,
    executor,
    changes,
    run: (name, args, callbacks) =>
      executor.execute(
        PROJECT,
        { id: 'call_1', name, arguments: typeof args === 'string' ? args : JSON.stringify(args) },
        callbacks,
      ),
  };
}
