import type { RepositoryFailure, Result } from '@loomwork/shared';

export type MemoryResult<T> = Result<T, RepositoryFailure>;

/** Per-project string key/value memory. Saving an existing key overwrites it. */
export interface MemoryStorage {
  save(projectId: string, key: string, value: string): Promise<MemoryResult<void>>;
  recall(projectId: string, key: string): Promise<MemoryResult<string | undefined>>;
  list(projectId: string): Promise<MemoryResult<Record<string, string>>>;
  /** Resolves to false when the key did not exist. */
  delete(projectId: string, key: string): Promise<MemoryResult<boolean>>;
  clearProject(projectId: string): Promise<MemoryResult<void>>;
}

/**
 * Render saved memories as a system-prompt section, or an empty string
 * when there are none.
 */
export function renderMemoryContext(memories: Record<string, string>): string {
  const keys = Object.keys(memories).sort();
  if (keys.length === 0) return '';
  const rows = keys.map((key) => `- **${key}**: ${memories[key]}`);
  return ['## Project Memories', 'Information remembered from previous sessions:', ...rows].join('\n');
}
