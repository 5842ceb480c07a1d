import { ok } from '@loomwork/shared';
import type { MemoryResult, MemoryStorage } from './memory-storage.js';

export class InMemoryMemoryStorage implements MemoryStorage {
  private readonly projects = new Map<string, Map<string, string>>();

  private entries(projectId: string): Map<string, string> {
    let entries = this.projects.get(projectId);
    if (!entries) {
      entries = new Map();
      this.projects.set(projectId, entries);
    }
    return entries;
  }

  async save(projectId: string, key: string, value: string): Promise<MemoryResult<void>> {
    this.entries(projectId).set(key, value);
    return ok(undefined);
  }

  async recall(projectId: string, key: string): Promise<MemoryResult<string | undefined>> {
    return ok(this.projects.get(projectId)?.get(key));
  }

  async list(projectId: string): Promise<MemoryResult<Record<string, string>>> {
    const entries = this.projects.get(projectId);
    return ok(entries ? Object.fromEntries(entries) : {});
  }

  async delete(projectId: string, key: string): Promise<MemoryResult<boolean>> {
    return ok(this.projects.get(projectId)?.delete(key) ?? false);
  }

  async clearProject(projectId: string): Promise<MemoryResult<void>> {
    this.projects.delete(projectId);
    return ok(undefined);
  }
}
