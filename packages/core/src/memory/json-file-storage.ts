/**
 * MemoryStorage persisted as one JSON object per project:
 * `<rootDir>/<projectId>.json` mapping key to value. Reads and writes for a
 * project go through one serial queue, so concurrent saves never lose an
 * update.
 */
import { mkdir, readFile, rm, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { err, errorMessage, logger, ok, repositoryFailure } from '@loomwork/shared';
import { KeyedSerialQueue } from '../session/serial-queue.js';
import type { MemoryResult, MemoryStorage } from './memory-storage.js';

const log = logger.child({ module: 'json-file-memory' });

function isStringRecord(value: unknown): value is Record<string, string> {
  if (typeof value !== 'object' || value === null || Array.isArray(value)) return false;
  return Object.values(value).every((v) => typeof v === 'string');
}

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

export class JsonFileMemoryStorage implements MemoryStorage {
  private readonly queue = new KeyedSerialQueue();

  constructor(private readonly rootDir: string) {}

  private fileFor(projectId: string): string {
    return join(this.rootDir, `${encodeURIComponent(projectId)}.json`);
  }

  private async load(projectId: string): Promise<Record<string, string>> {
    let raw: string;
    try {
      raw = await readFile(this.fileFor(projectId), 'utf-8');
    } catch (error) {
      if (isMissingFile(error)) return {};
      throw error;
    }
    const parsed: unknown = JSON.parse(raw);
    if (!isStringRecord(parsed)) {
      throw new Error(`memory file for project ${projectId} is not a string map`);
    }
    return parsed;
  }

  private async store(projectId: string, entries: Record<string, string>): Promise<void> {
    await mkdir(this.rootDir, { recursive: true });
    await writeFile(this.fileFor(projectId), JSON.stringify(entries, null, 2), 'utf-8');
  }

  private locked<T>(projectId: string, op: string, fn: () => Promise<T>): Promise<MemoryResult<T>> {
    return this.queue.run(projectId, async () => {
      try {
        return ok(await fn());
      } catch (error) {
        log.error({ err: error, projectId, op }, 'memory storage operation failed');
        return err(repositoryFailure(errorMessage(error)));
      }
    });
  }

  save(projectId: string, key: string, value: string): Promise<MemoryResult<void>> {
    return this.locked(projectId, 'save', async () => {
      const entries = await this.load(projectId);
      entries[key] = value;
      await this.store(projectId, entries);
    });
  }

  recall(projectId: string, key: string): Promise<MemoryResult<string | undefined>> {
    return this.locked(projectId, 'recall', async () => {
      const entries = await this.load(projectId);
      return Object.hasOwn(entries, key) ? entries[key] : undefined;
    });
  }

  list(projectId: string): Promise<MemoryResult<Record<string, string>>> {
    return this.locked(projectId, 'list', () => this.load(projectId));
  }

  delete(projectId: string, key: string): Promise<MemoryResult<boolean>> {
    return this.locked(projectId, 'delete', async () => {
      const entries = await this.load(projectId);
      if (!Object.hasOwn(entries, key)) return false;
      delete entries[key];
      await this.store(projectId, entries);
      return true;
    });
  }

  clearProject(projectId: string): Promise<MemoryResult<void>> {
    return this.locked(projectId, 'clear', () => rm(this.fileFor(projectId), { force: true }));
  }
}
