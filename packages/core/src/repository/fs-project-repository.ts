/**
 * ProjectRepository over the local filesystem. Each project lives in
 * `<rootDir>/<projectId>/`; every resolved path must stay inside it.
 */
import { cp, mkdir, readFile, readdir, rename, rm, stat, writeFile } from 'node:fs/promises';
import { dirname, join, normalize, relative, resolve, sep } from 'node:path';
import { err, errorMessage, logger, ok, repositoryFailure, type RepositoryFailure, type Result } from '@loomwork/shared';
import { KeyedSerialQueue } from '../session/serial-queue.js';
import { optionalPathMatcher } from '../tools/glob.js';
import {
  compareTreeNodes,
  countOccurrences,
  extensionOf,
  flattenFiles,
  type FileTreeNode,
  type ProjectRepository,
  type RepoResult,
  type SearchReplaceSummary,
} from './project-repository.js';

const log = logger.child({ module: 'fs-project-repository' });

function fail(message: string): Result<never, RepositoryFailure> {
  return err(repositoryFailure(message));
}

function errnoCode(error: unknown): string | undefined {
  if (error instanceof Error && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}

function fsFailure(error: unknown, path: string): Result<never, RepositoryFailure> {
  switch (errnoCode(error)) {
    case 'ENOENT':
      return fail(`File not found: ${path}`);
    case 'EEXIST':
      return fail(`File already exists: ${path}`);
    case 'EISDIR':
      return fail(`Path is a folder: ${path}`);
    case 'ENOTDIR':
      return fail(`Not a folder: ${path}`);
    default:
      return fail(errorMessage(error));
  }
}

async function pathExists(absolute: string): Promise<boolean> {
  try {
    await stat(absolute);
    return true;
  } catch (error) {
    if (errnoCode(error) === 'ENOENT') return false;
    throw error;
  }
}

export class FsProjectRepository implements ProjectRepository {
  private readonly rootDir: string;
  private readonly writes = new KeyedSerialQueue();

  constructor(rootDir: string) {
    this.rootDir = resolve(rootDir);
  }

  /** Absolute path of a project-relative path, or undefined when it would escape the project. */
  resolvePath(projectId: string, path: string): string | undefined {
    const base = resolve(this.rootDir, projectId);
    if (relative(this.rootDir, base).startsWith('..')) return undefined;
    const target = resolve(base, normalize(path || '.'));
    return target === base || target.startsWith(base + sep) ? target : undefined;
  }

  private toRelative(projectId: string, absolute: string): string {
    return relative(resolve(this.rootDir, projectId), absolute).split(sep).join('/');
  }

  /** Resolve and run `fn` on the absolute path, turning thrown fs errors into failures. */
  private async withPath<T>(
    projectId: string,
    path: string,
    fn: (absolute: string) => Promise<RepoResult<T>>,
  ): Promise<RepoResult<T>> {
    const absolute = this.resolvePath(projectId, path);
    if (!absolute) return fail(`Path escapes project root: ${path}`);
    try {
      return await fn(absolute);
    } catch (error) {
      log.warn({ err: error, projectId, path }, 'filesystem operation failed');
      return fsFailure(error, path);
    }
  }

  private serialized<T>(projectId: string, path: string, fn: () => Promise<RepoResult<T>>): Promise<RepoResult<T>> {
    return this.writes.run(`${projectId}\u0000${path}`, fn);
  }

  readFile(projectId: string, path: string): Promise<RepoResult<string>> {
    return this.withPath(projectId, path, async (absolute) => ok(await readFile(absolute, 'utf-8')));
  }

  writeFile(projectId: string, path: string, content: string): Promise<RepoResult<void>> {
    return this.serialized(projectId, path, () =>
      this.withPath(projectId, path, async (absolute) => {
        await mkdir(dirname(absolute), { recursive: true });
        await writeFile(absolute, content, 'utf-8');
        return ok(undefined);
      }),
    );
  }

  createFile(projectId: string, path: string, content: string): Promise<RepoResult<void>> {
    return this.serialized(projectId, path, () =>
      this.withPath(projectId, path, async (absolute) => {
        await mkdir(dirname(absolute), { recursive: true });
        await writeFile(absolute, content, { encoding: 'utf-8', flag: 'wx' });
        return ok(undefined);
      }),
    );
  }

  deleteFile(projectId: string, path: string): Promise<RepoResult<void>> {
    return this.serialized(projectId, path, () =>
      this.withPath(projectId, path, async (absolute) => {
        if (!(await pathExists(absolute))) return fail(`File not found: ${path}`);
        await rm(absolute, { recursive: true });
        return ok(undefined);
      }),
    );
  }

  private relocate(
    projectId: string,
    from: string,
    to: string,
    op: (source: string, destination: string) => Promise<void>,
  ): Promise<RepoResult<void>> {
    return this.serialized(projectId, to, () =>
      this.withPath(projectId, from, (source) =>
        this.withPath(projectId, to, async (destination) => {
          if (!(await pathExists(source))) return fail(`File not found: ${from}`);
          if (await pathExists(destination)) return fail(`File already exists: ${to}`);
          await mkdir(dirname(destination), { recursive: true });
          await op(source, destination);
          return ok(undefined);
        }),
      ),
    );
  }

  renameFile(projectId: string, oldPath: string, newPath: string): Promise<RepoResult<void>> {
    return this.relocate(projectId, oldPath, newPath, rename);
  }

  copyFile(projectId: string, sourcePath: string, destinationPath: string): Promise<RepoResult<void>> {
    return this.relocate(projectId, sourcePath, destinationPath, (source, destination) =>
      cp(source, destination, { recursive: true, errorOnExist: true, force: false }),
    );
  }

  moveFile(projectId: string, sourcePath: string, destinationPath: string): Promise<RepoResult<void>> {
    return this.relocate(projectId, sourcePath, destinationPath, rename);
  }

  createFolder(projectId: string, path: string): Promise<RepoResult<void>> {
    return this.withPath(projectId, path, async (absolute) => {
      if (await pathExists(absolute)) return fail(`Folder already exists: ${path}`);
      await mkdir(absolute, { recursive: true });
      return ok(undefined);
    });
  }

  private async walk(projectId: string, absolute: string): Promise<FileTreeNode[]> {
    const entries = await readdir(absolute, { withFileTypes: true });
    const nodes: FileTreeNode[] = [];
    for (const entry of entries) {
      if (entry.name.startsWith('.')) continue;
      const child = join(absolute, entry.name);
      const path = this.toRelative(projectId, child);
      if (entry.isDirectory()) {
        nodes.push({ type: 'folder', name: entry.name, path, children: await this.walk(projectId, child) });
      } else if (entry.isFile()) {
        const info = await stat(child);
        nodes.push({ type: 'file', name: entry.name, path, extension: extensionOf(entry.name), size: info.size });
      }
    }
    return nodes.sort(compareTreeNodes);
  }

  async getFileTree(projectId: string, path = ''): Promise<RepoResult<FileTreeNode[]>> {
    const projectDir = this.resolvePath(projectId, '');
    if (projectDir && !path) {
      await mkdir(projectDir, { recursive: true }).catch((error: unknown) => {
        log.warn({ err: error, projectId }, 'could not create project folder');
      });
    }
    return this.withPath(projectId, path, async (absolute) => ok(await this.walk(projectId, absolute)));
  }

  async searchAndReplace(
    projectId: string,
    search: string,
    replace: string,
    filePattern: string | undefined,
    dryRun: boolean,
  ): Promise<RepoResult<SearchReplaceSummary>> {
    if (!search) return fail('Search text must not be empty');
    const tree = await this.getFileTree(projectId);
    if (!tree.ok) return tree;

    const matches = optionalPathMatcher(filePattern);
    const summary: SearchReplaceSummary = { filesModified: 0, totalReplacements: 0, files: [] };

    for (const file of flattenFiles(tree.value)) {
      if (!matches(file.path)) continue;
      const content = await this.readFile(projectId, file.path);
      if (!content.ok) return content;
      const occurrences = countOccurrences(content.value, search);
      if (occurrences === 0) continue;
      if (!dryRun) {
        const written = await this.writeFile(projectId, file.path, content.value.split(search).join(replace));
        if (!written.ok) return written;
      }
      summary.files.push({ path: file.path, occurrences });
      summary.filesModified++;
      summary.totalReplacements += occurrences;
    }
    return ok(summary);
  }

  patchFile(projectId: string, path: string, oldContent: string, newContent: string): Promise<RepoResult<void>> {
    return this.serialized(projectId, path, () =>
      this.withPath(projectId, path, async (absolute) => {
        const content = await readFile(absolute, 'utf-8');
        if (!oldContent || !content.includes(oldContent)) return fail(`Content not found in file: ${path}`);
        await writeFile(absolute, content.split(oldContent).join(newContent), 'utf-8');
        return ok(undefined);
      }),
    );
  }
}
