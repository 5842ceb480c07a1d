import { err, ok, repositoryFailure, type RepositoryFailure, type Result } from '@loomwork/shared';
import { optionalPathMatcher } from '../tools/glob.js';
import {
  compareTreeNodes,
  countOccurrences,
  extensionOf,
  type FileTreeNode,
  type FolderNode,
  type ProjectRepository,
  type RepoResult,
  type SearchReplaceSummary,
} from './project-repository.js';

interface ProjectFiles {
  files: Map<string, string>;
  folders: Set<string>;
}

function parentOf(path: string): string {
  const slash = path.lastIndexOf('/');
  return slash === -1 ? '' : path.slice(0, slash);
}

function nameOf(path: string): string {
  return path.slice(path.lastIndexOf('/') + 1);
}

function isHidden(path: string): boolean {
  return path.split('/').some((segment) => segment.startsWith('.'));
}

function fail(message: string): Result<never, RepositoryFailure> {
  return err(repositoryFailure(message));
}

/**
 * ProjectRepository held entirely in memory. Used by tests and by hosts
 * that keep project files in their own store.
 */
export class InMemoryProjectRepository implements ProjectRepository {
  private readonly projects = new Map<string, ProjectFiles>();

  /** Seed a project with files (paths relative, `/`-separated). */
  seed(projectId: string, files: Record<string, string>): void {
    const project = this.project(projectId);
    for (const [path, content] of Object.entries(files)) {
      project.files.set(path, content);
      this.ensureFolders(project, parentOf(path));
    }
  }

  /** Current content of a file, bypassing the Result API. */
  peek(projectId: string, path: string): string | undefined {
    return this.projects.get(projectId)?.files.get(path);
  }

  private project(projectId: string): ProjectFiles {
    let project = this.projects.get(projectId);
    if (!project) {
      project = { files: new Map(), folders: new Set() };
      this.projects.set(projectId, project);
    }
    return project;
  }

  private ensureFolders(project: ProjectFiles, folder: string): void {
    let current = folder;
    while (current) {
      project.folders.add(current);
      current = parentOf(current);
    }
  }

  private exists(project: ProjectFiles, path: string): boolean {
    return path === '' || project.files.has(path) || project.folders.has(path);
  }

  async readFile(projectId: string, path: string): Promise<RepoResult<string>> {
    const content = this.project(projectId).files.get(path);
    return content === undefined ? fail(`File not found: ${path}`) : ok(content);
  }

  async writeFile(projectId: string, path: string, content: string): Promise<RepoResult<void>> {
    const project = this.project(projectId);
    if (path === '' || project.folders.has(path)) return fail(`Path is a folder: ${path || '.'}`);
    project.files.set(path, content);
    this.ensureFolders(project, parentOf(path));
    return ok(undefined);
  }

  async createFile(projectId: string, path: string, content: string): Promise<RepoResult<void>> {
    const project = this.project(projectId);
    if (this.exists(project, path)) return fail(`File already exists: ${path}`);
    return this.writeFile(projectId, path, content);
  }

  async deleteFile(projectId: string, path: string): Promise<RepoResult<void>> {
    const project = this.project(projectId);
    if (project.files.delete(path)) return ok(undefined);
    if (!project.folders.has(path)) return fail(`File not found: ${path}`);
    const prefix = `${path}/`;
    project.folders.delete(path);
    for (const folder of [...project.folders]) {
      if (folder.startsWith(prefix)) project.folders.delete(folder);
    }
    for (const file of [...project.files.keys()]) {
      if (file.startsWith(prefix)) project.files.delete(file);
    }
    return ok(undefined);
  }

  private relocate(projectId: string, from: string, to: string, keepSource: boolean): RepoResult<void> {
    const project = this.project(projectId);
    if (!this.exists(project, from)) return fail(`File not found: ${from}`);
    if (this.exists(project, to)) return fail(`File already exists: ${to}`);

    const content = project.files.get(from);
    if (content !== undefined) {
      project.files.set(to, content);
      if (!keepSource) project.files.delete(from);
      this.ensureFolders(project, parentOf(to));
      return ok(undefined);
    }

    const prefix = `${from}/`;
    for (const [file, data] of [...project.files]) {
      if (!file.startsWith(prefix)) continue;
      project.files.set(to + file.slice(from.length), data);
      if (!keepSource) project.files.delete(file);
    }
    for (const folder of [...project.folders]) {
      if (folder !== from && !folder.startsWith(prefix)) continue;
      project.folders.add(to + folder.slice(from.length));
      if (!keepSource) project.folders.delete(folder);
    }
    this.ensureFolders(project, parentOf(to));
    return ok(undefined);
  }

  async renameFile(projectId: string, oldPath: string, newPath: string): Promise<RepoResult<void>> {
    return this.relocate(projectId, oldPath, newPath, false);
  }

  async copyFile(projectId: string, sourcePath: string, destinationPath: string): Promise<RepoResult<void>> {
    return this.relocate(projectId, sourcePath, destinationPath, true);
  }

  async moveFile(projectId: string, sourcePath: string, destinationPath: string): Promise<RepoResult<void>> {
    return this.relocate(projectId, sourcePath, destinationPath, false);
  }

  async createFolder(projectId: string, path: string): Promise<RepoResult<void>> {
    const project = this.project(projectId);
    if (this.exists(project, path)) return fail(`Folder already exists: ${path}`);
    this.ensureFolders(project, path);
    return ok(undefined);
  }

  async getFileTree(projectId: string, path = ''): Promise<RepoResult<FileTreeNode[]>> {
    const project = this.project(projectId);
    if (path && !project.folders.has(path)) return fail(`Folder not found: ${path}`);

    const root: FolderNode = { type: 'folder', name: nameOf(path), path, children: [] };
    const folders = new Map<string, FolderNode>([[path, root]]);
    const inScope = (p: string) => !isHidden(p) && (path === '' || p.startsWith(`${path}/`));

    const folderFor = (folderPath: string): FolderNode => {
      const existing = folders.get(folderPath);
      if (existing) return existing;
      const node: FolderNode = { type: 'folder', name: nameOf(folderPath), path: folderPath, children: [] };
      folders.set(folderPath, node);
      folderFor(parentOf(folderPath)).children.push(node);
      return node;
    };

    for (const folder of [...project.folders].sort()) {
      if (inScope(folder)) folderFor(folder);
    }
    for (const [file, content] of project.files) {
      if (!inScope(file)) continue;
      folderFor(parentOf(file)).children.push({
        type: 'file',
        name: nameOf(file),
        path: file,
        extension: extensionOf(nameOf(file)),
        size: Buffer.byteLength(content, 'utf-8'),
      });
    }

    const sortTree = (nodes: FileTreeNode[]): FileTreeNode[] => {
      nodes.sort(compareTreeNodes);
      for (const node of nodes) if (node.type === 'folder') sortTree(node.children);
      return nodes;
    };
    return ok(sortTree(root.children));
  }

  async searchAndReplace(
    projectId: string,
    search: string,
    replace: string,
    filePattern: string | undefined,
    dryRun: boolean,
  ): Promise<RepoResult<SearchReplaceSummary>> {
    if (!search) return fail('Search text must not be empty');
    const project = this.project(projectId);
    const matches = optionalPathMatcher(filePattern);
    const summary: SearchReplaceSummary = { filesModified: 0, totalReplacements: 0, files: [] };

    for (const [path, content] of [...project.files].sort(([a], [b]) => a.localeCompare(b))) {
      if (isHidden(path) || !matches(path)) continue;
      const occurrences = countOccurrences(content, search);
      if (occurrences === 0) continue;
      summary.files.push({ path, occurrences });
      summary.filesModified++;
      summary.totalReplacements += occurrences;
      if (!dryRun) project.files.set(path, content.split(search).join(replace));
    }
    return ok(summary);
  }

  async patchFile(
    projectId: string,
    path: string,
    oldContent: string,
    newContent: string,
  ): Promise<RepoResult<void>> {
    const project = this.project(projectId);
    const content = project.files.get(path);
    if (content === undefined) return fail(`File not found: ${path}`);
    if (!oldContent || !content.includes(oldContent)) return fail(`Content not found in file: ${path}`);
    project.files.set(path, content.split(oldContent).join(newContent));
    return ok(undefined);
  }
}
