import type { RepositoryFailure, Result } from '@loomwork/shared';

export type RepoResult<T> = Result<T, RepositoryFailure>;

export interface FileNode {
  type: 'file';
  name: string;
  /** Project-relative, `/`-separated */
  path: string;
  extension: string;
  size: number;
}

export interface FolderNode {
  type: 'folder';
  name: string;
  path: string;
  children: FileTreeNode[];
}

export type FileTreeNode = FileNode | FolderNode;

export interface ReplacementFile {
  path: string;
  occurrences: number;
}

export interface SearchReplaceSummary {
  filesModified: number;
  totalReplacements: number;
  files: ReplacementFile[];
}

/**
 * Sandboxed file tree of one project. Paths are project-relative and
 * already validated by the caller. Every method reports failure as a
 * RepositoryFailure value; none throws.
 *
 * Implementations serialize writes per path; callers do not lock.
 */
export interface ProjectRepository {
  readFile(projectId: string, path: string): Promise<RepoResult<string>>;
  /** Create or overwrite; parent folders are created as needed. */
  writeFile(projectId: string, path: string, content: string): Promise<RepoResult<void>>;
  /** Fails when the file already exists. */
  createFile(projectId: string, path: string, content: string): Promise<RepoResult<void>>;
  deleteFile(projectId: string, path: string): Promise<RepoResult<void>>;
  /** Fails when the source is missing or the destination exists. */
  renameFile(projectId: string, oldPath: string, newPath: string): Promise<RepoResult<void>>;
  copyFile(projectId: string, sourcePath: string, destinationPath: string): Promise<RepoResult<void>>;
  moveFile(projectId: string, sourcePath: string, destinationPath: string): Promise<RepoResult<void>>;
  /** Fails when the folder already exists. */
  createFolder(projectId: string, path: string): Promise<RepoResult<void>>;
  /**
   * Tree of the project (or of `path` beneath it). Dotfiles are skipped;
   * folders sort before files, then by case-insensitive name.
   */
  getFileTree(projectId: string, path?: string): Promise<RepoResult<FileTreeNode[]>>;
  searchAndReplace(
    projectId: string,
    search: string,
    replace: string,
    filePattern: string | undefined,
    dryRun: boolean,
  ): Promise<RepoResult<SearchReplaceSummary>>;
  /** Replace every occurrence of `oldContent`; fails when it does not occur. */
  patchFile(projectId: string, path: string, oldContent: string, newContent: string): Promise<RepoResult<void>>;
}

// ---------------------------------------------------------------------------
// Tree helpers shared by implementations and tools
// ---------------------------------------------------------------------------

export function extensionOf(name: string): string {
  const dot = name.lastIndexOf('.');
  return dot > 0 ? name.slice(dot + 1).toLowerCase() : '';
}

export function compareTreeNodes(a: FileTreeNode, b: FileTreeNode): number {
  if (a.type !== b.type) return a.type === 'folder' ? -1 : 1;
  const an = a.name.toLowerCase();
  const bn = b.name.toLowerCase();
  return an < bn ? -1 : an > bn ? 1 : 0;
}

/** Depth-first list of every file in a tree. */
export function flattenFiles(nodes: FileTreeNode[]): FileNode[] {
  return nodes.flatMap((node) => (node.type === 'file' ? [node] : flattenFiles(node.children)));
}

export function countOccurrences(haystack: string, needle: string): number {
  if (!needle) return 0;
  let count = 0;
  let from = haystack.indexOf(needle);
  while (from !== -1) {
    count++;
    from = haystack.indexOf(needle, from + needle.length);
  }
  return count;
}
