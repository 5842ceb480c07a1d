import { z } from 'zod';
import { toolFailure, toolSuccess, type FileChangeEvent } from '@loomwork/shared';
import { flattenFiles, extensionOf, type FileTreeNode } from '../repository/project-repository.js';
import { content, defineTool, optionalPath, requiredInteger, requiredPath, requiredString } from './args.js';
import { createPathMatcher } from './glob.js';
import { diffLines, formatDiff } from './line-diff.js';
import { renderTree } from './tree-format.js';
import type { RegisteredTool, ToolContext } from './types.js';

/** Paths delete_file refuses, after normalization ('' is the project root). */
export const PROTECTED_PATHS: ReadonlySet<string> = new Set([
  '',
  'src',
  'app',
  'lib',
  'node_modules',
  '.git',
  '.github',
  'build',
  'dist',
  'out',
]);

function notify(ctx: ToolContext, event: FileChangeEvent): void {
  ctx.callbacks.onFileChanged?.(event);
}

async function currentContent(ctx: ToolContext, path: string): Promise<string | undefined> {
  const result = await ctx.repository.readFile(ctx.projectId, path);
  return result.ok ? result.value : undefined;
}

function splitFileLines(text: string): string[] {
  return text.length === 0 ? [] : text.split('\n');
}

// ---------------------------------------------------------------------------
// Basic file operations
// ---------------------------------------------------------------------------

function createBasicFileTools(): RegisteredTool[] {
  return [
    defineTool({
      definition: {
        name: 'read_file',
        description: 'Read the full contents of a file in the project.',
        input_schema: {
          type: 'object',
          properties: {
            path: { type: 'string', description: 'File path relative to the project root' },
          },
          required: ['path'],
        },
      },
      schema: z.object({ path: requiredPath('path') }),
      handler: async ({ path }, ctx) => {
        const result = await ctx.repository.readFile(ctx.projectId, path);
        return result.ok ? toolSuccess(result.value) : toolFailure(`Failed to read file: ${result.error.message}`);
      },
    }),

    defineTool({
      definition: {
        name: 'write_file',
        description: 'Create a file or overwrite an existing one with the given content.',
        input_schema: {
          type: 'object',
          properties: {
            path: { type: 'string', description: 'File path relative to the project root' },
            content: { type: 'string', description: 'Complete new content of the file' },
          },
          required: ['path', 'content'],
        },
      },
      schema: z.object({ path: requiredPath('path'), content: content('content') }),
      handler: async ({ path, content: text }, ctx) => {
        const before = await currentContent(ctx, path);

        if (before === undefined) {
          const created = await ctx.repository.createFile(ctx.projectId, path, text);
          if (created.ok) {
            notify(ctx, { path, changeType: 'created', newContent: text });
            return toolSuccess(`File created and written successfully: ${path}`);
          }
        }

        const written = await ctx.repository.writeFile(ctx.projectId, path, text);
        if (!written.ok) return toolFailure(`Failed to write file: ${written.error.message}`);
        notify(ctx, { path, changeType: 'modified', oldContent: before, newContent: text });
        return toolSuccess(`File updated successfully: ${path}`);
      },
    }),

    defineTool({
      definition: {
        name: 'list_files',
        description: 'List files and folders as a tree. Hidden files are not shown.',
        input_schema: {
          type: 'object',
          properties: {
            path: { type: 'string', description: 'Folder to list; omit or use "." for the project root' },
          },
          required: [],
        },
      },
      schema: z.object({ path: optionalPath('path') }),
      handler: async ({ path }, ctx) => {
        const tree = await ctx.repository.getFileTree(ctx.projectId, path);
        if (!tree.ok) return toolFailure(`Failed to list files: ${tree.error.message}`);
        if (tree.value.length === 0) return toolSuccess('Directory is empty');
        return toolSuccess(renderTree(tree.value).join('\n'));
      },
    }),

    defineTool({
      definition: {
        name: 'delete_file',
        description: 'Delete a file or folder. Top-level source and build folders cannot be deleted.',
        input_schema: {
          type: 'object',
          properties: {
            path: { type: 'string', description: 'Path of the file or folder to delete' },
          },
          required: ['path'],
        },
      },
      schema: z.object({ path: requiredPath('path') }),
      handler: async ({ path }, ctx) => {
        if (PROTECTED_PATHS.has(path)) {
          return toolFailure(`Cannot delete protected path: ${path || '.'}`);
        }
        const before = await currentContent(ctx, path);
        const deleted = await ctx.repository.deleteFile(ctx.projectId, path);
        if (!deleted.ok) return toolFailure(`Failed to delete file: ${deleted.error.message}`);
        notify(ctx, { path, changeType: 'deleted', oldContent: before });
        return toolSuccess(`File deleted successfully: ${path}`);
      },
    }),

    defineTool({
      definition: {
        name: 'create_folder',
        description: 'Create a folder (and any missing parents).',
        input_schema: {
          type: 'object',
          properties: {
            path: { type: 'string', description: 'Folder path relative to the project root' },
          },
          required: ['path'],
        },
      },
      schema: z.object({ path: requiredPath('path') }),
      handler: async ({ path }, ctx) => {
        const created = await ctx.repository.createFolder(ctx.projectId, path);
        if (!created.ok) return toolFailure(`Failed to create folder: ${created.error.message}`);
        return toolSuccess(`Folder created successfully: ${path}`);
      },
    }),
  ];
}

// ---------------------------------------------------------------------------
// Rename, copy, move
// ---------------------------------------------------------------------------

function createRelocationTools(): RegisteredTool[] {
  const transferSchema = z.object({
    source_path: requiredPath('source_path'),
    destination_path: requiredPath('destination_path'),
  });
  const transferProperties = {
    source_path: { type: 'string', description: 'Existing file path' },
    destination_path: { type: 'string', description: 'New file path; must not exist yet' },
  } as const;

  return [
    defineTool({
      definition: {
        name: 'rename_file',
        description: 'Rename a file or folder.',
        input_schema: {
          type: 'object',
          properties: {
            old_path: { type: 'string', description: 'Current path' },
            new_path: { type: 'string', description: 'New path; must not exist yet' },
          },
          required: ['old_path', 'new_path'],
        },
      },
      schema: z.object({ old_path: requiredPath('old_path'), new_path: requiredPath('new_path') }),
      handler: async ({ old_path, new_path }, ctx) => {
        const before = await currentContent(ctx, old_path);
        const renamed = await ctx.repository.renameFile(ctx.projectId, old_path, new_path);
        if (!renamed.ok) return toolFailure(`Failed to rename file: ${renamed.error.message}`);
        notify(ctx, { path: new_path, changeType: 'renamed', oldContent: before, newContent: before });
        return toolSuccess(`File renamed from '${old_path}' to '${new_path}'`);
      },
    }),

    defineTool({
      definition: {
        name: 'copy_file',
        description: 'Copy a file or folder to a new path.',
        input_schema: { type: 'object', properties: { ...transferProperties }, required: ['source_path', 'destination_path'] },
      },
      schema: transferSchema,
      handler: async ({ source_path, destination_path }, ctx) => {
        const copied = await ctx.repository.copyFile(ctx.projectId, source_path, destination_path);
        if (!copied.ok) return toolFailure(`Failed to copy file: ${copied.error.message}`);
        notify(ctx, {
          path: destination_path,
          changeType: 'copied',
          newContent: await currentContent(ctx, destination_path),
        });
        return toolSuccess(`File copied from '${source_path}' to '${destination_path}'`);
      },
    }),

    defineTool({
      definition: {
        name: 'move_file',
        description: 'Move a file or folder to a new path.',
        input_schema: { type: 'object', properties: { ...transferProperties }, required: ['source_path', 'destination_path'] },
      },
      schema: transferSchema,
      handler: async ({ source_path, destination_path }, ctx) => {
        const before = await currentContent(ctx, source_path);
        const moved = await ctx.repository.moveFile(ctx.projectId, source_path, destination_path);
        if (!moved.ok) return toolFailure(`Failed to move file: ${moved.error.message}`);
        notify(ctx, { path: destination_path, changeType: 'moved', oldContent: before, newContent: before });
        return toolSuccess(`File moved from '${source_path}' to '${destination_path}'`);
      },
    }),
  ];
}

// ---------------------------------------------------------------------------
// Line-level editing and inspection
// ---------------------------------------------------------------------------

function createLineTools(): RegisteredTool[] {
  return [
    defineTool({
      definition: {
        name: 'get_file_info',
        description: 'Get size, line count and type of a file.',
        input_schema: {
          type: 'object',
          properties: { path: { type: 'string', description: 'File path relative to the project root' } },
          required: ['path'],
        },
      },
      schema: z.object({ path: requiredPath('path') }),
      handler: async ({ path }, ctx) => {
        const read = await ctx.repository.readFile(ctx.projectId, path);
        if (!read.ok) return toolFailure(`Failed to get file info: ${read.error.message}`);
        const name = path.slice(path.lastIndexOf('/') + 1);
        return toolSuccess(
          [
            `Path: ${path}`,
            `Size: ${Buffer.byteLength(read.value, 'utf-8')} bytes`,
            `Lines: ${splitFileLines(read.value).length}`,
            `Type: ${extensionOf(name) || 'none'}`,
          ].join('\n'),
        );
      },
    }),

    defineTool({
      definition: {
        name: 'insert_at_line',
        description:
          'Insert content so that it starts at the given 1-based line. 0 or 1 inserts at the top; a number past the end appends.',
        input_schema: {
          type: 'object',
          properties: {
            path: { type: 'string', description: 'File path relative to the project root' },
            line_number: { type: 'integer', description: 'Line the inserted content will start at' },
            content: { type: 'string', description: 'Content to insert' },
          },
          required: ['path', 'line_number', 'content'],
        },
      },
      schema: z.object({
        path: requiredPath('path'),
        line_number: requiredInteger('line_number'),
        content: content('content'),
      }),
      handler: async ({ path, line_number, content: text }, ctx) => {
        const read = await ctx.repository.readFile(ctx.projectId, path);
        if (!read.ok) return toolFailure(`Failed to insert content: ${read.error.message}`);

        const lines = splitFileLines(read.value);
        const at = Math.min(Math.max(line_number - 1, 0), lines.length);
        const updated = [...lines.slice(0, at), ...text.split('\n'), ...lines.slice(at)].join('\n');

        const written = await ctx.repository.writeFile(ctx.projectId, path, updated);
        if (!written.ok) return toolFailure(`Failed to insert content: ${written.error.message}`);
        notify(ctx, { path, changeType: 'modified', oldContent: read.value, newContent: updated });
        return toolSuccess(`Inserted content at line ${at + 1} in ${path}`);
      },
    }),

    defineTool({
      definition: {
        name: 'append_to_file',
        description: 'Append content to the end of an existing file.',
        input_schema: {
          type: 'object',
          properties: {
            path: { type: 'string', description: 'File path relative to the project root' },
            content: { type: 'string', description: 'Content to append' },
          },
          required: ['path', 'content'],
        },
      },
      schema: z.object({ path: requiredPath('path'), content: content('content') }),
      handler: async ({ path, content: text }, ctx) => {
        const read = await ctx.repository.readFile(ctx.projectId, path);
        if (!read.ok) return toolFailure(`Failed to append to file: ${read.error.message}`);

        const separator = read.value === '' || read.value.endsWith('\n') ? '' : '\n';
        const updated = read.value + separator + text;
        const written = await ctx.repository.writeFile(ctx.projectId, path, updated);
        if (!written.ok) return toolFailure(`Failed to append to file: ${written.error.message}`);
        notify(ctx, { path, changeType: 'modified', oldContent: read.value, newContent: updated });
        return toolSuccess(`Appended content to ${path}`);
      },
    }),

    defineTool({
      definition: {
        name: 'read_lines',
        description: 'Read a 1-based, inclusive range of lines from a file. Each line is prefixed with its number.',
        input_schema: {
          type: 'object',
          properties: {
            path: { type: 'string', description: 'File path relative to the project root' },
            start_line: { type: 'integer', description: 'First line to read (1-based)' },
            end_line: { type: 'integer', description: 'Last line to read (inclusive)' },
          },
          required: ['path', 'start_line', 'end_line'],
        },
      },
      schema: z.object({
        path: requiredPath('path'),
        start_line: requiredInteger('start_line', 1),
        end_line: requiredInteger('end_line', 1),
      }),
      handler: async ({ path, start_line, end_line }, ctx) => {
        const read = await ctx.repository.readFile(ctx.projectId, path);
        if (!read.ok) return toolFailure(`Failed to read file: ${read.error.message}`);

        const lines = splitFileLines(read.value);
        if (start_line > lines.length) {
          return toolFailure(`Invalid line range: ${path} has ${lines.length} lines`);
        }
        if (end_line < start_line) {
          return toolFailure(`Invalid line range: end_line (${end_line}) is before start_line (${start_line})`);
        }
        const last = Math.min(end_line, lines.length);
        const rows: string[] = [];
        for (let n = start_line; n <= last; n++) {
          rows.push(`${n}: ${lines[n - 1]}`);
        }
        return toolSuccess(rows.join('\n'));
      },
    }),

    defineTool({
      definition: {
        name: 'diff_files',
        description: 'Compare two files line by line (by position) and list the differing lines.',
        input_schema: {
          type: 'object',
          properties: {
            path1: { type: 'string', description: 'First file' },
            path2: { type: 'string', description: 'Second file' },
          },
          required: ['path1', 'path2'],
        },
      },
      schema: z.object({ path1: requiredPath('path1'), path2: requiredPath('path2') }),
      handler: async ({ path1, path2 }, ctx) => {
        const [first, second] = await Promise.all([
          ctx.repository.readFile(ctx.projectId, path1),
          ctx.repository.readFile(ctx.projectId, path2),
        ]);
        if (!first.ok) return toolFailure(`Failed to read file: ${first.error.message}`);
        if (!second.ok) return toolFailure(`Failed to read file: ${second.error.message}`);
        return toolSuccess(formatDiff(diffLines(first.value, second.value)));
      },
    }),
  ];
}

// ---------------------------------------------------------------------------
// Discovery
// ---------------------------------------------------------------------------

function summarize(tree: FileTreeNode[]): string {
  const files = flattenFiles(tree);
  let folders = 0;
  const countFolders = (nodes: FileTreeNode[]) => {
    for (const node of nodes) {
      if (node.type === 'folder') {
        folders++;
        countFolders(node.children);
      }
    }
  };
  countFolders(tree);

  const byType = new Map<string, number>();
  for (const file of files) {
    const type = file.extension || '(none)';
    byType.set(type, (byType.get(type) ?? 0) + 1);
  }
  const types = [...byType.entries()]
    .sort(([a, an], [b, bn]) => bn - an || a.localeCompare(b))
    .map(([type, count]) => `  ${type}: ${count}`);
  const totalSize = files.reduce((sum, file) => sum + file.size, 0);

  return [
    'Project summary',
    `Files: ${files.length}`,
    `Folders: ${folders}`,
    `Total size: ${totalSize} bytes`,
    '',
    'File types:',
    ...(types.length > 0 ? types : ['  (no files)']),
    '',
    'Structure:',
    ...(tree.length > 0 ? renderTree(tree) : ['(empty)']),
  ].join('\n');
}

function createDiscoveryTools(): RegisteredTool[] {
  return [
    defineTool({
      definition: {
        name: 'find_files',
        description:
          'Find files by glob pattern. "*" matches within one folder, "**" across folders. A pattern without "/" is matched against file names (e.g. "*.css").',
        input_schema: {
          type: 'object',
          properties: {
            pattern: { type: 'string', description: 'Glob pattern, e.g. "*.html" or "src/**/*.js"' },
            path: { type: 'string', description: 'Folder to search in; defaults to the project root' },
          },
          required: ['pattern'],
        },
      },
      schema: z.object({ pattern: requiredString('pattern'), path: optionalPath('path') }),
      handler: async ({ pattern, path }, ctx) => {
        const tree = await ctx.repository.getFileTree(ctx.projectId, path);
        if (!tree.ok) return toolFailure(`Failed to find files: ${tree.error.message}`);
        const matches = createPathMatcher(pattern.trim());
        const found = flattenFiles(tree.value)
          .map((file) => file.path)
          .filter(matches);
        return toolSuccess(found.length > 0 ? found.join('\n') : `No files found matching: ${pattern}`);
      },
    }),

    defineTool({
      definition: {
        name: 'get_project_summary',
        description: 'Overview of the project: file and folder counts, file types and the folder structure.',
        input_schema: { type: 'object', properties: {}, required: [] },
      },
      schema: z.object({}),
      handler: async (_args, ctx) => {
        const tree = await ctx.repository.getFileTree(ctx.projectId);
        if (!tree.ok) return toolFailure(`Failed to summarize project: ${tree.error.message}`);
        return toolSuccess(summarize(tree.value));
      },
    }),
  ];
}

export function createFileTools(): RegisteredTool[] {
  return [
    ...createBasicFileTools(),
    ...createRelocationTools(),
    ...createLineTools(),
    ...createDiscoveryTools(),
  ];
}
