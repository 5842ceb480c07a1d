import { z } from 'zod';
import { toolFailure, toolSuccess } from '@loomwork/shared';
import { flattenFiles } from '../repository/project-repository.js';
import { content, defineTool, flag, optionalString, requiredPath, requiredString } from './args.js';
import { optionalPathMatcher } from './glob.js';
import type { RegisteredTool } from './types.js';

export const MAX_SEARCH_RESULTS = 100;

export function createSearchTools(): RegisteredTool[] {
  return [
    defineTool({
      definition: {
        name: 'search_files',
        description: 'Search file contents for text (case-insensitive). Returns matching lines as path:line: text.',
        input_schema: {
          type: 'object',
          properties: {
            query: { type: 'string', description: 'Text to search for' },
            file_pattern: { type: 'string', description: 'Optional glob limiting which files are searched, e.g. "*.js"' },
          },
          required: ['query'],
        },
      },
      schema: z.object({ query: requiredString('query'), file_pattern: optionalString('file_pattern') }),
      handler: async ({ query, file_pattern }, ctx) => {
        if (query.length === 0) return toolFailure('Search query must not be empty');

        const tree = await ctx.repository.getFileTree(ctx.projectId);
        if (!tree.ok) return toolFailure(`Failed to search files: ${tree.error.message}`);

        const matches = optionalPathMatcher(file_pattern);
        const needle = query.toLowerCase();
        const hits: string[] = [];
        for (const file of flattenFiles(tree.value)) {
          if (!matches(file.path)) continue;
          const read = await ctx.repository.readFile(ctx.projectId, file.path);
          if (!read.ok) continue;
          read.value.split('\n').forEach((line, i) => {
            if (line.toLowerCase().includes(needle)) hits.push(`${file.path}:${i + 1}: ${line.trim()}`);
          });
        }

        if (hits.length === 0) return toolSuccess(`No matches found for: ${query}`);
        const shown = hits.slice(0, MAX_SEARCH_RESULTS);
        if (hits.length > shown.length) shown.push(`... (${hits.length - shown.length} more matches)`);
        return toolSuccess(shown.join('\n'));
      },
    }),

    defineTool({
      definition: {
        name: 'search_replace',
        description:
          'Replace every occurrence of a literal string across project files. Use dry_run to preview the affected files first.',
        input_schema: {
          type: 'object',
          properties: {
            search: { type: 'string', description: 'Literal text to find' },
            replace: { type: 'string', description: 'Replacement text (may be empty)' },
            file_pattern: { type: 'string', description: 'Optional glob limiting which files are changed' },
            dry_run: { type: 'boolean', description: 'Report what would change without writing (default false)' },
          },
          required: ['search', 'replace'],
        },
      },
      schema: z.object({
        search: requiredString('search'),
        replace: requiredString('replace'),
        file_pattern: optionalString('file_pattern'),
        dry_run: flag('dry_run', false),
      }),
      handler: async ({ search, replace, file_pattern, dry_run }, ctx) => {
        const preview = await ctx.repository.searchAndReplace(ctx.projectId, search, replace, file_pattern, true);
        if (!preview.ok) return toolFailure(`Failed to search and replace: ${preview.error.message}`);
        if (preview.value.totalReplacements === 0) return toolSuccess(`No occurrences of '${search}' found`);

        const rows = preview.value.files.map((file) => `  ${file.path}: ${file.occurrences}`);
        const counts = `${preview.value.totalReplacements} occurrence(s) in ${preview.value.filesModified} file(s)`;
        if (dry_run) return toolSuccess([`[dry run] Would replace ${counts}`, ...rows].join('\n'));

        const before = new Map<string, string>();
        for (const file of preview.value.files) {
          const read = await ctx.repository.readFile(ctx.projectId, file.path);
          if (read.ok) before.set(file.path, read.value);
        }

        const applied = await ctx.repository.searchAndReplace(ctx.projectId, search, replace, file_pattern, false);
        if (!applied.ok) return toolFailure(`Failed to search and replace: ${applied.error.message}`);

        for (const file of applied.value.files) {
          const oldContent = before.get(file.path);
          ctx.callbacks.onFileChanged?.({
            path: file.path,
            changeType: 'modified',
            oldContent,
            newContent: oldContent?.split(search).join(replace),
          });
        }
        const appliedRows = applied.value.files.map((file) => `  ${file.path}: ${file.occurrences}`);
        return toolSuccess(
          [
            `Replaced ${applied.value.totalReplacements} occurrence(s) in ${applied.value.filesModified} file(s)`,
            ...appliedRows,
          ].join('\n'),
        );
      },
    }),

    defineTool({
      definition: {
        name: 'patch_file',
        description:
          'Replace an exact block of text in one file. old_content must match the file exactly, including whitespace.',
        input_schema: {
          type: 'object',
          properties: {
            path: { type: 'string', description: 'File path relative to the project root' },
            old_content: { type: 'string', description: 'Exact text to replace' },
            new_content: { type: 'string', description: 'Replacement text' },
          },
          required: ['path', 'old_content', 'new_content'],
        },
      },
      schema: z.object({
        path: requiredPath('path'),
        old_content: content('old_content'),
        new_content: content('new_content'),
      }),
      handler: async ({ path, old_content, new_content }, ctx) => {
        if (old_content.length === 0) return toolFailure('Failed to patch file: old_content must not be empty');

        const before = await ctx.repository.readFile(ctx.projectId, path);
        const patched = await ctx.repository.patchFile(ctx.projectId, path, old_content, new_content);
        if (!patched.ok) return toolFailure(`Failed to patch file: ${patched.error.message}`);

        if (before.ok) {
          ctx.callbacks.onFileChanged?.({
            path,
            changeType: 'modified',
            oldContent: before.value,
            newContent: before.value.split(old_content).join(new_content),
          });
        }
        return toolSuccess(`File patched successfully: ${path}`);
      },
    }),
  ];
}
