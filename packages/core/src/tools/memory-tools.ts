import { z } from 'zod';
import { toolFailure, toolSuccess } from '@loomwork/shared';
import { defineTool, memoryKey, requiredString } from './args.js';
import type { RegisteredTool } from './types.js';

const keyProperty = {
  type: 'string',
  description: 'Memory key: starts with a letter; letters, digits, _ and - only; at most 100 characters',
} as const;

export function createMemoryTools(): RegisteredTool[] {
  return [
    defineTool({
      definition: {
        name: 'save_memory',
        description: 'Remember a fact about this project across sessions. Saving an existing key overwrites it.',
        input_schema: {
          type: 'object',
          properties: { key: keyProperty, value: { type: 'string', description: 'Value to remember' } },
          required: ['key', 'value'],
        },
      },
      schema: z.object({ key: memoryKey(), value: requiredString('value') }),
      handler: async ({ key, value }, ctx) => {
        const saved = await ctx.memory.save(ctx.projectId, key, value);
        return saved.ok ? toolSuccess(`Memory saved: ${key}`) : toolFailure(`Failed to save memory: ${saved.error.message}`);
      },
    }),

    defineTool({
      definition: {
        name: 'recall_memory',
        description: 'Look up a remembered value by key.',
        input_schema: { type: 'object', properties: { key: keyProperty }, required: ['key'] },
      },
      schema: z.object({ key: memoryKey() }),
      handler: async ({ key }, ctx) => {
        const recalled = await ctx.memory.recall(ctx.projectId, key);
        if (!recalled.ok) return toolFailure(`Failed to recall memory: ${recalled.error.message}`);
        return toolSuccess(recalled.value ?? `No memory found for key: ${key}`);
      },
    }),

    defineTool({
      definition: {
        name: 'list_memories',
        description: 'List everything remembered for this project.',
        input_schema: { type: 'object', properties: {}, required: [] },
      },
      schema: z.object({}),
      handler: async (_args, ctx) => {
        const listed = await ctx.memory.list(ctx.projectId);
        if (!listed.ok) return toolFailure(`Failed to list memories: ${listed.error.message}`);
        const keys = Object.keys(listed.value).sort();
        if (keys.length === 0) return toolSuccess('No memories saved for this project');
        return toolSuccess(keys.map((key) => `• ${key}: ${listed.value[key]}`).join('\n'));
      },
    }),

    defineTool({
      definition: {
        name: 'delete_memory',
        description: 'Forget a remembered value.',
        input_schema: { type: 'object', properties: { key: keyProperty }, required: ['key'] },
      },
      schema: z.object({ key: memoryKey() }),
      handler: async ({ key }, ctx) => {
        const deleted = await ctx.memory.delete(ctx.projectId, key);
        if (!deleted.ok) return toolFailure(`Failed to delete memory: ${deleted.error.message}`);
        return deleted.value ? toolSuccess(`Memory deleted: ${key}`) : toolFailure(`No memory found for key: ${key}`);
      },
    }),

    defineTool({
      definition: {
        name: 'update_memory',
        description: 'Replace the value stored under a key (creates it if missing).',
        input_schema: {
          type: 'object',
          properties: { key: keyProperty, value: { type: 'string', description: 'New value' } },
          required: ['key', 'value'],
        },
      },
      schema: z.object({ key: memoryKey(), value: requiredString('value') }),
      handler: async ({ key, value }, ctx) => {
        const saved = await ctx.memory.save(ctx.projectId, key, value);
        return saved.ok
          ? toolSuccess(`Memory updated: ${key}`)
          : toolFailure(`Failed to update memory: ${saved.error.message}`);
      },
    }),
  ];
}
