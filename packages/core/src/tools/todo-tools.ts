import { z } from 'zod';
import { toolFailure, toolSuccess } from '@loomwork/shared';
import { defineTool, optionalString, requiredString, todoStatus } from './args.js';
import type { RegisteredTool } from './types.js';

// Todos live on the project session; handlers run inside session.run(),
// so reads and writes here never interleave with another turn's.
export function createTodoTools(): RegisteredTool[] {
  return [
    defineTool({
      definition: {
        name: 'create_todo',
        description: 'Add an item to the task list for the current session.',
        input_schema: {
          type: 'object',
          properties: {
            title: { type: 'string', description: 'Short title' },
            description: { type: 'string', description: 'Optional details' },
          },
          required: ['title'],
        },
      },
      schema: z.object({ title: requiredString('title'), description: optionalString('description') }),
      handler: async ({ title, description }, ctx) => {
        const todo = ctx.session.todos.create(title, description);
        ctx.callbacks.onTodoCreated?.(todo);
        return toolSuccess(`Created todo ${todo.id}: ${todo.title}`);
      },
    }),

    defineTool({
      definition: {
        name: 'update_todo',
        description: 'Change the status of a todo.',
        input_schema: {
          type: 'object',
          properties: {
            todo_id: { type: 'string', description: 'Id returned by create_todo' },
            status: {
              type: 'string',
              description: 'New status',
              enum: ['pending', 'in_progress', 'completed'],
            },
          },
          required: ['todo_id', 'status'],
        },
      },
      schema: z.object({ todo_id: requiredString('todo_id'), status: todoStatus() }),
      handler: async ({ todo_id, status }, ctx) => {
        const todo = ctx.session.todos.update(todo_id, status);
        if (!todo) return toolFailure(`Todo not found: ${todo_id}`);
        ctx.callbacks.onTodoUpdated?.(todo);
        return toolSuccess(`Updated todo ${todo.id} to ${todo.status}`);
      },
    }),

    defineTool({
      definition: {
        name: 'list_todos',
        description: 'List the todos of the current session in creation order.',
        input_schema: { type: 'object', properties: {}, required: [] },
      },
      schema: z.object({}),
      handler: async (_args, ctx) => {
        const todos = ctx.session.todos.list();
        if (todos.length === 0) return toolSuccess('No todos for this project');
        return toolSuccess(
          todos
            .map((todo) => `[${todo.status}] ${todo.id}: ${todo.title}${todo.description ? ` - ${todo.description}` : ''}`)
            .join('\n'),
        );
      },
    }),
  ];
}
