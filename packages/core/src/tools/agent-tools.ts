import { z } from 'zod';
import { toolSuccess } from '@loomwork/shared';
import { defineTool, requiredString } from './args.js';
import type { RegisteredTool } from './types.js';

export const NO_ANSWER = 'User did not provide an answer';

function isStringArray(value: unknown): value is string[] {
  return Array.isArray(value) && value.every((item) => typeof item === 'string');
}

/** Options as a comma-separated string or a string array. */
function answerOptions() {
  return z.unknown().transform((value, ctx): string[] | undefined => {
    if (value === undefined || value === null) return undefined;
    const raw: unknown = typeof value === 'string' ? value.split(',') : value;
    if (!isStringArray(raw)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: 'Invalid argument: options (must be a comma-separated string)',
      });
      return z.NEVER;
    }
    const options = raw.map((item) => item.trim()).filter((item) => item.length > 0);
    return options.length > 0 ? options : undefined;
  });
}

export function createAgentTools(): RegisteredTool[] {
  return [
    defineTool({
      definition: {
        name: 'ask_user',
        description: 'Ask the user a question and wait for the answer. Use only when you cannot proceed without it.',
        input_schema: {
          type: 'object',
          properties: {
            question: { type: 'string', description: 'The question' },
            options: { type: 'string', description: 'Optional comma-separated answer choices' },
          },
          required: ['question'],
        },
      },
      schema: z.object({ question: requiredString('question'), options: answerOptions() }),
      handler: async ({ question, options }, ctx) => {
        if (!ctx.callbacks.askUser) {
          const choices = options ? `\nOptions: ${options.join(', ')}` : '';
          return toolSuccess(`Question for user: ${question}${choices}`);
        }
        const answer = await ctx.callbacks.askUser(question, options);
        return toolSuccess(answer ?? NO_ANSWER);
      },
    }),

    defineTool({
      definition: {
        name: 'finish_task',
        description: 'Signal that the task is complete. Ends the agent loop after this turn.',
        input_schema: {
          type: 'object',
          properties: { summary: { type: 'string', description: 'What was done' } },
          required: ['summary'],
        },
      },
      schema: z.object({ summary: requiredString('summary') }),
      handler: async ({ summary }, ctx) => {
        ctx.callbacks.onTaskFinished?.(summary);
        return toolSuccess(`Task completed: ${summary}`);
      },
    }),
  ];
}
