/**
 * Argument schemas shared by the tool definitions. Messages produced here
 * are the ones the model sees, so they name the argument.
 */
import { posix } from 'node:path';
import { z } from 'zod';
import { TODO_STATUSES, err, ok, type EngineError, type Result, type ToolResult } from '@loomwork/shared';
import type { RegisteredTool, ToolSpec } from './types.js';

export const MAX_PATH_LENGTH = 500;
export const MAX_CONTENT_LENGTH = 1_000_000;
export const MAX_MEMORY_KEY_LENGTH = 100;

const MEMORY_KEY = /^[a-zA-Z][a-zA-Z0-9_-]*$/;

export function missingArgument(name: string): string {
  return `Missing required argument: ${name}`;
}

function isAbsent(value: unknown): boolean {
  return value === undefined || value === null;
}

// ---------------------------------------------------------------------------
// Primitive arguments
// ---------------------------------------------------------------------------

export function requiredString(name: string) {
  return z.unknown().transform((value, ctx): string => {
    if (isAbsent(value)) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: missingArgument(name) });
      return z.NEVER;
    }
    if (typeof value === 'string') return value;
    if (typeof value === 'number' || typeof value === 'boolean') return String(value);
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: `Invalid argument: ${name} (must be a string)` });
    return z.NEVER;
  });
}

export function optionalString(name: string) {
  return z.unknown().transform((value, ctx): string | undefined => {
    if (isAbsent(value)) return undefined;
    if (typeof value === 'string') return value.length > 0 ? value : undefined;
    if (typeof value === 'number' || typeof value === 'boolean') return String(value);
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: `Invalid argument: ${name} (must be a string)` });
    return z.NEVER;
  });
}

/** Integer given as a number or a numeric string. */
export function requiredInteger(name: string, min = 0) {
  return z.unknown().transform((value, ctx): number => {
    if (isAbsent(value)) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: missingArgument(name) });
      return z.NEVER;
    }
    const n = typeof value === 'string' && /^-?\d+$/.test(value.trim()) ? Number(value.trim()) : value;
    if (typeof n !== 'number' || !Number.isInteger(n)) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: `Missing or invalid argument: ${name} (must be an integer)` });
      return z.NEVER;
    }
    if (n < min) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: `Invalid argument: ${name} (must be at least ${min})` });
      return z.NEVER;
    }
    return n;
  });
}

/** Boolean given as a boolean or "true"/"false"; absent means `fallback`. */
export function flag(name: string, fallback: boolean) {
  return z.unknown().transform((value, ctx): boolean => {
    if (isAbsent(value)) return fallback;
    if (typeof value === 'boolean') return value;
    if (value === 'true' || value === 'false') return value === 'true';
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: `Invalid argument: ${name} (must be true or false)` });
    return z.NEVER;
  });
}

// ---------------------------------------------------------------------------
// Domain arguments
// ---------------------------------------------------------------------------

/**
 * Normalize a project-relative path: `/` separators, no `.` segments, no
 * trailing slash, `''` for the project root.
 */
export function normalizeProjectPath(raw: string): Result<string, string> {
  const path = raw.trim().replace(/\\/g, '/');
  if (path.length > MAX_PATH_LENGTH) return err(`Path too long (max ${MAX_PATH_LENGTH} characters)`);
  if (path.includes('\u0000')) return err('Path contains a null byte');
  if (path.startsWith('/') || /^[a-zA-Z]:\//.test(path)) return err(`Path must be relative to the project root: ${raw}`);
  const normalized = posix.normalize(path || '.').replace(/\/+$/, '');
  if (normalized === '..' || normalized.startsWith('../')) return err(`Path escapes project root: ${raw}`);
  return ok(normalized === '.' ? '' : normalized);
}

function pathSchema(base: z.ZodType<string, z.ZodTypeDef, unknown>) {
  return base.transform((value, ctx): string => {
    const result = normalizeProjectPath(value);
    if (!result.ok) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: result.error });
      return z.NEVER;
    }
    return result.value;
  });
}

export function requiredPath(name: string) {
  return pathSchema(requiredString(name));
}

/** Path that defaults to the project root when absent. */
export function optionalPath(name: string) {
  return pathSchema(optionalString(name).transform((value) => value ?? ''));
}

export function content(name: string) {
  return requiredString(name).refine((value) => value.length <= MAX_CONTENT_LENGTH, {
    message: `Content too large: ${name} exceeds ${MAX_CONTENT_LENGTH} characters`,
  });
}

export function memoryKey() {
  return requiredString('key')
    .refine((value) => value.length >= 1 && value.length <= MAX_MEMORY_KEY_LENGTH, {
      message: `Invalid memory key: must be 1-${MAX_MEMORY_KEY_LENGTH} characters`,
    })
    .refine((value) => MEMORY_KEY.test(value), {
      message: 'Invalid memory key: must start with a letter and contain only letters, digits, _ or -',
    });
}

export function todoStatus() {
  return requiredString('status').transform((value, ctx) => {
    const status = TODO_STATUSES.find((s) => s === value.trim().toLowerCase());
    if (!status) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: `Invalid status: ${value}. Must be one of: ${TODO_STATUSES.join(', ')}`,
      });
      return z.NEVER;
    }
    return status;
  });
}

// ---------------------------------------------------------------------------
// Tool construction
// ---------------------------------------------------------------------------

function toEngineError(issue: z.ZodIssue): EngineError {
  const argument = issue.path.length > 0 ? String(issue.path[0]) : 'arguments';
  if (issue.message === missingArgument(argument)) {
    return { kind: 'missing_argument', argument };
  }
  return { kind: 'invalid_argument_format', argument, detail: issue.message };
}

/**
 * Bind a schema to its handler. The first failing argument (in schema
 * declaration order) becomes the error; the handler never sees raw input.
 */
export function defineTool<S extends z.AnyZodObject>(spec: ToolSpec<S>): RegisteredTool {
  return {
    definition: spec.definition,
    schema: spec.schema,
    async invoke(input, ctx): Promise<Result<ToolResult, EngineError>> {
      const parsed = await spec.schema.safeParseAsync(input);
      if (!parsed.success) {
        return err(toEngineError(parsed.error.issues[0]));
      }
      return ok(await spec.handler(parsed.data, ctx));
    },
  };
}
