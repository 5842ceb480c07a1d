/**
 * Engine configuration loader.
 *
 * Builds an EngineConfig from:
 *   1. Defaults
 *   2. A JSON file at LOOMWORK_CONFIG_PATH (optional)
 *   3. Environment variable overrides (LOOMWORK_*)
 */

import { readFile } from 'node:fs/promises';
import { z } from 'zod';
import { logger } from './logger.js';
import { createFeatures, type Features } from './features.js';

const log = logger.child({ module: 'config' });

// ---------------------------------------------------------------------------
// Schema
// ---------------------------------------------------------------------------

const timeoutsSchema = z.object({
  connectMs: z.number().int().positive().default(60_000),
  readMs: z.number().int().positive().default(180_000),
});

export const engineConfigSchema = z.object({
  baseUrl: z.string().url().default('https://openrouter.ai/api/v1'),
  apiKey: z.string().default(''),
  model: z.string().min(1).default('deepseek/deepseek-chat'),
  supportsToolCalls: z.boolean().default(true),
  temperature: z.number().min(0).max(2).default(0.7),
  maxTokens: z.number().int().positive().optional(),
  timeouts: timeoutsSchema.default({}),
  maxIterations: z.number().int().positive().default(20),
  appName: z.string().default('loomwork'),
  appUrl: z.string().default('https://github.com/loomwork/loomwork'),
});

export type EngineConfigInput = z.input<typeof engineConfigSchema>;

export type EngineConfig = Readonly<z.output<typeof engineConfigSchema>> & {
  readonly features: Features;
};

// ---------------------------------------------------------------------------
// Sources
// ---------------------------------------------------------------------------

async function readConfigFile(path: string): Promise<unknown> {
  const raw = await readFile(path, 'utf-8');
  try {
    return JSON.parse(raw);
  } catch (err) {
    throw new Error(`config: ${path} is not valid JSON: ${err instanceof Error ? err.message : String(err)}`);
  }
}

function parseNumber(name: string, value: string): number {
  const n = Number(value);
  if (value.trim() === '' || Number.isNaN(n)) {
    throw new Error(`config: ${name} must be a number, got '${value}'`);
  }
  return n;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function applyEnvOverrides(base: Record<string, unknown>, env: NodeJS.ProcessEnv): Record<string, unknown> {
  const merged: Record<string, unknown> = { ...base };
  const timeouts: Record<string, unknown> = isRecord(base.timeouts) ? { ...base.timeouts } : {};

  if (env.LOOMWORK_BASE_URL) merged.baseUrl = env.LOOMWORK_BASE_URL;
  if (env.LOOMWORK_API_KEY) merged.apiKey = env.LOOMWORK_API_KEY;
  if (env.LOOMWORK_MODEL) merged.model = env.LOOMWORK_MODEL;
  if (env.LOOMWORK_TEMPERATURE) merged.temperature = parseNumber('LOOMWORK_TEMPERATURE', env.LOOMWORK_TEMPERATURE);
  if (env.LOOMWORK_MAX_TOKENS) merged.maxTokens = parseNumber('LOOMWORK_MAX_TOKENS', env.LOOMWORK_MAX_TOKENS);
  if (env.LOOMWORK_MAX_ITERATIONS) {
    merged.maxIterations = parseNumber('LOOMWORK_MAX_ITERATIONS', env.LOOMWORK_MAX_ITERATIONS);
  }
  if (env.LOOMWORK_CONNECT_TIMEOUT_MS) {
    timeouts.connectMs = parseNumber('LOOMWORK_CONNECT_TIMEOUT_MS', env.LOOMWORK_CONNECT_TIMEOUT_MS);
  }
  if (env.LOOMWORK_READ_TIMEOUT_MS) {
    timeouts.readMs = parseNumber('LOOMWORK_READ_TIMEOUT_MS', env.LOOMWORK_READ_TIMEOUT_MS);
  }
  merged.timeouts = timeouts;
  return merged;
}

function formatIssues(error: z.ZodError): string {
  return error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`).join('; ');
}

// ---------------------------------------------------------------------------
// Public API
// ---------------------------------------------------------------------------

/** Validate an in-memory config object (no file, no env). */
export function parseEngineConfig(input: unknown, features?: Features): EngineConfig {
  const parsed = engineConfigSchema.safeParse(input);
  if (!parsed.success) {
    throw new Error(`config: invalid engine configuration: ${formatIssues(parsed.error)}`);
  }
  return Object.freeze({ ...parsed.data, features: features ?? createFeatures({}) });
}

export async function loadEngineConfig(env: NodeJS.ProcessEnv = process.env): Promise<EngineConfig> {
  let base: Record<string, unknown> = {};

  const configPath = env.LOOMWORK_CONFIG_PATH;
  if (configPath) {
    const fromFile = await readConfigFile(configPath);
    if (!isRecord(fromFile)) {
      throw new Error(`config: ${configPath} must contain a JSON object`);
    }
    base = fromFile;
    log.info({ configPath }, 'loaded engine config file');
  }

  const config = parseEngineConfig(applyEnvOverrides(base, env), createFeatures(env));

  log.info(
    {
      baseUrl: config.baseUrl,
      model: config.model,
      hasApiKey: config.apiKey.length > 0,
      maxIterations: config.maxIterations,
    },
    'engine config loaded',
  );

  return config;
}
