import { logger } from './logger.js';

const log = logger.child({ module: 'features' });

// ---------------------------------------------------------------------------
// Flag registry
// ---------------------------------------------------------------------------

const FLAG_REGISTRY = {
  incrementalSegmenter:   { default: true, desc: 'Re-parse only the unsettled tail of a streaming message' },
  providerCircuitBreaker: { default: true, desc: 'Fast-fail provider requests after repeated failures' },
  memoryContext:          { default: true, desc: 'Include saved project memories in the system prompt' },
} as const;

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export type FeatureFlag = keyof typeof FLAG_REGISTRY;

export interface Features {
  isEnabled(flag: FeatureFlag): boolean;
  allFlags(): Record<FeatureFlag, boolean>;
}

const FLAG_NAMES = Object.keys(FLAG_REGISTRY).filter(
  (key): key is FeatureFlag => key in FLAG_REGISTRY,
);

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

/**
 * Convert a camelCase flag name to its FEATURE_SCREAMING_SNAKE env var.
 *
 * e.g. memoryContext → FEATURE_MEMORY_CONTEXT
 */
export function toEnvKey(flag: string): string {
  const snake = flag.replace(/[A-Z]/g, (ch) => `_${ch}`).toUpperCase();
  return `FEATURE_${snake}`;
}

// ---------------------------------------------------------------------------
// Factory
// ---------------------------------------------------------------------------

function resolveFlag(env: NodeJS.ProcessEnv, flag: FeatureFlag): boolean {
  const envVal = env[toEnvKey(flag)];
  return envVal !== undefined ? envVal === 'true' || envVal === '1' : FLAG_REGISTRY[flag].default;
}

/**
 * Resolve flags from FEATURE_* env vars, falling back to registry defaults.
 * 'true' and '1' enable a flag; any other value disables it.
 */
export function createFeatures(env: NodeJS.ProcessEnv = process.env): Features {
  const resolved: Record<FeatureFlag, boolean> = {
    incrementalSegmenter: resolveFlag(env, 'incrementalSegmenter'),
    providerCircuitBreaker: resolveFlag(env, 'providerCircuitBreaker'),
    memoryContext: resolveFlag(env, 'memoryContext'),
  };
  const known = new Set(FLAG_NAMES.map(toEnvKey));

  const unknownVars = Object.keys(env).filter((key) => key.startsWith('FEATURE_') && !known.has(key));
  if (unknownVars.length > 0) {
    log.warn({ unknownVars }, 'unknown FEATURE_* env vars detected, these have no effect');
  }

  log.debug({ flags: resolved }, 'feature flags resolved');

  return {
    isEnabled(flag: FeatureFlag): boolean {
      return resolved[flag];
    },
    allFlags(): Record<FeatureFlag, boolean> {
      return { ...resolved };
    },
  };
}

/** Features with every flag at its default, for callers that take no env. */
export function defaultFeatures(): Features {
  return createFeatures({});
}
