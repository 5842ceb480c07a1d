export * from './types.js';
export * from './model-types.js';
export * from './result.js';
export { logger, type Logger } from './logger.js';
export { getTracer, withSpan, markSpanFailed } from './tracing.js';
export {
  CircuitBreaker,
  CircuitOpenError,
  type CircuitBreakerOptions,
  type CircuitState,
} from './circuit-breaker.js';
export { createFeatures, defaultFeatures, toEnvKey, type Features, type FeatureFlag } from './features.js';
export {
  loadEngineConfig,
  parseEngineConfig,
  engineConfigSchema,
  type EngineConfig,
  type EngineConfigInput,
} from './config.js';
