import { describe, it, expect, vi } from 'vitest';

// Mock the logger to keep pino output out of test runs
const { mockWarn } = vi.hoisted(() => ({ mockWarn: vi.fn() }));

vi.mock('../logger.js', () => ({
  logger: {
    child: vi.fn().mockReturnValue({
      info: vi.fn(),
      warn: mockWarn,
      debug: vi.fn(),
    }),
  },
}));

import { createFeatures, defaultFeatures, toEnvKey } from '../features.js';

describe('features', () => {
  describe('toEnvKey()', () => {
    it('converts camelCase to FEATURE_SCREAMING_SNAKE', () => {
      expect(toEnvKey('memoryContext')).toBe('FEATURE_MEMORY_CONTEXT');
      expect(toEnvKey('providerCircuitBreaker')).toBe('FEATURE_PROVIDER_CIRCUIT_BREAKER');
    });
  });

  describe('defaults', () => {
    it('enables every flag when no env var is set', () => {
      expect(defaultFeatures().allFlags()).toEqual({
        incrementalSegmenter: true,
        providerCircuitBreaker: true,
        memoryContext: true,
      });
    });
  });

  describe('env overrides', () => {
    it('treats "false" as disabled', () => {
      const f = createFeatures({ FEATURE_MEMORY_CONTEXT: 'false' });
      expect(f.isEnabled('memoryContext')).toBe(false);
      expect(f.isEnabled('incrementalSegmenter')).toBe(true);
    });

    it('treats "1" as enabled', () => {
      const f = createFeatures({ FEATURE_INCREMENTAL_SEGMENTER: '1' });
      expect(f.isEnabled('incrementalSegmenter')).toBe(true);
    });

    it('treats any other value as disabled', () => {
      const f = createFeatures({ FEATURE_PROVIDER_CIRCUIT_BREAKER: 'yes' });
      expect(f.isEnabled('providerCircuitBreaker')).toBe(false);
    });

    it('warns about unknown FEATURE_* vars', () => {
      mockWarn.mockClear();
      createFeatures({ FEATURE_TELEPATHY: 'true' });
      expect(mockWarn).toHaveBeenCalledWith(
        { unknownVars: ['FEATURE_TELEPATHY'] },
        'unknown FEATURE_* env vars detected, these have no effect',
      );
    });
  });

  it('allFlags() returns a copy', () => {
    const f = defaultFeatures();
    const snapshot = f.allFlags();
    snapshot.memoryContext = false;
    expect(f.isEnabled('memoryContext')).toBe(true);
  });
});
