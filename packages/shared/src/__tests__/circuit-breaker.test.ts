import { describe, it, expect, vi } from 'vitest';

vi.mock('../logger.js', () => ({
  logger: {
    child: vi.fn().mockReturnValue({ info: vi.fn(), warn: vi.fn(), debug: vi.fn() }),
  },
}));

import { CircuitBreaker, CircuitOpenError } from '../circuit-breaker.js';

function failing(): Promise<never> {
  return Promise.reject(new Error('boom'));
}

describe('CircuitBreaker', () => {
  it('opens after the failure threshold and fast-fails', async () => {
    const breaker = new CircuitBreaker({ name: 'test', failureThreshold: 2, now: () => 1000 });
    await expect(breaker.execute(failing)).rejects.toThrow('boom');
    await expect(breaker.execute(failing)).rejects.toThrow('boom');
    expect(breaker.currentState).toBe('open');

    const fn = vi.fn().mockResolvedValue('ok');
    await expect(breaker.execute(fn)).rejects.toBeInstanceOf(CircuitOpenError);
    expect(fn).not.toHaveBeenCalled();
  });

  it('probes half-open after the reset timeout and closes on success', async () => {
    let now = 0;
    const transitions: string[] = [];
    const breaker = new CircuitBreaker({
      name: 'test',
      failureThreshold: 1,
      resetTimeoutMs: 100,
      now: () => now,
      onStateChange: (from, to) => transitions.push(`${from}->${to}`),
    });

    await expect(breaker.execute(failing)).rejects.toThrow('boom');
    now = 150;
    await expect(breaker.execute(() => Promise.resolve(42))).resolves.toBe(42);

    expect(breaker.currentState).toBe('closed');
    expect(transitions).toEqual(['closed->open', 'open->half-open', 'half-open->closed']);
  });

  it('counts results matched by isFailure', async () => {
    const breaker = new CircuitBreaker({
      name: 'test',
      failureThreshold: 1,
      isFailure: (r) => r === 'bad',
    });
    await expect(breaker.execute(() => Promise.resolve('bad'))).resolves.toBe('bad');
    expect(breaker.currentState).toBe('open');
  });

  it('reset() closes the breaker', async () => {
    const breaker = new CircuitBreaker({ name: 'test', failureThreshold: 1 });
    await expect(breaker.execute(failing)).rejects.toThrow('boom');
    breaker.reset();
    expect(breaker.currentState).toBe('closed');
  });

  it('leaves the counters alone for rejections matched by isIgnored', async () => {
    const breaker = new CircuitBreaker({
      name: 'test',
      failureThreshold: 1,
      isIgnored: (error) => error instanceof Error && error.message === 'cancelled',
    });
    await expect(breaker.execute(() => Promise.reject(new Error('cancelled')))).rejects.toThrow('cancelled');
    await expect(breaker.execute(() => Promise.reject(new Error('cancelled')))).rejects.toThrow('cancelled');
    expect(breaker.currentState).toBe('closed');

    await expect(breaker.execute(failing)).rejects.toThrow('boom');
    expect(breaker.currentState).toBe('open');
  });
});
