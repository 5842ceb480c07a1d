/**
 * Circuit breaker guarding provider requests.
 * States: closed (normal) -> open (fast-fail) -> half-open (probing)
 */
import { logger } from './logger.js';

const log = logger.child({ module: 'circuit-breaker' });

export type CircuitState = 'closed' | 'open' | 'half-open';

export interface CircuitBreakerOptions {
  /** Name for logging */
  name: string;
  /** Number of failures before opening (default: 5) */
  failureThreshold?: number;
  /** Time in ms before trying half-open (default: 30000) */
  resetTimeoutMs?: number;
  /** Successes in half-open before closing (default: 1) */
  halfOpenSuccessThreshold?: number;
  /** Decides whether a settled result counts as a failure (default: never) */
  isFailure?: (result: unknown) => boolean;
  /** Rejections matched here pass through without touching the counters */
  isIgnored?: (error: unknown) => boolean;
  onStateChange?: (from: CircuitState, to: CircuitState) => void;
  /** Clock, injectable for tests */
  now?: () => number;
}

export class CircuitOpenError extends Error {
  constructor(readonly breaker: string) {
    super(`Circuit breaker '${breaker}' is open`);
    this.name = 'CircuitOpenError';
  }
}

export class CircuitBreaker {
  private state: CircuitState = 'closed';
  private failureCount = 0;
  private successCount = 0;
  private lastFailureTime = 0;
  private readonly name: string;
  private readonly failureThreshold: number;
  private readonly resetTimeoutMs: number;
  private readonly halfOpenSuccessThreshold: number;
  private readonly isFailure: (result: unknown) => boolean;
  private readonly isIgnored: (error: unknown) => boolean;
  private readonly onStateChange?: (from: CircuitState, to: CircuitState) => void;
  private readonly now: () => number;

  constructor(opts: CircuitBreakerOptions) {
    this.name = opts.name;
    this.failureThreshold = opts.failureThreshold ?? 5;
    this.resetTimeoutMs = opts.resetTimeoutMs ?? 30_000;
    this.halfOpenSuccessThreshold = opts.halfOpenSuccessThreshold ?? 1;
    this.isFailure = opts.isFailure ?? (() => false);
    this.isIgnored = opts.isIgnored ?? (() => false);
    this.onStateChange = opts.onStateChange;
    this.now = opts.now ?? Date.now;
  }

  get currentState(): CircuitState {
    return this.state;
  }

  private transition(to: CircuitState): void {
    if (this.state === to) return;
    const from = this.state;
    this.state = to;
    log.info({ name: this.name, from, to }, 'circuit breaker state change');
    this.onStateChange?.(from, to);
  }

  /**
   * Run `fn` through the breaker. Throws CircuitOpenError without calling
   * `fn` while open. Both thrown errors and results matched by `isFailure`
   * count against the threshold; rejections matched by `isIgnored` do not.
   */
  async execute<T>(fn: () => Promise<T>): Promise<T> {
    if (this.state === 'open') {
      if (this.now() - this.lastFailureTime >= this.resetTimeoutMs) {
        this.transition('half-open');
        this.successCount = 0;
      } else {
        throw new CircuitOpenError(this.name);
      }
    }

    let result: T;
    try {
      result = await fn();
    } catch (error) {
      if (!this.isIgnored(error)) this.onFailure();
      throw error;
    }
    if (this.isFailure(result)) {
      this.onFailure();
    } else {
      this.onSuccess();
    }
    return result;
  }

  private onSuccess(): void {
    if (this.state === 'half-open') {
      this.successCount++;
      if (this.successCount >= this.halfOpenSuccessThreshold) {
        this.failureCount = 0;
        this.transition('closed');
      }
    } else {
      this.failureCount = 0;
    }
  }

  private onFailure(): void {
    this.failureCount++;
    this.lastFailureTime = this.now();
    if (this.state === 'half-open' || this.failureCount >= this.failureThreshold) {
      this.transition('open');
    }
  }

  reset(): void {
    this.failureCount = 0;
    this.successCount = 0;
    this.transition('closed');
  }
}
