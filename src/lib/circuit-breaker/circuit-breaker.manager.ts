/**
 * Circuit Breaker Manager
 * Typed wrapper around opossum
 */

import CircuitBreakerLib from 'opossum';
import { CircuitBreakerConfig, CircuitBreakerStats, CircuitState } from './circuit-breaker.types';

export class CircuitBreaker<TArgs extends unknown[], TResult> {
  private breaker: CircuitBreakerLib<TArgs, TResult>;
  private config: Required<CircuitBreakerConfig>;
  private failures: number = 0;
  private successes: number = 0;
  private timeouts: number = 0;
  private rejections: number = 0;
  private lastFailureTime?: number;

  constructor(fn: (...args: TArgs) => Promise<TResult>, config?: CircuitBreakerConfig) {
    this.config = {
      name: config?.name ?? 'CircuitBreaker',
      timeout: config?.timeout ?? 10000,
      errorThresholdPercentage: config?.errorThresholdPercentage ?? 50,
      resetTimeout: config?.resetTimeout ?? 30000,
      monitoringPeriod: config?.monitoringPeriod ?? 60000,
      minimumRequests: config?.minimumRequests ?? 5,
      enabled: config?.enabled !== false,
    };

    this.breaker = new CircuitBreakerLib<TArgs, TResult>(fn, {
      name: this.config.name,
      timeout: this.config.timeout,
      errorThresholdPercentage: this.config.errorThresholdPercentage,
      resetTimeout: this.config.resetTimeout,
      rollingCountTimeout: this.config.monitoringPeriod,
      rollingCountBuckets: 10,
      volumeThreshold: this.config.minimumRequests,
      enabled: this.config.enabled,
    });

    this.breaker.on('success', () => {
      this.successes++;
    });

    this.breaker.on('failure', () => {
      this.failures++;
      this.lastFailureTime = Date.now();
    });

    this.breaker.on('timeout', () => {
      this.timeouts++;
    });

    this.breaker.on('reject', () => {
      this.rejections++;
    });

    this.breaker.on('open', () => {
      console.warn(`[${this.config.name}] Circuit opened`);
    });

    this.breaker.on('halfOpen', () => {
      console.log(`[${this.config.name}] Circuit half-open, trying the next call`);
    });

    this.breaker.on('close', () => {
      console.log(`[${this.config.name}] Circuit closed`);
    });
  }

  /**
   * Execute function through circuit breaker. Rejects on timeout or while open.
   */
  execute(...args: TArgs): Promise<TResult> {
    return this.breaker.fire(...args);
  }

  private getState(): CircuitState {
    if (!this.config.enabled) {
      return CircuitState.CLOSED;
    }

    if (this.breaker.opened) {
      return CircuitState.OPEN;
    }
    return this.breaker.halfOpen ? CircuitState.HALF_OPEN : CircuitState.CLOSED;
  }

  /**
   * Counters since startup, reported on /health
   */
  getStats(): CircuitBreakerStats {
    const state = this.getState();
    const totalRequests = this.failures + this.successes;
    const errorRate = totalRequests > 0 ? (this.failures / totalRequests) * 100 : 0;

    const nextAttempt = state === CircuitState.OPEN && this.lastFailureTime
      ? this.lastFailureTime + this.config.resetTimeout
      : undefined;

    return {
      state,
      failures: this.failures,
      successes: this.successes,
      timeouts: this.timeouts,
      rejections: this.rejections,
      totalRequests,
      lastFailureTime: this.lastFailureTime,
      nextAttempt,
      errorRate,
    };
  }

  /**
   * Stop internal timers
   */
  shutdown(): void {
    this.breaker.shutdown();
  }
}
