/**
 * Circuit Breaker Types
 * Type definitions for the circuit breaker system
 */

export enum CircuitState {
  CLOSED = 'closed',      // Calls pass through
  OPEN = 'open',          // Calls fail immediately
  HALF_OPEN = 'half_open', // Next call is a trial
}

export interface CircuitBreakerConfig {
  name?: string;
  timeout?: number;                    // Per-call timeout (ms)
  errorThresholdPercentage?: number;   // Error percentage threshold (0-100)
  resetTimeout?: number;               // Time before attempting half-open (ms)
  monitoringPeriod?: number;           // Rolling window for error rate (ms)
  minimumRequests?: number;            // Calls in window before the circuit may open
  enabled?: boolean;
}

export interface CircuitBreakerStats {
  state: CircuitState;
  failures: number;
  successes: number;
  timeouts: number;
  rejections: number;                  // Calls refused while open
  totalRequests: number;
  lastFailureTime?: number;
  nextAttempt?: number;
  errorRate: number;
}
