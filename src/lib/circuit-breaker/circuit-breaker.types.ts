/**
 * Circuit Breaker Types
 * Type definitions for per-host circuit breakers
 */

/**
 * Circuit breaker state enumeration
 */
export enum CircuitState {
  CLOSED = 'closed',      // Normal operation, requests pass through
  OPEN = 'open',          // Circuit is open, requests fail immediately
  HALF_OPEN = 'half_open', // Testing state, one trial request allowed
}

/**
 * Circuit breaker configuration
 */
export interface CircuitBreakerConfig {
  errorThresholdPercentage: number;    // Error percentage threshold (0-100)
  resetTimeout: number;                // Time before attempting half-open (ms)
  minimumRequests: number;             // Minimum requests before the circuit may open
  monitoringPeriod?: number;           // Rolling window for error counting (ms)
  enabled: boolean;
}

/**
 * Circuit breaker statistics for one host
 */
export interface CircuitBreakerStats {
  state: CircuitState;
  failures: number;
  successes: number;
  rejections: number;
  totalRequests: number;
  lastFailureTime?: number;
  errorRate: number;
}
