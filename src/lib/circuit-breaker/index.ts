/**
 * Circuit Breaker System
 * Main export file for per-host circuit breakers
 */

export * from './circuit-breaker.types';
export * from './circuit-breaker.manager';
