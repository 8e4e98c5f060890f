/**
 * Circuit Breaker Manager
 * One opossum breaker per host: a host that keeps failing at the network
 * level fails fast until its reset timeout has passed
 */

import CircuitBreakerLib from 'opossum';
import { CancelledError, NetworkError } from '../errors/crawl.errors';
import { CrawlLogger } from '../logging/crawl.logger';
import { CircuitBreakerConfig, CircuitBreakerStats, CircuitState } from './circuit-breaker.types';

type Task<T> = () => Promise<T>;

interface HostCounters {
  failures: number;
  successes: number;
  rejections: number;
  lastFailureTime?: number;
}

export class HostCircuitBreakers<T> {
  private breakers: Map<string, CircuitBreakerLib<[Task<T>], T>> = new Map();
  private counters: Map<string, HostCounters> = new Map();

  constructor(
    private readonly config: CircuitBreakerConfig,
    private readonly logger: CrawlLogger
  ) {}

  /**
   * Run `task` through the host's breaker. An open breaker rejects with a
   * NetworkError carrying code EOPENBREAKER.
   */
  async execute(host: string, task: Task<T>): Promise<T> {
    if (!this.config.enabled) {
      return task();
    }

    try {
      return await this.getBreaker(host).fire(task);
    } catch (error) {
      if (error instanceof Error && 'code' in error && error.code === 'EOPENBREAKER') {
        this.getCounters(host).rejections++;
        throw new NetworkError(`Circuit open for ${host}`, 'EOPENBREAKER', { cause: error });
      }
      throw error;
    }
  }

  getState(host: string): CircuitState {
    const breaker = this.breakers.get(host);
    if (!breaker || !this.config.enabled) {
      return CircuitState.CLOSED;
    }

    return breaker.opened ? CircuitState.OPEN :
           breaker.halfOpen ? CircuitState.HALF_OPEN :
           CircuitState.CLOSED;
  }

  /**
   * Get statistics per host
   */
  getStats(): Record<string, CircuitBreakerStats> {
    const stats: Record<string, CircuitBreakerStats> = {};
    for (const [host, counters] of this.counters) {
      const totalRequests = counters.failures + counters.successes;
      stats[host] = {
        state: this.getState(host),
        failures: counters.failures,
        successes: counters.successes,
        rejections: counters.rejections,
        totalRequests,
        lastFailureTime: counters.lastFailureTime,
        errorRate: totalRequests > 0 ? (counters.failures / totalRequests) * 100 : 0,
      };
    }
    return stats;
  }

  /**
   * Stop every breaker's rolling-window timers
   */
  shutdown(): void {
    for (const breaker of this.breakers.values()) {
      breaker.shutdown();
    }
  }

  private getCounters(host: string): HostCounters {
    let counters = this.counters.get(host);
    if (!counters) {
      counters = { failures: 0, successes: 0, rejections: 0 };
      this.counters.set(host, counters);
    }
    return counters;
  }

  private getBreaker(host: string): CircuitBreakerLib<[Task<T>], T> {
    const existing = this.breakers.get(host);
    if (existing) {
      return existing;
    }

    const breaker = new CircuitBreakerLib((task: Task<T>) => task(), {
      // Requests carry their own timeout
      timeout: false,
      errorThresholdPercentage: this.config.errorThresholdPercentage,
      resetTimeout: this.config.resetTimeout,
      volumeThreshold: this.config.minimumRequests,
      rollingCountTimeout: this.config.monitoringPeriod || 60000,
      rollingCountBuckets: 10,
      name: host,
      // Cancellation is not a host failure
      errorFilter: (error: unknown) => error instanceof CancelledError,
    });

    const counters = this.getCounters(host);

    // Track statistics
    breaker.on('success', () => {
      counters.successes++;
    });

    breaker.on('failure', () => {
      counters.failures++;
      counters.lastFailureTime = Date.now();
    });

    breaker.on('open', () => {
      this.logger.warn(`Circuit opened for ${host}, failing fast for ${this.config.resetTimeout}ms`);
    });

    breaker.on('halfOpen', () => {
      this.logger.debug(`Circuit half-open for ${host}, allowing a trial request`);
    });

    breaker.on('close', () => {
      this.logger.debug(`Circuit closed for ${host}`);
    });

    this.breakers.set(host, breaker);
    return breaker;
  }
}
