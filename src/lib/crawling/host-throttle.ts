/**
 * Host Throttle
 * Per-host request spacing. Each host owns one slot tracker; slots are
 * reserved synchronously, so concurrent workers never share a slot.
 */

interface HostEntry {
  lastSlot: number;
  requests: number;
}

export interface HostThrottleStats {
  hosts: number;
  totalRequests: number;
  delayedRequests: number;
  totalWaitMs: number;
}

export type SleepFn = (ms: number, signal?: AbortSignal) => Promise<void>;

/**
 * Resolve after `ms`, or reject with the signal's reason once it aborts
 */
export const sleep: SleepFn = (ms, signal) =>
  new Promise<void>((resolve, reject) => {
    if (signal?.aborted) {
      reject(signal.reason);
      return;
    }

    const onAbort = () => {
      clearTimeout(timer);
      reject(signal?.reason);
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);

    signal?.addEventListener('abort', onAbort, { once: true });
  });

export class HostThrottle {
  private hosts: Map<string, HostEntry> = new Map();
  private stats = {
    totalRequests: 0,
    delayedRequests: 0,
    totalWaitMs: 0,
  };

  constructor(
    private readonly clock: () => number = Date.now,
    private readonly wait: SleepFn = sleep
  ) {}

  /**
   * Reserve the next request slot for `host` and wait until it arrives.
   * Slots for one host are at least `delayMs` apart; other hosts are unaffected.
   */
  async acquire(host: string, delayMs: number, signal?: AbortSignal): Promise<void> {
    const waitMs = this.reserve(host, delayMs);
    this.stats.totalRequests++;

    if (waitMs > 0) {
      this.stats.delayedRequests++;
      this.stats.totalWaitMs += waitMs;
      await this.wait(waitMs, signal);
    }
  }

  getStats(): HostThrottleStats {
    return {
      hosts: this.hosts.size,
      ...this.stats,
    };
  }

  /**
   * Request count per host
   */
  getHostCounts(): Record<string, number> {
    const counts: Record<string, number> = {};
    for (const [host, entry] of this.hosts) {
      counts[host] = entry.requests;
    }
    return counts;
  }

  private reserve(host: string, delayMs: number): number {
    const now = this.clock();
    const entry = this.hosts.get(host);

    if (!entry) {
      this.hosts.set(host, { lastSlot: now, requests: 1 });
      return 0;
    }

    const slot = Math.max(now, entry.lastSlot + Math.max(0, delayMs));
    entry.lastSlot = slot;
    entry.requests++;
    return slot - now;
  }
}
