/**
 * Crawl Frontier
 * Breadth-first pending queue plus the visited set, with depth and page budget checks
 */

import { CrawlTarget, FrontierRejection, ScopePolicy } from './crawling.types';

export type FrontierLimits = Pick<ScopePolicy, 'maxDepth' | 'maxPages'>;

export class Frontier {
  private queue: CrawlTarget[] = [];
  private pendingUrls: Set<string> = new Set();
  private visitedUrls: Set<string> = new Set();
  private accepted: number = 0;
  private rejections: Record<FrontierRejection, number> = {
    duplicate: 0,
    depth: 0,
    budget: 0,
  };

  constructor(private readonly limits: FrontierLimits) {}

  /**
   * Accept a target unless it is a duplicate, too deep or over the page budget.
   * Check and insert happen in one synchronous step, so concurrent workers
   * can never both accept the same URL.
   */
  offer(target: CrawlTarget): boolean {
    const rejection = this.check(target);
    if (rejection) {
      this.rejections[rejection]++;
      return false;
    }

    this.queue.push(target);
    this.pendingUrls.add(target.url);
    this.accepted++;
    return true;
  }

  /**
   * Get next target (FIFO for BFS)
   */
  next(): CrawlTarget | null {
    const target = this.queue.shift();
    if (!target) {
      return null;
    }

    this.pendingUrls.delete(target.url);
    return target;
  }

  /**
   * Mark a URL as visited. Called exactly once per URL, right before its fetch.
   */
  markVisited(url: string): void {
    if (this.visitedUrls.has(url)) {
      throw new Error(`URL already visited: ${url}`);
    }

    this.pendingUrls.delete(url);
    this.visitedUrls.add(url);
  }

  isVisited(url: string): boolean {
    return this.visitedUrls.has(url);
  }

  isPending(url: string): boolean {
    return this.pendingUrls.has(url);
  }

  isEmpty(): boolean {
    return this.queue.length === 0;
  }

  /**
   * Number of pending targets
   */
  size(): number {
    return this.queue.length;
  }

  visitedCount(): number {
    return this.visitedUrls.size;
  }

  acceptedCount(): number {
    return this.accepted;
  }

  /**
   * True once no further offer can be accepted
   */
  isBudgetExhausted(): boolean {
    return this.accepted >= this.limits.maxPages;
  }

  getVisitedUrls(): string[] {
    return Array.from(this.visitedUrls);
  }

  getRejections(): Record<FrontierRejection, number> {
    return { ...this.rejections };
  }

  private check(target: CrawlTarget): FrontierRejection | null {
    if (this.visitedUrls.has(target.url) || this.pendingUrls.has(target.url)) {
      return 'duplicate';
    }

    if (target.depth > this.limits.maxDepth) {
      return 'depth';
    }

    if (this.accepted >= this.limits.maxPages) {
      return 'budget';
    }

    return null;
  }
}
