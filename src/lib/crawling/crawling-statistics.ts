/**
 * Crawling Statistics Tracker
 * Track per-run crawl statistics
 */

import { CrawlingStatistics, RejectionReason } from './crawling.types';

export class CrawlingStatisticsTracker {
  private startTime: number;
  private pagesVisited: number = 0;
  private pagesSkipped: number = 0;
  private pagesFailed: number = 0;
  private linksDiscovered: number = 0;
  private duplicatesSkipped: number = 0;
  private maxDepthReached: number = 0;
  private pageTimes: number[] = [];
  private scopeRejections: Record<RejectionReason, number> = {
    malformed: 0,
    scheme: 0,
    'ignored-extension': 0,
    'out-of-scope': 0,
  };

  constructor(private readonly clock: () => number = Date.now) {
    this.startTime = clock();
  }

  /**
   * Record a page visit
   */
  recordPageVisit(depth: number, time: number): void {
    this.pagesVisited++;
    this.maxDepthReached = Math.max(this.maxDepthReached, depth);
    this.pageTimes.push(time);
  }

  /**
   * Record a skipped target
   */
  recordSkipped(): void {
    this.pagesSkipped++;
  }

  /**
   * Record a failed fetch
   */
  recordFailed(): void {
    this.pagesFailed++;
  }

  /**
   * Record link discovery
   */
  recordLinkDiscovery(count: number): void {
    this.linksDiscovered += count;
  }

  recordDuplicate(): void {
    this.duplicatesSkipped++;
  }

  recordScopeRejection(reason: RejectionReason): void {
    this.scopeRejections[reason]++;
  }

  /**
   * Get final statistics
   */
  getStatistics(): CrawlingStatistics {
    const totalTime = this.clock() - this.startTime;
    const averagePageTime =
      this.pageTimes.length > 0
        ? this.pageTimes.reduce((sum, time) => sum + time, 0) / this.pageTimes.length
        : 0;

    const totalAttempts = this.pagesVisited + this.pagesFailed;
    const successRate = totalAttempts > 0 ? this.pagesVisited / totalAttempts : 0;

    return {
      pagesVisited: this.pagesVisited,
      pagesFailed: this.pagesFailed,
      pagesSkipped: this.pagesSkipped,
      duplicatesSkipped: this.duplicatesSkipped,
      linksDiscovered: this.linksDiscovered,
      scopeRejections: { ...this.scopeRejections },
      maxDepthReached: this.maxDepthReached,
      averagePageTime,
      successRate,
      totalTime,
    };
  }
}
