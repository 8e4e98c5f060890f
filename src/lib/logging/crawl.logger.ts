/**
 * Crawl Logger
 * Console logging for a crawl run; debug lines only appear in verbose mode
 */

export interface CrawlLogger {
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}

export function createConsoleLogger(verbose: boolean): CrawlLogger {
  return {
    debug: (message) => {
      if (verbose) {
        console.log(`🔎 ${message}`);
      }
    },
    info: (message) => console.log(message),
    warn: (message) => console.warn(`⚠️  ${message}`),
    error: (message) => console.error(`❌ ${message}`),
  };
}

/**
 * Logger that keeps every line in memory
 */
export interface MemoryLogger extends CrawlLogger {
  lines: Array<{ level: keyof CrawlLogger; message: string }>;
}

export function createMemoryLogger(): MemoryLogger {
  const lines: MemoryLogger['lines'] = [];
  return {
    lines,
    debug: (message) => lines.push({ level: 'debug', message }),
    info: (message) => lines.push({ level: 'info', message }),
    warn: (message) => lines.push({ level: 'warn', message }),
    error: (message) => lines.push({ level: 'error', message }),
  };
}
