#!/usr/bin/env node
/**
 * recon-crawl command line
 */

import { Command, InvalidArgumentError } from 'commander';
import { createInterface } from 'readline/promises';
import {
  CrawlerConfig,
  CrawlerConfigOverrides,
  defaultCrawlerConfig,
  loadConfigFile,
  parseOverrides,
  resolveCrawlerConfig,
  validateSeedUrl,
} from './config/crawl.config';
import { CrawlScheduler, createScopePolicy } from './lib/crawling';
import { NodeDnsResolver } from './lib/discovery';
import { FatalConfigError } from './lib/errors/crawl.errors';
import { CrawlLogger, createConsoleLogger } from './lib/logging/crawl.logger';
import { CrawlReport, createReportSinks, sinkOutputPath } from './lib/report';
import { HttpFetcher, createPageFetcher } from './modules/fetcher/fetchers';

const EXIT_OK = 0;
const EXIT_FATAL = 1;
const EXIT_NO_PERMISSION = 2;

export type CliOptions = {
  config?: string;
  maxDepth?: number;
  maxPages?: number;
  delay?: number;
  concurrency?: number;
  timeout?: number;
  maxDuration?: number;
  respectRobots?: boolean;
  overrideRobots?: boolean;
  includeSubdomains?: boolean;
  jsRendering?: boolean;
  headless?: boolean;
  outputFormat?: string;
  outputFile?: string;
  enableSubdomainEnumeration?: boolean;
  enableEndpointGuessing?: boolean;
  enableHiddenFileScanning?: boolean;
  disableJsAnalysis?: boolean;
  subdomainWordlist?: string;
  endpointWordlist?: string;
  hiddenFileWordlist?: string;
  subdomainMethods?: string[];
  extraHiddenFile?: string[];
  retry?: boolean;
  header: Record<string, string>;
  cookie: Record<string, string>;
  userAgent?: string;
  yes?: boolean;
  verbose?: boolean;
};

function parseInteger(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed)) {
    throw new InvalidArgumentError('Not an integer.');
  }
  return parsed;
}

function parseList(value: string): string[] {
  return value.split(',').map((item) => item.trim()).filter(Boolean);
}

function collect(value: string, previous: string[] = []): string[] {
  return [...previous, value];
}

function keyValue(separator: string) {
  return (value: string, previous: Record<string, string>): Record<string, string> => {
    const cut = value.indexOf(separator);
    if (cut <= 0) {
      throw new InvalidArgumentError(`Expected name${separator}value.`);
    }
    return { ...previous, [value.slice(0, cut).trim()]: value.slice(cut + 1).trim() };
  };
}

export function buildProgram(): Command {
  return new Command()
    .name('recon-crawl')
    .description('Permissioned, read-only reconnaissance crawler')
    .argument('<url>', 'seed URL')
    .option('--config <file>', 'JSON config file')
    .option('--max-depth <n>', 'maximum link depth from the seed', parseInteger)
    .option('--max-pages <n>', 'maximum number of targets to fetch', parseInteger)
    .option('--delay <ms>', 'minimum delay between requests to one host', parseInteger)
    .option('--concurrency <n>', 'concurrent workers', parseInteger)
    .option('--timeout <ms>', 'per-request timeout', parseInteger)
    .option('--max-duration <ms>', 'time budget for the whole run', parseInteger)
    .option('--respect-robots', 'load and apply robots.txt')
    .option('--no-respect-robots', 'ignore robots.txt entirely')
    .option('--override-robots', 'load and log robots.txt rules without enforcing them')
    .option('--include-subdomains', 'crawl any host under the seed\'s registrable domain')
    .option('--js-rendering', 'render pages with jsdom and record the requests they issue')
    .option('--headless', 'render without a visual viewport')
    .option('--no-headless', 'render as a visual viewport')
    .option('--output-format <format>', 'json, sqlite or both')
    .option('--output-file <path>', 'report path without extension')
    .option('--enable-subdomain-enumeration', 'enumerate subdomains of the base domain')
    .option('--enable-endpoint-guessing', 'probe wordlist paths on each host')
    .option('--enable-hidden-file-scanning', 'probe sensitive file paths on each host')
    .option('--disable-js-analysis', 'skip static and dynamic JavaScript analysis')
    .option('--subdomain-wordlist <file>', 'replace the subdomain wordlist')
    .option('--endpoint-wordlist <file>', 'replace the endpoint wordlist')
    .option('--hidden-file-wordlist <file>', 'replace the hidden-file wordlist')
    .option('--subdomain-methods <list>', 'comma-separated: dns,wordlist,records', parseList)
    .option('--extra-hidden-file <path>', 'additional hidden path to probe (repeatable)', collect)
    .option('--retry', 'retry a failed fetch once with backoff')
    .option('--header <name:value>', 'request header (repeatable)', keyValue(':'), {})
    .option('--cookie <name=value>', 'request cookie (repeatable)', keyValue('='), {})
    .option('--user-agent <ua>', 'user agent string')
    .option('-y, --yes', 'confirm permission without prompting')
    .option('-v, --verbose', 'debug logging');
}

/**
 * CLI flags as config overrides; flags not given stay undefined and are skipped
 */
export function cliOverrides(options: CliOptions): CrawlerConfigOverrides {
  return parseOverrides(
    {
      maxDepth: options.maxDepth,
      maxPages: options.maxPages,
      delayMs: options.delay,
      concurrency: options.concurrency,
      timeoutMs: options.timeout,
      maxDurationMs: options.maxDuration,
      respectRobots: options.respectRobots,
      overrideRobots: options.overrideRobots,
      includeSubdomains: options.includeSubdomains,
      useJsRendering: options.jsRendering,
      headless: options.headless,
      outputFormat: options.outputFormat,
      outputFile: options.outputFile,
      enableSubdomainEnumeration: options.enableSubdomainEnumeration,
      enableEndpointGuessing: options.enableEndpointGuessing,
      enableHiddenFileScanning: options.enableHiddenFileScanning,
      disableJsAnalysis: options.disableJsAnalysis,
      subdomainWordlist: options.subdomainWordlist,
      endpointWordlist: options.endpointWordlist,
      hiddenFileWordlist: options.hiddenFileWordlist,
      subdomainMethods: options.subdomainMethods,
      extraHiddenFiles: options.extraHiddenFile,
      retry: options.retry ? { enabled: true } : undefined,
      headers: options.header,
      cookies: options.cookie,
      userAgent: options.userAgent,
      verbose: options.verbose,
    },
    'command line'
  );
}

async function confirmPermission(seed: string, logger: CrawlLogger): Promise<boolean> {
  if (!process.stdin.isTTY) {
    logger.error('Permission not confirmed: pass --yes when not running interactively');
    return false;
  }

  const rl = createInterface({ input: process.stdin, output: process.stdout });
  try {
    const answer = await rl.question(`Do you have permission to crawl ${seed}? [y/N] `);
    return /^y(es)?$/i.test(answer.trim());
  } finally {
    rl.close();
  }
}

function printSummary(report: CrawlReport): void {
  const { summary } = report;
  console.log('\n📊 Crawl summary');
  console.log(`   Base URL:          ${summary.baseUrl}`);
  console.log(`   Pages crawled:     ${summary.totalPages}`);
  console.log(`   Forms:             ${summary.totalForms}`);
  console.log(`   API endpoints:     ${summary.totalEndpoints}`);
  console.log(`   JS files:          ${summary.totalJsFiles}`);
  console.log(`   WebSocket URLs:    ${summary.totalWebsocketUrls}`);
  console.log(`   Subdomains:        ${summary.totalSubdomains}`);
  console.log(`   Guessed endpoints: ${summary.totalGuessedEndpoints}`);
  console.log(`   Hidden files:      ${summary.totalHiddenFiles}`);
  console.log(`   Failures:          ${summary.totalFailures}`);
  console.log(`   Robots denials:    ${summary.totalDenials}`);
  console.log(`   Depth reached:     ${summary.crawlDepthReached}`);
  console.log(`   Duration:          ${(summary.durationMs / 1000).toFixed(1)}s${summary.cancelled ? ' (cancelled, partial report)' : ''}`);
}

async function crawl(seed: string, config: CrawlerConfig, logger: CrawlLogger): Promise<void> {
  const policy = createScopePolicy(seed, {
    includeSubdomains: config.includeSubdomains,
    maxDepth: config.maxDepth,
    maxPages: config.maxPages,
  });

  const http = new HttpFetcher();
  const fetcher = createPageFetcher(config, http);
  const scheduler = new CrawlScheduler({
    config,
    fetcher,
    probeFetcher: http,
    dns: new NodeDnsResolver(),
    logger,
  });

  const controller = new AbortController();
  const onSigint = () => {
    logger.warn('Interrupt received, stopping the crawl');
    controller.abort();
  };
  process.once('SIGINT', onSigint);

  try {
    const report = await scheduler.run(seed, policy, controller.signal);

    for (const sink of createReportSinks(config.outputFormat)) {
      const outputPath = sinkOutputPath(config.outputFile, sink.format);
      await sink.write(report, outputPath);
      logger.info(`✅ Report saved to ${outputPath}`);
    }

    printSummary(report);
  } finally {
    process.removeListener('SIGINT', onSigint);
    if (fetcher.close) {
      await fetcher.close();
    }
  }
}

export async function main(argv: string[] = process.argv): Promise<number> {
  const program = buildProgram();
  await program.parseAsync(argv);

  const options = program.opts<CliOptions>();
  const [seed] = program.args;

  let config: CrawlerConfig;
  try {
    validateSeedUrl(seed);
    const fileOverrides = options.config ? await loadConfigFile(options.config) : undefined;
    config = resolveCrawlerConfig(defaultCrawlerConfig(), fileOverrides, cliOverrides(options));
  } catch (error) {
    if (error instanceof FatalConfigError) {
      console.error(`❌ ${error.message}`);
      return EXIT_FATAL;
    }
    throw error;
  }

  const logger = createConsoleLogger(config.verbose);

  if (!options.yes && !(await confirmPermission(seed, logger))) {
    logger.error('Crawl aborted: permission not confirmed');
    return EXIT_NO_PERMISSION;
  }

  try {
    await crawl(seed, config, logger);
  } catch (error) {
    if (error instanceof FatalConfigError) {
      logger.error(error.message);
      return EXIT_FATAL;
    }
    throw error;
  }

  return EXIT_OK;
}

if (require.main === module) {
  main()
    .then((code) => {
      process.exitCode = code;
    })
    .catch((error: unknown) => {
      console.error('❌ Unexpected error:', error);
      process.exitCode = EXIT_FATAL;
    });
}
