/**
 * Command Line Tests
 */

import { CliOptions, buildProgram, cliOverrides, main } from '../cli';
import { FatalConfigError } from '../lib/errors/crawl.errors';

function parse(...args: string[]): CliOptions {
  const program = buildProgram()
    .exitOverride()
    .configureOutput({ writeErr: () => undefined, writeOut: () => undefined });
  program.parse(['node', 'recon-crawl', ...args]);
  return program.opts<CliOptions>();
}

describe('cliOverrides', () => {
  it('should map flags to config overrides', () => {
    const options = parse(
      'https://example.com',
      '--max-depth', '3',
      '--no-respect-robots',
      '--header', 'Authorization: Bearer test-token',
      '--cookie', 'session=test-session',
      '--extra-hidden-file', '.env.local',
      '--extra-hidden-file', 'dump.sql',
      '--subdomain-methods', 'dns, records',
      '--retry',
      '--output-format', 'json',
      '-y'
    );

    expect(options.yes).toBe(true);
    expect(cliOverrides(options)).toEqual({
      maxDepth: 3,
      respectRobots: false,
      outputFormat: 'json',
      subdomainMethods: ['dns', 'records'],
      extraHiddenFiles: ['.env.local', 'dump.sql'],
      headers: { Authorization: 'Bearer test-token' },
      cookies: { session: 'test-session' },
      retry: { enabled: true },
    });
  });

  it('should leave unset flags out', () => {
    expect(cliOverrides(parse('https://example.com'))).toEqual({ headers: {}, cookies: {} });
  });

  it('should reject values the config does not accept', () => {
    const options = parse('https://example.com', '--output-format', 'xml');

    expect(() => cliOverrides(options)).toThrow(
      new FatalConfigError('command line: "outputFormat" must be json, sqlite or both')
    );
  });
});

describe('buildProgram', () => {
  it('should reject non-integer numbers', () => {
    expect(() => parse('https://example.com', '--max-pages', 'many')).toThrow('Not an integer.');
  });

  it('should reject a header without a name', () => {
    expect(() => parse('https://example.com', '--header', 'no-separator')).toThrow('Expected name:value.');
  });

  it('should require the seed URL', () => {
    expect(() => parse()).toThrow("missing required argument 'url'");
  });
});

describe('main', () => {
  let errorSpy: jest.SpyInstance;

  beforeEach(() => {
    errorSpy = jest.spyOn(console, 'error').mockImplementation(() => undefined);
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  it('should exit with 1 on an unusable seed', async () => {
    await expect(main(['node', 'recon-crawl', 'ftp://example.com/', '-y'])).resolves.toBe(1);
    expect(errorSpy).toHaveBeenCalledWith('❌ Seed URL scheme ftp: is not allowed');
  });

  it('should exit with 1 when the config file cannot be read', async () => {
    const code = await main(['node', 'recon-crawl', 'https://example.com/', '--config', '/nonexistent/crawl.json', '-y']);

    expect(code).toBe(1);
    expect(errorSpy).toHaveBeenCalledWith('❌ Cannot read config file /nonexistent/crawl.json');
  });
});
