/**
 * Hidden File Scanner Tests
 */

import { HiddenFileScanner, sensitivityOf } from '../hidden-file-scanner';
import { testPolicy } from '../../../__tests__/helpers/fixtures';

describe('HiddenFileScanner', () => {
  const scanner = new HiddenFileScanner(['.env', '/.git/config', '*.bak', '*~'], ['backup.zip', ' .env ']);

  it('should expand wildcard entries against the page file name and index files', () => {
    expect(scanner.expand('https://example.com/app/index.php')).toEqual([
      '.env',
      '.git/config',
      'index.php.bak',
      'index.html.bak',
      'index.php~',
      'index.html~',
      'backup.zip',
    ]);
  });

  it('should include another page file name first', () => {
    expect(scanner.expand('https://example.com/shop/view.aspx').slice(2, 5)).toEqual([
      'view.aspx.bak',
      'index.php.bak',
      'index.html.bak',
    ]);
  });

  it('should probe at the host root', () => {
    const candidates = scanner.candidates('https://example.com/app/index.php', testPolicy());

    expect(candidates[0]).toEqual({ url: 'https://example.com/.env', path: '/.env' });
    expect(candidates[1]).toEqual({ url: 'https://example.com/.git/config', path: '/.git/config' });
    expect(candidates).toHaveLength(7);
  });

  it('should treat anything but 404 and redirects as present', () => {
    expect([200, 403, 500, 404, 301, 302].map((status) => scanner.isHit(status))).toEqual([
      true,
      true,
      true,
      false,
      false,
      false,
    ]);
  });
});

describe('sensitivityOf', () => {
  it.each([
    ['/.env', 1],
    ['/.git/config', 1],
    ['/wp-config.php.bak', 2],
    ['/backup.zip', 3],
    ['/debug.log', 4],
    ['/db.old', 4],
    ['/index.php~', 5],
  ])('should rate %s as %i', (path, level) => {
    expect(sensitivityOf(path)).toBe(level);
  });
});
