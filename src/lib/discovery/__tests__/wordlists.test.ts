/**
 * Wordlist Tests
 */

import { promises as fs } from 'fs';
import os from 'os';
import path from 'path';
import { loadWordlist, parseWordlist } from '../wordlists';

describe('parseWordlist', () => {
  it('should skip comments and blanks and drop duplicates', () => {
    expect(parseWordlist('# comment\nwww\n\n  mail  \nwww\r\nftp')).toEqual(['www', 'mail', 'ftp']);
  });
});

describe('loadWordlist', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), 'wordlists-'));
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  it('should load the bundled default list', async () => {
    const entries = await loadWordlist('subdomains');

    expect(entries).toContain('www');
    expect(entries.some((entry) => entry.startsWith('#'))).toBe(false);
  });

  it('should read a user file instead of the default', async () => {
    const file = path.join(dir, 'custom.txt');
    await fs.writeFile(file, 'staging\nqa\n');

    await expect(loadWordlist('subdomains', file)).resolves.toEqual(['staging', 'qa']);
  });

  it('should reject a missing file', async () => {
    await expect(loadWordlist('endpoints', path.join(dir, 'missing.txt'))).rejects.toThrow('ENOENT');
  });
});
