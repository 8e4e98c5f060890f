/**
 * Wordlists
 * Default lists ship under data/wordlists; a user file replaces a default
 */

import { promises as fs } from 'fs';
import path from 'path';

export type WordlistName = 'subdomains' | 'endpoints' | 'hidden-files';

export const DEFAULT_WORDLIST_DIR = path.resolve(__dirname, '../../../data/wordlists');

/**
 * One entry per line; blank lines and `#` comments are skipped, duplicates dropped
 */
export function parseWordlist(content: string): string[] {
  const entries = new Set<string>();
  for (const line of content.split(/\r?\n/)) {
    const entry = line.trim();
    if (entry && !entry.startsWith('#')) {
      entries.add(entry);
    }
  }
  return Array.from(entries);
}

export async function loadWordlist(name: WordlistName, overridePath?: string | null): Promise<string[]> {
  const file = overridePath || path.join(DEFAULT_WORDLIST_DIR, `${name}.txt`);
  const content = await fs.readFile(file, 'utf-8');
  return parseWordlist(content);
}
