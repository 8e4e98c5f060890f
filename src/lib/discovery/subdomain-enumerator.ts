/**
 * Subdomain Enumerator
 * Wordlist guesses under the base domain, optionally filtered by DNS,
 * plus hosts named by the domain's own DNS records
 */

import pLimit from 'p-limit';
import { CrawlLogger } from '../logging/crawl.logger';
import { DnsResolver, SubdomainCandidate, SubdomainMethod } from './discovery.types';

const LABEL_PATTERN = /^[a-z0-9](?:[a-z0-9-]{0,61}[a-z0-9])?(?:\.[a-z0-9](?:[a-z0-9-]{0,61}[a-z0-9])?)*$/;

export interface SubdomainEnumeratorOptions {
  methods: readonly SubdomainMethod[];
  wordlist: readonly string[];
  resolver: DnsResolver;
  concurrency: number;
  logger: CrawlLogger;
}

interface Resolution {
  host: string;
  addresses: string[];
}

export class SubdomainEnumerator {
  constructor(private readonly options: SubdomainEnumeratorOptions) {}

  /**
   * Candidate hosts under `baseDomain`, each tagged with the method that
   * produced it. A guess that both resolves and is on the wordlist counts
   * as `dns`.
   */
  async enumerate(baseDomain: string): Promise<SubdomainCandidate[]> {
    const domain = baseDomain.toLowerCase();
    const methods = new Set(this.options.methods);
    const limit = pLimit(Math.max(1, this.options.concurrency));
    const candidates = new Map<string, SubdomainCandidate>();

    const guesses = this.buildGuesses(domain);

    if (methods.has('dns')) {
      const resolutions = await Promise.all(guesses.map((host) => limit(() => this.resolve(host))));
      for (const resolution of resolutions) {
        if (resolution) {
          candidates.set(resolution.host, {
            host: resolution.host,
            method: 'dns',
            resolved: true,
            addresses: resolution.addresses,
            queued: false,
          });
        }
      }
      this.options.logger.debug(`DNS resolved ${candidates.size}/${guesses.length} subdomain guesses`);
    }

    if (methods.has('wordlist')) {
      for (const host of guesses) {
        if (!candidates.has(host)) {
          candidates.set(host, { host, method: 'wordlist', resolved: false, addresses: [], queued: false });
        }
      }
    }

    if (methods.has('records')) {
      const related = await this.relatedHosts(domain);
      const fresh = related.filter((host) => !candidates.has(host));
      const resolutions = await Promise.all(fresh.map((host) => limit(() => this.resolve(host))));
      fresh.forEach((host, index) => {
        const resolution = resolutions[index];
        candidates.set(host, {
          host,
          method: 'records',
          resolved: resolution !== null,
          addresses: resolution ? resolution.addresses : [],
          queued: false,
        });
      });
    }

    this.options.logger.info(`🌐 Subdomain enumeration found ${candidates.size} candidates for ${domain}`);
    return Array.from(candidates.values());
  }

  private buildGuesses(domain: string): string[] {
    const hosts = new Set<string>();
    for (const word of this.options.wordlist) {
      const label = word.trim().toLowerCase().replace(/\.$/, '');
      if (!LABEL_PATTERN.test(label)) {
        this.options.logger.debug(`Skipping invalid subdomain label "${word}"`);
        continue;
      }
      hosts.add(`${label}.${domain}`);
    }
    return Array.from(hosts);
  }

  private async resolve(host: string): Promise<Resolution | null> {
    try {
      const addresses = await this.options.resolver.lookup(host);
      return addresses.length > 0 ? { host, addresses } : null;
    } catch (error) {
      this.options.logger.debug(`${host} does not resolve: ${error instanceof Error ? error.message : String(error)}`);
      return null;
    }
  }

  private async relatedHosts(domain: string): Promise<string[]> {
    try {
      const hosts = await this.options.resolver.relatedHosts(domain);
      return Array.from(new Set(hosts)).filter((host) => host !== domain && host.endsWith(`.${domain}`));
    } catch (error) {
      this.options.logger.warn(`DNS record lookup failed for ${domain}: ${error instanceof Error ? error.message : String(error)}`);
      return [];
    }
  }
}
