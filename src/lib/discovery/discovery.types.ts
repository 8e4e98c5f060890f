/**
 * Discovery Types
 * Auxiliary discovery: subdomains, guessed endpoints, hidden files
 */

/**
 * - `dns`: resolve each wordlist guess, keep the ones that resolve
 * - `wordlist`: keep every guess unresolved, to be probed over HTTP
 * - `records`: NS/MX/CNAME targets of the base domain that fall inside it
 */
export type SubdomainMethod = 'dns' | 'wordlist' | 'records';

export const SUBDOMAIN_METHODS: readonly SubdomainMethod[] = ['dns', 'wordlist', 'records'];

export interface SubdomainCandidate {
  host: string;
  method: SubdomainMethod;
  resolved: boolean;
  addresses: string[];

  /**
   * Queued for crawling (false when out of scope or over budget)
   */
  queued: boolean;
}

export interface GuessedEndpointHit {
  url: string;
  path: string;
  statusCode: number;
  contentType: string;
}

/**
 * 1 = .env/.git/.ssh, 2 = config files, 3 = backups, 4 = logs/.bak/.old, 5 = other
 */
export type SensitivityLevel = 1 | 2 | 3 | 4 | 5;

export interface HiddenFileHit {
  url: string;
  path: string;
  statusCode: number;
  contentType: string;
  sensitivity: SensitivityLevel;
}

/**
 * Name resolution used by subdomain enumeration and the seed preflight
 */
export interface DnsResolver {
  /**
   * Addresses for a host; rejects when it does not resolve
   */
  lookup(host: string): Promise<string[]>;

  /**
   * Host names from the domain's NS, MX and CNAME records
   */
  relatedHosts(domain: string): Promise<string[]>;
}
