/**
 * DNS Resolver
 * node:dns backed resolver
 */

import { promises as dns } from 'node:dns';
import { DnsResolver } from './discovery.types';

export class NodeDnsResolver implements DnsResolver {
  async lookup(host: string): Promise<string[]> {
    const results = await dns.lookup(host, { all: true });
    return results.map((result) => result.address);
  }

  async relatedHosts(domain: string): Promise<string[]> {
    const [ns, mx, cname] = await Promise.allSettled([
      dns.resolveNs(domain),
      dns.resolveMx(domain),
      dns.resolveCname(domain),
    ]);

    const hosts: string[] = [];
    if (ns.status === 'fulfilled') hosts.push(...ns.value);
    if (mx.status === 'fulfilled') hosts.push(...mx.value.map((record) => record.exchange));
    if (cname.status === 'fulfilled') hosts.push(...cname.value);

    return hosts.map((host) => host.replace(/\.$/, '').toLowerCase());
  }
}
