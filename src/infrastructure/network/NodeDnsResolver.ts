import { promises as dns } from 'dns';
import { DnsResolverPort } from '../../application/ports/DnsResolverPort';
import { NetworkError, errorMessage } from '../../domain/errors/AppErrors';
import { NAME_NOT_FOUND_CODES, RESOLVER_TIMEOUT_CODES, systemErrorCode } from './errorCodes';

/**
 * Resolves hostnames through the operating system resolver, the same path
 * a browser on this machine would take (hosts file included).
 */
export class NodeDnsResolver implements DnsResolverPort {
  async resolve(hostname: string, signal: AbortSignal): Promise<string[]> {
    if (signal.aborted) {
      throw new NetworkError('TIMEOUT', `Lookup of ${hostname} cancelled`);
    }

    try {
      const entries = await dns.lookup(hostname, { all: true });
      return entries.map(entry => entry.address);
    } catch (error) {
      const code = systemErrorCode(error);
      if (code && NAME_NOT_FOUND_CODES.has(code)) {
        throw new NetworkError('DNS_FAILURE', `${hostname} does not resolve (${code})`, code);
      }
      if (code && RESOLVER_TIMEOUT_CODES.has(code)) {
        throw new NetworkError('TIMEOUT', `Resolver timed out for ${hostname} (${code})`, code);
      }
      throw new NetworkError('RESOLVER_FAILURE', `Lookup of ${hostname} failed: ${errorMessage(error)}`, code);
    }
  }
}
