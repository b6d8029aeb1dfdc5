/**
 * Port for hostname resolution.
 *
 * Implementations throw `NetworkError` with kind `DNS_FAILURE` when the name
 * does not exist, `TIMEOUT` when the resolver gives up, and
 * `RESOLVER_FAILURE` otherwise.
 */
export interface DnsResolverPort {
  /**
   * Resolves a hostname to its addresses.
   */
  resolve(hostname: string, signal: AbortSignal): Promise<string[]>;
}
