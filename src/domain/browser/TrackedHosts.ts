/**
 * Allowlist of hosts whose requests are recorded during a browser session.
 *
 * An entry without `/` matches the host itself and its subdomains.
 * An entry with `/` matches host plus path prefix, e.g. `example.org/api/`.
 */
export class TrackedHosts {
  private readonly entries: readonly { host: string; pathPrefix?: string }[];

  constructor(entries: readonly string[]) {
    this.entries = entries
      .map(entry => entry.trim().toLowerCase())
      .filter(entry => entry.length > 0)
      .map(entry => {
        const slash = entry.indexOf('/');
        return slash === -1
          ? { host: entry }
          : { host: entry.slice(0, slash), pathPrefix: entry.slice(slash) };
      });
  }

  matches(url: string): boolean {
    let parsed: URL;
    try {
      parsed = new URL(url);
    } catch {
      return false;
    }
    if (parsed.protocol !== 'http:' && parsed.protocol !== 'https:' && parsed.protocol !== 'ws:' && parsed.protocol !== 'wss:') {
      return false;
    }

    const host = parsed.hostname.toLowerCase();
    return this.entries.some(entry => {
      const hostMatches = host === entry.host || host.endsWith(`.${entry.host}`);
      if (!hostMatches) return false;
      return entry.pathPrefix === undefined || parsed.pathname.startsWith(entry.pathPrefix);
    });
  }
}
