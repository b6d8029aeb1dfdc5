import { deepFreeze } from '../shared/ValueObject';

/**
 * Kind of target a probe exercises.
 */
export type ProbeKind = 'DNS_RESOLUTION' | 'HTTP_GET' | 'BROWSER_LAYER_TRIGGER';

/**
 * Whose infrastructure a probe targets: a third-party data provider
 * or the map service itself.
 */
export type ProbeRole = 'provider' | 'service';

interface ProbeSpecBase {
  /** Unique identifier within the registry */
  readonly id: string;
  /** Hostname (DNS) or absolute URL (HTTP, browser) */
  readonly target: string;
  readonly role: ProbeRole;
  /** Upper bound for the probe, in milliseconds */
  readonly timeoutMs: number;
  readonly description?: string;
}

export interface DnsProbeSpec extends ProbeSpecBase {
  readonly kind: 'DNS_RESOLUTION';
}

export interface HttpProbeSpec extends ProbeSpecBase {
  readonly kind: 'HTTP_GET';
  /** Status pattern counted as success, e.g. `200,403` or `2xx` */
  readonly expectedStatus?: string;
  /** Substring the response content type must contain on success */
  readonly expectedContentType?: string;
  readonly headers?: Readonly<Record<string, string>>;
}

/**
 * How to reach and activate the overlay control on the live page.
 */
export interface OverlayTrigger {
  /** Candidate selectors for the control, tried in order */
  readonly selectors: readonly string[];
  /** Control (e.g. a menu) that must be opened before the overlay control is reachable */
  readonly revealSelector?: string;
  /** Element whose presence marks the map as initialized */
  readonly readySelector?: string;
}

export interface BrowserProbeSpec extends ProbeSpecBase {
  readonly kind: 'BROWSER_LAYER_TRIGGER';
  readonly trigger: OverlayTrigger;
}

export type ProbeSpec = DnsProbeSpec | HttpProbeSpec | BrowserProbeSpec;

export type NetworkProbeSpec = DnsProbeSpec | HttpProbeSpec;

export function isNetworkProbe(spec: ProbeSpec): spec is NetworkProbeSpec {
  return spec.kind === 'DNS_RESOLUTION' || spec.kind === 'HTTP_GET';
}

/**
 * Hostname a probe talks to, lower-cased.
 */
export function probeHost(spec: Pick<ProbeSpec, 'kind' | 'target'>): string {
  if (spec.kind === 'DNS_RESOLUTION') {
    return spec.target.trim().toLowerCase();
  }
  return new URL(spec.target).hostname.toLowerCase();
}

/**
 * Returns a frozen copy of the spec.
 */
export function freezeProbeSpec<T extends ProbeSpec>(spec: T): T {
  return deepFreeze(structuredClone(spec));
}
