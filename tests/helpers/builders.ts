import { NetworkEvent, NetworkEventProps, createNetworkEvent } from '../../src/domain/browser/NetworkEvent';
import { BrowserProbeSpec, DnsProbeSpec, HttpProbeSpec, ProbeSpec } from '../../src/domain/probes/ProbeSpec';
import { ProbeOutcome, ProbeResult, createProbeResult } from '../../src/domain/probes/ProbeResult';

export const T0 = Date.parse('2024-05-01T10:00:00.000Z');

export function dnsSpec(overrides: Partial<DnsProbeSpec> = {}): DnsProbeSpec {
  return {
    id: 'dns-tiles',
    kind: 'DNS_RESOLUTION',
    target: 'tiles.example.com',
    role: 'provider',
    timeoutMs: 1000,
    ...overrides,
  };
}

export function httpSpec(overrides: Partial<HttpProbeSpec> = {}): HttpProbeSpec {
  return {
    id: 'http-tiles',
    kind: 'HTTP_GET',
    target: 'https://tiles.example.com/tile.png',
    role: 'provider',
    timeoutMs: 1000,
    ...overrides,
  };
}

export function browserSpec(overrides: Partial<BrowserProbeSpec> = {}): BrowserProbeSpec {
  return {
    id: 'map-layer',
    kind: 'BROWSER_LAYER_TRIGGER',
    target: 'https://map.example.org',
    role: 'service',
    timeoutMs: 5000,
    trigger: { selectors: ['#overlay-toggle'] },
    ...overrides,
  };
}

export function result(spec: ProbeSpec, outcome: ProbeOutcome): ProbeResult {
  return createProbeResult(spec, outcome, new Date(T0));
}

export function event(props: Partial<NetworkEventProps> = {}, windowClosedAt = T0 + 10000): NetworkEvent {
  return createNetworkEvent(
    {
      url: 'https://tiles.example.com/tile.png',
      method: 'GET',
      startedAt: T0,
      ...props,
    },
    windowClosedAt
  );
}
