import { NetworkEvent, describeNetworkEvent } from '../browser/NetworkEvent';
import { ProbeResult, describeProbeResult } from '../probes/ProbeResult';
import { VerdictCode, VerdictInput } from './Verdict';

/**
 * What a matching rule cites.
 */
export interface RuleMatch {
  rationale: string;
  probes?: readonly ProbeResult[];
  events?: readonly NetworkEvent[];
  consoleErrors?: readonly string[];
}

/**
 * One row of the verdict table. Rules are evaluated in table order and
 * written most-specific-first.
 */
export interface VerdictRule {
  readonly code: VerdictCode;
  readonly recommendations: readonly string[];
  match(input: VerdictInput): RuleMatch | null;
}

const ACCESS_DENIED_STATUSES = new Set([401, 403]);

const isDirectProbe = (result: ProbeResult): boolean => result.kind !== 'BROWSER_LAYER_TRIGGER';

const listProbes = (results: readonly ProbeResult[]): string =>
  results.map(describeProbeResult).join('; ');

const listEvents = (events: readonly NetworkEvent[]): string =>
  events.map(describeNetworkEvent).join('; ');

export const providerAccessRestrictedRule: VerdictRule = {
  code: 'PROVIDER_ACCESS_RESTRICTED',
  recommendations: [
    'The provider rejects anonymous requests; its API now requires credentials or a paid plan.',
    'Evaluate an alternative AIS feed for the overlay and migrate the client to it.',
  ],
  match({ results }) {
    const rejected = results.filter(
      r =>
        r.role === 'provider' &&
        r.kind === 'HTTP_GET' &&
        r.status === 'FAILURE' &&
        r.httpStatus !== undefined &&
        ACCESS_DENIED_STATUSES.has(r.httpStatus)
    );
    if (rejected.length === 0) {
      return null;
    }
    return {
      rationale: `Provider endpoint rejected the request: ${listProbes(rejected)}`,
      probes: rejected,
    };
  },
};

export const providerEndpointRemovedRule: VerdictRule = {
  code: 'PROVIDER_ENDPOINT_REMOVED',
  recommendations: [
    'The provider hostname no longer resolves; the endpoint the overlay depends on must be replaced.',
    'Search the page scripts for the hard-coded provider host.',
  ],
  match({ results }) {
    const unresolved = results.filter(
      r => r.role === 'provider' && r.kind === 'DNS_RESOLUTION' && r.status === 'FAILURE'
    );
    if (unresolved.length === 0) {
      return null;
    }
    return {
      rationale: `Provider hostname does not resolve: ${listProbes(unresolved)}`,
      probes: unresolved,
    };
  },
};

export const clientNeverRequestsRule: VerdictRule = {
  code: 'CLIENT_NEVER_REQUESTS',
  recommendations: [
    'Inspect the handler behind the overlay control; activating it issues no data request.',
    'Check whether the layer was disabled or removed from the page scripts.',
  ],
  match({ results, events }) {
    const providers = results.filter(r => r.role === 'provider' && isDirectProbe(r));
    const sessions = results.filter(
      r => r.kind === 'BROWSER_LAYER_TRIGGER' && r.status === 'SUCCESS'
    );
    if (
      providers.length === 0 ||
      sessions.length === 0 ||
      events.length > 0 ||
      providers.some(r => r.status !== 'SUCCESS')
    ) {
      return null;
    }
    return {
      rationale:
        `All ${providers.length} provider probes succeeded and ${listProbes(sessions)} ` +
        `activated the overlay, but no request to a tracked host was issued during the session.`,
      probes: [...sessions, ...providers],
    };
  },
};

export const clientRequestsFailRule: VerdictRule = {
  code: 'CLIENT_REQUESTS_FAIL',
  recommendations: [
    'Compare the browser request (origin, headers, parameters) with the direct probe; look for CORS or authorization differences.',
    'Check whether the client builds the request URL from outdated parameters.',
  ],
  match({ results, events }) {
    if (events.length === 0 || events.some(e => !e.failed)) {
      return null;
    }
    // Every host the client called must have been probed directly, and answered.
    const eventHosts = [...new Set(events.map(e => e.host))];
    const direct = results.filter(r => isDirectProbe(r) && eventHosts.includes(r.host));
    const unprobed = eventHosts.some(host => !direct.some(r => r.host === host));
    if (unprobed || direct.some(r => r.status !== 'SUCCESS')) {
      return null;
    }
    return {
      rationale:
        `All ${events.length} client-issued requests failed: ${listEvents(events)}. ` +
        `Direct probes to the same hosts succeeded: ${listProbes(direct)}`,
      probes: direct,
      events,
    };
  },
};

export const clientScriptErrorRule: VerdictRule = {
  code: 'CLIENT_SCRIPT_ERROR',
  recommendations: [
    'Fix the captured script error; it can stop the overlay from initializing.',
  ],
  match({ consoleErrors }) {
    if (consoleErrors.length === 0) {
      return null;
    }
    const quoted = consoleErrors.map(e => `"${e}"`).join('; ');
    return {
      rationale: `${consoleErrors.length} script error(s) captured during the session: ${quoted}`,
      consoleErrors,
    };
  },
};

export const inconclusiveRule: VerdictRule = {
  code: 'INCONCLUSIVE',
  recommendations: [
    'Review the raw evidence attached to this report.',
    'Inspect the page network traffic for data hosts missing from the tracked host allowlist.',
  ],
  match({ results, events, consoleErrors }) {
    const succeeded = results.filter(r => r.status === 'SUCCESS').length;
    const failedEvents = events.filter(e => e.failed).length;
    const notOk = results.filter(r => r.status !== 'SUCCESS');
    const summary =
      `No failure signature matched: ${succeeded}/${results.length} probes succeeded, ` +
      `${events.length} tracked requests (${failedEvents} failed), ` +
      `${consoleErrors.length} script errors.`;
    return {
      rationale: notOk.length > 0 ? `${summary} Unhealthy probes: ${listProbes(notOk)}` : summary,
      probes: results,
      events,
      consoleErrors,
    };
  },
};

/**
 * Default rule table, most specific first. Append new failure signatures
 * before `inconclusiveRule`.
 */
export const DEFAULT_VERDICT_RULES: readonly VerdictRule[] = [
  providerAccessRestrictedRule,
  providerEndpointRemovedRule,
  clientNeverRequestsRule,
  clientRequestsFailRule,
  clientScriptErrorRule,
  inconclusiveRule,
];
