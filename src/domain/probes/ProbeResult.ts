import { BrowserErrorKind, NetworkErrorKind } from '../errors/AppErrors';
import { deepFreeze } from '../shared/ValueObject';
import { ProbeKind, ProbeRole, ProbeSpec, probeHost } from './ProbeSpec';

export type ProbeStatus = 'SUCCESS' | 'FAILURE' | 'TIMEOUT' | 'ERROR';

/**
 * Why a probe did not succeed. `SKIPPED` marks probes the run deadline
 * prevented from starting.
 */
export type ProbeErrorKind = NetworkErrorKind | BrowserErrorKind | 'SKIPPED';

/**
 * Outcome of a single probe execution, before it is bound to its spec.
 */
export interface ProbeOutcome {
  status: ProbeStatus;
  httpStatus?: number;
  latencyMs?: number;
  errorKind?: ProbeErrorKind;
  detail?: string;
  skipped?: boolean;
}

/**
 * Normalized result of one probe. Created once per spec per run, frozen.
 */
export interface ProbeResult {
  readonly probeId: string;
  readonly kind: ProbeKind;
  readonly role: ProbeRole;
  readonly target: string;
  readonly host: string;
  readonly status: ProbeStatus;
  readonly httpStatus?: number;
  readonly latencyMs?: number;
  readonly errorKind?: ProbeErrorKind;
  readonly detail?: string;
  readonly skipped?: boolean;
  /** ISO-8601 completion time */
  readonly timestamp: string;
}

export function createProbeResult(
  spec: ProbeSpec,
  outcome: ProbeOutcome,
  completedAt: Date = new Date()
): ProbeResult {
  const result: ProbeResult = {
    probeId: spec.id,
    kind: spec.kind,
    role: spec.role,
    target: spec.target,
    host: probeHost(spec),
    status: outcome.status,
    timestamp: completedAt.toISOString(),
    ...(outcome.httpStatus !== undefined && { httpStatus: outcome.httpStatus }),
    ...(outcome.latencyMs !== undefined && { latencyMs: outcome.latencyMs }),
    ...(outcome.errorKind !== undefined && { errorKind: outcome.errorKind }),
    ...(outcome.detail !== undefined && { detail: outcome.detail }),
    ...(outcome.skipped && { skipped: true }),
  };
  return deepFreeze(result);
}

/**
 * One-line description used in rationales and logs,
 * e.g. `marinetraffic-web (https://...) FAILURE HTTP 403`.
 */
export function describeProbeResult(result: ProbeResult): string {
  const parts = [`${result.probeId} (${result.target})`, result.status];
  if (result.httpStatus !== undefined) {
    parts.push(`HTTP ${result.httpStatus}`);
  }
  if (result.errorKind && result.errorKind !== 'HTTP_STATUS') {
    parts.push(`[${result.errorKind}]`);
  }
  if (result.detail) {
    parts.push(`- ${result.detail}`);
  }
  return parts.join(' ');
}
