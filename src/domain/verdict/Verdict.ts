import { NetworkEvent } from '../browser/NetworkEvent';
import { ProbeResult } from '../probes/ProbeResult';

export type VerdictCode =
  | 'PROVIDER_ACCESS_RESTRICTED'
  | 'PROVIDER_ENDPOINT_REMOVED'
  | 'CLIENT_NEVER_REQUESTS'
  | 'CLIENT_REQUESTS_FAIL'
  | 'CLIENT_SCRIPT_ERROR'
  | 'INCONCLUSIVE';

export const VERDICT_LABELS: Readonly<Record<VerdictCode, string>> = {
  PROVIDER_ACCESS_RESTRICTED: 'provider access restricted',
  PROVIDER_ENDPOINT_REMOVED: 'provider endpoint removed',
  CLIENT_NEVER_REQUESTS: 'client layer never triggers a data request',
  CLIENT_REQUESTS_FAIL: 'client-issued requests fail despite reachable endpoint',
  CLIENT_SCRIPT_ERROR: 'client-side script error',
  INCONCLUSIVE: 'inconclusive',
};

/**
 * Evidence a verdict rests on.
 */
export interface VerdictEvidence {
  readonly probes: readonly ProbeResult[];
  readonly events: readonly NetworkEvent[];
  readonly consoleErrors: readonly string[];
}

export interface Verdict {
  readonly code: VerdictCode;
  readonly label: string;
  /** Cites the probe results / events that triggered the match */
  readonly rationale: string;
  readonly evidence: VerdictEvidence;
  readonly recommendations: readonly string[];
}

/**
 * Inputs to classification.
 */
export interface VerdictInput {
  readonly results: readonly ProbeResult[];
  readonly events: readonly NetworkEvent[];
  readonly consoleErrors: readonly string[];
}

/**
 * Primary verdict plus every other rule that also matched, in rule order.
 */
export interface Classification {
  readonly verdict: Verdict;
  readonly additionalFindings: readonly Verdict[];
}
