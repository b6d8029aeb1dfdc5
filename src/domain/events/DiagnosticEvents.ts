import { BaseDomainEvent } from './DomainEvent';
import { ProbeResult } from '../probes/ProbeResult';
import { RunStatus } from '../report/DiagnosticReport';
import { Verdict } from '../verdict/Verdict';

/**
 * Event raised when a diagnostic run starts.
 */
export class RunStartedEvent extends BaseDomainEvent {
  static readonly TYPE = 'diagnostics.run_started';

  constructor(
    runId: string,
    public readonly probeCount: number,
    public readonly concurrency: number,
    public readonly deadlineMs: number
  ) {
    super(RunStartedEvent.TYPE, runId);
  }
}

/**
 * Event raised when a probe result is recorded (including skipped probes).
 */
export class ProbeCompletedEvent extends BaseDomainEvent {
  static readonly TYPE = 'diagnostics.probe_completed';

  constructor(
    runId: string,
    public readonly result: ProbeResult
  ) {
    super(ProbeCompletedEvent.TYPE, runId);
  }
}

/**
 * Event raised when the browser session has been torn down.
 */
export class BrowserSessionCompletedEvent extends BaseDomainEvent {
  static readonly TYPE = 'diagnostics.browser_session_completed';

  constructor(
    runId: string,
    public readonly pageUrl: string,
    public readonly triggerActivated: boolean,
    public readonly eventCount: number,
    public readonly failedEventCount: number,
    public readonly consoleErrorCount: number
  ) {
    super(BrowserSessionCompletedEvent.TYPE, runId);
  }
}

/**
 * Event raised once the verdict has been classified.
 */
export class VerdictReachedEvent extends BaseDomainEvent {
  static readonly TYPE = 'diagnostics.verdict_reached';

  constructor(
    runId: string,
    public readonly verdict: Verdict,
    public readonly additionalFindings: readonly Verdict[]
  ) {
    super(VerdictReachedEvent.TYPE, runId);
  }
}

/**
 * Event raised when a run ends, with or without a report.
 */
export class RunCompletedEvent extends BaseDomainEvent {
  static readonly TYPE = 'diagnostics.run_completed';

  constructor(
    runId: string,
    public readonly status: RunStatus | 'SETUP_FAILURE',
    public readonly durationMs: number,
    public readonly error?: string
  ) {
    super(RunCompletedEvent.TYPE, runId);
  }
}
