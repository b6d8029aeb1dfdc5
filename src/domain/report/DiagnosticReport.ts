import { NetworkEvent } from '../browser/NetworkEvent';
import { ProbeResult } from '../probes/ProbeResult';
import { ValueObject } from '../shared/ValueObject';
import { Verdict } from '../verdict/Verdict';

/**
 * Aggregate status of a completed run, mapped to exit codes by the CLI.
 */
export type RunStatus = 'HEALTHY' | 'FAILURES_DETECTED';

export interface DiagnosticReportProps {
  runId: string;
  /** ISO-8601 */
  generatedAt: string;
  /** ISO-8601 */
  startedAt: string;
  durationMs: number;
  probeResults: ProbeResult[];
  networkEvents: NetworkEvent[];
  consoleErrors: string[];
  verdict: Verdict;
  additionalFindings: Verdict[];
  runStatus: RunStatus;
  screenshotPath?: string;
}

export interface DiagnosticReportInput {
  runId: string;
  generatedAt: Date;
  startedAt: Date;
  probeResults: readonly ProbeResult[];
  networkEvents: readonly NetworkEvent[];
  consoleErrors: readonly string[];
  verdict: Verdict;
  additionalFindings?: readonly Verdict[];
  screenshotPath?: string;
}

/**
 * The evidentiary output of one run. Inputs are copied and frozen on
 * creation, so later activity in the run never shows through.
 */
export class DiagnosticReport extends ValueObject<DiagnosticReportProps> {
  private constructor(props: DiagnosticReportProps) {
    super(props);
  }

  static create(input: DiagnosticReportInput): DiagnosticReport {
    return new DiagnosticReport({
      runId: input.runId,
      generatedAt: input.generatedAt.toISOString(),
      startedAt: input.startedAt.toISOString(),
      durationMs: Math.max(0, input.generatedAt.getTime() - input.startedAt.getTime()),
      probeResults: [...input.probeResults],
      networkEvents: [...input.networkEvents],
      consoleErrors: [...input.consoleErrors],
      verdict: input.verdict,
      additionalFindings: [...(input.additionalFindings ?? [])],
      runStatus: DiagnosticReport.deriveStatus(input.probeResults, input.networkEvents),
      ...(input.screenshotPath !== undefined && { screenshotPath: input.screenshotPath }),
    });
  }

  /**
   * Healthy only when every probe succeeded and no tracked request failed.
   */
  static deriveStatus(
    results: readonly ProbeResult[],
    events: readonly NetworkEvent[]
  ): RunStatus {
    const allProbesOk = results.every(r => r.status === 'SUCCESS');
    const noFailedEvents = events.every(e => !e.failed);
    return allProbesOk && noFailedEvents ? 'HEALTHY' : 'FAILURES_DETECTED';
  }

  get runId(): string {
    return this.props.runId;
  }

  get generatedAt(): string {
    return this.props.generatedAt;
  }

  get startedAt(): string {
    return this.props.startedAt;
  }

  get durationMs(): number {
    return this.props.durationMs;
  }

  get probeResults(): readonly ProbeResult[] {
    return this.props.probeResults;
  }

  get networkEvents(): readonly NetworkEvent[] {
    return this.props.networkEvents;
  }

  get consoleErrors(): readonly string[] {
    return this.props.consoleErrors;
  }

  get verdict(): Verdict {
    return this.props.verdict;
  }

  get additionalFindings(): readonly Verdict[] {
    return this.props.additionalFindings;
  }

  get runStatus(): RunStatus {
    return this.props.runStatus;
  }

  get screenshotPath(): string | undefined {
    return this.props.screenshotPath;
  }

  /**
   * Plain serializable form.
   */
  toJSON(): Readonly<DiagnosticReportProps> {
    return this.props;
  }
}
