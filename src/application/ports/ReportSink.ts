import { DiagnosticReport } from '../../domain/report/DiagnosticReport';

export type ReportFormat = 'json' | 'markdown';

/**
 * Port for serializing and delivering a finished report.
 */
export interface ReportSink {
  /**
   * Writes the report and returns a description of where it went.
   */
  write(report: DiagnosticReport): Promise<string>;
}
