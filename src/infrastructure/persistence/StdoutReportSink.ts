import { ReportFormat, ReportSink } from '../../application/ports/ReportSink';
import { ReportFormatter } from '../../application/services/ReportFormatter';
import { DiagnosticReport } from '../../domain/report/DiagnosticReport';

/**
 * Minimal writable target, satisfied by `process.stdout`.
 */
export interface TextOutput {
  write(chunk: string): boolean;
}

/**
 * Prints the report to standard output. Pair with stderr-only logging so
 * the output can be piped.
 */
export class StdoutReportSink implements ReportSink {
  constructor(
    private readonly format: ReportFormat,
    private readonly formatter: ReportFormatter = new ReportFormatter(),
    private readonly output: TextOutput = process.stdout
  ) {}

  async write(report: DiagnosticReport): Promise<string> {
    const content = this.formatter.format(report, this.format);
    this.output.write(content.endsWith('\n') ? content : `${content}\n`);
    return 'stdout';
  }
}
