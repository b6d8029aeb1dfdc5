import * as fs from 'fs/promises';
import * as path from 'path';
import { ReportFormat, ReportSink } from '../../application/ports/ReportSink';
import { ReportFormatter } from '../../application/services/ReportFormatter';
import { DiagnosticReport } from '../../domain/report/DiagnosticReport';
import { getLogger } from '../logging';

const logger = getLogger('Report');

const EXTENSIONS: Record<ReportFormat, string> = {
  json: 'json',
  markdown: 'md',
};

/**
 * Writes each report to its own file in the output directory,
 * named `diagnostic-<date>-<runId prefix>.<ext>`.
 */
export class FileReportSink implements ReportSink {
  constructor(
    private readonly outputDir: string,
    private readonly format: ReportFormat,
    private readonly formatter: ReportFormatter = new ReportFormatter()
  ) {}

  /**
   * Get the file path for a report.
   */
  getFilePath(report: DiagnosticReport): string {
    const date = report.generatedAt.split('T')[0];
    const filename = `diagnostic-${date}-${report.runId.substring(0, 8)}.${EXTENSIONS[this.format]}`;
    return path.join(this.outputDir, filename);
  }

  async write(report: DiagnosticReport): Promise<string> {
    await fs.mkdir(this.outputDir, { recursive: true });

    const filePath = this.getFilePath(report);
    await fs.writeFile(filePath, this.formatter.format(report, this.format), 'utf-8');

    logger.info(`Report written to ${filePath}`, { format: this.format });
    return filePath;
  }
}
