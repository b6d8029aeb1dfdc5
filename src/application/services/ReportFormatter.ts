import { NetworkEvent } from '../../domain/browser/NetworkEvent';
import { ProbeResult, ProbeStatus } from '../../domain/probes/ProbeResult';
import { DiagnosticReport, RunStatus } from '../../domain/report/DiagnosticReport';
import { Verdict } from '../../domain/verdict/Verdict';
import { ReportFormat } from '../ports/ReportSink';

/**
 * Renders a DiagnosticReport as JSON or Markdown. Pure: no I/O.
 */
export class ReportFormatter {
  format(report: DiagnosticReport, format: ReportFormat): string {
    return format === 'markdown' ? this.toMarkdown(report) : this.toJson(report);
  }

  toJson(report: DiagnosticReport): string {
    return JSON.stringify(report, null, 2);
  }

  toMarkdown(report: DiagnosticReport): string {
    const sections = [
      this.buildHeader(report),
      this.buildVerdictSection(report.verdict),
      this.buildProbeSection(report.probeResults),
      this.buildNetworkSection(report.networkEvents),
      this.buildConsoleSection(report.consoleErrors),
    ];

    if (report.additionalFindings.length > 0) {
      sections.push(this.buildAdditionalFindings(report.additionalFindings));
    }
    if (report.screenshotPath) {
      sections.push(`## Screenshot\n\n![Page after overlay activation](${report.screenshotPath})`);
    }

    return sections.join('\n\n') + '\n';
  }

  private buildHeader(report: DiagnosticReport): string {
    return `# Vessel Overlay Diagnostic Report

**Run ID:** \`${report.runId}\`
**Started:** ${report.startedAt}
**Generated:** ${report.generatedAt}
**Duration:** ${this.formatDuration(report.durationMs)}
**Status:** ${this.formatRunStatus(report.runStatus)}

---`;
  }

  private buildVerdictSection(verdict: Verdict): string {
    const steps = verdict.recommendations.map((step, i) => `${i + 1}. ${step}`).join('\n');
    return `## Verdict

**${verdict.label}** (\`${verdict.code}\`)

${verdict.rationale}

### Recommended Next Steps

${steps}`;
  }

  private buildProbeSection(results: readonly ProbeResult[]): string {
    const rows = results.map(r => {
      const http = r.httpStatus !== undefined ? String(r.httpStatus) : '-';
      const latency = r.latencyMs !== undefined ? `${r.latencyMs}ms` : '-';
      const detail = [r.errorKind, r.detail].filter(Boolean).join(': ');
      return `| ${this.cell(r.probeId)} | ${r.kind} | ${r.role} | ${this.formatStatus(r.status)} | ${http} | ${latency} | ${this.cell(detail || '-')} |`;
    });

    return `## Probe Results

| Probe | Kind | Role | Status | HTTP | Latency | Detail |
|-------|------|------|--------|------|---------|--------|
${rows.join('\n')}`;
  }

  private buildNetworkSection(events: readonly NetworkEvent[]): string {
    if (events.length === 0) {
      return '## Network Activity\n\n_No tracked requests were recorded during the observation window._';
    }

    const rows = events.map((e, i) => {
      const status = e.status !== undefined ? String(e.status) : '-';
      const duration = e.durationMs !== undefined ? `${e.durationMs}ms` : '-';
      const result = e.failed ? `❌ ${this.cell(e.errorText ?? 'failed')}` : '✅ ok';
      return `| ${i + 1} | ${e.method} | ${this.cell(e.url)} | ${status} | ${duration} | ${result} |`;
    });

    return `## Network Activity

| # | Method | URL | Status | Duration | Result |
|---|--------|-----|--------|----------|--------|
${rows.join('\n')}`;
  }

  private buildConsoleSection(errors: readonly string[]): string {
    if (errors.length === 0) {
      return '## Console Errors\n\n_None captured._';
    }
    return `## Console Errors

\`\`\`
${errors.join('\n')}
\`\`\``;
  }

  private buildAdditionalFindings(findings: readonly Verdict[]): string {
    const items = findings.map(v => `- **${v.label}** (\`${v.code}\`): ${v.rationale}`);
    return `## Additional Findings\n\n${items.join('\n')}`;
  }

  // Helper methods

  private formatDuration(ms: number): string {
    const seconds = Math.floor(ms / 1000);
    const minutes = Math.floor(seconds / 60);
    const remainingSeconds = seconds % 60;
    return `${minutes}m ${remainingSeconds}s`;
  }

  private formatRunStatus(status: RunStatus): string {
    const statusMap: Record<RunStatus, string> = {
      HEALTHY: '✅ Healthy',
      FAILURES_DETECTED: '⚠️ Failures Detected',
    };
    return statusMap[status];
  }

  private formatStatus(status: ProbeStatus): string {
    const statusMap: Record<ProbeStatus, string> = {
      SUCCESS: '✅ SUCCESS',
      FAILURE: '❌ FAILURE',
      TIMEOUT: '⏱️ TIMEOUT',
      ERROR: '⚠️ ERROR',
    };
    return statusMap[status];
  }

  private cell(text: string): string {
    return text.replace(/\r?\n/g, ' ').replace(/\|/g, '\\|');
  }
}
