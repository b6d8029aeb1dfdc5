/**
 * Vessel Overlay Diagnostics
 * Library entry point
 */

// Domain
export { StatusPattern } from './domain/probes/StatusPattern';
export { isNetworkProbe, probeHost } from './domain/probes/ProbeSpec';
export type {
  ProbeSpec,
  ProbeKind,
  ProbeRole,
  DnsProbeSpec,
  HttpProbeSpec,
  BrowserProbeSpec,
  OverlayTrigger,
} from './domain/probes/ProbeSpec';
export { createProbeResult, describeProbeResult } from './domain/probes/ProbeResult';
export type { ProbeResult, ProbeStatus, ProbeErrorKind } from './domain/probes/ProbeResult';
export { createNetworkEvent, describeNetworkEvent } from './domain/browser/NetworkEvent';
export type { NetworkEvent } from './domain/browser/NetworkEvent';
export { TrackedHosts } from './domain/browser/TrackedHosts';
export { VerdictClassifier } from './domain/verdict/VerdictClassifier';
export { DEFAULT_VERDICT_RULES } from './domain/verdict/VerdictRules';
export type { VerdictRule } from './domain/verdict/VerdictRules';
export { VERDICT_LABELS } from './domain/verdict/Verdict';
export type { Verdict, VerdictCode } from './domain/verdict/Verdict';
export { DiagnosticReport } from './domain/report/DiagnosticReport';
export type { RunStatus } from './domain/report/DiagnosticReport';
export {
  DomainError,
  NetworkError,
  BrowserError,
  AggregationError,
  ConfigurationError,
} from './domain/errors/AppErrors';

// Application
export { ProbeRegistry } from './application/services/ProbeRegistry';
export { NetworkProbeRunner } from './application/services/NetworkProbeRunner';
export { BrowserSessionMonitor } from './application/services/BrowserSessionMonitor';
export type { BrowserObservation } from './application/services/BrowserSessionMonitor';
export { DiagnosticService } from './application/services/DiagnosticService';
export type { DiagnosticOutcome } from './application/services/DiagnosticService';
export { ReportFormatter } from './application/services/ReportFormatter';
export type {
  BrowserPort,
  BrowserLaunchOptions,
  TrackedRequest,
  TriggerActivation,
  DnsResolverPort,
  HttpClientPort,
  HttpProbeRequest,
  HttpProbeResponse,
  ReportSink,
  ReportFormat,
} from './application/ports';

// Infrastructure
export { CompositionRoot } from './infrastructure/di/CompositionRoot';
export { ConfigFactory } from './infrastructure/config/ConfigFactory';
export { PlaywrightBrowserAdapter } from './infrastructure/browser/PlaywrightBrowserAdapter';
export { NodeDnsResolver } from './infrastructure/network/NodeDnsResolver';
export { FetchHttpClient } from './infrastructure/network/FetchHttpClient';
export { FileReportSink } from './infrastructure/persistence/FileReportSink';
export { StdoutReportSink } from './infrastructure/persistence/StdoutReportSink';
