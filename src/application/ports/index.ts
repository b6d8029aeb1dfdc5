export type { BrowserPort, BrowserLaunchOptions, TrackedRequest, TriggerActivation } from './BrowserPort';
export type { DnsResolverPort } from './DnsResolverPort';
export type { HttpClientPort, HttpProbeRequest, HttpProbeResponse } from './HttpClientPort';
export type { ReportSink, ReportFormat } from './ReportSink';
