import { BrowserPort } from '../../application/ports/BrowserPort';
import { DnsResolverPort } from '../../application/ports/DnsResolverPort';
import { HttpClientPort } from '../../application/ports/HttpClientPort';
import { ReportSink } from '../../application/ports/ReportSink';
import { BrowserSessionMonitor } from '../../application/services/BrowserSessionMonitor';
import { DiagnosticService } from '../../application/services/DiagnosticService';
import { NetworkProbeRunner } from '../../application/services/NetworkProbeRunner';
import { ProbeRegistry } from '../../application/services/ProbeRegistry';
import { ReportFormatter } from '../../application/services/ReportFormatter';
import { VerdictClassifier } from '../../domain/verdict/VerdictClassifier';
import { PlaywrightBrowserAdapter } from '../browser/PlaywrightBrowserAdapter';
import { CLIConfigOverrides, ConfigFactory, LoadedConfig } from '../config/ConfigFactory';
import { DiagnosticEventHandlers } from '../events/DiagnosticEventHandlers';
import { InMemoryEventBus } from '../events/InMemoryEventBus';
import { setGlobalLoggerConfig } from '../logging';
import { FetchHttpClient } from '../network/FetchHttpClient';
import { NodeDnsResolver } from '../network/NodeDnsResolver';
import { FileReportSink } from '../persistence/FileReportSink';
import { StdoutReportSink } from '../persistence/StdoutReportSink';

export interface ApplicationContainer {
  diagnosticService: DiagnosticService;
  reportSink: ReportSink;
  eventHandlers: DiagnosticEventHandlers;
  eventBus: InMemoryEventBus;
  /** Closes the browser if a session is still open */
  closeBrowser: () => Promise<void>;
  config: LoadedConfig;
}

/**
 * Adapter overrides, for wiring the application against fakes.
 */
export interface AdapterOverrides {
  dns?: DnsResolverPort;
  http?: HttpClientPort;
  browser?: BrowserPort;
  reportSink?: ReportSink;
}

export class CompositionRoot {
  static initialize(
    cliOptions: CLIConfigOverrides & { verbose?: boolean } = {},
    adapters: AdapterOverrides = {}
  ): ApplicationContainer {
    // 1. Load Configuration
    const config = ConfigFactory.load(cliOptions);
    const toStdout = config.report.output === '-';
    setGlobalLoggerConfig({
      minLevel: config.logging.level,
      jsonOutput: config.logging.json,
      useColors: !config.logging.json && process.stderr.isTTY === true,
      stderrOnly: true,
    });

    // 2. Initialize Infrastructure Adapters
    const browser = adapters.browser ?? new PlaywrightBrowserAdapter();
    const dns = adapters.dns ?? new NodeDnsResolver();
    const http = adapters.http ?? new FetchHttpClient();
    const eventBus = new InMemoryEventBus();
    const formatter = new ReportFormatter();
    const reportSink =
      adapters.reportSink ??
      (toStdout
        ? new StdoutReportSink(config.report.format, formatter)
        : new FileReportSink(config.report.output, config.report.format, formatter));

    // 3. Initialize Application Services
    const registry = new ProbeRegistry(config.probes);
    const monitor = new BrowserSessionMonitor(browser, {
      launch: {
        headless: config.browser.headless,
        viewportWidth: config.browser.width,
        viewportHeight: config.browser.height,
        captureConsoleErrors: config.browser.captureConsoleErrors,
      },
      navigationTimeoutMs: config.browser.navigationTimeoutMs,
      readyTimeoutMs: config.browser.readyTimeoutMs,
      triggerTimeoutMs: config.browser.triggerTimeoutMs,
      trackedHosts: config.tracking.hosts,
    });

    const diagnosticService = new DiagnosticService(
      {
        registry,
        runner: new NetworkProbeRunner(dns, http),
        monitor,
        classifier: new VerdictClassifier(),
        eventBus,
      },
      {
        deadlineMs: config.run.deadlineMs,
        concurrency: config.run.concurrency,
        settleWindowMs: config.browser.settleWindowMs,
        screenshotDir: config.browser.screenshotDir,
      }
    );

    // 4. Setup Event Handling
    const eventHandlers = new DiagnosticEventHandlers(eventBus, cliOptions.verbose ?? false);
    eventHandlers.register();

    return {
      diagnosticService,
      reportSink,
      eventHandlers,
      eventBus,
      closeBrowser: () => browser.close(),
      config,
    };
  }
}
