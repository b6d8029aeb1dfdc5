import { HttpProbeRequest, HttpProbeResponse } from '../../../src/application/ports/HttpClientPort';
import { BrowserSessionMonitor } from '../../../src/application/services/BrowserSessionMonitor';
import { DiagnosticOutcome, DiagnosticService, DiagnosticRunConfig } from '../../../src/application/services/DiagnosticService';
import { NetworkProbeRunner } from '../../../src/application/services/NetworkProbeRunner';
import { ProbeRegistry } from '../../../src/application/services/ProbeRegistry';
import {
  BrowserSessionCompletedEvent,
  ProbeCompletedEvent,
  RunCompletedEvent,
  RunStartedEvent,
  VerdictReachedEvent,
} from '../../../src/domain/events/DiagnosticEvents';
import { DiagnosticReport } from '../../../src/domain/report/DiagnosticReport';
import { ProbeSpec } from '../../../src/domain/probes/ProbeSpec';
import { VerdictClassifier } from '../../../src/domain/verdict/VerdictClassifier';
import { InMemoryEventBus } from '../../../src/infrastructure/events/InMemoryEventBus';
import { browserSpec, dnsSpec, httpSpec } from '../../helpers/builders';
import { FakeBrowser } from '../../helpers/FakeBrowser';

const OK_RESPONSE: HttpProbeResponse = { status: 200, statusText: 'OK', contentType: 'image/png', bodyBytes: 512 };

const TILE_REQUEST = {
  url: 'https://tiles.example.com/tile.png',
  method: 'GET',
  startedAt: 1000,
  endedAt: 1040,
  status: 200,
};

function reportOf(outcome: DiagnosticOutcome): DiagnosticReport {
  if (outcome.status === 'SETUP_FAILURE') {
    throw new Error(`Expected a report, got setup failure: ${outcome.error.message}`);
  }
  return outcome.report;
}

describe('DiagnosticService', () => {
  let resolve: jest.Mock<Promise<string[]>, [string, AbortSignal]>;
  let get: jest.Mock<Promise<HttpProbeResponse>, [HttpProbeRequest]>;
  let browser: FakeBrowser;
  let eventBus: InMemoryEventBus;

  const config: DiagnosticRunConfig = { deadlineMs: 5000, concurrency: 2, settleWindowMs: 0 };

  function createService(specs: ProbeSpec[], overrides: Partial<DiagnosticRunConfig> = {}): DiagnosticService {
    return new DiagnosticService(
      {
        registry: new ProbeRegistry(specs),
        runner: new NetworkProbeRunner({ resolve }, { get }),
        monitor: new BrowserSessionMonitor(browser, {
          launch: { headless: true, viewportWidth: 1280, viewportHeight: 720, captureConsoleErrors: false },
          navigationTimeoutMs: 1000,
          readyTimeoutMs: 1000,
          triggerTimeoutMs: 500,
          trackedHosts: ['tiles.example.com'],
        }),
        classifier: new VerdictClassifier(),
        eventBus,
      },
      { ...config, ...overrides }
    );
  }

  beforeEach(() => {
    resolve = jest.fn().mockResolvedValue(['192.0.2.10']);
    get = jest.fn().mockResolvedValue(OK_RESPONSE);
    browser = new FakeBrowser();
    eventBus = new InMemoryEventBus();
  });

  it('should report a healthy run when every probe and request succeeds', async () => {
    browser.requestsOnActivate = [TILE_REQUEST];

    const outcome = await createService([dnsSpec(), httpSpec(), browserSpec()]).run();
    const report = reportOf(outcome);

    expect(outcome.status).toBe('HEALTHY');
    expect(report.runStatus).toBe('HEALTHY');
    expect(report.verdict.code).toBe('INCONCLUSIVE');
    expect(report.verdict.rationale).toBe(
      'No failure signature matched: 3/3 probes succeeded, 1 tracked requests (0 failed), 0 script errors.'
    );
    expect(report.networkEvents.map(e => e.url)).toEqual(['https://tiles.example.com/tile.png']);
    expect(report.runId).toBe(outcome.runId);
  });

  it('should return exactly one result per probe in registry order', async () => {
    const specs = [browserSpec(), httpSpec(), dnsSpec(), dnsSpec({ id: 'dns-map', target: 'map.example.org', role: 'service' })];

    const report = reportOf(await createService(specs).run());

    expect(report.probeResults.map(r => r.probeId)).toEqual(['map-layer', 'http-tiles', 'dns-tiles', 'dns-map']);
  });

  it('should classify a rejected provider as access restricted', async () => {
    get.mockResolvedValue({ status: 403, statusText: 'Forbidden', bodyBytes: 0 });

    const outcome = await createService([dnsSpec(), httpSpec(), browserSpec()]).run();
    const report = reportOf(outcome);

    expect(outcome.status).toBe('FAILURES_DETECTED');
    expect(report.verdict.code).toBe('PROVIDER_ACCESS_RESTRICTED');
    expect(report.verdict.rationale).toBe(
      'Provider endpoint rejected the request: ' +
        'http-tiles (https://tiles.example.com/tile.png) FAILURE HTTP 403 - HTTP 403 Forbidden, expected 2xx/3xx'
    );
  });

  it('should detect a client that never requests data', async () => {
    const report = reportOf(await createService([dnsSpec(), httpSpec(), browserSpec()]).run());

    expect(report.verdict.code).toBe('CLIENT_NEVER_REQUESTS');
    expect(report.networkEvents).toEqual([]);
    expect(report.runStatus).toBe('HEALTHY');
  });

  it('should carry script errors and the screenshot into the report', async () => {
    browser.requestsOnActivate = [TILE_REQUEST];
    browser.pageErrors = ['TypeError: layer is undefined'];

    const outcome = await createService([httpSpec(), browserSpec()], { screenshotDir: '/tmp/shots' }).run();
    const report = reportOf(outcome);

    expect(report.consoleErrors).toEqual(['TypeError: layer is undefined']);
    expect(report.verdict.code).toBe('CLIENT_SCRIPT_ERROR');
    expect(report.screenshotPath).toBe(`/tmp/shots/map-layer-${outcome.runId.slice(0, 8)}.png`);
  });

  it('should record a teardown failure against the browser probe', async () => {
    browser.requestsOnActivate = [TILE_REQUEST];
    browser.closeError = new Error('Target closed');

    const report = reportOf(await createService([browserSpec()]).run());

    expect(report.probeResults[0]).toMatchObject({
      probeId: 'map-layer',
      status: 'ERROR',
      errorKind: 'SESSION_TEARDOWN_FAILURE',
      detail: 'Browser teardown failed: Target closed',
    });
    expect(report.runStatus).toBe('FAILURES_DETECTED');
  });

  it('should return a setup failure without a report when the browser cannot launch', async () => {
    browser.launchError = new Error('Executable does not exist');

    const outcome = await createService([dnsSpec(), browserSpec()]).run();

    expect(outcome.status).toBe('SETUP_FAILURE');
    expect(outcome).not.toHaveProperty('report');
    if (outcome.status === 'SETUP_FAILURE') {
      expect(outcome.error.message).toBe('Browser launch failed: Executable does not exist');
    }
    const completed = eventBus.getEventsOf(RunCompletedEvent);
    expect(completed).toHaveLength(1);
    expect(completed[0].status).toBe('SETUP_FAILURE');
    expect(completed[0].error).toBe('Browser launch failed: Executable does not exist');
    expect(eventBus.getEventsOf(VerdictReachedEvent)).toHaveLength(0);
  });

  describe('deadline', () => {
    it('should skip every probe when the run is cancelled before it starts', async () => {
      const controller = new AbortController();
      controller.abort();

      const outcome = await createService([dnsSpec(), httpSpec(), browserSpec()]).run({ signal: controller.signal });
      const report = reportOf(outcome);

      expect(report.probeResults.map(r => [r.status, r.errorKind, r.skipped])).toEqual([
        ['TIMEOUT', 'SKIPPED', true],
        ['TIMEOUT', 'SKIPPED', true],
        ['TIMEOUT', 'SKIPPED', true],
      ]);
      expect(report.probeResults[0].detail).toBe('Run deadline reached before the probe started');
      expect(resolve).not.toHaveBeenCalled();
      expect(browser.calls).toEqual([]);
      expect(outcome.status).toBe('FAILURES_DETECTED');
    });

    it('should end the run near the deadline when probes hang', async () => {
      resolve.mockImplementation(() => new Promise<string[]>(() => undefined));
      const specs = [dnsSpec(), dnsSpec({ id: 'dns-2' }), dnsSpec({ id: 'dns-3' })];

      const started = Date.now();
      const report = reportOf(await createService(specs, { deadlineMs: 60, concurrency: 1 }).run());

      expect(Date.now() - started).toBeLessThan(1000);
      expect(report.probeResults).toHaveLength(3);
      expect(report.probeResults.map(r => r.status)).toEqual(['TIMEOUT', 'TIMEOUT', 'TIMEOUT']);
    });

    it('should cut off the probe in flight and skip the ones not yet started', async () => {
      const controller = new AbortController();
      resolve.mockImplementation(() => {
        controller.abort();
        return new Promise<string[]>(() => undefined);
      });
      const specs = [dnsSpec(), dnsSpec({ id: 'dns-2' }), dnsSpec({ id: 'dns-3' })];

      const report = reportOf(await createService(specs, { concurrency: 1 }).run({ signal: controller.signal }));

      expect(report.probeResults.map(r => [r.probeId, r.status, r.errorKind, r.skipped ?? false])).toEqual([
        ['dns-tiles', 'TIMEOUT', 'TIMEOUT', false],
        ['dns-2', 'TIMEOUT', 'SKIPPED', true],
        ['dns-3', 'TIMEOUT', 'SKIPPED', true],
      ]);
      expect(report.probeResults[0].detail).toBe('Run deadline reached before the probe completed');
      expect(report.probeResults[1].detail).toBe('Run deadline reached before the probe started');
      expect(resolve).toHaveBeenCalledTimes(1);
    });

    it('should end a browser session in flight at the deadline, skip its screenshot and close it', async () => {
      browser.requestsOnActivate = [TILE_REQUEST];

      const started = Date.now();
      const outcome = await createService([browserSpec()], {
        deadlineMs: 80,
        settleWindowMs: 10000,
        screenshotDir: '/tmp/shots',
      }).run();
      const report = reportOf(outcome);

      expect(Date.now() - started).toBeLessThan(1000);
      expect(report.probeResults[0]).toMatchObject({
        probeId: 'map-layer',
        status: 'TIMEOUT',
        errorKind: 'TIMEOUT',
        detail: 'Run deadline reached during the browser session',
      });
      expect(browser.calls).toEqual([
        'launch',
        'navigate https://map.example.org 1000',
        'ready 1000 -',
        'activate #overlay-toggle 500',
        'close',
      ]);
      expect(report.screenshotPath).toBeUndefined();
      expect(report.networkEvents.map(e => e.url)).toEqual(['https://tiles.example.com/tile.png']);
    });

    it('should not wait for a browser still launching at the deadline', async () => {
      browser.launchDelayMs = 300;

      const started = Date.now();
      const outcome = await createService([dnsSpec(), browserSpec()], { deadlineMs: 50 }).run();
      const report = reportOf(outcome);

      expect(Date.now() - started).toBeLessThan(250);
      expect(outcome.status).toBe('FAILURES_DETECTED');
      expect(report.probeResults.map(r => [r.probeId, r.status])).toEqual([
        ['dns-tiles', 'SUCCESS'],
        ['map-layer', 'TIMEOUT'],
      ]);
      expect(browser.calls).toEqual(['launch']);

      await new Promise(r => setTimeout(r, 400));
      expect(browser.calls).toEqual(['launch', 'close']);
    });

    it('should bound a browser session by its probe timeout', async () => {
      const started = Date.now();
      const report = reportOf(
        await createService([browserSpec({ timeoutMs: 50 })], { settleWindowMs: 10000 }).run()
      );

      expect(Date.now() - started).toBeLessThan(1000);
      expect(report.probeResults[0]).toMatchObject({
        status: 'TIMEOUT',
        errorKind: 'TIMEOUT',
        detail: 'Browser session exceeded 50ms',
      });
      expect(browser.closeCount).toBe(1);
    });
  });

  it('should publish run lifecycle events', async () => {
    browser.requestsOnActivate = [TILE_REQUEST];

    const outcome = await createService([dnsSpec(), httpSpec(), browserSpec()]).run();

    const started = eventBus.getEventsOf(RunStartedEvent);
    expect(started).toHaveLength(1);
    expect(started[0]).toMatchObject({ runId: outcome.runId, probeCount: 3, concurrency: 2, deadlineMs: 5000 });

    const probeEvents = eventBus.getEventsOf(ProbeCompletedEvent);
    expect(probeEvents.map(e => e.result.probeId).sort()).toEqual(['dns-tiles', 'http-tiles', 'map-layer']);

    const sessions = eventBus.getEventsOf(BrowserSessionCompletedEvent);
    expect(sessions).toHaveLength(1);
    expect(sessions[0]).toMatchObject({
      pageUrl: 'https://map.example.org',
      triggerActivated: true,
      eventCount: 1,
      failedEventCount: 0,
      consoleErrorCount: 0,
    });

    expect(eventBus.getEventsOf(VerdictReachedEvent)).toHaveLength(1);
    const completed = eventBus.getEventsOf(RunCompletedEvent);
    expect(completed.map(e => e.status)).toEqual(['HEALTHY']);
    expect(eventBus.getHistory()[0]).toBeInstanceOf(RunStartedEvent);
  });
});
