import { randomUUID } from 'crypto';
import * as path from 'path';

import { NetworkEvent } from '../../domain/browser/NetworkEvent';
import { AggregationError, errorMessage } from '../../domain/errors/AppErrors';
import { EventBus } from '../../domain/events/DomainEvent';
import {
  BrowserSessionCompletedEvent,
  ProbeCompletedEvent,
  RunCompletedEvent,
  RunStartedEvent,
  VerdictReachedEvent,
} from '../../domain/events/DiagnosticEvents';
import { BrowserProbeSpec, NetworkProbeSpec, ProbeSpec, isNetworkProbe } from '../../domain/probes/ProbeSpec';
import { ProbeResult, createProbeResult } from '../../domain/probes/ProbeResult';
import { DiagnosticReport, RunStatus } from '../../domain/report/DiagnosticReport';
import { VerdictClassifier } from '../../domain/verdict/VerdictClassifier';
import { getLogger } from '../../infrastructure/logging';
import { BrowserSessionMonitor } from './BrowserSessionMonitor';
import { NetworkProbeRunner } from './NetworkProbeRunner';
import { ProbeRegistry } from './ProbeRegistry';
import { runBounded } from './ProbePool';

const logger = getLogger('Run');

export interface DiagnosticRunConfig {
  /** Global deadline for the whole run */
  deadlineMs: number;
  /** Network probes in flight at once */
  concurrency: number;
  /** Observation window after the overlay trigger */
  settleWindowMs: number;
  /** Directory for browser screenshots; none taken when unset */
  screenshotDir?: string;
}

export interface DiagnosticServiceDependencies {
  registry: ProbeRegistry;
  runner: NetworkProbeRunner;
  monitor: BrowserSessionMonitor;
  classifier: VerdictClassifier;
  eventBus: EventBus;
}

export type DiagnosticOutcome =
  | { status: RunStatus; runId: string; report: DiagnosticReport }
  | { status: 'SETUP_FAILURE'; runId: string; error: Error };

interface BrowserEvidence {
  events: NetworkEvent[];
  consoleErrors: string[];
  screenshotPath?: string;
}

const SKIPPED_DETAIL = 'Run deadline reached before the probe started';

/**
 * Orchestrates one diagnostic run: network probes through a bounded pool,
 * browser probes one after another alongside them, all under a single
 * deadline, then classification and report assembly.
 */
export class DiagnosticService {
  constructor(
    private readonly deps: DiagnosticServiceDependencies,
    private readonly config: DiagnosticRunConfig
  ) {}

  async run(options: { signal?: AbortSignal } = {}): Promise<DiagnosticOutcome> {
    const runId = randomUUID();
    const startedAt = new Date();
    const deadlineAt = startedAt.getTime() + this.config.deadlineMs;
    const specs = this.deps.registry.list();
    const concurrency = Math.max(1, this.config.concurrency);

    const controller = new AbortController();
    const deadlineTimer = setTimeout(() => {
      logger.warn('Run deadline reached, cancelling remaining probes', { deadlineMs: this.config.deadlineMs });
      controller.abort();
    }, this.config.deadlineMs);
    const onExternalAbort = (): void => controller.abort();
    if (options.signal?.aborted) {
      controller.abort();
    } else {
      options.signal?.addEventListener('abort', onExternalAbort, { once: true });
    }

    logger.info(`Run ${runId} started`, { probes: specs.length, concurrency, deadlineMs: this.config.deadlineMs });
    await this.deps.eventBus.publish(
      new RunStartedEvent(runId, specs.length, concurrency, this.config.deadlineMs)
    );

    const results = new Map<string, ProbeResult>();
    const record = async (result: ProbeResult): Promise<void> => {
      if (results.has(result.probeId)) {
        throw new AggregationError(`duplicate result for probe '${result.probeId}'`);
      }
      results.set(result.probeId, result);
      await this.deps.eventBus.publish(new ProbeCompletedEvent(runId, result));
    };

    const networkSpecs = specs.filter(isNetworkProbe);
    const browserSpecs = this.deps.registry.byKind('BROWSER_LAYER_TRIGGER');

    const networkTask = runBounded(networkSpecs, concurrency, async spec => {
      await record(await this.runNetworkProbe(spec, deadlineAt, controller.signal));
    });

    const browserTask = this.runBrowserProbes(runId, browserSpecs, controller.signal, record).catch(
      (error: unknown) => {
        // A browser that cannot start leaves nothing to diagnose with; stop the network pool too.
        controller.abort();
        throw error;
      }
    );

    const [networkSettled, browserSettled] = await Promise.allSettled([networkTask, browserTask]);
    clearTimeout(deadlineTimer);
    options.signal?.removeEventListener('abort', onExternalAbort);

    if (browserSettled.status === 'rejected') {
      return this.setupFailure(runId, startedAt, browserSettled.reason);
    }
    if (networkSettled.status === 'rejected') {
      throw networkSettled.reason;
    }

    const evidence = browserSettled.value;
    const probeResults = specs.map(spec => {
      const result = results.get(spec.id);
      if (!result) {
        throw new AggregationError(`missing result for probe '${spec.id}'`);
      }
      return result;
    });

    const classification = this.deps.classifier.evaluate(probeResults, evidence.events, evidence.consoleErrors);
    logger.info(`Verdict: ${classification.verdict.label}`, {
      code: classification.verdict.code,
      additionalFindings: classification.additionalFindings.map(v => v.code),
    });
    await this.deps.eventBus.publish(
      new VerdictReachedEvent(runId, classification.verdict, classification.additionalFindings)
    );

    const report = DiagnosticReport.create({
      runId,
      startedAt,
      generatedAt: new Date(),
      probeResults,
      networkEvents: evidence.events,
      consoleErrors: evidence.consoleErrors,
      verdict: classification.verdict,
      additionalFindings: classification.additionalFindings,
      screenshotPath: evidence.screenshotPath,
    });

    await this.deps.eventBus.publish(new RunCompletedEvent(runId, report.runStatus, report.durationMs));
    return { status: report.runStatus, runId, report };
  }

  private async runNetworkProbe(
    spec: NetworkProbeSpec,
    deadlineAt: number,
    signal: AbortSignal
  ): Promise<ProbeResult> {
    const remaining = deadlineAt - Date.now();
    if (signal.aborted || remaining <= 0) {
      return this.skipped(spec);
    }
    return this.deps.runner.run(spec, { timeoutMs: remaining, signal });
  }

  private async runBrowserProbes(
    runId: string,
    specs: readonly BrowserProbeSpec[],
    signal: AbortSignal,
    record: (result: ProbeResult) => Promise<void>
  ): Promise<BrowserEvidence> {
    const events: NetworkEvent[] = [];
    const consoleErrors: string[] = [];
    let screenshotPath: string | undefined;

    for (const spec of specs) {
      if (signal.aborted) {
        await record(this.skipped(spec));
        continue;
      }

      const started = Date.now();
      const observation = await this.deps.monitor.observe(spec.target, this.config.settleWindowMs, {
        trigger: spec.trigger,
        signal,
        timeoutMs: spec.timeoutMs,
        screenshotPath: this.screenshotPathFor(runId, spec),
      });

      const outcome =
        observation.teardownError && observation.outcome.status === 'SUCCESS'
          ? { status: 'ERROR' as const, errorKind: 'SESSION_TEARDOWN_FAILURE' as const, detail: observation.teardownError }
          : observation.outcome;
      await record(createProbeResult(spec, { ...outcome, latencyMs: Date.now() - started }));

      events.push(...observation.events);
      consoleErrors.push(...observation.consoleErrors);
      screenshotPath = observation.screenshotPath ?? screenshotPath;

      await this.deps.eventBus.publish(
        new BrowserSessionCompletedEvent(
          runId,
          spec.target,
          observation.triggerActivated,
          observation.events.length,
          observation.events.filter(e => e.failed).length,
          observation.consoleErrors.length
        )
      );
    }

    // Sessions are sequential, but keep the merged list ordered regardless.
    events.sort((a, b) => Date.parse(a.startedAt) - Date.parse(b.startedAt));
    return { events, consoleErrors, ...(screenshotPath !== undefined && { screenshotPath }) };
  }

  private screenshotPathFor(runId: string, spec: BrowserProbeSpec): string | undefined {
    if (!this.config.screenshotDir) {
      return undefined;
    }
    return path.join(this.config.screenshotDir, `${spec.id}-${runId.slice(0, 8)}.png`);
  }

  private skipped(spec: ProbeSpec): ProbeResult {
    logger.warn(`${spec.id} skipped`, { reason: SKIPPED_DETAIL });
    return createProbeResult(spec, {
      status: 'TIMEOUT',
      errorKind: 'SKIPPED',
      detail: SKIPPED_DETAIL,
      skipped: true,
    });
  }

  private async setupFailure(runId: string, startedAt: Date, reason: unknown): Promise<DiagnosticOutcome> {
    const error = reason instanceof Error ? reason : new Error(errorMessage(reason));
    const durationMs = Date.now() - startedAt.getTime();
    logger.error(`Run ${runId} aborted during setup`, { error: error.message });
    await this.deps.eventBus.publish(new RunCompletedEvent(runId, 'SETUP_FAILURE', durationMs, error.message));
    return { status: 'SETUP_FAILURE', runId, error };
  }
}
