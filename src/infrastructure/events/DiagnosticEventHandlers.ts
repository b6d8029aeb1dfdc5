import { DomainEvent, EventBus, EventHandler } from '../../domain/events/DomainEvent';
import {
  BrowserSessionCompletedEvent,
  ProbeCompletedEvent,
  RunCompletedEvent,
  RunStartedEvent,
  VerdictReachedEvent,
} from '../../domain/events/DiagnosticEvents';
import { describeProbeResult } from '../../domain/probes/ProbeResult';
import { loggers } from '../logging';

/**
 * Event handlers for diagnostic run events.
 * Turns domain events into progress lines on the Event log category.
 */
export class DiagnosticEventHandlers {
  private handlers: Map<string, EventHandler<never>> = new Map();
  private completedProbes = 0;
  private totalProbes = 0;

  constructor(
    private readonly eventBus: EventBus,
    private readonly verbose: boolean = false
  ) {}

  /**
   * Register all event handlers.
   */
  register(): void {
    this.registerHandler(RunStartedEvent.TYPE, this.handleRunStarted.bind(this));
    this.registerHandler(ProbeCompletedEvent.TYPE, this.handleProbeCompleted.bind(this));
    this.registerHandler(BrowserSessionCompletedEvent.TYPE, this.handleBrowserSessionCompleted.bind(this));
    this.registerHandler(VerdictReachedEvent.TYPE, this.handleVerdictReached.bind(this));
    this.registerHandler(RunCompletedEvent.TYPE, this.handleRunCompleted.bind(this));
  }

  /**
   * Unregister all event handlers.
   */
  unregister(): void {
    for (const [eventType, handler] of this.handlers) {
      this.eventBus.unsubscribe(eventType, handler);
    }
    this.handlers.clear();
  }

  private registerHandler<T extends DomainEvent>(eventType: string, handler: EventHandler<T>): void {
    this.eventBus.subscribe(eventType, handler);
    this.handlers.set(eventType, handler);
  }

  private handleRunStarted(event: RunStartedEvent): void {
    this.completedProbes = 0;
    this.totalProbes = event.probeCount;
    loggers.event.info(`Run ${event.runId} started`, {
      probes: event.probeCount,
      concurrency: event.concurrency,
      deadlineMs: event.deadlineMs,
    });
  }

  private handleProbeCompleted(event: ProbeCompletedEvent): void {
    this.completedProbes++;
    const progress = `[${this.completedProbes}/${this.totalProbes}]`;
    if (this.verbose || event.result.status !== 'SUCCESS') {
      loggers.event.info(`${progress} ${describeProbeResult(event.result)}`);
    } else {
      loggers.event.debug(`${progress} ${describeProbeResult(event.result)}`);
    }
  }

  private handleBrowserSessionCompleted(event: BrowserSessionCompletedEvent): void {
    loggers.event.info(`Browser session on ${event.pageUrl} finished`, {
      triggerActivated: event.triggerActivated,
      events: event.eventCount,
      failedEvents: event.failedEventCount,
      consoleErrors: event.consoleErrorCount,
    });
  }

  private handleVerdictReached(event: VerdictReachedEvent): void {
    loggers.event.info(`Verdict: ${event.verdict.label}`, { code: event.verdict.code });
    for (const finding of event.additionalFindings) {
      loggers.event.info(`Also matched: ${finding.label}`, { code: finding.code });
    }
  }

  private handleRunCompleted(event: RunCompletedEvent): void {
    const context = { status: event.status, durationMs: event.durationMs };
    if (event.status === 'SETUP_FAILURE') {
      loggers.event.error(`Run ${event.runId} failed during setup: ${event.error ?? 'unknown error'}`, context);
    } else {
      loggers.event.info(`Run ${event.runId} completed`, context);
    }
  }
}
