import { NetworkEvent, createNetworkEvent } from '../../domain/browser/NetworkEvent';
import { TrackedHosts } from '../../domain/browser/TrackedHosts';
import { BrowserError, errorMessage } from '../../domain/errors/AppErrors';
import { OverlayTrigger } from '../../domain/probes/ProbeSpec';
import { ProbeOutcome } from '../../domain/probes/ProbeResult';
import { getLogger } from '../../infrastructure/logging';
import { BrowserLaunchOptions, BrowserPort } from '../ports/BrowserPort';

const logger = getLogger('Browser');

export interface SessionMonitorConfig {
  launch: BrowserLaunchOptions;
  navigationTimeoutMs: number;
  readyTimeoutMs: number;
  triggerTimeoutMs: number;
  trackedHosts: readonly string[];
}

export interface ObserveOptions {
  trigger: OverlayTrigger;
  /** Run-level cancellation; the session is still torn down */
  signal?: AbortSignal;
  /** Upper bound for the whole session, launch included */
  timeoutMs?: number;
  /** Where to save a screenshot once the window closes */
  screenshotPath?: string;
}

/**
 * Everything one browser session saw.
 */
export interface BrowserObservation {
  pageUrl: string;
  triggerActivated: boolean;
  triggerSelector?: string;
  /** Tracked requests, ordered by start time */
  events: NetworkEvent[];
  consoleErrors: string[];
  /** Session outcome as a probe outcome (SUCCESS when the trigger fired and the window elapsed) */
  outcome: ProbeOutcome;
  screenshotPath?: string;
  /** Set when closing the browser failed */
  teardownError?: string;
}

const RUN_DEADLINE_DETAIL = 'Run deadline reached during the browser session';

class SessionCancelled extends Error {}

/**
 * Cancellation for one session: aborts on the run signal or when the
 * session's own time budget runs out, remembering which came first.
 */
class SessionScope {
  readonly signal: AbortSignal;
  private readonly controller = new AbortController();
  private readonly runSignal?: AbortSignal;
  private readonly timer?: NodeJS.Timeout;
  private reason = RUN_DEADLINE_DETAIL;
  private readonly onRunAbort = (): void => this.cancel(RUN_DEADLINE_DETAIL);

  constructor(runSignal: AbortSignal | undefined, timeoutMs: number | undefined) {
    this.signal = this.controller.signal;
    this.runSignal = runSignal;
    if (runSignal?.aborted) {
      this.cancel(RUN_DEADLINE_DETAIL);
    } else {
      runSignal?.addEventListener('abort', this.onRunAbort, { once: true });
    }
    if (timeoutMs !== undefined) {
      this.timer = setTimeout(() => this.cancel(`Browser session exceeded ${timeoutMs}ms`), timeoutMs);
    }
  }

  get detail(): string {
    return this.reason;
  }

  dispose(): void {
    clearTimeout(this.timer);
    this.runSignal?.removeEventListener('abort', this.onRunAbort);
  }

  private cancel(reason: string): void {
    if (this.controller.signal.aborted) return;
    this.reason = reason;
    this.controller.abort();
  }
}

/**
 * Drives one scoped browser session: load the page, activate the
 * overlay, then watch tracked traffic and script errors for a fixed window.
 */
export class BrowserSessionMonitor {
  private busy = false;
  private readonly trackedHosts: TrackedHosts;

  constructor(
    private readonly browser: BrowserPort,
    private readonly config: SessionMonitorConfig
  ) {
    this.trackedHosts = new TrackedHosts(config.trackedHosts);
  }

  get isBusy(): boolean {
    return this.busy;
  }

  /**
   * Runs one session. Only a launch failure (or a concurrent call) throws;
   * every later fault is recorded in the observation.
   */
  async observe(pageUrl: string, settleWindowMs: number, options: ObserveOptions): Promise<BrowserObservation> {
    if (this.busy) {
      throw new BrowserError('SESSION_BUSY', 'A browser session is already in progress');
    }
    this.busy = true;
    const scope = new SessionScope(options.signal, options.timeoutMs);
    let releaseOnReturn = true;

    try {
      const launching = this.browser.launch(this.config.launch);
      try {
        await this.cancellable(launching, scope);
      } catch (error) {
        if (error instanceof SessionCancelled) {
          // The launch keeps running; close whatever it produces before the next session.
          releaseOnReturn = false;
          void launching
            .then(
              () => this.closeQuietly(),
              () => this.closeQuietly()
            )
            .finally(() => {
              this.busy = false;
            });
          logger.warn('Browser session cancelled during launch', { reason: error.message });
          return this.cancelledDuringLaunch(pageUrl, error);
        }
        await this.closeQuietly();
        throw error instanceof BrowserError
          ? error
          : new BrowserError('LAUNCH_FAILURE', `Browser launch failed: ${errorMessage(error)}`, error);
      }

      logger.info('Browser launched', { url: pageUrl, settleWindowMs });
      return await this.runSession(pageUrl, settleWindowMs, options, scope);
    } finally {
      scope.dispose();
      if (releaseOnReturn) {
        this.busy = false;
      }
    }
  }

  private cancelledDuringLaunch(pageUrl: string, error: SessionCancelled): BrowserObservation {
    return {
      pageUrl,
      triggerActivated: false,
      events: [],
      consoleErrors: [],
      outcome: this.toOutcome(error),
    };
  }

  private async runSession(
    pageUrl: string,
    settleWindowMs: number,
    options: ObserveOptions,
    scope: SessionScope
  ): Promise<BrowserObservation> {
    const { trigger } = options;
    let outcome: ProbeOutcome = { status: 'SUCCESS' };
    let triggerActivated = false;
    let triggerSelector: string | undefined;
    let screenshotPath: string | undefined;
    let teardownError: string | undefined;
    let events: NetworkEvent[] = [];
    let consoleErrors: string[] = [];

    try {
      await this.cancellable(this.browser.navigate(pageUrl, this.config.navigationTimeoutMs), scope);
      await this.cancellable(this.browser.waitForReady(this.config.readyTimeoutMs, trigger.readySelector), scope);

      try {
        const activation = await this.cancellable(
          this.browser.activateOverlay(trigger, this.config.triggerTimeoutMs),
          scope
        );
        triggerActivated = activation.activated;
        triggerSelector = activation.selector;
        if (!activation.activated) {
          outcome = {
            status: 'ERROR',
            errorKind: 'TRIGGER_NOT_FOUND',
            detail: `No overlay control matched: ${trigger.selectors.join(', ')}`,
          };
        } else {
          logger.info('Overlay activated', { selector: activation.selector, alreadyActive: activation.alreadyActive });
        }
      } catch (error) {
        if (!(error instanceof BrowserError) || error.kind !== 'TRIGGER_NOT_FOUND') {
          throw error;
        }
        outcome = { status: 'ERROR', errorKind: 'TRIGGER_NOT_FOUND', detail: error.message };
      }

      if (!triggerActivated) {
        logger.warn('Overlay control not found, observing anyway', { selectors: trigger.selectors });
      }

      await this.cancellable(this.sleep(settleWindowMs, scope.signal), scope);
    } catch (error) {
      outcome = this.toOutcome(error);
    } finally {
      const windowClosedAt = Date.now();
      events = this.collectEvents(windowClosedAt);
      consoleErrors = this.browser.getPageErrors();

      if (options.screenshotPath && !scope.signal.aborted) {
        try {
          screenshotPath = await this.browser.screenshot(options.screenshotPath);
        } catch (error) {
          logger.warn('Screenshot failed', { error: errorMessage(error) });
        }
      }

      try {
        await this.browser.close();
      } catch (error) {
        teardownError = `Browser teardown failed: ${errorMessage(error)}`;
        logger.warn(teardownError);
      }
    }

    logger.info('Browser session closed', {
      status: outcome.status,
      events: events.length,
      failedEvents: events.filter(e => e.failed).length,
      consoleErrors: consoleErrors.length,
    });

    return {
      pageUrl,
      triggerActivated,
      events,
      consoleErrors,
      outcome,
      ...(triggerSelector !== undefined && { triggerSelector }),
      ...(screenshotPath !== undefined && { screenshotPath }),
      ...(teardownError !== undefined && { teardownError }),
    };
  }

  private collectEvents(windowClosedAt: number): NetworkEvent[] {
    return this.browser
      .getRequests()
      .filter(request => this.trackedHosts.matches(request.url))
      .sort((a, b) => a.startedAt - b.startedAt)
      .map(request => createNetworkEvent(request, windowClosedAt));
  }

  private toOutcome(error: unknown): ProbeOutcome {
    if (error instanceof SessionCancelled) {
      return { status: 'TIMEOUT', errorKind: 'TIMEOUT', detail: error.message };
    }
    if (error instanceof BrowserError) {
      return {
        status: error.kind === 'NAVIGATION_TIMEOUT' ? 'TIMEOUT' : 'ERROR',
        errorKind: error.kind,
        detail: error.message,
      };
    }
    logger.error('Browser session failed', { error: errorMessage(error) });
    return { status: 'ERROR', errorKind: 'NAVIGATION_FAILURE', detail: errorMessage(error) };
  }

  /**
   * Rejects with SessionCancelled as soon as the scope aborts.
   */
  private cancellable<T>(operation: Promise<T>, scope: SessionScope): Promise<T> {
    const { signal } = scope;
    return new Promise<T>((resolve, reject) => {
      const onAbort = (): void => reject(new SessionCancelled(scope.detail));
      if (signal.aborted) {
        onAbort();
        // Keep a late rejection of the abandoned operation from going unhandled.
        operation.catch(error => logger.debug('Abandoned browser step failed', { error: errorMessage(error) }));
        return;
      }
      signal.addEventListener('abort', onAbort, { once: true });
      operation.then(
        value => {
          signal.removeEventListener('abort', onAbort);
          resolve(value);
        },
        (error: unknown) => {
          signal.removeEventListener('abort', onAbort);
          if (signal.aborted) {
            logger.debug('Abandoned browser step failed', { error: errorMessage(error) });
            return;
          }
          reject(error);
        }
      );
    });
  }

  private sleep(ms: number, signal: AbortSignal): Promise<void> {
    return new Promise(resolve => {
      const timer = setTimeout(done, ms);
      function done(): void {
        clearTimeout(timer);
        signal.removeEventListener('abort', done);
        resolve();
      }
      signal.addEventListener('abort', done, { once: true });
    });
  }

  private async closeQuietly(): Promise<void> {
    try {
      await this.browser.close();
    } catch (error) {
      logger.debug('Close after an interrupted launch failed', { error: errorMessage(error) });
    }
  }
}
