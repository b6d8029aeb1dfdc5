import { OverlayTrigger } from '../../domain/probes/ProbeSpec';

/**
 * Options for launching the browser.
 */
export interface BrowserLaunchOptions {
  /** Run browser in headless mode */
  headless: boolean;
  viewportWidth: number;
  viewportHeight: number;
  /** Record `console.error` output in addition to uncaught page errors */
  captureConsoleErrors: boolean;
}

/**
 * A request seen by the browser since launch.
 * Timestamps are epoch milliseconds.
 */
export interface TrackedRequest {
  url: string;
  method: string;
  startedAt: number;
  /** Set when a response or a network failure ended the request */
  endedAt?: number;
  status?: number;
  errorText?: string;
}

/**
 * Result of activating the overlay control.
 */
export interface TriggerActivation {
  activated: boolean;
  /** Selector that located the control */
  selector?: string;
  /** Control was already active and left as is */
  alreadyActive?: boolean;
}

/**
 * Port interface for the single controlled browser session.
 * The session monitor owns the lifecycle: `launch` once, `close` on every path.
 */
export interface BrowserPort {
  /**
   * Launches the browser and opens a page. Throws `BrowserError(LAUNCH_FAILURE)`.
   */
  launch(options: BrowserLaunchOptions): Promise<void>;

  /**
   * Navigates to the page. Throws `BrowserError(NAVIGATION_TIMEOUT | NAVIGATION_FAILURE)`.
   */
  navigate(url: string, timeoutMs: number): Promise<void>;

  /**
   * Waits for the document to be ready and, when given, for `readySelector`.
   * Throws `BrowserError(NAVIGATION_TIMEOUT)`.
   */
  waitForReady(timeoutMs: number, readySelector?: string): Promise<void>;

  /**
   * Opens the reveal control (if any) and activates the first matching overlay control.
   */
  activateOverlay(trigger: OverlayTrigger, timeoutMs: number): Promise<TriggerActivation>;

  /**
   * Snapshot of the requests seen so far, in start order.
   */
  getRequests(): TrackedRequest[];

  /**
   * Snapshot of script errors raised by the page so far, verbatim.
   */
  getPageErrors(): string[];

  /**
   * Saves a screenshot of the current page and returns its path.
   */
  screenshot(path: string): Promise<string>;

  /**
   * Closes the browser. Safe to call more than once.
   */
  close(): Promise<void>;
}
