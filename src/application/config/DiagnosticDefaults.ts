/**
 * Diagnostic Constants and Configuration
 *
 * Centralizes the defaults of a diagnostic run.
 */

import { RunStatus } from '../../domain/report/DiagnosticReport';

/**
 * Whole-run limits.
 */
export const RUN = {
  /** Global deadline for a run in milliseconds */
  DEFAULT_DEADLINE_MS: 120000,
  /** Maximum network probes in flight */
  DEFAULT_CONCURRENCY: 4,
  /** Upper bound accepted for the concurrency limit */
  MAX_CONCURRENCY: 16,
} as const;

/**
 * Network probe defaults.
 */
export const PROBE = {
  /** Per-probe timeout when the catalog entry declares none */
  DEFAULT_TIMEOUT_MS: 10000,
  /** User agent sent with HTTP probes */
  USER_AGENT: 'vessel-overlay-diagnostics/1.0',
  /** Default catalog location, relative to the working directory */
  DEFAULT_CATALOG_PATH: 'config/probes.json',
} as const;

/**
 * Browser session defaults.
 */
export const BROWSER = {
  /** Observation window after the overlay trigger in milliseconds */
  DEFAULT_SETTLE_WINDOW_MS: 15000,
  /** Navigation timeout in milliseconds */
  DEFAULT_NAVIGATION_TIMEOUT_MS: 20000,
  /** Ready state / ready selector timeout in milliseconds */
  DEFAULT_READY_TIMEOUT_MS: 20000,
  /** Timeout for locating and activating the overlay control */
  DEFAULT_TRIGGER_TIMEOUT_MS: 5000,
  /** Whole-session bound for browser probes that declare no timeout */
  DEFAULT_SESSION_TIMEOUT_MS: 60000,
  DEFAULT_VIEWPORT_WIDTH: 1280,
  DEFAULT_VIEWPORT_HEIGHT: 720,
} as const;

/**
 * Hosts whose requests are recorded during the browser session.
 * Entries containing a path match on host + path prefix.
 */
export const TRACKING = {
  DEFAULT_HOSTS: [
    'tiles.marinetraffic.com',
    'www.marinetraffic.com',
    'services.marinetraffic.com',
    'data.aishub.net',
    'stream.aisstream.io',
    'map.openseamap.org/api/',
  ],
} as const;

/**
 * Report defaults.
 */
export const REPORT = {
  DEFAULT_OUTPUT_DIR: './reports',
  DEFAULT_FORMAT: 'json',
} as const;

/**
 * Process exit codes for each run status.
 */
export const EXIT_CODES = {
  HEALTHY: 0,
  SETUP_FAILURE: 1,
  FAILURES_DETECTED: 2,
  INTERRUPTED: 130,
  TERMINATED: 143,
} as const;

/**
 * Maps a run outcome to the process exit code.
 */
export function exitCodeForStatus(status: RunStatus | 'SETUP_FAILURE'): number {
  return EXIT_CODES[status];
}
