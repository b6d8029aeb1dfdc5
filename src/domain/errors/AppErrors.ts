/**
 * Base class for all domain errors.
 */
export class DomainError extends Error {
  constructor(message: string) {
    super(message);
    this.name = this.constructor.name;
    Error.captureStackTrace(this, this.constructor);
  }
}

/**
 * Failure flavors of a DNS or HTTP probe.
 */
export type NetworkErrorKind =
  | 'DNS_FAILURE'
  | 'RESOLVER_FAILURE'
  | 'CONNECTION_REFUSED'
  | 'CONNECTION_FAILURE'
  | 'TLS_FAILURE'
  | 'TIMEOUT'
  | 'HTTP_STATUS'
  | 'UNEXPECTED_CONTENT';

/**
 * Failure flavors of the browser session.
 */
export type BrowserErrorKind =
  | 'LAUNCH_FAILURE'
  | 'NAVIGATION_TIMEOUT'
  | 'NAVIGATION_FAILURE'
  | 'TRIGGER_NOT_FOUND'
  | 'SESSION_TEARDOWN_FAILURE'
  | 'SESSION_BUSY';

/**
 * Error raised by a network adapter. Always captured into a ProbeResult.
 */
export class NetworkError extends DomainError {
  constructor(
    public readonly kind: NetworkErrorKind,
    message: string,
    public readonly code?: string,
    public readonly statusCode?: number
  ) {
    super(message);
  }
}

/**
 * Error raised while driving the browser session.
 * Only LAUNCH_FAILURE escapes the session monitor.
 */
export class BrowserError extends DomainError {
  constructor(
    public readonly kind: BrowserErrorKind,
    message: string,
    public readonly originalError?: unknown
  ) {
    super(message);
  }
}

/**
 * Error thrown when classifier input breaks the report invariants.
 * Indicates a defect, not a user-facing condition.
 */
export class AggregationError extends DomainError {
  constructor(message: string) {
    super(`Inconsistent diagnostic input: ${message}`);
  }
}

/**
 * Error thrown when configuration is invalid.
 */
export class ConfigurationError extends DomainError {
  constructor(message: string) {
    super(`Configuration Error: ${message}`);
  }
}

/**
 * Extracts a readable message from an unknown thrown value.
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
