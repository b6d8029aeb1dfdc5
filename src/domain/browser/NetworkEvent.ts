import { deepFreeze } from '../shared/ValueObject';

/**
 * A tracked outbound request observed during the browser session.
 */
export interface NetworkEvent {
  readonly url: string;
  readonly host: string;
  readonly method: string;
  /** Response status; absent when no response arrived */
  readonly status?: number;
  /** ISO-8601 start time */
  readonly startedAt: string;
  readonly durationMs?: number;
  /** Whether a response or a network failure ended the request before the window closed */
  readonly completed: boolean;
  /** Network failure, non-2xx status, or never completed */
  readonly failed: boolean;
  readonly errorText?: string;
}

export interface NetworkEventProps {
  url: string;
  method: string;
  startedAt: number;
  endedAt?: number;
  status?: number;
  errorText?: string;
}

export const NEVER_COMPLETED = 'No response before the observation window closed';

/**
 * Builds a frozen NetworkEvent. `windowClosedAt` bounds the duration of
 * requests that never completed.
 */
export function createNetworkEvent(props: NetworkEventProps, windowClosedAt: number): NetworkEvent {
  const completed = props.endedAt !== undefined;
  const statusFailed = props.status !== undefined && (props.status < 200 || props.status >= 300);
  const failed = !completed || props.errorText !== undefined || statusFailed;
  const endedAt = props.endedAt ?? windowClosedAt;
  const errorText = props.errorText ?? (completed ? undefined : NEVER_COMPLETED);

  const event: NetworkEvent = {
    url: props.url,
    host: new URL(props.url).hostname.toLowerCase(),
    method: props.method,
    startedAt: new Date(props.startedAt).toISOString(),
    durationMs: Math.max(0, endedAt - props.startedAt),
    completed,
    failed,
    ...(props.status !== undefined && { status: props.status }),
    ...(errorText !== undefined && { errorText }),
  };
  return deepFreeze(event);
}

export function describeNetworkEvent(event: NetworkEvent): string {
  const outcome =
    event.status !== undefined
      ? `HTTP ${event.status}`
      : event.errorText ?? 'no response';
  const suffix = event.status !== undefined && event.errorText ? ` (${event.errorText})` : '';
  return `${event.method} ${event.url} -> ${outcome}${suffix}`;
}
