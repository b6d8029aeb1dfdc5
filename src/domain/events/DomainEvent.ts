import { randomUUID } from 'crypto';

/**
 * Something that happened during a diagnostic run.
 */
export interface DomainEvent {
  /** One of the event classes' static `TYPE` values */
  readonly type: string;
  readonly runId: string;
  /** ISO-8601 */
  readonly occurredAt: string;
  readonly eventId: string;
}

export abstract class BaseDomainEvent implements DomainEvent {
  readonly occurredAt = new Date().toISOString();
  readonly eventId = randomUUID();

  protected constructor(
    readonly type: string,
    readonly runId: string
  ) {}
}

export type EventHandler<T extends DomainEvent = DomainEvent> = (event: T) => void | Promise<void>;

/**
 * Run-scoped publish/subscribe. Handlers are keyed by event type;
 * a failing handler never fails the publisher.
 */
export interface EventBus {
  publish(event: DomainEvent): Promise<void>;
  subscribe<T extends DomainEvent>(eventType: string, handler: EventHandler<T>): void;
  unsubscribe<T extends DomainEvent>(eventType: string, handler: EventHandler<T>): void;
}
