import { EventBus, DomainEvent, EventHandler } from '../../domain/events/DomainEvent';
import { errorMessage } from '../../domain/errors/AppErrors';
import { loggers } from '../logging';

/**
 * Event class carrying its type constant, e.g. `ProbeCompletedEvent`.
 */
export interface EventClass<T extends DomainEvent> {
  new (...args: never[]): T;
  readonly TYPE: string;
}

/**
 * In-memory implementation of EventBus.
 * Handlers run in parallel; a failing handler is logged and never fails the publisher.
 */
export class InMemoryEventBus implements EventBus {
  private handlers: Map<string, Set<EventHandler>> = new Map();
  private eventHistory: DomainEvent[] = [];
  private maxHistorySize: number;

  constructor(options?: { maxHistorySize?: number }) {
    this.maxHistorySize = options?.maxHistorySize ?? 1000;
  }

  async publish(event: DomainEvent): Promise<void> {
    this.eventHistory.push(event);
    if (this.eventHistory.length > this.maxHistorySize) {
      this.eventHistory.shift();
    }

    const typeHandlers = this.handlers.get(event.type);
    if (!typeHandlers || typeHandlers.size === 0) {
      return;
    }

    const handlerPromises = Array.from(typeHandlers).map(async handler => {
      try {
        await handler(event);
      } catch (error) {
        loggers.event.error(`Error in event handler for ${event.type}: ${errorMessage(error)}`);
      }
    });

    await Promise.all(handlerPromises);
  }

  subscribe<T extends DomainEvent>(eventType: string, handler: EventHandler<T>): void {
    let typeHandlers = this.handlers.get(eventType);
    if (!typeHandlers) {
      typeHandlers = new Set();
      this.handlers.set(eventType, typeHandlers);
    }
    typeHandlers.add(handler as EventHandler);
  }

  unsubscribe<T extends DomainEvent>(eventType: string, handler: EventHandler<T>): void {
    this.handlers.get(eventType)?.delete(handler as EventHandler);
  }

  /**
   * Get event history (for debugging/testing).
   * Optionally filter by event type.
   */
  getHistory(eventType?: string): ReadonlyArray<DomainEvent> {
    if (eventType) {
      return this.eventHistory.filter(e => e.type === eventType);
    }
    return [...this.eventHistory];
  }

  /**
   * Get events of a specific class from history.
   */
  getEventsOf<T extends DomainEvent>(eventClass: EventClass<T>): T[] {
    return this.eventHistory.filter((e): e is T => e instanceof eventClass);
  }
}
