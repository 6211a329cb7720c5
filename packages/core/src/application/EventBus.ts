import type { EventType, EventPayload, DomainEvent } from '../domain/events/DomainEvents.js';
import { isEventOf } from '../domain/events/DomainEvents.js';

type EventHandler<T extends EventType> = (event: EventPayload<T>) => void;

type WildcardHandler = (event: DomainEvent) => void;

/** Typed event bus for domain events. Subscribe with `on()`, publish with `emit()`. */
export class EventBus {
  private readonly handlers = new Map<EventType, Map<object, WildcardHandler>>();
  private readonly wildcardHandlers = new Set<WildcardHandler>();

  /** Subscribe to events of the given type. */
  on<T extends EventType>(type: T, handler: EventHandler<T>): void {
    const existing = this.handlers.get(type) ?? new Map<object, WildcardHandler>();
    existing.set(handler, (event) => {
      if (isEventOf(event, type)) handler(event);
    });
    this.handlers.set(type, existing);
  }

  /** Subscribe to all events regardless of type. */
  onAny(handler: WildcardHandler): void {
    this.wildcardHandlers.add(handler);
  }

  /** Unsubscribe a previously registered handler. */
  off<T extends EventType>(type: T, handler: EventHandler<T>): void {
    this.handlers.get(type)?.delete(handler);
  }

  /** Unsubscribe a wildcard handler. */
  offAny(handler: WildcardHandler): void {
    this.wildcardHandlers.delete(handler);
  }

  /** Emit a domain event to all registered handlers. A throwing handler does not prevent others from executing. */
  emit(event: DomainEvent): void {
    const handlers = this.handlers.get(event.type);
    if (handlers) {
      for (const handler of handlers.values()) {
        this.deliver(handler, event);
      }
    }

    for (const handler of this.wildcardHandlers) {
      this.deliver(handler, event);
    }
  }

  private deliver(handler: WildcardHandler, event: DomainEvent): void {
    try {
      handler(event);
    } catch (error) {
      const detail = error instanceof Error ? error.message : String(error);
      process.emitWarning(`Handler for '${event.type}' threw: ${detail}`, 'EventHandlerWarning');
    }
  }
}
