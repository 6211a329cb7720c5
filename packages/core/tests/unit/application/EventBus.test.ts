import { describe, it, expect, vi, afterEach } from 'vitest';
import { EventBus } from '../../../src/application/EventBus.js';
import type { HeaderIndexedEvent, ExtractionFailedEvent } from '../../../src/domain/events/DomainEvents.js';

function headerIndexed(): HeaderIndexedEvent {
  return {
    type: 'header:indexed',
    columns: ['zip_code', 'population'],
    missingColumns: [],
    delimiter: ',',
    timestamp: Date.now(),
  };
}

describe('EventBus', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('should emit events to registered handlers', () => {
    const bus = new EventBus();
    const handler = vi.fn();

    bus.on('header:indexed', handler);

    const event = headerIndexed();
    bus.emit(event);
    expect(handler).toHaveBeenCalledOnce();
    expect(handler).toHaveBeenCalledWith(event);
  });

  it('should not call handlers for different event types', () => {
    const bus = new EventBus();
    const handler = vi.fn();

    bus.on('header:indexed', handler);

    const event: ExtractionFailedEvent = {
      type: 'extraction:failed',
      code: 'EMPTY_STREAM',
      error: 'Source is empty: no header row available',
      timestamp: Date.now(),
    };

    bus.emit(event);
    expect(handler).not.toHaveBeenCalled();
  });

  it('should support multiple handlers for the same event', () => {
    const bus = new EventBus();
    const handler1 = vi.fn();
    const handler2 = vi.fn();

    bus.on('header:indexed', handler1);
    bus.on('header:indexed', handler2);
    bus.emit(headerIndexed());

    expect(handler1).toHaveBeenCalledOnce();
    expect(handler2).toHaveBeenCalledOnce();
  });

  it('should unsubscribe handlers with off()', () => {
    const bus = new EventBus();
    const handler = vi.fn();

    bus.on('header:indexed', handler);
    bus.off('header:indexed', handler);
    bus.emit(headerIndexed());

    expect(handler).not.toHaveBeenCalled();
  });

  it('should deliver every event to wildcard handlers until removed', () => {
    const bus = new EventBus();
    const handler = vi.fn();

    bus.onAny(handler);
    bus.emit(headerIndexed());
    bus.offAny(handler);
    bus.emit(headerIndexed());

    expect(handler).toHaveBeenCalledOnce();
  });

  it('should keep delivering when a handler throws, and warn about it', () => {
    const warn = vi.spyOn(process, 'emitWarning').mockImplementation(() => undefined);
    const bus = new EventBus();
    const after = vi.fn();

    bus.on('header:indexed', () => {
      throw new Error('subscriber broke');
    });
    bus.on('header:indexed', after);
    bus.emit(headerIndexed());

    expect(after).toHaveBeenCalledOnce();
    expect(warn).toHaveBeenCalledWith("Handler for 'header:indexed' threw: subscriber broke", 'EventHandlerWarning');
  });
});
