import { Logger, LoggerService } from '@nestjs/common';
import {
  EventDispatcher,
  EventHandler,
  EventSubscription,
  VendingEvent,
  VendingEventType,
} from '../interfaces';

/**
 * Default implementation of the EventDispatcher
 *
 * Supports multiple handlers per event type with error isolation: a failing
 * handler is logged and never affects other handlers or the dispatcher's caller.
 */
export class EventDispatcherImpl implements EventDispatcher {
  private handlers: Map<VendingEventType, Set<EventHandler>> = new Map();
  private globalHandlers: Set<EventHandler> = new Set();
  private subscriptionIdCounter = 0;

  constructor(
    private readonly logger: LoggerService = new Logger(EventDispatcherImpl.name),
  ) {}

  /**
   * Register an event handler for a specific event type
   */
  on(eventType: VendingEventType, handler: EventHandler): EventSubscription {
    const subscriptionId = `sub_${++this.subscriptionIdCounter}`;

    let handlers = this.handlers.get(eventType);
    if (!handlers) {
      handlers = new Set();
      this.handlers.set(eventType, handlers);
    }
    handlers.add(handler);

    return {
      id: subscriptionId,
      unsubscribe: () => this.off(eventType, handler),
    };
  }

  /**
   * Register a handler for all event types
   */
  onAll(handler: EventHandler): EventSubscription {
    const subscriptionId = `sub_${++this.subscriptionIdCounter}`;

    this.globalHandlers.add(handler);

    return {
      id: subscriptionId,
      unsubscribe: () => {
        this.globalHandlers.delete(handler);
      },
    };
  }

  /**
   * Remove an event handler
   */
  off(eventType: VendingEventType, handler: EventHandler): void {
    const handlers = this.handlers.get(eventType);
    if (handlers) {
      handlers.delete(handler);
      if (handlers.size === 0) {
        this.handlers.delete(eventType);
      }
    }
  }

  /**
   * Remove all handlers for an event type, or every handler
   */
  removeAllHandlers(eventType?: VendingEventType): void {
    if (eventType) {
      this.handlers.delete(eventType);
    } else {
      this.handlers.clear();
      this.globalHandlers.clear();
    }
  }

  /**
   * Dispatch an event to all registered handlers
   */
  async dispatch(event: VendingEvent): Promise<void> {
    const allHandlers = this.getHandlers(event.type);
    const errors: Array<{ handler: string; error: Error }> = [];

    await Promise.allSettled(
      allHandlers.map(async (handler) => {
        try {
          await handler(event);
        } catch (error) {
          errors.push({
            handler: handler.name || 'anonymous',
            error: error instanceof Error ? error : new Error(String(error)),
          });
        }
      }),
    );

    for (const { handler, error } of errors) {
      this.logger.error(
        `Event handler '${handler}' failed for ${event.type}: ${error.message}`,
        error.stack,
      );
    }
  }

  /**
   * Get all handlers for an event type, specific ones first
   */
  getHandlers(eventType: VendingEventType): EventHandler[] {
    const specificHandlers = Array.from(this.handlers.get(eventType) ?? []);
    return [...specificHandlers, ...this.globalHandlers];
  }

  /**
   * Check if there are any handlers for an event type
   */
  hasHandlers(eventType: VendingEventType): boolean {
    return this.getHandlers(eventType).length > 0;
  }

  /**
   * Get handler count for an event type, or across all types
   */
  getHandlerCount(eventType?: VendingEventType): number {
    if (eventType) {
      return this.getHandlers(eventType).length;
    }

    let total = this.globalHandlers.size;
    for (const handlers of this.handlers.values()) {
      total += handlers.size;
    }
    return total;
  }
}
