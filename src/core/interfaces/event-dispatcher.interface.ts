import { UnresolvedReason, VendingEventType } from '../domain/enums';
import {
  ChannelIndex,
  DispenseReport,
  OrderIdentifier,
  SlotIdentifier,
} from './common.types';

/**
 * Payload carried by each vending event type
 */
export interface VendingEventMap {
  [VendingEventType.WEBHOOK_IGNORED]: {
    processingId: string;
    eventType?: string;
    paymentStatus?: string;
    reason: string;
  };
  [VendingEventType.ORDER_CLAIMED]: {
    orderId: OrderIdentifier;
    eventId?: string;
  };
  [VendingEventType.ORDER_DUPLICATE]: {
    orderId: OrderIdentifier;
    eventId?: string;
  };
  [VendingEventType.ORDER_LOOKUP_FAILED]: {
    orderId: OrderIdentifier;
    error: string;
  };
  [VendingEventType.SLOT_RESOLVED]: {
    orderId: OrderIdentifier;
    lineItemUid?: string;
    catalogObjectId: string;
    slotId: SlotIdentifier;
  };
  [VendingEventType.SLOT_UNRESOLVED]: {
    orderId: OrderIdentifier;
    lineItemUid?: string;
    catalogObjectId?: string;
    reason: UnresolvedReason;
    detail: string;
  };
  [VendingEventType.DISPENSE_STARTED]: {
    slotId?: SlotIdentifier;
    channels: ChannelIndex[];
    dwellMs: number;
  };
  [VendingEventType.DISPENSE_COMPLETED]: DispenseReport;
  [VendingEventType.DISPENSE_SKIPPED]: {
    slotId: SlotIdentifier;
    reason: string;
  };
}

/**
 * Discriminated union of every event the pipeline emits
 */
export type VendingEvent = {
  [K in VendingEventType]: { type: K; payload: VendingEventMap[K] };
}[VendingEventType];

/**
 * Event handler function signature
 */
export type EventHandler = (event: VendingEvent) => Promise<void> | void;

/**
 * Handle returned by a registration
 */
export interface EventSubscription {
  id: string;
  unsubscribe(): void;
}

/**
 * Event dispatcher interface - fans vending events out to handlers.
 * Handler failures are isolated; `dispatch` never rejects.
 */
export interface EventDispatcher {
  /**
   * Register a handler for one event type
   */
  on(eventType: VendingEventType, handler: EventHandler): EventSubscription;

  /**
   * Register a handler for every event type
   */
  onAll(handler: EventHandler): EventSubscription;

  /**
   * Remove a handler registered with `on`
   */
  off(eventType: VendingEventType, handler: EventHandler): void;

  /**
   * Deliver an event to all matching handlers and wait for them
   */
  dispatch(event: VendingEvent): Promise<void>;

  /**
   * Handlers that would receive the given event type
   */
  getHandlers(eventType: VendingEventType): EventHandler[];
}
