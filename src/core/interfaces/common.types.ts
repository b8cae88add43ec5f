import { DispenseStatus, UnresolvedReason } from '../domain/enums';

/**
 * Common types used across the pipeline
 */

/**
 * Human-readable slot label, e.g. "A1" or "D8"
 */
export type SlotIdentifier = string;

/**
 * Logical relay channel (1-16 on the reference board)
 */
export type ChannelIndex = number;

/**
 * Provider order id, unique per purchase
 */
export type OrderIdentifier = string;

/**
 * Completed-payment event extracted from a webhook
 */
export interface CompletedPaymentEvent {
  orderId: OrderIdentifier;
  eventId?: string;
  paymentId?: string;
  merchantId?: string;
  receivedAt: Date;
}

/**
 * Result of resolving one line item to a slot
 */
export type SlotResolution =
  | {
      found: true;
      slotId: SlotIdentifier;
      catalogObjectId: string;
    }
  | {
      found: false;
      reason: UnresolvedReason;
      catalogObjectId?: string;
      detail: string;
    };

/**
 * Outcome of a dispense or pulse cycle
 */
export interface DispenseReport {
  slotId?: SlotIdentifier;
  status: DispenseStatus;
  channels: ChannelIndex[];
  failedChannels: ChannelIndex[];
  startedAt: Date;
  durationMs: number;
}
