import { Logger, LoggerService } from '@nestjs/common';
import { EventHandler, VendingEvent, VendingEventType } from '../../interfaces';

/**
 * Logging event handler
 * Writes one line per vending event for the kiosk's journal
 */
export class LoggingEventHandler {
  constructor(
    private readonly logger: LoggerService = new Logger('VendingEvents'),
    private readonly logLevel: 'verbose' | 'normal' | 'minimal' = 'normal',
  ) {}

  /**
   * Create the event handler function
   */
  getHandler(): EventHandler {
    return (event: VendingEvent) => {
      try {
        const message = `[${event.type}] ${this.describe(event)}`;

        if (this.logLevel === 'verbose') {
          this.logger.log(`${message} ${JSON.stringify(event.payload)}`);
        } else if (this.logLevel === 'minimal' && !this.isNotable(event)) {
          this.logger.debug?.(message);
        } else {
          this.logger.log(message);
        }
      } catch (error) {
        this.logger.error(
          `Failed to log event ${event.type}`,
          error instanceof Error ? error.stack : String(error),
        );
      }
    };
  }

  /**
   * Dispense outcomes and duplicates stay visible at every level
   */
  private isNotable(event: VendingEvent): boolean {
    return (
      event.type === VendingEventType.DISPENSE_COMPLETED ||
      event.type === VendingEventType.DISPENSE_SKIPPED ||
      event.type === VendingEventType.ORDER_DUPLICATE ||
      event.type === VendingEventType.ORDER_LOOKUP_FAILED
    );
  }

  private describe(event: VendingEvent): string {
    switch (event.type) {
      case VendingEventType.WEBHOOK_IGNORED:
        return `webhook ${event.payload.processingId} ignored: ${event.payload.reason}`;
      case VendingEventType.ORDER_CLAIMED:
        return `order ${event.payload.orderId} claimed`;
      case VendingEventType.ORDER_DUPLICATE:
        return `order ${event.payload.orderId} already dispensed`;
      case VendingEventType.ORDER_LOOKUP_FAILED:
        return `order ${event.payload.orderId} lookup failed: ${event.payload.error}`;
      case VendingEventType.SLOT_RESOLVED:
        return `order ${event.payload.orderId} item ${event.payload.catalogObjectId} -> slot ${event.payload.slotId}`;
      case VendingEventType.SLOT_UNRESOLVED:
        return `order ${event.payload.orderId} item ${event.payload.catalogObjectId ?? '(none)'} unresolved (${event.payload.reason}): ${event.payload.detail}`;
      case VendingEventType.DISPENSE_STARTED:
        return `${event.payload.slotId ? `slot ${event.payload.slotId}` : 'pulse'} engaging channels ${event.payload.channels.join(',')} for ${event.payload.dwellMs}ms`;
      case VendingEventType.DISPENSE_COMPLETED:
        return `${event.payload.slotId ? `slot ${event.payload.slotId}` : 'pulse'} ${event.payload.status} in ${event.payload.durationMs}ms`;
      case VendingEventType.DISPENSE_SKIPPED:
        return `slot ${event.payload.slotId} skipped: ${event.payload.reason}`;
    }
  }
}
