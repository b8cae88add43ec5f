/**
 * Events emitted while turning a webhook into relay actuation
 */
export enum VendingEventType {
  WEBHOOK_IGNORED = 'webhook.ignored',
  ORDER_CLAIMED = 'order.claimed',
  ORDER_DUPLICATE = 'order.duplicate',
  ORDER_LOOKUP_FAILED = 'order.lookup_failed',
  SLOT_RESOLVED = 'slot.resolved',
  SLOT_UNRESOLVED = 'slot.unresolved',
  DISPENSE_STARTED = 'dispense.started',
  DISPENSE_COMPLETED = 'dispense.completed',
  DISPENSE_SKIPPED = 'dispense.skipped',
}
