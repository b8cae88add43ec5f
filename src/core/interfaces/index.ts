// Interface and type exports
export * from './common.types';
export * from './idempotency-ledger';
export * from './payment-provider.adapter';
export * from './pin-driver.interface';
export * from './event-dispatcher.interface';

// Re-export enums needed by interfaces
export { VendingEventType, LogicLevel } from '../domain/enums';
