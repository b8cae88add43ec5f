/**
 * Injection tokens for the vending module
 */

export const VENDING_CONFIG = Symbol('VENDING_CONFIG');
export const EVENT_DISPATCHER = Symbol('EVENT_DISPATCHER');
export const METRICS_HANDLER = Symbol('METRICS_HANDLER');
export const PAYMENT_PROVIDER = Symbol('PAYMENT_PROVIDER');
export const IDEMPOTENCY_LEDGER = Symbol('IDEMPOTENCY_LEDGER');
export const ACTUATOR_MAP = Symbol('ACTUATOR_MAP');
export const PIN_DRIVER = Symbol('PIN_DRIVER');
export const RELAY_DRIVER = Symbol('RELAY_DRIVER');
export const TASK_RUNNER = Symbol('TASK_RUNNER');
export const DISPENSE_CONTROLLER = Symbol('DISPENSE_CONTROLLER');
export const WEBHOOK_PROCESSOR = Symbol('WEBHOOK_PROCESSOR');
