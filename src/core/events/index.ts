/**
 * Vending Event System
 * Event dispatching and handling for pipeline and dispense events
 */

// Event dispatcher implementation
export { EventDispatcherImpl } from './event-dispatcher.impl';

// Built-in event handlers
export { LoggingEventHandler } from './handlers/logging.handler';
export { MetricsEventHandler } from './handlers/metrics.handler';
