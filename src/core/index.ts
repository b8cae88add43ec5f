/**
 * Vending core - pipeline, resolver and relay control.
 * Knows nothing about HTTP, the database or the GPIO library in use.
 */

// Domain models
export * from './domain/models';
export * from './domain/enums';
export * from './domain/errors';

// Interfaces and contracts
export * from './interfaces';

// Webhook processing pipeline
export * from './pipeline';

// Catalog resolution
export * from './catalog';

// Relay control
export * from './hardware';

// Background work
export * from './tasks';

// Event system
export * from './events';
