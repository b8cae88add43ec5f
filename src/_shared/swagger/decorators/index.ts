/**
 * Swagger decorators for the vending API
 *
 * Keep the controllers free of documentation noise.
 */

export * from './webhook.decorators';
export * from './health.decorators';
export * from './maintenance.decorators';
