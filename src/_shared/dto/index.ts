/**
 * DTOs for the vending API
 *
 * Input validation and Swagger documentation for the HTTP endpoints.
 */

export * from './webhook.dto';
export * from './maintenance.dto';
