/**
 * NestJS surface of the vending controller
 */

export * from './vending';
