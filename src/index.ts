/**
 * Vending Relay Controller
 *
 * Turns completed Square payments into relay cycles that release the
 * purchased items from a vending enclosure.
 *
 * The onoff GPIO driver is not re-exported here; import it from
 * './adapters/gpio/onoff' on hardware that has a GPIO character device.
 */

// Export all core components
export * from './core';

// Export adapters
export * from './adapters/providers/square';
export * from './adapters/providers/mock';
export * from './adapters/storage/memory';
export * from './adapters/storage/typeorm';
export * from './adapters/gpio/simulated';

// Export the NestJS module, its services, controllers and DI tokens
export * from './modules/vending';

// Export environment handling
export {
  EnvironmentVariables,
  CATALOG_PROVIDERS,
  GPIO_DRIVERS,
  LEDGER_STORAGES,
  validateEnvironment,
  createVendingConfig,
} from './config/environment';
export type {
  CatalogProvider,
  GpioDriver,
  LedgerStorage,
} from './config/environment';

// Export DTOs, Swagger decorators and test factories
export * from './_shared';
