import { FactoryProvider, ModuleMetadata } from '@nestjs/common';
import { DataSource } from 'typeorm';
import type {
  EventDispatcher,
  EventHandler,
  HardwareLayout,
  IdempotencyLedger,
  PaymentProviderAdapter,
  PinDriver,
  VendingEventType,
} from '../../core';
import type { LedgerDatabaseOptions } from '../../adapters/storage/typeorm';

/**
 * Vending Module Configuration
 */
export interface VendingModuleConfig {
  /**
   * Payment provider: where orders and the catalog are looked up and
   * whose webhook signatures are checked
   */
  provider: {
    /**
     * Provider adapter instance or name
     */
    adapter: PaymentProviderAdapter | 'square' | 'mock';

    keys?: {
      /**
       * Access token for the Orders and Catalog APIs
       */
      accessToken?: string;

      /**
       * Webhook signature key(s). Verification is off when none is set.
       * Array supports key rotation (try each until one matches).
       */
      webhookSignatureKey?: string | string[];
    };

    options?: {
      /**
       * API base URL (sandbox or production)
       */
      apiUrl?: string;

      /**
       * Pinned API version header
       */
      apiVersion?: string;

      /**
       * Timeout for a single API call in milliseconds
       * Default: 30000
       */
      apiTimeout?: number;

      /**
       * Public URL the provider posts notifications to; part of the signed content
       */
      notificationUrl?: string;
    };
  };

  /**
   * Idempotency ledger configuration
   */
  ledger: {
    type: 'memory' | 'typeorm' | 'custom';
    options?: LedgerDatabaseOptions;
    dataSource?: DataSource;
    adapter?: IdempotencyLedger;

    /**
     * Forget claimed orders after this long. Unset keeps them forever.
     */
    retentionMs?: number;
  };

  /**
   * Relay hardware
   */
  hardware: {
    driver: 'onoff' | 'simulated' | PinDriver;

    /**
     * Channel bindings and slot map, read from `layoutPath` unless given inline
     */
    layout?: HardwareLayout;
    layoutPath?: string;

    /**
     * How long a slot's relays stay engaged
     * Default: 3300
     */
    dwellMs?: number;
  };

  /**
   * Webhook processing configuration
   */
  webhooks?: {
    /**
     * Budget for the order and catalog lookups of one order
     * Default: 30000
     */
    resolutionTimeoutMs?: number;
  };

  /**
   * Event configuration
   */
  events?: {
    dispatcher?: EventDispatcher;
    enableLogging?: boolean;
    logLevel?: 'verbose' | 'normal' | 'minimal';
    enableMetrics?: boolean;
    handlers?: Array<{
      eventType: VendingEventType;
      handler: EventHandler;
    }>;
  };

  /**
   * Maintenance endpoints (bench testing). Disabled without an API key.
   */
  maintenance?: {
    apiKey?: string;
    defaultPulseMs?: number;
    maxPulseMs?: number;
  };
}

/**
 * Async configuration factory
 */
export interface VendingModuleAsyncConfig {
  imports?: ModuleMetadata['imports'];
  inject?: FactoryProvider['inject'];
  useFactory: FactoryProvider<
    VendingModuleConfig | Promise<VendingModuleConfig>
  >['useFactory'];
}

/**
 * Default configuration values
 */
export const defaultVendingConfig: Omit<VendingModuleConfig, 'provider'> = {
  ledger: {
    type: 'memory',
  },
  hardware: {
    driver: 'simulated',
    layoutPath: 'config/hardware.json',
    dwellMs: 3300,
  },
  webhooks: {
    resolutionTimeoutMs: 30000,
  },
  events: {
    enableLogging: true,
    logLevel: 'normal',
    enableMetrics: true,
  },
  maintenance: {
    defaultPulseMs: 5000,
    maxPulseMs: 10000,
  },
};

/**
 * Merge a configuration over the defaults, section by section
 */
export function mergeVendingConfig(config: VendingModuleConfig): VendingModuleConfig {
  return {
    ...defaultVendingConfig,
    ...config,
    ledger: { ...defaultVendingConfig.ledger, ...config.ledger },
    hardware: { ...defaultVendingConfig.hardware, ...config.hardware },
    webhooks: { ...defaultVendingConfig.webhooks, ...config.webhooks },
    events: { ...defaultVendingConfig.events, ...config.events },
    maintenance: { ...defaultVendingConfig.maintenance, ...config.maintenance },
  };
}
