import { Injectable, Inject } from '@nestjs/common';
import type { VendingModuleConfig } from '../vending.config';
import { VENDING_CONFIG } from '../constants';

/**
 * Configuration Service
 *
 * Provides access to the vending configuration
 */
@Injectable()
export class ConfigurationService {
  constructor(
    @Inject(VENDING_CONFIG)
    private readonly config: VendingModuleConfig,
  ) {}

  /**
   * Get full configuration
   */
  getConfig(): VendingModuleConfig {
    return this.config;
  }

  /**
   * Webhook signature keys, empty when verification is off
   */
  getSignatureKeys(): string[] {
    const configured = this.config.provider.keys?.webhookSignatureKey;
    const keys = Array.isArray(configured) ? configured : [configured];
    return keys.filter((key): key is string => !!key);
  }

  isSignatureVerificationEnabled(): boolean {
    return this.getSignatureKeys().length > 0;
  }

  getResolutionTimeoutMs(): number | undefined {
    return this.config.webhooks?.resolutionTimeoutMs;
  }

  /**
   * Maintenance endpoints exist only when a key is configured
   */
  isMaintenanceEnabled(): boolean {
    return !!this.config.maintenance?.apiKey;
  }

  getMaintenanceApiKey(): string | undefined {
    return this.config.maintenance?.apiKey || undefined;
  }

  getPulseLimits(): { defaultMs: number; maxMs: number } {
    return {
      defaultMs: this.config.maintenance?.defaultPulseMs ?? 5000,
      maxMs: this.config.maintenance?.maxPulseMs ?? 10000,
    };
  }

  getProviderName(): string {
    const adapter = this.config.provider.adapter;
    return typeof adapter === 'string' ? adapter : adapter.providerName;
  }

  getLedgerType(): VendingModuleConfig['ledger']['type'] {
    return this.config.ledger.type;
  }
}
