import { plainToInstance, Type } from 'class-transformer';
import {
  IsIn,
  IsInt,
  IsOptional,
  IsString,
  IsUrl,
  Max,
  Min,
  validateSync,
} from 'class-validator';
import { ConfigService } from '@nestjs/config';
import { ConfigurationError } from '../core/domain/errors';
import type { VendingModuleConfig } from '../modules/vending/vending.config';

export const CATALOG_PROVIDERS = ['square', 'mock'] as const;
export const GPIO_DRIVERS = ['onoff', 'simulated'] as const;
export const LEDGER_STORAGES = ['memory', 'typeorm'] as const;

export type CatalogProvider = (typeof CATALOG_PROVIDERS)[number];
export type GpioDriver = (typeof GPIO_DRIVERS)[number];
export type LedgerStorage = (typeof LEDGER_STORAGES)[number];

/**
 * Process environment, validated once at startup
 */
export class EnvironmentVariables {
  @IsOptional()
  @IsString()
  NODE_ENV?: string;

  @Type(() => Number)
  @IsInt()
  @Min(1)
  @Max(65535)
  PORT = 8000;

  @IsOptional()
  @IsString()
  SQUARE_ACCESS_TOKEN?: string;

  @IsUrl({ require_tld: false })
  SQUARE_API_BASE_URL = 'https://connect.squareup.com';

  @IsString()
  SQUARE_API_VERSION = '2025-07-16';

  // Comma separated; several keys during rotation
  @IsOptional()
  @IsString()
  SQUARE_WEBHOOK_SIGNATURE_KEY?: string;

  @IsOptional()
  @IsUrl({ require_tld: false })
  SQUARE_WEBHOOK_URL?: string;

  @IsIn(CATALOG_PROVIDERS)
  CATALOG_PROVIDER: CatalogProvider = 'square';

  @IsIn(GPIO_DRIVERS)
  GPIO_DRIVER: GpioDriver = 'onoff';

  @IsString()
  HARDWARE_LAYOUT_PATH = 'config/hardware.json';

  @Type(() => Number)
  @IsInt()
  @Min(1)
  DISPENSE_DWELL_MS = 3300;

  @Type(() => Number)
  @IsInt()
  @Min(1)
  RESOLUTION_TIMEOUT_MS = 30000;

  @IsIn(LEDGER_STORAGES)
  LEDGER_STORAGE: LedgerStorage = 'memory';

  @IsOptional()
  @Type(() => Number)
  @IsInt()
  @Min(1)
  LEDGER_RETENTION_MS?: number;

  @IsString()
  DB_HOST = 'localhost';

  @Type(() => Number)
  @IsInt()
  DB_PORT = 5432;

  @IsString()
  DB_USERNAME = 'vending';

  @IsString()
  DB_PASSWORD = 'vending';

  @IsString()
  DB_NAME = 'vending';

  @IsOptional()
  @IsString()
  MAINTENANCE_API_KEY?: string;
}

/**
 * `validate` hook for ConfigModule: coerce, check, and fail startup on error
 */
export function validateEnvironment(
  config: Record<string, unknown>,
): EnvironmentVariables {
  const validated = plainToInstance(EnvironmentVariables, config);
  const errors = validateSync(validated, { skipMissingProperties: false });

  if (errors.length > 0) {
    const problems = errors.flatMap((error) =>
      Object.values(error.constraints ?? {}),
    );
    throw new ConfigurationError(
      `Invalid environment: ${problems.join('; ')}`,
      'environment',
      { problems },
    );
  }

  return validated;
}

/**
 * Module configuration from the validated environment
 */
export function createVendingConfig(
  configService: ConfigService<EnvironmentVariables, true>,
): VendingModuleConfig {
  const signatureKeys = (configService.get('SQUARE_WEBHOOK_SIGNATURE_KEY', { infer: true }) ?? '')
    .split(',')
    .map((key) => key.trim())
    .filter((key) => key.length > 0);

  return {
    provider: {
      adapter: configService.get('CATALOG_PROVIDER', { infer: true }),
      keys: {
        accessToken: configService.get('SQUARE_ACCESS_TOKEN', { infer: true }),
        webhookSignatureKey: signatureKeys,
      },
      options: {
        apiUrl: configService.get('SQUARE_API_BASE_URL', { infer: true }),
        apiVersion: configService.get('SQUARE_API_VERSION', { infer: true }),
        notificationUrl: configService.get('SQUARE_WEBHOOK_URL', { infer: true }),
      },
    },
    ledger: {
      type: configService.get('LEDGER_STORAGE', { infer: true }),
      retentionMs: configService.get('LEDGER_RETENTION_MS', { infer: true }),
      options: {
        host: configService.get('DB_HOST', { infer: true }),
        port: configService.get('DB_PORT', { infer: true }),
        username: configService.get('DB_USERNAME', { infer: true }),
        password: configService.get('DB_PASSWORD', { infer: true }),
        database: configService.get('DB_NAME', { infer: true }),
      },
    },
    hardware: {
      driver: configService.get('GPIO_DRIVER', { infer: true }),
      layoutPath: configService.get('HARDWARE_LAYOUT_PATH', { infer: true }),
      dwellMs: configService.get('DISPENSE_DWELL_MS', { infer: true }),
    },
    webhooks: {
      resolutionTimeoutMs: configService.get('RESOLUTION_TIMEOUT_MS', { infer: true }),
    },
    maintenance: {
      apiKey: configService.get('MAINTENANCE_API_KEY', { infer: true }),
    },
  };
}
