import { DataSource, DataSourceOptions } from 'typeorm';
import { ProcessedOrderEntity } from './entities';

export interface LedgerDatabaseOptions {
  host?: string;
  port?: number;
  username?: string;
  password?: string;
  database?: string;
  synchronize?: boolean;
  logging?: boolean;
}

/**
 * TypeORM configuration for the order ledger (PostgreSQL)
 */
export const createTypeORMConfig = (
  options: LedgerDatabaseOptions = {},
): DataSourceOptions => ({
  type: 'postgres',
  host: options.host ?? process.env.DB_HOST ?? 'localhost',
  port: options.port ?? parseInt(process.env.DB_PORT || '5432', 10),
  username: options.username ?? process.env.DB_USERNAME ?? 'vending',
  password: options.password ?? process.env.DB_PASSWORD ?? 'vending',
  database: options.database ?? process.env.DB_NAME ?? 'vending',
  entities: [ProcessedOrderEntity],
  synchronize: options.synchronize ?? true,
  logging: options.logging ?? process.env.DB_LOGGING === 'true',
  // Connection pool settings
  extra: {
    max: 2,
    idleTimeoutMillis: 30000,
    connectionTimeoutMillis: 2000,
  },
});

/**
 * Create TypeORM DataSource
 */
export const createDataSource = (options?: LedgerDatabaseOptions): DataSource =>
  new DataSource(createTypeORMConfig(options));
