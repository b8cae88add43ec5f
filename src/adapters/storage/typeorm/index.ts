export * from './entities';
export { TypeORMIdempotencyLedger } from './typeorm-idempotency-ledger';
export {
  createTypeORMConfig,
  createDataSource,
  type LedgerDatabaseOptions,
} from './typeorm.config';
