export { MemoryIdempotencyLedger } from './memory-idempotency-ledger';
