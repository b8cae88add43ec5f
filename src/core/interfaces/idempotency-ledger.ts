/**
 * Idempotency ledger - the record of orders that already triggered actuation.
 *
 * The only correctness gate against duplicate dispensing when the provider
 * redelivers a notification. `tryClaim` MUST be a single atomic
 * check-and-insert: concurrent claims for the same id yield exactly one `true`.
 */
export interface IdempotencyLedger {
  /**
   * Record the order id if unseen.
   * @returns true the first time an id is claimed, false on every later call
   */
  tryClaim(orderId: string): Promise<boolean>;

  /**
   * Whether the id is currently held by the ledger
   */
  has(orderId: string): Promise<boolean>;

  /**
   * Number of ids currently retained
   */
  size(): Promise<number>;

  /**
   * Backing store reachable
   */
  isHealthy(): Promise<boolean>;

  /**
   * Release the backing store at shutdown
   */
  close?(): Promise<void>;
}

/**
 * Retention options shared by ledger implementations
 */
export interface LedgerRetentionOptions {
  /**
   * Evict ids claimed longer ago than this. Unset keeps every id for the
   * lifetime of the store.
   */
  retentionMs?: number;

  /**
   * Clock, in epoch milliseconds
   */
  now?: () => number;
}
