import {
  IdempotencyLedger,
  LedgerRetentionOptions,
} from '../../../core/interfaces';

/**
 * In-memory idempotency ledger
 *
 * Check-and-insert happens synchronously within a single call, so it is
 * atomic on the event loop however many webhooks race for the same order.
 * Contents are lost on restart; use the TypeORM ledger where the kiosk
 * may lose power between a payment and its redelivery.
 */
export class MemoryIdempotencyLedger implements IdempotencyLedger {
  // Insertion order doubles as claim order, oldest first
  private claims: Map<string, number> = new Map();
  private readonly retentionMs?: number;
  private readonly now: () => number;

  constructor(options: LedgerRetentionOptions = {}) {
    this.retentionMs = options.retentionMs;
    this.now = options.now ?? Date.now;
  }

  async tryClaim(orderId: string): Promise<boolean> {
    this.evictExpired();

    if (this.claims.has(orderId)) {
      return false;
    }
    this.claims.set(orderId, this.now());
    return true;
  }

  async has(orderId: string): Promise<boolean> {
    this.evictExpired();
    return this.claims.has(orderId);
  }

  async size(): Promise<number> {
    this.evictExpired();
    return this.claims.size;
  }

  async isHealthy(): Promise<boolean> {
    return true;
  }

  /**
   * Drop every claim (test helper)
   */
  clear(): void {
    this.claims.clear();
  }

  private evictExpired(): void {
    if (this.retentionMs === undefined) {
      return;
    }

    const cutoff = this.now() - this.retentionMs;
    for (const [orderId, claimedAt] of this.claims) {
      if (claimedAt >= cutoff) {
        break;
      }
      this.claims.delete(orderId);
    }
  }
}
