import { Logger, LoggerService } from '@nestjs/common';
import { DataSource, LessThan, QueryFailedError, Repository } from 'typeorm';
import {
  IdempotencyLedger,
  LedgerRetentionOptions,
} from '../../../core/interfaces';
import { ProcessedOrderEntity } from './entities';

/**
 * TypeORM implementation of IdempotencyLedger
 *
 * The primary key on `order_id` makes the insert the atomic check: when two
 * processes (or two webhooks) race, exactly one insert succeeds and the
 * other fails with a constraint violation, reported as a duplicate.
 */
export class TypeORMIdempotencyLedger implements IdempotencyLedger {
  private readonly repo: Repository<ProcessedOrderEntity>;
  private readonly retentionMs?: number;
  private readonly now: () => number;

  constructor(
    private readonly dataSource: DataSource,
    options: LedgerRetentionOptions = {},
    private readonly logger: LoggerService = new Logger(TypeORMIdempotencyLedger.name),
  ) {
    this.repo = dataSource.getRepository(ProcessedOrderEntity);
    this.retentionMs = options.retentionMs;
    this.now = options.now ?? Date.now;
  }

  async tryClaim(orderId: string): Promise<boolean> {
    await this.evictExpired();

    try {
      await this.repo.insert({ orderId, claimedAtMs: this.now() });
      return true;
    } catch (error) {
      if (error instanceof QueryFailedError) {
        const existing = await this.repo.findOneBy({ orderId });
        if (existing) {
          return false;
        }
      }
      throw error;
    }
  }

  async has(orderId: string): Promise<boolean> {
    const cutoff = this.cutoff();
    const row = await this.repo.findOneBy({ orderId });
    return row !== null && (cutoff === undefined || row.claimedAtMs >= cutoff);
  }

  async size(): Promise<number> {
    await this.evictExpired();
    return this.repo.count();
  }

  async isHealthy(): Promise<boolean> {
    if (!this.dataSource.isInitialized) {
      return false;
    }
    try {
      await this.dataSource.query('SELECT 1');
      return true;
    } catch (error) {
      this.logger.warn(
        `Ledger health check failed: ${error instanceof Error ? error.message : String(error)}`,
      );
      return false;
    }
  }

  async close(): Promise<void> {
    if (this.dataSource.isInitialized) {
      await this.dataSource.destroy();
    }
  }

  private cutoff(): number | undefined {
    return this.retentionMs === undefined
      ? undefined
      : this.now() - this.retentionMs;
  }

  private async evictExpired(): Promise<void> {
    const cutoff = this.cutoff();
    if (cutoff === undefined) {
      return;
    }
    await this.repo.delete({ claimedAtMs: LessThan(cutoff) });
  }
}
