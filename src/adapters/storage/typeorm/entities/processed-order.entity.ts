import { Column, Entity, Index, PrimaryColumn } from 'typeorm';

/**
 * TypeORM entity for the idempotency ledger: one row per claimed order
 */
@Entity('processed_orders')
@Index(['claimedAtMs'])
export class ProcessedOrderEntity {
  @PrimaryColumn({ name: 'order_id', type: 'varchar', length: 255 })
  orderId!: string;

  // Epoch milliseconds, compared against the retention cutoff
  @Column({ name: 'claimed_at_ms', type: 'double precision' })
  claimedAtMs!: number;
}
