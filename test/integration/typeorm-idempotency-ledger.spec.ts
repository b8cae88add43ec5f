import { DataSource } from 'typeorm';
import { ProcessedOrderEntity, TypeORMIdempotencyLedger } from '../../src';

describe('TypeORM Idempotency Ledger Integration Tests', () => {
  let dataSource: DataSource;
  let now: number;
  let ledger: TypeORMIdempotencyLedger;

  beforeAll(async () => {
    // In-process SQLite; the production ledger runs on PostgreSQL
    dataSource = new DataSource({
      type: 'sqljs',
      entities: [ProcessedOrderEntity],
      synchronize: true,
      logging: false,
    });

    await dataSource.initialize();
  });

  afterAll(async () => {
    if (dataSource.isInitialized) {
      await dataSource.destroy();
    }
  });

  beforeEach(async () => {
    await dataSource.getRepository(ProcessedOrderEntity).clear();
    now = 1_000_000;
    ledger = new TypeORMIdempotencyLedger(dataSource, {
      retentionMs: 60_000,
      now: () => now,
    });
  });

  it('should claim an order id once', async () => {
    expect(await ledger.tryClaim('ord_1')).toBe(true);
    expect(await ledger.tryClaim('ord_1')).toBe(false);
    expect(await ledger.has('ord_1')).toBe(true);
    expect(await ledger.size()).toBe(1);
  });

  it('should grant exactly one of many concurrent claims', async () => {
    const results = await Promise.all(
      Array.from({ length: 5 }, () => ledger.tryClaim('ord_race')),
    );

    expect(results.filter(Boolean)).toHaveLength(1);
  });

  it('should store the claim time in epoch milliseconds', async () => {
    await ledger.tryClaim('ord_1');

    const row = await dataSource
      .getRepository(ProcessedOrderEntity)
      .findOneBy({ orderId: 'ord_1' });

    expect(row?.claimedAtMs).toBe(1_000_000);
  });

  it('should evict claims older than the retention window', async () => {
    await ledger.tryClaim('ord_old');
    now += 30_000;
    await ledger.tryClaim('ord_new');

    now += 30_001;

    expect(await ledger.has('ord_old')).toBe(false);
    expect(await ledger.has('ord_new')).toBe(true);
    expect(await ledger.size()).toBe(1);
    expect(await ledger.tryClaim('ord_old')).toBe(true);
  });

  it('should be healthy while the data source is open', async () => {
    expect(await ledger.isHealthy()).toBe(true);
  });

  it('should close its data source', async () => {
    const own = new DataSource({
      type: 'sqljs',
      entities: [ProcessedOrderEntity],
      synchronize: true,
      logging: false,
    });
    await own.initialize();
    const closing = new TypeORMIdempotencyLedger(own);

    await closing.close();

    expect(own.isInitialized).toBe(false);
    expect(await closing.isHealthy()).toBe(false);
  });
});
