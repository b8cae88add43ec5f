import {
  ActuatorMap,
  BackgroundTaskRunner,
  DispenseController,
  EventDispatcherImpl,
  IdempotencyLedger,
  IntakeFate,
  LogicLevel,
  MemoryIdempotencyLedger,
  MockProviderAdapter,
  ProviderError,
  RelayDriver,
  SimulatedPinDriver,
  SquareWebhookFactory,
  UnresolvedReason,
  VendingEvent,
  VendingEventType,
  WebhookProcessor,
  loadHardwareLayout,
} from '../../src';

// GPIO lines behind B3's channels 2, 7, 12 and 14
const B3_LINES = [3, 10, 13, 26];

describe('WebhookProcessor Integration Tests', () => {
  let provider: MockProviderAdapter;
  let ledger: MemoryIdempotencyLedger;
  let pins: SimulatedPinDriver;
  let tasks: BackgroundTaskRunner;
  let dispatcher: EventDispatcherImpl;
  let dispenseController: DispenseController;
  let events: VendingEvent[];

  function createProcessor(
    overrides: { signatureKeys?: string[]; resolutionTimeoutMs?: number; ledger?: IdempotencyLedger } = {},
  ): WebhookProcessor {
    return new WebhookProcessor({
      provider,
      ledger: overrides.ledger ?? ledger,
      dispenseController,
      tasks,
      eventDispatcher: dispatcher,
      signatureKeys: overrides.signatureKeys,
      resolutionTimeoutMs: overrides.resolutionTimeoutMs,
    });
  }

  function lowWrites(): number {
    return pins.history.filter((change) => change.level === LogicLevel.LOW).length;
  }

  beforeEach(() => {
    const actuatorMap = ActuatorMap.fromLayout(loadHardwareLayout());
    provider = new MockProviderAdapter();
    ledger = new MemoryIdempotencyLedger();
    pins = new SimulatedPinDriver();
    tasks = new BackgroundTaskRunner();
    dispatcher = new EventDispatcherImpl();
    events = [];
    dispatcher.onAll((event) => {
      events.push(event);
    });

    const relayDriver = new RelayDriver(pins, actuatorMap.bindings);
    relayDriver.configure();
    dispenseController = new DispenseController(
      actuatorMap,
      relayDriver,
      tasks,
      dispatcher,
      { dwellMs: 10 },
    );

    provider.addOrder('ord_1', [
      { uid: 'li_1', catalogObjectId: 'ITEM_CRISPS', name: 'Crisps', quantity: '1' },
    ]);
    provider.stockItem({ catalogObjectId: 'ITEM_CRISPS', slotId: 'B3' });
  });

  afterEach(async () => {
    await tasks.drain();
  });

  describe('End-to-End Processing', () => {
    it('should release the purchased item from its slot', async () => {
      const processor = createProcessor();
      const webhook = SquareWebhookFactory.paymentCompleted({
        orderId: 'ord_1',
        eventId: 'evt_1',
      });

      const result = await processor.processWebhook(webhook.body, webhook.headers);
      await tasks.drain();

      expect(result.fate).toBe(IntakeFate.ACCEPTED);
      expect(result.orderId).toBe('ord_1');
      expect(result.eventId).toBe('evt_1');
      expect(provider.orderRequests).toEqual(['ord_1']);
      expect(pins.engagedLines()).toEqual(B3_LINES);
      for (const line of B3_LINES) {
        expect(pins.levelOf(line)).toBe(LogicLevel.HIGH);
      }
      expect(await ledger.has('ord_1')).toBe(true);
    });

    it('should dispense once for a redelivered notification', async () => {
      const processor = createProcessor();
      const webhook = SquareWebhookFactory.paymentCompleted({ orderId: 'ord_1' });

      await processor.processWebhook(webhook.body, webhook.headers);
      await tasks.drain();
      const second = await processor.processWebhook(webhook.body, webhook.headers);
      await tasks.drain();

      expect(second.fate).toBe(IntakeFate.ACCEPTED);
      expect(provider.orderRequests).toEqual(['ord_1']);
      expect(lowWrites()).toBe(B3_LINES.length);
      expect(events.filter((e) => e.type === VendingEventType.ORDER_DUPLICATE)).toHaveLength(1);
    });

    it('should dispense once when deliveries race', async () => {
      const processor = createProcessor();
      const first = SquareWebhookFactory.paymentCompleted({ orderId: 'ord_1', eventId: 'evt_a' });
      const retry = SquareWebhookFactory.paymentCompleted({ orderId: 'ord_1', eventId: 'evt_b' });

      await Promise.all([
        processor.processWebhook(first.body, first.headers),
        processor.processWebhook(retry.body, retry.headers),
        processor.processWebhook(first.body, first.headers),
      ]);
      await tasks.drain();

      expect(provider.orderRequests).toEqual(['ord_1']);
      expect(lowWrites()).toBe(B3_LINES.length);
    });

    it('should do nothing for a payment that is not completed', async () => {
      const processor = createProcessor();
      const webhook = SquareWebhookFactory.paymentUpdated({
        orderId: 'ord_1',
        status: 'PENDING',
      });

      const result = await processor.processWebhook(webhook.body, webhook.headers);
      await tasks.drain();

      expect(result.fate).toBe(IntakeFate.IGNORED);
      expect(result.reason).toBe('payment status is not COMPLETED');
      expect(provider.orderRequests).toEqual([]);
      expect(pins.engagedLines()).toEqual([]);
      expect(await ledger.has('ord_1')).toBe(false);
    });

    it('should classify an unreadable body without scheduling work', async () => {
      const processor = createProcessor();

      const result = await processor.processWebhook(Buffer.from('not json'), {});

      expect(result.fate).toBe(IntakeFate.PARSE_ERROR);
      expect(tasks.getStatistics().submitted).toBe(0);
    });

    it('should count intake fates', async () => {
      const processor = createProcessor();
      const accepted = SquareWebhookFactory.paymentCompleted({ orderId: 'ord_1' });
      const ignored = SquareWebhookFactory.event('refund.created');

      await processor.processWebhook(accepted.body, accepted.headers);
      await processor.processWebhook(ignored.body, ignored.headers);
      await processor.processWebhook(ignored.body, ignored.headers);

      expect(processor.getStatistics().fates).toEqual({
        [IntakeFate.ACCEPTED]: 1,
        [IntakeFate.IGNORED]: 2,
      });
    });
  });

  describe('Partial orders', () => {
    it('should dispense the resolvable items and skip the rest', async () => {
      provider.addOrder('ord_mixed', [
        { uid: 'li_1', catalogObjectId: 'ITEM_CRISPS', name: 'Crisps', quantity: '1' },
        { name: 'Custom amount', quantity: '1' },
        { uid: 'li_3', catalogObjectId: 'ITEM_GONE', name: 'Retired item', quantity: '1' },
        { uid: 'li_4', catalogObjectId: 'ITEM_WATER', name: 'Water', quantity: '2' },
      ]);
      provider.stockItem({ catalogObjectId: 'ITEM_WATER', slotId: 'A1' });
      const processor = createProcessor();

      const result = await processor.fulfil({
        orderId: 'ord_mixed',
        receivedAt: new Date(),
      });
      await tasks.drain();

      expect(result.claimed).toBe(true);
      expect(result.lineItems).toBe(4);
      expect(result.dispensedSlots).toEqual(['B3', 'A1']);
      expect(result.unresolved).toBe(2);
      expect(result.error).toBeUndefined();

      const reasons = events
        .flatMap((e) => (e.type === VendingEventType.SLOT_UNRESOLVED ? [e.payload.reason] : []))
        .sort();
      expect(reasons).toEqual([
        UnresolvedReason.NO_CATALOG_REFERENCE,
        UnresolvedReason.OBJECT_NOT_FOUND,
      ]);

      // B3 is channels 2, 7, 12, 14; A1 is channels 3, 12, 13, 14
      expect(pins.engagedLines()).toEqual([3, 4, 10, 13, 19, 26]);
    });

    it('should dispense around an item whose catalog lookup errors', async () => {
      provider.addOrder('ord_3', [
        { uid: 'li_1', catalogObjectId: 'ITEM_CRISPS', name: 'Crisps', quantity: '1' },
        { uid: 'li_2', catalogObjectId: 'ITEM_JUICE', name: 'Juice', quantity: '1' },
        { uid: 'li_3', catalogObjectId: 'ITEM_WATER', name: 'Water', quantity: '1' },
      ]);
      provider.stockItem({ catalogObjectId: 'ITEM_WATER', slotId: 'A1' });
      provider.failCatalogObject('ITEM_JUICE');
      const processor = createProcessor();

      const result = await processor.fulfil({ orderId: 'ord_3', receivedAt: new Date() });
      await tasks.drain();

      expect(result.claimed).toBe(true);
      expect(result.lineItems).toBe(3);
      expect(result.dispensedSlots).toEqual(['B3', 'A1']);
      expect(result.unresolved).toBe(1);
      expect(result.error).toBeUndefined();

      const unresolved = events.flatMap((e) =>
        e.type === VendingEventType.SLOT_UNRESOLVED ? [e.payload.reason] : [],
      );
      expect(unresolved).toEqual([UnresolvedReason.LOOKUP_FAILED]);
      expect(pins.engagedLines()).toEqual([3, 4, 10, 13, 19, 26]);
    });

    it('should keep the claim when the order lookup fails', async () => {
      provider.failOrder('ord_9');
      const processor = createProcessor();

      const first = await processor.fulfil({ orderId: 'ord_9', receivedAt: new Date() });
      const redelivery = await processor.fulfil({ orderId: 'ord_9', receivedAt: new Date() });

      expect(first.claimed).toBe(true);
      expect(first.error).toBeInstanceOf(ProviderError);
      expect(first.dispensedSlots).toEqual([]);
      expect(redelivery.claimed).toBe(false);
      expect(provider.orderRequests).toEqual(['ord_9']);
      expect(events.map((e) => e.type)).toContain(VendingEventType.ORDER_LOOKUP_FAILED);
    });

    it('should not dispense when the ledger cannot record the order', async () => {
      const brokenLedger: IdempotencyLedger = {
        tryClaim: async () => {
          throw new Error('connection refused');
        },
        has: async () => false,
        size: async () => 0,
        isHealthy: async () => false,
      };
      const processor = createProcessor({ ledger: brokenLedger });

      const result = await processor.fulfil({ orderId: 'ord_1', receivedAt: new Date() });

      expect(result.claimed).toBe(false);
      expect(result.error?.message).toBe('connection refused');
      expect(provider.orderRequests).toEqual([]);
      expect(pins.engagedLines()).toEqual([]);
    });

    it('should give up on lookups that exceed the resolution timeout', async () => {
      provider.setLatency(200);
      const processor = createProcessor({ resolutionTimeoutMs: 20 });

      const result = await processor.fulfil({ orderId: 'ord_1', receivedAt: new Date() });

      expect(result.claimed).toBe(true);
      expect(result.error).toMatchObject({ code: 'ABORTED' });
      expect(result.dispensedSlots).toEqual([]);
    });
  });

  describe('Signature Verification', () => {
    it('should accept a notification signed with a configured key', async () => {
      const processor = createProcessor({ signatureKeys: ['test-secret'] });
      const webhook = SquareWebhookFactory.paymentCompleted({
        orderId: 'ord_1',
        signatureKey: 'test-secret',
      });

      const result = await processor.processWebhook(webhook.body, {
        'X-Square-HmacSha256-Signature': webhook.headers['x-square-hmacsha256-signature'],
      });

      expect(result.fate).toBe(IntakeFate.ACCEPTED);
    });

    it('should reject an unsigned notification without side effects', async () => {
      const processor = createProcessor({ signatureKeys: ['test-secret'] });
      const webhook = SquareWebhookFactory.paymentCompleted({ orderId: 'ord_1' });

      const result = await processor.processWebhook(webhook.body, webhook.headers);
      await tasks.drain();

      expect(result.fate).toBe(IntakeFate.SIGNATURE_FAILED);
      expect(provider.orderRequests).toEqual([]);
      expect(await ledger.has('ord_1')).toBe(false);
      expect(pins.engagedLines()).toEqual([]);
    });

    it('should classify a non-ASCII signature header as a failed signature', async () => {
      const processor = createProcessor({ signatureKeys: ['test-secret'] });
      const webhook = SquareWebhookFactory.paymentCompleted({ orderId: 'ord_1' });

      const result = await processor.processWebhook(webhook.body, {
        'x-square-hmacsha256-signature': '\u00e9'.repeat(44),
      });

      expect(result.fate).toBe(IntakeFate.SIGNATURE_FAILED);
      expect(result.error).toBeUndefined();
    });

    it('should reject a body altered after signing', async () => {
      const processor = createProcessor({ signatureKeys: ['test-secret'] });
      const webhook = SquareWebhookFactory.paymentCompleted({
        orderId: 'ord_1',
        signatureKey: 'test-secret',
      });
      const tampered = Buffer.from(webhook.body.toString().replace('ord_1', 'ord_2'));

      const result = await processor.processWebhook(tampered, webhook.headers);

      expect(result.fate).toBe(IntakeFate.SIGNATURE_FAILED);
    });
  });
});
