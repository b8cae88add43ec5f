import {
  DispenseStatus,
  EventDispatcherImpl,
  MetricsEventHandler,
  VendingEvent,
  VendingEventType,
} from '../../src';

const claimed: VendingEvent = {
  type: VendingEventType.ORDER_CLAIMED,
  payload: { orderId: 'ord_1', eventId: 'evt_1' },
};

describe('EventDispatcherImpl', () => {
  let dispatcher: EventDispatcherImpl;

  beforeEach(() => {
    dispatcher = new EventDispatcherImpl();
  });

  it('should deliver an event to its type handlers and to global handlers', async () => {
    const specific: VendingEvent[] = [];
    const global: VendingEvent[] = [];
    dispatcher.on(VendingEventType.ORDER_CLAIMED, (event) => {
      specific.push(event);
    });
    dispatcher.onAll((event) => {
      global.push(event);
    });

    await dispatcher.dispatch(claimed);
    await dispatcher.dispatch({
      type: VendingEventType.ORDER_DUPLICATE,
      payload: { orderId: 'ord_1' },
    });

    expect(specific).toEqual([claimed]);
    expect(global.map((event) => event.type)).toEqual([
      VendingEventType.ORDER_CLAIMED,
      VendingEventType.ORDER_DUPLICATE,
    ]);
  });

  it('should isolate a failing handler', async () => {
    const received: string[] = [];
    dispatcher.on(VendingEventType.ORDER_CLAIMED, () => {
      throw new Error('handler broke');
    });
    dispatcher.on(VendingEventType.ORDER_CLAIMED, async () => {
      received.push('second');
    });

    await expect(dispatcher.dispatch(claimed)).resolves.toBeUndefined();
    expect(received).toEqual(['second']);
  });

  it('should stop delivering after unsubscribe', async () => {
    let calls = 0;
    const subscription = dispatcher.on(VendingEventType.ORDER_CLAIMED, () => {
      calls++;
    });

    await dispatcher.dispatch(claimed);
    subscription.unsubscribe();
    await dispatcher.dispatch(claimed);

    expect(calls).toBe(1);
    expect(dispatcher.hasHandlers(VendingEventType.ORDER_CLAIMED)).toBe(false);
  });

  it('should count handlers per type and overall', () => {
    dispatcher.on(VendingEventType.ORDER_CLAIMED, () => undefined);
    dispatcher.on(VendingEventType.SLOT_RESOLVED, () => undefined);
    dispatcher.onAll(() => undefined);

    expect(dispatcher.getHandlerCount(VendingEventType.ORDER_CLAIMED)).toBe(2);
    expect(dispatcher.getHandlerCount()).toBe(3);

    dispatcher.removeAllHandlers();
    expect(dispatcher.getHandlerCount()).toBe(0);
  });
});

describe('MetricsEventHandler', () => {
  it('should count events and dispenses per slot', async () => {
    const metrics = new MetricsEventHandler();
    const dispatcher = new EventDispatcherImpl();
    dispatcher.onAll(metrics.getHandler());

    await dispatcher.dispatch(claimed);
    for (const [slotId, status, durationMs] of [
      ['B3', DispenseStatus.COMPLETED, 100],
      ['B3', DispenseStatus.DEGRADED, 300],
    ] as const) {
      await dispatcher.dispatch({
        type: VendingEventType.DISPENSE_COMPLETED,
        payload: {
          slotId,
          status,
          channels: [2, 7, 12, 14],
          failedChannels: [],
          startedAt: new Date(),
          durationMs,
        },
      });
    }

    const snapshot = metrics.getMetrics();
    expect(snapshot.totalEvents).toBe(3);
    expect(snapshot.eventCounts).toEqual({
      [VendingEventType.ORDER_CLAIMED]: 1,
      [VendingEventType.DISPENSE_COMPLETED]: 2,
    });
    expect(snapshot.dispenses).toEqual({
      total: 2,
      degraded: 1,
      bySlot: { B3: 2 },
      averageDurationMs: 200,
      lastDurationMs: 300,
    });

    metrics.reset();
    expect(metrics.getMetrics().totalEvents).toBe(0);
  });
});
