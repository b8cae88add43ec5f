import { DispenseStatus } from '../../domain/enums';
import { EventHandler, VendingEvent, VendingEventType } from '../../interfaces';

/**
 * Metrics collection event handler
 * Counts pipeline events and dispense outcomes for the stats endpoint
 */
export class MetricsEventHandler {
  private metrics: {
    eventCounts: Map<VendingEventType, number>;
    lastEventTime: Map<VendingEventType, Date>;
    dispensesBySlot: Map<string, number>;
    dispenseDurations: number[];
    degradedDispenses: number;
  };

  constructor() {
    this.metrics = {
      eventCounts: new Map(),
      lastEventTime: new Map(),
      dispensesBySlot: new Map(),
      dispenseDurations: [],
      degradedDispenses: 0,
    };
  }

  /**
   * Create the event handler function
   */
  getHandler(): EventHandler {
    return (event: VendingEvent) => {
      const currentCount = this.metrics.eventCounts.get(event.type) ?? 0;
      this.metrics.eventCounts.set(event.type, currentCount + 1);
      this.metrics.lastEventTime.set(event.type, new Date());

      if (event.type === VendingEventType.DISPENSE_COMPLETED) {
        const { slotId, durationMs, status } = event.payload;
        const slotKey = slotId ?? 'pulse';

        this.metrics.dispensesBySlot.set(
          slotKey,
          (this.metrics.dispensesBySlot.get(slotKey) ?? 0) + 1,
        );
        this.metrics.dispenseDurations.push(durationMs);

        // Keep only last 1000 durations
        if (this.metrics.dispenseDurations.length > 1000) {
          this.metrics.dispenseDurations.shift();
        }

        if (status === DispenseStatus.DEGRADED) {
          this.metrics.degradedDispenses++;
        }
      }
    };
  }

  /**
   * Get current metrics snapshot
   */
  getMetrics(): {
    totalEvents: number;
    eventCounts: Record<string, number>;
    lastEventAt: Record<string, string>;
    dispenses: {
      total: number;
      degraded: number;
      bySlot: Record<string, number>;
      averageDurationMs: number;
      lastDurationMs: number | null;
    };
  } {
    const totalEvents = Array.from(this.metrics.eventCounts.values()).reduce(
      (a, b) => a + b,
      0,
    );
    const durations = this.metrics.dispenseDurations;
    const averageDurationMs =
      durations.length > 0
        ? durations.reduce((a, b) => a + b, 0) / durations.length
        : 0;

    const lastEventAt: Record<string, string> = {};
    for (const [type, at] of this.metrics.lastEventTime) {
      lastEventAt[type] = at.toISOString();
    }

    return {
      totalEvents,
      eventCounts: Object.fromEntries(this.metrics.eventCounts),
      lastEventAt,
      dispenses: {
        total: Array.from(this.metrics.dispensesBySlot.values()).reduce(
          (a, b) => a + b,
          0,
        ),
        degraded: this.metrics.degradedDispenses,
        bySlot: Object.fromEntries(this.metrics.dispensesBySlot),
        averageDurationMs,
        lastDurationMs: durations.length > 0 ? durations[durations.length - 1] : null,
      },
    };
  }

  /**
   * Reset metrics
   */
  reset(): void {
    this.metrics.eventCounts.clear();
    this.metrics.lastEventTime.clear();
    this.metrics.dispensesBySlot.clear();
    this.metrics.dispenseDurations = [];
    this.metrics.degradedDispenses = 0;
  }
}
