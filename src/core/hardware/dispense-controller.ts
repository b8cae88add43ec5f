import { Logger, LoggerService } from '@nestjs/common';
import { ActuatorMap } from '../domain/models';
import { DispenseStatus, VendingEventType } from '../domain/enums';
import {
  ChannelIndex,
  DispenseReport,
  EventDispatcher,
  SlotIdentifier,
} from '../interfaces';
import { BackgroundTaskRunner } from '../tasks';
import { RelayDriver } from './relay-driver';

export const DEFAULT_DWELL_MS = 3300;

export interface DispenseControllerOptions {
  /**
   * How long a slot's relays stay engaged
   */
  dwellMs?: number;
}

/**
 * Dispense Controller - engage, hold, release.
 *
 * Every cycle runs independently; there is no queue across slots. Slots
 * share motors (the lift and the column selectors), and two concurrent
 * cycles touching the same channel are not coordinated: the cycle that
 * finishes first drives the shared channel idle while the other is still
 * holding. That mirrors how the enclosure has always been driven; see
 * DESIGN.md before adding reference counting here.
 */
export class DispenseController {
  readonly dwellMs: number;

  constructor(
    private readonly actuatorMap: ActuatorMap,
    private readonly relayDriver: RelayDriver,
    private readonly tasks: BackgroundTaskRunner,
    private readonly eventDispatcher?: EventDispatcher,
    options: DispenseControllerOptions = {},
    private readonly logger: LoggerService = new Logger(DispenseController.name),
  ) {
    this.dwellMs = options.dwellMs ?? DEFAULT_DWELL_MS;
  }

  /**
   * Release a slot's item in the background. Returns immediately.
   */
  dispense(slotId: SlotIdentifier): void {
    this.tasks.submit(`dispense ${slotId}`, () => this.runCycle(slotId));
  }

  /**
   * Engage an explicit channel list in the background (bench testing)
   */
  pulse(channels: ChannelIndex[], durationMs: number): void {
    this.tasks.submit(`pulse ${channels.join(',')}`, () =>
      this.runPulse(channels, durationMs),
    );
  }

  /**
   * Run a full cycle for a slot and report how it went
   */
  async runCycle(slotId: SlotIdentifier): Promise<DispenseReport> {
    const channels = this.actuatorMap.channelsFor(slotId);

    if (!channels) {
      this.logger.warn(`Unknown slot label: ${slotId}`);
      await this.eventDispatcher?.dispatch({
        type: VendingEventType.DISPENSE_SKIPPED,
        payload: { slotId, reason: 'unknown slot' },
      });
      return {
        slotId,
        status: DispenseStatus.UNKNOWN_SLOT,
        channels: [],
        failedChannels: [],
        startedAt: new Date(),
        durationMs: 0,
      };
    }

    this.logger.log(`Dispensing item from slot ${slotId}`);
    const report = await this.cycle([...channels], this.dwellMs, slotId);
    this.logger.log(`Finished dispensing from slot ${slotId} (${report.status})`);

    return report;
  }

  /**
   * Run a cycle on explicit channels
   */
  async runPulse(
    channels: ChannelIndex[],
    durationMs: number,
  ): Promise<DispenseReport> {
    this.logger.log(`Pulsing channels ${channels.join(',')} for ${durationMs}ms`);
    return this.cycle([...new Set(channels)], durationMs);
  }

  private async cycle(
    channels: ChannelIndex[],
    holdMs: number,
    slotId?: SlotIdentifier,
  ): Promise<DispenseReport> {
    const startedAt = new Date();
    const failed = new Set<ChannelIndex>();

    try {
      for (const channel of channels) {
        if (!this.relayDriver.engage(channel)) {
          failed.add(channel);
        }
      }

      // Handlers run beside the hold; the dwell never waits on them
      const dispatcher = this.eventDispatcher;
      if (dispatcher) {
        this.tasks.submit(`dispense.started ${slotId ?? channels.join(',')}`, () =>
          dispatcher.dispatch({
            type: VendingEventType.DISPENSE_STARTED,
            payload: { slotId, channels, dwellMs: holdMs },
          }),
        );
      }

      await this.sleep(holdMs);
    } finally {
      // Always back to idle, whatever happened above
      for (const channel of channels) {
        if (!this.relayDriver.disengage(channel)) {
          failed.add(channel);
        }
      }
    }

    const report: DispenseReport = {
      slotId,
      status: failed.size > 0 ? DispenseStatus.DEGRADED : DispenseStatus.COMPLETED,
      channels,
      failedChannels: Array.from(failed).sort((a, b) => a - b),
      startedAt,
      durationMs: Date.now() - startedAt.getTime(),
    };

    await this.eventDispatcher?.dispatch({
      type: VendingEventType.DISPENSE_COMPLETED,
      payload: report,
    });

    return report;
  }

  private sleep(ms: number): Promise<void> {
    return new Promise((resolve) => setTimeout(resolve, ms));
  }
}
