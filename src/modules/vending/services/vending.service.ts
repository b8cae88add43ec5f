import {
  BadRequestException,
  Inject,
  Injectable,
  Logger,
} from '@nestjs/common';
import type {
  ActuatorMap,
  BackgroundTaskRunner,
  ChannelIndex,
  DispenseController,
  IdempotencyLedger,
  IncomingHeaders,
  IntakeResult,
  MetricsEventHandler,
  RelayDriver,
  SlotIdentifier,
  WebhookProcessor,
} from '../../../core';
import {
  ACTUATOR_MAP,
  DISPENSE_CONTROLLER,
  IDEMPOTENCY_LEDGER,
  METRICS_HANDLER,
  RELAY_DRIVER,
  TASK_RUNNER,
  WEBHOOK_PROCESSOR,
} from '../constants';
import { ConfigurationService } from './configuration.service';

export interface ReadinessReport {
  status: 'ready' | 'not_ready';
  checks: {
    ledger: boolean;
    relays: boolean;
  };
  details: {
    ledger: string;
    claimedOrders?: number;
    channels: number;
    slots: number;
    pendingTasks: number;
  };
}

/**
 * VendingService
 *
 * Main service providing high-level vending operations
 */
@Injectable()
export class VendingService {
  private readonly logger = new Logger(VendingService.name);

  constructor(
    @Inject(WEBHOOK_PROCESSOR)
    private readonly webhookProcessor: WebhookProcessor,
    @Inject(DISPENSE_CONTROLLER)
    private readonly dispenseController: DispenseController,
    @Inject(ACTUATOR_MAP)
    private readonly actuatorMap: ActuatorMap,
    @Inject(RELAY_DRIVER)
    private readonly relayDriver: RelayDriver,
    @Inject(IDEMPOTENCY_LEDGER)
    private readonly ledger: IdempotencyLedger,
    @Inject(TASK_RUNNER)
    private readonly tasks: BackgroundTaskRunner,
    @Inject(METRICS_HANDLER)
    private readonly metrics: MetricsEventHandler | null,
    private readonly configService: ConfigurationService,
  ) {}

  /**
   * Process an incoming webhook
   */
  async processWebhook(
    rawBody: Buffer,
    headers: IncomingHeaders,
  ): Promise<IntakeResult> {
    return this.webhookProcessor.processWebhook(rawBody, headers);
  }

  /**
   * Slot to channel table
   */
  listSlots(): Record<SlotIdentifier, ChannelIndex[]> {
    return this.actuatorMap.toJSON();
  }

  /**
   * Start a dispense cycle by hand
   * @returns the slot's channels, or undefined for an unknown slot
   */
  dispenseSlot(slotId: SlotIdentifier): ChannelIndex[] | undefined {
    const channels = this.actuatorMap.channelsFor(slotId);
    if (!channels) {
      return undefined;
    }

    this.logger.log(`Manual dispense requested for slot ${slotId}`);
    this.dispenseController.dispense(slotId);
    return [...channels];
  }

  /**
   * Engage channels by hand for a bounded time
   */
  pulseChannels(
    channels: ChannelIndex[],
    durationMs?: number,
  ): { channels: ChannelIndex[]; durationMs: number } {
    const limits = this.configService.getPulseLimits();
    const duration = durationMs ?? limits.defaultMs;

    if (duration > limits.maxMs) {
      throw new BadRequestException(
        `durationMs must not exceed ${limits.maxMs}`,
      );
    }

    const bound = new Set(this.actuatorMap.channels);
    const unbound = channels.filter((channel) => !bound.has(channel));
    if (unbound.length > 0) {
      throw new BadRequestException(
        `Unbound channel(s): ${unbound.join(', ')}`,
      );
    }

    const unique = Array.from(new Set(channels));
    this.logger.log(`Manual pulse requested for channels ${unique.join(',')}`);
    this.dispenseController.pulse(unique, duration);
    return { channels: unique, durationMs: duration };
  }

  async getReadiness(): Promise<ReadinessReport> {
    const ledgerHealthy = await this.ledger.isHealthy();
    const claimedOrders = ledgerHealthy ? await this.ledger.size() : undefined;
    const relaysReady = this.relayDriver.isConfigured;

    return {
      status: ledgerHealthy && relaysReady ? 'ready' : 'not_ready',
      checks: {
        ledger: ledgerHealthy,
        relays: relaysReady,
      },
      details: {
        ledger: ledgerHealthy ? 'connected' : 'disconnected',
        claimedOrders,
        channels: this.relayDriver.channels.length,
        slots: this.actuatorMap.slotIds.length,
        pendingTasks: this.tasks.pending,
      },
    };
  }

  getStatistics() {
    return {
      events: this.metrics?.getMetrics() ?? null,
      pipeline: this.webhookProcessor.getStatistics(),
      tasks: this.tasks.getStatistics(),
      dwellMs: this.dispenseController.dwellMs,
      runtime: {
        uptime: process.uptime(),
        memory: process.memoryUsage(),
        node: process.version,
      },
    };
  }
}
