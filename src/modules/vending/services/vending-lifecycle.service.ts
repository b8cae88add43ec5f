import {
  Inject,
  Injectable,
  Logger,
  OnApplicationShutdown,
} from '@nestjs/common';
import type {
  BackgroundTaskRunner,
  IdempotencyLedger,
  RelayDriver,
} from '../../../core';
import { IDEMPOTENCY_LEDGER, RELAY_DRIVER, TASK_RUNNER } from '../constants';

/**
 * Shutdown ordering: cycles in flight finish their dwell and return their
 * channels to idle before the pins are released.
 */
@Injectable()
export class VendingLifecycleService implements OnApplicationShutdown {
  private readonly logger = new Logger(VendingLifecycleService.name);

  constructor(
    @Inject(TASK_RUNNER)
    private readonly tasks: BackgroundTaskRunner,
    @Inject(RELAY_DRIVER)
    private readonly relayDriver: RelayDriver,
    @Inject(IDEMPOTENCY_LEDGER)
    private readonly ledger: IdempotencyLedger,
  ) {}

  async onApplicationShutdown(signal?: string): Promise<void> {
    this.logger.log(
      `Shutting down${signal ? ` (${signal})` : ''}; waiting for ${this.tasks.pending} task(s)`,
    );

    await this.tasks.drain();
    this.relayDriver.release();
    await this.ledger.close?.();

    this.logger.log('All relays released');
  }
}
