import { Logger, LoggerService } from '@nestjs/common';
import { VendingEventType } from '../../domain/enums';
import { EventDispatcher, IdempotencyLedger } from '../../interfaces';
import { FulfilmentContext, PipelineStage, StageResult } from '../types';

/**
 * Fulfilment stage 1: Claim
 * Records the order in the idempotency ledger before anything is fetched.
 * A duplicate stops here; so does a ledger failure, since an order that
 * cannot be recorded must not dispense.
 */
export class ClaimStage implements PipelineStage<FulfilmentContext> {
  name = 'claim';

  constructor(
    private readonly ledger: IdempotencyLedger,
    private readonly eventDispatcher?: EventDispatcher,
    private readonly logger: LoggerService = new Logger(ClaimStage.name),
  ) {}

  async execute(
    context: FulfilmentContext,
  ): Promise<StageResult<FulfilmentContext>> {
    const startTime = Date.now();
    const { orderId, eventId } = context.event;

    let claimed: boolean;
    try {
      claimed = await this.ledger.tryClaim(orderId);
    } catch (error) {
      context.claimed = false;
      context.error = error instanceof Error ? error : new Error(String(error));
      this.logger.error(
        `Ledger unavailable, order ${orderId} will not be dispensed: ${context.error.message}`,
        context.error.stack,
      );

      return {
        success: false,
        context,
        error: context.error,
        shouldContinue: false,
        metadata: { durationMs: Date.now() - startTime },
      };
    }

    context.claimed = claimed;

    if (!claimed) {
      this.logger.log(`Order ${orderId} already processed, skipping`);
      await this.eventDispatcher?.dispatch({
        type: VendingEventType.ORDER_DUPLICATE,
        payload: { orderId, eventId },
      });

      return {
        success: true,
        context,
        shouldContinue: false,
        metadata: { duplicate: true, durationMs: Date.now() - startTime },
      };
    }

    this.logger.log(`Processing order ${orderId}`);
    await this.eventDispatcher?.dispatch({
      type: VendingEventType.ORDER_CLAIMED,
      payload: { orderId, eventId },
    });

    return {
      success: true,
      context,
      shouldContinue: true,
      metadata: { durationMs: Date.now() - startTime },
    };
  }
}
