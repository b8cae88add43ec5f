import { Logger, LoggerService } from '@nestjs/common';
import { IntakeFate, VendingEventType } from '../../domain/enums';
import { EventDispatcher, VendingEvent } from '../../interfaces';
import { BackgroundTaskRunner } from '../../tasks';
import { IntakeContext, PipelineStage, StageResult } from '../types';

export const PAYMENT_UPDATED_EVENT = 'payment.updated';
export const COMPLETED_PAYMENT_STATUS = 'COMPLETED';

/**
 * Intake stage 3: Eligibility
 * Only a completed payment that references an order can release an item
 */
export class EligibilityStage implements PipelineStage<IntakeContext> {
  name = 'eligibility';

  constructor(
    private readonly tasks: BackgroundTaskRunner,
    private readonly eventDispatcher?: EventDispatcher,
    private readonly logger: LoggerService = new Logger(EligibilityStage.name),
  ) {}

  async execute(context: IntakeContext): Promise<StageResult<IntakeContext>> {
    const startTime = Date.now();
    const payload = context.payload;
    const payment = payload?.data?.object?.payment;

    const reason = this.ineligibility(
      payload?.type,
      payment?.status,
      payment?.order_id,
    );

    if (reason || !payment?.order_id) {
      context.fate = IntakeFate.IGNORED;
      context.reason = reason ?? 'missing order id';
      this.logger.debug?.(
        `Ignoring webhook ${context.processingId} (${payload?.type ?? 'no type'}, status ${payment?.status ?? 'none'}): ${context.reason}`,
      );

      const dispatcher = this.eventDispatcher;
      if (dispatcher) {
        const event: VendingEvent = {
          type: VendingEventType.WEBHOOK_IGNORED,
          payload: {
            processingId: context.processingId,
            eventType: payload?.type,
            paymentStatus: payment?.status,
            reason: context.reason,
          },
        };
        // Off the request path: the acknowledgement does not wait on handlers
        this.tasks.submit(`webhook.ignored ${context.processingId}`, () =>
          dispatcher.dispatch(event),
        );
      }

      return {
        success: true,
        context,
        shouldContinue: false,
        metadata: {
          ignored: true,
          durationMs: Date.now() - startTime,
        },
      };
    }

    context.fate = IntakeFate.ACCEPTED;
    context.event = {
      orderId: payment.order_id,
      eventId: payload?.event_id,
      paymentId: payment.id,
      merchantId: payload?.merchant_id,
      receivedAt: context.receivedAt,
    };

    return {
      success: true,
      context,
      shouldContinue: true,
      metadata: {
        orderId: payment.order_id,
        durationMs: Date.now() - startTime,
      },
    };
  }

  private ineligibility(
    type?: string,
    status?: string,
    orderId?: string,
  ): string | undefined {
    if (type !== PAYMENT_UPDATED_EVENT) {
      return `event type is not ${PAYMENT_UPDATED_EVENT}`;
    }
    if (status !== COMPLETED_PAYMENT_STATUS) {
      return `payment status is not ${COMPLETED_PAYMENT_STATUS}`;
    }
    if (!orderId) {
      return 'missing order id';
    }
    return undefined;
  }
}
