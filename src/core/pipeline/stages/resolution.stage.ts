import { Logger, LoggerService } from '@nestjs/common';
import { VendingEventType } from '../../domain/enums';
import {
  EventDispatcher,
  OrderLineItem,
  PaymentProviderAdapter,
} from '../../interfaces';
import { CatalogResolver } from '../../catalog';
import {
  FulfilmentContext,
  LineItemResolution,
  PipelineStage,
  StageResult,
} from '../types';

/**
 * Fulfilment stage 2: Resolution
 * Fetches the order and resolves every line item to a slot. Line items are
 * resolved concurrently and independently: one failing item never holds
 * back the others.
 */
export class ResolutionStage implements PipelineStage<FulfilmentContext> {
  name = 'resolution';

  constructor(
    private readonly provider: PaymentProviderAdapter,
    private readonly catalogResolver: CatalogResolver,
    private readonly eventDispatcher?: EventDispatcher,
    private readonly logger: LoggerService = new Logger(ResolutionStage.name),
  ) {}

  async execute(
    context: FulfilmentContext,
  ): Promise<StageResult<FulfilmentContext>> {
    const startTime = Date.now();
    const { orderId } = context.event;

    try {
      context.order = await this.provider.retrieveOrder(orderId, {
        signal: context.signal,
      });
    } catch (error) {
      context.error = error instanceof Error ? error : new Error(String(error));
      this.logger.error(
        `Failed to retrieve order ${orderId}: ${context.error.message}`,
      );
      await this.eventDispatcher?.dispatch({
        type: VendingEventType.ORDER_LOOKUP_FAILED,
        payload: { orderId, error: context.error.message },
      });

      return {
        success: false,
        context,
        error: context.error,
        shouldContinue: false,
        metadata: { durationMs: Date.now() - startTime },
      };
    }

    const lineItems = context.order.lineItems;
    this.logger.log(`Order ${orderId} has ${lineItems.length} line item(s)`);

    context.resolutions = await Promise.all(
      lineItems.map((lineItem) => this.resolve(orderId, lineItem, context.signal)),
    );

    return {
      success: true,
      context,
      shouldContinue: true,
      metadata: {
        resolved: context.resolutions.filter((r) => r.resolution.found).length,
        durationMs: Date.now() - startTime,
      },
    };
  }

  private async resolve(
    orderId: string,
    lineItem: OrderLineItem,
    signal: AbortSignal,
  ): Promise<LineItemResolution> {
    const resolution = await this.catalogResolver.resolveSlot(lineItem, {
      signal,
    });

    if (resolution.found) {
      this.logger.log(
        `Order ${orderId}: ${lineItem.name ?? resolution.catalogObjectId} is in slot ${resolution.slotId}`,
      );
      await this.eventDispatcher?.dispatch({
        type: VendingEventType.SLOT_RESOLVED,
        payload: {
          orderId,
          lineItemUid: lineItem.uid,
          catalogObjectId: resolution.catalogObjectId,
          slotId: resolution.slotId,
        },
      });
    } else {
      this.logger.warn(
        `Order ${orderId}: skipping line item ${lineItem.uid ?? '(no uid)'} (${resolution.reason}): ${resolution.detail}`,
      );
      await this.eventDispatcher?.dispatch({
        type: VendingEventType.SLOT_UNRESOLVED,
        payload: {
          orderId,
          lineItemUid: lineItem.uid,
          catalogObjectId: resolution.catalogObjectId,
          reason: resolution.reason,
          detail: resolution.detail,
        },
      });
    }

    return { lineItem, resolution };
  }
}
