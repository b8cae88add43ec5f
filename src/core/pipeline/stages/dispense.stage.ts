import { DispenseController } from '../../hardware/dispense-controller';
import { FulfilmentContext, PipelineStage, StageResult } from '../types';

/**
 * Fulfilment stage 3: Dispense
 * Starts one cycle per resolved line item and returns without waiting for
 * the relays. Quantity is not read: one line item releases one item.
 */
export class DispenseStage implements PipelineStage<FulfilmentContext> {
  name = 'dispense';

  constructor(private readonly dispenseController: DispenseController) {}

  async execute(
    context: FulfilmentContext,
  ): Promise<StageResult<FulfilmentContext>> {
    const startTime = Date.now();

    for (const { resolution } of context.resolutions) {
      if (!resolution.found) {
        continue;
      }
      this.dispenseController.dispense(resolution.slotId);
      context.dispensedSlots.push(resolution.slotId);
    }

    return {
      success: true,
      context,
      shouldContinue: true,
      metadata: {
        dispensed: context.dispensedSlots.length,
        durationMs: Date.now() - startTime,
      },
    };
  }
}
