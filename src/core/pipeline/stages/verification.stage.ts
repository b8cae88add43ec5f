import { Logger, LoggerService } from '@nestjs/common';
import { IntakeFate } from '../../domain/enums';
import { PaymentProviderAdapter } from '../../interfaces';
import { IntakeContext, PipelineStage, StageResult } from '../types';

/**
 * Intake stage 2: Signature Verification
 * Runs only when signature keys are configured; a mismatch ends intake
 * with a signature_failed fate and no side effects.
 */
export class VerificationStage implements PipelineStage<IntakeContext> {
  name = 'verification';

  constructor(
    private readonly provider: PaymentProviderAdapter,
    private readonly signatureKeys: string[],
    private readonly logger: LoggerService = new Logger(VerificationStage.name),
  ) {}

  async execute(context: IntakeContext): Promise<StageResult<IntakeContext>> {
    const startTime = Date.now();

    if (this.signatureKeys.length === 0) {
      return {
        success: true,
        context,
        shouldContinue: true,
        metadata: {
          skipped: true,
          durationMs: Date.now() - startTime,
        },
      };
    }

    const isValid = this.provider.verifySignature(
      context.rawBody,
      context.headers,
      this.signatureKeys,
    );
    context.signatureValid = isValid;

    if (!isValid) {
      context.fate = IntakeFate.SIGNATURE_FAILED;
      context.reason = 'Signature verification failed';
      this.logger.warn(
        `Rejected webhook ${context.processingId}: ${context.reason} (event ${context.payload?.event_id ?? 'unknown'})`,
      );

      return {
        success: true,
        context,
        shouldContinue: false,
        metadata: {
          signatureFailed: true,
          durationMs: Date.now() - startTime,
        },
      };
    }

    return {
      success: true,
      context,
      shouldContinue: true,
      metadata: {
        durationMs: Date.now() - startTime,
      },
    };
  }
}
