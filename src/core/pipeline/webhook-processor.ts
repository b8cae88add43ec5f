import { Logger, LoggerService } from '@nestjs/common';
import { v4 as uuidv4 } from 'uuid';
import { IntakeFate } from '../domain/enums';
import { CompletedPaymentEvent } from '../interfaces';
import { CatalogResolver } from '../catalog';
import {
  FulfilmentContext,
  FulfilmentResult,
  IntakeContext,
  IntakeResult,
  PipelineConfig,
  PipelineError,
  PipelineStage,
} from './types';
import { NormalizationStage } from './stages/normalization.stage';
import { VerificationStage } from './stages/verification.stage';
import { EligibilityStage } from './stages/eligibility.stage';
import { ClaimStage } from './stages/claim.stage';
import { ResolutionStage } from './stages/resolution.stage';
import { DispenseStage } from './stages/dispense.stage';

export const DEFAULT_RESOLUTION_TIMEOUT_MS = 30000;

export type IncomingHeaders = Record<string, string | string[] | undefined>;

/**
 * WebhookProcessor runs a notification through two pipelines.
 *
 * Intake (synchronous with the HTTP request):
 * 1. Normalization - parse and shape-check the body
 * 2. Verification - check the signature when keys are configured
 * 3. Eligibility - completed payments with an order only
 *
 * Fulfilment (detached, submitted to the task runner):
 * 1. Claim - at-most-once gate in the idempotency ledger
 * 2. Resolution - order lookup, then line items to slots
 * 3. Dispense - start a relay cycle per resolved item
 */
export class WebhookProcessor {
  private readonly intakeStages: PipelineStage<IntakeContext>[];
  private readonly fulfilmentStages: PipelineStage<FulfilmentContext>[];
  private readonly timeoutMs: number;
  private readonly logger: LoggerService;
  private readonly fates = new Map<IntakeFate, number>();

  constructor(private readonly config: PipelineConfig) {
    this.timeoutMs = config.resolutionTimeoutMs ?? DEFAULT_RESOLUTION_TIMEOUT_MS;
    this.logger = config.logger ?? new Logger(WebhookProcessor.name);

    this.intakeStages = this.initializeIntakeStages();
    this.fulfilmentStages = this.initializeFulfilmentStages();
  }

  /**
   * Classify a webhook and, when accepted, start fulfilment in the background.
   * Never rejects.
   */
  async processWebhook(
    rawBody: Buffer,
    headers: IncomingHeaders,
  ): Promise<IntakeResult> {
    const startTime = Date.now();

    const context: IntakeContext = {
      rawBody,
      headers: this.normalizeHeaders(headers),
      receivedAt: new Date(),
      processingId: uuidv4(),
    };

    for (const stage of this.intakeStages) {
      try {
        const result = await stage.execute(context);
        if (!result.shouldContinue) {
          break;
        }
      } catch (error) {
        const cause = error instanceof Error ? error : undefined;
        context.fate = IntakeFate.PARSE_ERROR;
        context.error = new PipelineError(
          `Stage '${stage.name}' failed: ${cause?.message ?? String(error)}`,
          stage.name,
          cause,
        );
        this.logger.error(context.error.message, cause?.stack);
        break;
      }
    }

    const fate = context.fate ?? IntakeFate.PARSE_ERROR;
    this.fates.set(fate, (this.fates.get(fate) ?? 0) + 1);

    if (fate === IntakeFate.ACCEPTED && context.event) {
      const event = context.event;
      this.logger.log(
        `Accepted completed payment for order ${event.orderId} (event ${event.eventId ?? 'unknown'})`,
      );
      this.config.tasks.submit(`fulfil order ${event.orderId}`, () =>
        this.fulfil(event),
      );
    } else if (fate === IntakeFate.PARSE_ERROR) {
      this.logger.warn(
        `Unreadable webhook ${context.processingId}: ${context.reason ?? context.error?.message ?? 'unknown error'}`,
      );
    }

    return {
      fate,
      processingId: context.processingId,
      eventId: context.payload?.event_id,
      orderId: context.event?.orderId,
      reason: context.reason,
      error: context.error,
      durationMs: Date.now() - startTime,
    };
  }

  /**
   * Claim, resolve and dispense one order. Every outbound call of the order
   * shares one abort signal bounded by the resolution timeout.
   */
  async fulfil(event: CompletedPaymentEvent): Promise<FulfilmentResult> {
    const controller = new AbortController();
    const timer = setTimeout(() => controller.abort(), this.timeoutMs);
    const stageDurations = new Map<string, number>();

    const context: FulfilmentContext = {
      event,
      startTime: new Date(),
      signal: controller.signal,
      resolutions: [],
      dispensedSlots: [],
    };

    try {
      for (const stage of this.fulfilmentStages) {
        const stageStartTime = Date.now();
        try {
          const result = await stage.execute(context);
          stageDurations.set(stage.name, Date.now() - stageStartTime);
          if (!result.shouldContinue) {
            break;
          }
        } catch (error) {
          stageDurations.set(stage.name, Date.now() - stageStartTime);
          const cause = error instanceof Error ? error : undefined;
          context.error = new PipelineError(
            `Stage '${stage.name}' failed for order ${event.orderId}: ${cause?.message ?? String(error)}`,
            stage.name,
            cause,
          );
          this.logger.error(context.error.message, cause?.stack);
          break;
        }
      }
    } finally {
      clearTimeout(timer);
    }

    const unresolved = context.resolutions.filter((r) => !r.resolution.found).length;
    if (context.claimed && context.order) {
      this.logger.log(
        `Order ${event.orderId}: ${context.dispensedSlots.length} dispense(s) started, ${unresolved} item(s) skipped`,
      );
    }

    return {
      orderId: event.orderId,
      claimed: context.claimed ?? false,
      lineItems: context.order?.lineItems.length ?? 0,
      dispensedSlots: context.dispensedSlots,
      unresolved,
      error: context.error,
      durationMs: Date.now() - context.startTime.getTime(),
      stageDurations,
    };
  }

  private initializeIntakeStages(): PipelineStage<IntakeContext>[] {
    return [
      new NormalizationStage(),
      new VerificationStage(
        this.config.provider,
        this.config.signatureKeys ?? [],
        this.config.logger,
      ),
      new EligibilityStage(
        this.config.tasks,
        this.config.eventDispatcher,
        this.config.logger,
      ),
    ];
  }

  private initializeFulfilmentStages(): PipelineStage<FulfilmentContext>[] {
    const catalogResolver =
      this.config.catalogResolver ??
      new CatalogResolver(this.config.provider, this.config.logger);

    return [
      new ClaimStage(
        this.config.ledger,
        this.config.eventDispatcher,
        this.config.logger,
      ),
      new ResolutionStage(
        this.config.provider,
        catalogResolver,
        this.config.eventDispatcher,
        this.config.logger,
      ),
      new DispenseStage(this.config.dispenseController),
    ];
  }

  /**
   * Normalize headers to lowercase keys with single string values
   */
  private normalizeHeaders(headers: IncomingHeaders): Record<string, string> {
    const normalized: Record<string, string> = {};
    for (const [key, value] of Object.entries(headers)) {
      if (value === undefined) continue;
      normalized[key.toLowerCase()] = Array.isArray(value)
        ? value.join(',')
        : value;
    }
    return normalized;
  }

  /**
   * Get pipeline statistics
   */
  getStatistics(): {
    intakeStages: string[];
    fulfilmentStages: string[];
    fates: Record<string, number>;
    configuration: {
      verifySignatures: boolean;
      resolutionTimeoutMs: number;
    };
  } {
    return {
      intakeStages: this.intakeStages.map((s) => s.name),
      fulfilmentStages: this.fulfilmentStages.map((s) => s.name),
      fates: Object.fromEntries(this.fates),
      configuration: {
        verifySignatures: (this.config.signatureKeys ?? []).length > 0,
        resolutionTimeoutMs: this.timeoutMs,
      },
    };
  }
}
