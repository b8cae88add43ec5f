import { LoggerService } from '@nestjs/common';
import { IntakeFate } from '../domain/enums';
import { SquareWebhookPayload } from '../domain/models';
import {
  CompletedPaymentEvent,
  EventDispatcher,
  IdempotencyLedger,
  OrderLineItem,
  PaymentProviderAdapter,
  ProviderOrder,
  SlotIdentifier,
  SlotResolution,
} from '../interfaces';
import { CatalogResolver } from '../catalog';
import { DispenseController } from '../hardware/dispense-controller';
import { BackgroundTaskRunner } from '../tasks';

/**
 * Webhook intake context passed through the intake stages
 */
export interface IntakeContext {
  // Raw input
  rawBody: Buffer;
  headers: Record<string, string>;
  receivedAt: Date;

  // Processing metadata
  processingId: string;

  // Parsed body
  payload?: SquareWebhookPayload;

  // Verification results
  signatureValid?: boolean;

  // Outcome
  fate?: IntakeFate;
  event?: CompletedPaymentEvent;
  reason?: string;
  error?: Error;
}

/**
 * Per-line-item outcome recorded during fulfilment
 */
export interface LineItemResolution {
  lineItem: OrderLineItem;
  resolution: SlotResolution;
}

/**
 * Fulfilment context: one claimed order on its way to the relays
 */
export interface FulfilmentContext {
  event: CompletedPaymentEvent;
  startTime: Date;

  // Shared by every outbound call of this order
  signal: AbortSignal;

  claimed?: boolean;
  order?: ProviderOrder;
  resolutions: LineItemResolution[];
  dispensedSlots: SlotIdentifier[];
  error?: Error;
}

/**
 * Pipeline stage result
 */
export interface StageResult<TContext> {
  success: boolean;
  context: TContext;
  error?: Error;
  shouldContinue: boolean;
  metadata?: Record<string, unknown>;
}

/**
 * Pipeline stage interface
 */
export interface PipelineStage<TContext> {
  name: string;
  execute(context: TContext): Promise<StageResult<TContext>>;
}

/**
 * Pipeline configuration
 */
export interface PipelineConfig {
  provider: PaymentProviderAdapter;
  ledger: IdempotencyLedger;
  dispenseController: DispenseController;
  tasks: BackgroundTaskRunner;
  eventDispatcher?: EventDispatcher;
  catalogResolver?: CatalogResolver;

  // Webhook signature keys; verification is skipped when empty
  signatureKeys?: string[];

  // Upper bound on order and catalog lookups for one order
  resolutionTimeoutMs?: number;

  logger?: LoggerService;
}

/**
 * Result of webhook intake, returned before any fulfilment happens
 */
export interface IntakeResult {
  fate: IntakeFate;
  processingId: string;
  eventId?: string;
  orderId?: string;
  reason?: string;
  error?: Error;
  durationMs: number;
}

/**
 * Result of fulfilling one order
 */
export interface FulfilmentResult {
  orderId: string;
  claimed: boolean;
  lineItems: number;
  dispensedSlots: SlotIdentifier[];
  unresolved: number;
  error?: Error;
  durationMs: number;
  stageDurations: Map<string, number>;
}

/**
 * Pipeline error with the failing stage attached
 */
export class PipelineError extends Error {
  constructor(
    message: string,
    public stage: string,
    public cause?: Error,
  ) {
    super(message);
    this.name = 'PipelineError';
  }
}

/**
 * Body could not be read as a webhook notification
 */
export class PayloadParseError extends Error {
  constructor(
    message: string,
    public violations: string[] = [],
  ) {
    super(message);
    this.name = 'PayloadParseError';
  }
}
