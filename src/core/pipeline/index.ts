/**
 * Webhook processing pipeline
 *
 * Intake classifies each notification (accepted, ignored, signature_failed,
 * parse_error); fulfilment claims the order, resolves its items to slots
 * and starts the relay cycles.
 */

// Main processor
export { WebhookProcessor, DEFAULT_RESOLUTION_TIMEOUT_MS } from './webhook-processor';
export type { IncomingHeaders } from './webhook-processor';

// Pipeline types
export * from './types';

// Individual stages (for testing or custom pipelines)
export { NormalizationStage } from './stages/normalization.stage';
export { VerificationStage } from './stages/verification.stage';
export {
  EligibilityStage,
  PAYMENT_UPDATED_EVENT,
  COMPLETED_PAYMENT_STATUS,
} from './stages/eligibility.stage';
export { ClaimStage } from './stages/claim.stage';
export { ResolutionStage } from './stages/resolution.stage';
export { DispenseStage } from './stages/dispense.stage';
