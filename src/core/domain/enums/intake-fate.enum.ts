/**
 * Webhook intake outcomes - every inbound webhook gets exactly one
 */
export enum IntakeFate {
  /**
   * Completed payment with an order id; fulfilment was scheduled
   */
  ACCEPTED = 'accepted',

  /**
   * Well-formed but not a completed payment (other event types, other statuses)
   */
  IGNORED = 'ignored',

  /**
   * Signature key configured and the signature did not match
   */
  SIGNATURE_FAILED = 'signature_failed',

  /**
   * Body missing, not JSON, or not shaped like a Square event
   */
  PARSE_ERROR = 'parse_error',
}
