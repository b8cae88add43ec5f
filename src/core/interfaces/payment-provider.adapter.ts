/**
 * Payment provider adapter interface - the slice of the provider's API the
 * vending pipeline needs: webhook signature checks, order lookup and catalog
 * batch retrieval. Implementations map provider JSON onto the types below.
 */
export interface PaymentProviderAdapter {
  /**
   * Unique identifier for this provider (e.g., 'square', 'mock')
   */
  readonly providerName: string;

  /**
   * Provider-specific configuration (API endpoint, version, timeout)
   */
  readonly config: ProviderConfig;

  // ==================== Webhook Processing ====================

  /**
   * Verify webhook signature using provider-specific algorithm
   * @param rawBody - Raw request body, byte for byte as received
   * @param headers - Lower-cased HTTP headers including the signature
   * @param secrets - Signature keys to try (supports rotation)
   */
  verifySignature(
    rawBody: Buffer,
    headers: Record<string, string>,
    secrets: string[],
  ): boolean;

  // ==================== API Operations ====================

  /**
   * Fetch an order by id. Throws ProviderError on any non-200 response.
   */
  retrieveOrder(
    orderId: string,
    options?: ProviderRequestOptions,
  ): Promise<ProviderOrder>;

  /**
   * Fetch catalog objects by id. Ids the provider does not know are simply
   * absent from the result; transport and HTTP failures throw ProviderError.
   */
  batchRetrieveCatalogObjects(
    objectIds: string[],
    options?: ProviderRequestOptions,
  ): Promise<CatalogObject[]>;
}

/**
 * Per-call options for outbound provider requests
 */
export interface ProviderRequestOptions {
  /**
   * Aborts the call; shared by every lookup of one order
   */
  signal?: AbortSignal;

  /**
   * Overrides the adapter's per-request timeout
   */
  timeout?: number;
}

/**
 * Provider configuration
 */
export interface ProviderConfig {
  apiBaseUrl?: string;
  apiVersion?: string;
  webhookPath?: string;
  // Public URL the provider posts to; part of the signed content
  notificationUrl?: string;
  timeout?: number;
  customHeaders?: Record<string, string>;
}

/**
 * Order as far as the pipeline cares: its line items
 */
export interface ProviderOrder {
  id: string;
  state?: string;
  lineItems: OrderLineItem[];
}

/**
 * A purchased entry within an order
 */
export interface OrderLineItem {
  uid?: string;
  catalogObjectId?: string;
  name?: string;
  quantity?: string;
}

/**
 * Value of a custom attribute attached to an item or item variation
 */
export interface CatalogCustomAttributeValue {
  name?: string;
  key?: string;
  definitionId?: string;
  selectionUidValues: string[];
}

/**
 * One allowed option of a selection-type custom attribute
 */
export interface CatalogAllowedSelection {
  uid?: string;
  name?: string;
}

/**
 * Catalog objects, discriminated by kind. Only items and item variations
 * carry custom attribute values; definitions carry the selection config.
 */
export type CatalogObject =
  | {
      kind: 'item' | 'item_variation';
      id: string;
      customAttributeValues: Record<string, CatalogCustomAttributeValue>;
    }
  | {
      kind: 'custom_attribute_definition';
      id: string;
      name?: string;
      allowedSelections: CatalogAllowedSelection[];
    }
  | {
      kind: 'other';
      id: string;
      type: string;
    };

/**
 * Provider error - non-200 responses, transport failures and aborts
 */
export class ProviderError extends Error {
  constructor(
    message: string,
    public code: string,
    public providerName: string,
    public details?: Record<string, unknown>,
  ) {
    super(message);
    this.name = 'ProviderError';
  }
}
