import {
  CatalogObject,
  OrderLineItem,
  PaymentProviderAdapter,
  ProviderConfig,
  ProviderError,
  ProviderOrder,
  ProviderRequestOptions,
} from '../../../core/interfaces';
import { verifySquareSignature } from '../square/square-signature';

export const MOCK_NOTIFICATION_URL = 'https://vending.test/webhook/square';

/**
 * A slot-bound product: an item whose selection attribute names a slot
 */
export interface MockStockedItem {
  catalogObjectId: string;
  slotId: string;
  kind?: 'item' | 'item_variation';
  definitionId?: string;
  selectionUid?: string;
}

/**
 * Mock payment provider adapter for testing and bench use.
 *
 * Holds orders and catalog objects in memory, verifies signatures the way
 * Square does and can be told to fail individual lookups.
 */
export class MockProviderAdapter implements PaymentProviderAdapter {
  readonly providerName = 'mock';
  readonly config: ProviderConfig;

  private orders: Map<string, ProviderOrder> = new Map();
  private catalog: Map<string, CatalogObject> = new Map();
  private failingOrders: Set<string> = new Set();
  private failingObjects: Set<string> = new Set();
  private latencyMs = 0;

  // Ids requested, in order, for assertions
  readonly orderRequests: string[] = [];
  readonly catalogRequests: string[][] = [];

  constructor(config: Partial<ProviderConfig> = {}) {
    this.config = {
      apiBaseUrl: 'https://api.mock.vending',
      webhookPath: '/webhook/square',
      notificationUrl: MOCK_NOTIFICATION_URL,
      timeout: 5000,
      ...config,
    };
  }

  verifySignature(
    rawBody: Buffer,
    headers: Record<string, string>,
    secrets: string[],
  ): boolean {
    return verifySquareSignature(
      rawBody,
      headers,
      secrets,
      this.config.notificationUrl ?? MOCK_NOTIFICATION_URL,
    );
  }

  async retrieveOrder(
    orderId: string,
    options?: ProviderRequestOptions,
  ): Promise<ProviderOrder> {
    this.orderRequests.push(orderId);
    await this.simulateDelay(options?.signal);

    if (this.failingOrders.has(orderId)) {
      throw new ProviderError(
        `Square API error on GET /v2/orders/${orderId}: 500 Internal Server Error`,
        'HTTP_500',
        this.providerName,
        { status: 500 },
      );
    }

    const order = this.orders.get(orderId);
    if (!order) {
      throw new ProviderError(
        `Square API error on GET /v2/orders/${orderId}: 404 Not Found`,
        'HTTP_404',
        this.providerName,
        { status: 404 },
      );
    }
    return order;
  }

  async batchRetrieveCatalogObjects(
    objectIds: string[],
    options?: ProviderRequestOptions,
  ): Promise<CatalogObject[]> {
    this.catalogRequests.push([...objectIds]);
    await this.simulateDelay(options?.signal);

    const failing = objectIds.find((id) => this.failingObjects.has(id));
    if (failing) {
      throw new ProviderError(
        `Square API error on POST /v2/catalog/batch-retrieve: 503 Service Unavailable`,
        'HTTP_503',
        this.providerName,
        { status: 503, objectId: failing },
      );
    }

    return objectIds.flatMap((id) => {
      const object = this.catalog.get(id);
      return object ? [object] : [];
    });
  }

  // ==================== Test setup ====================

  addOrder(orderId: string, lineItems: OrderLineItem[]): ProviderOrder {
    const order: ProviderOrder = { id: orderId, state: 'OPEN', lineItems };
    this.orders.set(orderId, order);
    return order;
  }

  addCatalogObject(object: CatalogObject): void {
    this.catalog.set(object.id, object);
  }

  /**
   * Register an item and the selection definition that places it in a slot
   */
  stockItem(item: MockStockedItem): void {
    const definitionId = item.definitionId ?? `def_${item.catalogObjectId}`;
    const selectionUid = item.selectionUid ?? `sel_${item.slotId}`;

    this.addCatalogObject({
      kind: item.kind ?? 'item',
      id: item.catalogObjectId,
      customAttributeValues: {
        slot: {
          name: 'Slot',
          key: 'slot',
          definitionId,
          selectionUidValues: [selectionUid],
        },
      },
    });

    const existing = this.catalog.get(definitionId);
    const allowedSelections =
      existing?.kind === 'custom_attribute_definition'
        ? existing.allowedSelections
        : [];

    this.addCatalogObject({
      kind: 'custom_attribute_definition',
      id: definitionId,
      name: 'Slot',
      allowedSelections: [
        ...allowedSelections.filter((s) => s.uid !== selectionUid),
        { uid: selectionUid, name: item.slotId },
      ],
    });
  }

  failOrder(orderId: string): void {
    this.failingOrders.add(orderId);
  }

  failCatalogObject(objectId: string): void {
    this.failingObjects.add(objectId);
  }

  setLatency(ms: number): void {
    this.latencyMs = ms;
  }

  private simulateDelay(signal?: AbortSignal): Promise<void> {
    if (signal?.aborted) {
      return Promise.reject(this.abortError());
    }
    if (this.latencyMs <= 0) {
      return Promise.resolve();
    }

    return new Promise((resolve, reject) => {
      const onAbort = () => {
        clearTimeout(timer);
        reject(this.abortError());
      };
      const timer = setTimeout(() => {
        signal?.removeEventListener('abort', onAbort);
        resolve();
      }, this.latencyMs);
      signal?.addEventListener('abort', onAbort, { once: true });
    });
  }

  private abortError(): ProviderError {
    return new ProviderError('Request aborted', 'ABORTED', this.providerName);
  }
}
