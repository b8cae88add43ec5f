import { Logger, LoggerService } from '@nestjs/common';
import {
  CatalogObject,
  PaymentProviderAdapter,
  ProviderConfig,
  ProviderError,
  ProviderOrder,
  ProviderRequestOptions,
} from '../../../core/interfaces';
import { errorDetail, mapCatalogObjects, mapOrder } from './square-json';
import { verifySquareSignature } from './square-signature';

export const SQUARE_API_BASE_URL = 'https://connect.squareup.com';
export const SQUARE_API_VERSION = '2025-07-16';

export type FetchFn = typeof fetch;

export interface SquareProviderAdapterOptions {
  /**
   * Access token for the Orders and Catalog APIs
   */
  accessToken?: string;
  options?: ProviderConfig;
  fetchImpl?: FetchFn;
  logger?: LoggerService;
}

/**
 * Square Provider Adapter
 *
 * Authentication:
 * - Webhook Signature: HMAC-SHA256 over notification URL + raw body
 * - API Calls: Bearer access token plus a pinned Square-Version
 *
 * @see https://developer.squareup.com/reference/square/orders-api/retrieve-order
 * @see https://developer.squareup.com/reference/square/catalog-api/batch-retrieve-catalog-objects
 */
export class SquareProviderAdapter implements PaymentProviderAdapter {
  readonly providerName = 'square';
  readonly config: ProviderConfig;
  private readonly accessToken?: string;
  private readonly fetchImpl: FetchFn;
  private readonly logger: LoggerService;

  constructor(options: SquareProviderAdapterOptions = {}) {
    this.accessToken = options.accessToken;
    this.fetchImpl = options.fetchImpl ?? ((input, init) => fetch(input, init));
    this.logger = options.logger ?? new Logger(SquareProviderAdapter.name);

    this.config = {
      apiBaseUrl: (options.options?.apiBaseUrl || SQUARE_API_BASE_URL).replace(/\/+$/, ''),
      apiVersion: options.options?.apiVersion || SQUARE_API_VERSION,
      webhookPath: options.options?.webhookPath || '/webhook/square',
      notificationUrl: options.options?.notificationUrl,
      timeout: options.options?.timeout || 30000,
      customHeaders: options.options?.customHeaders,
    };

    if (!this.accessToken) {
      this.logger.warn(
        'No Square access token configured; order and catalog lookups will be rejected',
      );
    }
  }

  /**
   * Verify webhook signature. Without a configured notification URL there
   * is nothing to check the signature against, so verification fails.
   */
  verifySignature(
    rawBody: Buffer,
    headers: Record<string, string>,
    secrets: string[],
  ): boolean {
    if (!this.config.notificationUrl) {
      this.logger.warn('Signature keys are set but no notification URL is configured');
      return false;
    }
    return verifySquareSignature(
      rawBody,
      headers,
      secrets,
      this.config.notificationUrl,
    );
  }

  async retrieveOrder(
    orderId: string,
    options?: ProviderRequestOptions,
  ): Promise<ProviderOrder> {
    const body = await this.request(
      'GET',
      `/v2/orders/${encodeURIComponent(orderId)}`,
      undefined,
      options,
    );

    const order = mapOrder(body, orderId);
    if (!order) {
      throw new ProviderError(
        `Order ${orderId} missing from response`,
        'INVALID_RESPONSE',
        this.providerName,
      );
    }
    return order;
  }

  async batchRetrieveCatalogObjects(
    objectIds: string[],
    options?: ProviderRequestOptions,
  ): Promise<CatalogObject[]> {
    if (objectIds.length === 0) {
      return [];
    }

    const body = await this.request(
      'POST',
      '/v2/catalog/batch-retrieve',
      { object_ids: objectIds },
      options,
    );
    return mapCatalogObjects(body);
  }

  /**
   * One API call. The caller's signal and the per-request timeout both
   * abort it; every failure surfaces as a ProviderError.
   */
  private async request(
    method: 'GET' | 'POST',
    path: string,
    body: Record<string, unknown> | undefined,
    options: ProviderRequestOptions = {},
  ): Promise<unknown> {
    const timeout = options.timeout || this.config.timeout || 30000;
    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), timeout);
    const onAbort = () => controller.abort();

    if (options.signal?.aborted) {
      controller.abort();
    } else {
      options.signal?.addEventListener('abort', onAbort, { once: true });
    }

    const url = `${this.config.apiBaseUrl}${path}`;

    try {
      let response: Response;
      try {
        response = await this.fetchImpl(url, {
          method,
          headers: {
            Authorization: `Bearer ${this.accessToken ?? ''}`,
            'Square-Version': this.config.apiVersion ?? SQUARE_API_VERSION,
            'Content-Type': 'application/json',
            Accept: 'application/json',
            ...this.config.customHeaders,
          },
          body: body ? JSON.stringify(body) : undefined,
          signal: controller.signal,
        });
      } catch (error) {
        if (controller.signal.aborted) {
          const code = options.signal?.aborted ? 'ABORTED' : 'TIMEOUT';
          throw new ProviderError(
            code === 'ABORTED'
              ? `${method} ${path} aborted`
              : `${method} ${path} timed out after ${timeout}ms`,
            code,
            this.providerName,
          );
        }
        throw new ProviderError(
          `${method} ${path} failed: ${error instanceof Error ? error.message : String(error)}`,
          'NETWORK_ERROR',
          this.providerName,
        );
      }

      const text = await response.text();
      let parsed: unknown;
      try {
        parsed = text.length > 0 ? JSON.parse(text) : undefined;
      } catch {
        parsed = undefined;
      }

      if (response.status !== 200) {
        throw new ProviderError(
          `Square API error on ${method} ${path}: ${response.status} ${errorDetail(parsed) ?? response.statusText}`,
          `HTTP_${response.status}`,
          this.providerName,
          { status: response.status },
        );
      }

      if (parsed === undefined) {
        throw new ProviderError(
          `Square API returned an unreadable body for ${method} ${path}`,
          'INVALID_RESPONSE',
          this.providerName,
        );
      }

      return parsed;
    } finally {
      clearTimeout(timeoutId);
      options.signal?.removeEventListener('abort', onAbort);
    }
  }
}
