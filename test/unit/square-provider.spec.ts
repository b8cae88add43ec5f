import * as crypto from 'crypto';
import {
  FetchFn,
  ProviderError,
  SQUARE_SIGNATURE_HEADER,
  SquareProviderAdapter,
  computeSquareSignature,
} from '../../src';

const NOTIFICATION_URL = 'https://kiosk.example.com/webhook/square';

interface RecordedCall {
  url: string;
  init?: RequestInit;
}

function stubFetch(
  calls: RecordedCall[],
  respond: () => Response | Promise<Response>,
): FetchFn {
  return async (input, init) => {
    calls.push({ url: String(input), init });
    return respond();
  };
}

function json(status: number, body: unknown): Response {
  return new Response(JSON.stringify(body), { status });
}

describe('SquareProviderAdapter', () => {
  let calls: RecordedCall[];

  beforeEach(() => {
    calls = [];
  });

  function adapter(respond: () => Response | Promise<Response>): SquareProviderAdapter {
    return new SquareProviderAdapter({
      accessToken: 'test-token',
      options: { notificationUrl: NOTIFICATION_URL },
      fetchImpl: stubFetch(calls, respond),
    });
  }

  describe('Signature Verification', () => {
    const body = Buffer.from('{"type":"payment.updated"}');

    it('should accept an HMAC-SHA256 over the notification URL and body', () => {
      const signature = crypto
        .createHmac('sha256', 'test-secret')
        .update(NOTIFICATION_URL + body.toString())
        .digest('base64');

      expect(computeSquareSignature('test-secret', NOTIFICATION_URL, body)).toBe(signature);
      expect(
        adapter(() => json(200, {})).verifySignature(
          body,
          { [SQUARE_SIGNATURE_HEADER]: signature },
          ['test-secret'],
        ),
      ).toBe(true);
    });

    it('should accept a signature made with any configured key', () => {
      const signature = computeSquareSignature('test-secret-new', NOTIFICATION_URL, body);

      expect(
        adapter(() => json(200, {})).verifySignature(
          body,
          { [SQUARE_SIGNATURE_HEADER]: signature },
          ['test-secret-old', 'test-secret-new'],
        ),
      ).toBe(true);
    });

    it('should reject a signature over a different URL', () => {
      const signature = computeSquareSignature(
        'test-secret',
        'https://elsewhere.example.com/hook',
        body,
      );

      expect(
        adapter(() => json(200, {})).verifySignature(
          body,
          { [SQUARE_SIGNATURE_HEADER]: signature },
          ['test-secret'],
        ),
      ).toBe(false);
    });

    it('should reject a header of the right length in non-ASCII characters', () => {
      const forged = '\u00e9'.repeat(44);

      expect(computeSquareSignature('test-secret', NOTIFICATION_URL, body)).toHaveLength(44);
      expect(
        adapter(() => json(200, {})).verifySignature(
          body,
          { [SQUARE_SIGNATURE_HEADER]: forged },
          ['test-secret'],
        ),
      ).toBe(false);
    });

    it('should reject a missing signature header', () => {
      expect(
        adapter(() => json(200, {})).verifySignature(body, {}, ['test-secret']),
      ).toBe(false);
    });

    it('should reject everything without a notification URL', () => {
      const unconfigured = new SquareProviderAdapter({ accessToken: 'test-token' });
      const signature = computeSquareSignature('test-secret', NOTIFICATION_URL, body);

      expect(
        unconfigured.verifySignature(
          body,
          { [SQUARE_SIGNATURE_HEADER]: signature },
          ['test-secret'],
        ),
      ).toBe(false);
    });
  });

  describe('retrieveOrder', () => {
    it('should fetch the order with the bearer token and pinned version', async () => {
      const square = adapter(() =>
        json(200, {
          order: {
            id: 'ord_1',
            state: 'OPEN',
            line_items: [
              { uid: 'li_1', catalog_object_id: 'ITEM_1', name: 'Crisps', quantity: '1' },
              { uid: 'li_2', name: 'Custom amount', quantity: '1' },
            ],
          },
        }),
      );

      const order = await square.retrieveOrder('ord_1');

      expect(order).toEqual({
        id: 'ord_1',
        state: 'OPEN',
        lineItems: [
          { uid: 'li_1', catalogObjectId: 'ITEM_1', name: 'Crisps', quantity: '1' },
          { uid: 'li_2', name: 'Custom amount', quantity: '1' },
        ],
      });
      expect(calls).toHaveLength(1);
      expect(calls[0].url).toBe('https://connect.squareup.com/v2/orders/ord_1');
      expect(calls[0].init).toMatchObject({
        method: 'GET',
        headers: expect.objectContaining({
          Authorization: 'Bearer test-token',
          'Square-Version': '2025-07-16',
        }),
      });
    });

    it('should use a configured base URL without its trailing slash', async () => {
      const square = new SquareProviderAdapter({
        accessToken: 'test-token',
        options: { apiBaseUrl: 'https://connect.squareupsandbox.com/' },
        fetchImpl: stubFetch(calls, () => json(200, { order: { id: 'ord_1' } })),
      });

      await square.retrieveOrder('ord_1');

      expect(calls[0].url).toBe('https://connect.squareupsandbox.com/v2/orders/ord_1');
    });

    it('should turn a 404 into a provider error carrying the status', async () => {
      const square = adapter(() =>
        json(404, { errors: [{ code: 'NOT_FOUND', detail: 'Order not found' }] }),
      );

      const failure = square.retrieveOrder('ord_missing');

      await expect(failure).rejects.toBeInstanceOf(ProviderError);
      await expect(failure).rejects.toMatchObject({
        code: 'HTTP_404',
        message: 'Square API error on GET /v2/orders/ord_missing: 404 Order not found',
        details: { status: 404 },
      });
    });

    it('should treat any status other than 200 as a failure', async () => {
      const square = adapter(() => json(201, { order: { id: 'ord_1' } }));

      await expect(square.retrieveOrder('ord_1')).rejects.toMatchObject({
        code: 'HTTP_201',
      });
    });

    it('should reject a response without an order', async () => {
      const square = adapter(() => json(200, {}));

      await expect(square.retrieveOrder('ord_1')).rejects.toMatchObject({
        code: 'INVALID_RESPONSE',
        message: 'Order ord_1 missing from response',
      });
    });

    it('should reject a body that is not JSON', async () => {
      const square = adapter(() => new Response('<html>', { status: 200 }));

      await expect(square.retrieveOrder('ord_1')).rejects.toMatchObject({
        code: 'INVALID_RESPONSE',
      });
    });

    it('should wrap a transport failure', async () => {
      const square = adapter(() => {
        throw new TypeError('fetch failed');
      });

      await expect(square.retrieveOrder('ord_1')).rejects.toMatchObject({
        code: 'NETWORK_ERROR',
        message: 'GET /v2/orders/ord_1 failed: fetch failed',
      });
    });

    it('should report a call aborted by the caller', async () => {
      const controller = new AbortController();
      controller.abort();
      const square = new SquareProviderAdapter({
        accessToken: 'test-token',
        fetchImpl: async (input, init) => {
          calls.push({ url: String(input), init });
          if (init?.signal?.aborted) {
            throw new Error('This operation was aborted');
          }
          return json(200, { order: { id: 'ord_1' } });
        },
      });

      await expect(
        square.retrieveOrder('ord_1', { signal: controller.signal }),
      ).rejects.toMatchObject({ code: 'ABORTED' });
    });
  });

  describe('batchRetrieveCatalogObjects', () => {
    it('should post the ids and map items, definitions and other objects', async () => {
      const square = adapter(() =>
        json(200, {
          objects: [
            {
              type: 'ITEM',
              id: 'ITEM_1',
              custom_attribute_values: {
                'Square:0a1b': {
                  name: 'Slot',
                  key: 'Square:0a1b',
                  type: 'SELECTION',
                  custom_attribute_definition_id: 'DEF_1',
                  selection_uid_values: ['SEL_B3'],
                },
              },
            },
            {
              type: 'CUSTOM_ATTRIBUTE_DEFINITION',
              id: 'DEF_1',
              custom_attribute_definition_data: {
                name: 'Slot',
                selection_config: {
                  allowed_selections: [{ uid: 'SEL_B3', name: 'B3' }],
                },
              },
            },
            { type: 'TAX', id: 'TAX_1' },
          ],
        }),
      );

      const objects = await square.batchRetrieveCatalogObjects(['ITEM_1', 'DEF_1', 'TAX_1']);

      expect(objects).toEqual([
        {
          kind: 'item',
          id: 'ITEM_1',
          customAttributeValues: {
            'Square:0a1b': {
              name: 'Slot',
              key: 'Square:0a1b',
              definitionId: 'DEF_1',
              selectionUidValues: ['SEL_B3'],
            },
          },
        },
        {
          kind: 'custom_attribute_definition',
          id: 'DEF_1',
          name: 'Slot',
          allowedSelections: [{ uid: 'SEL_B3', name: 'B3' }],
        },
        { kind: 'other', id: 'TAX_1', type: 'TAX' },
      ]);
      expect(calls[0].url).toBe('https://connect.squareup.com/v2/catalog/batch-retrieve');
      expect(calls[0].init?.method).toBe('POST');
      expect(calls[0].init?.body).toBe('{"object_ids":["ITEM_1","DEF_1","TAX_1"]}');
    });

    it('should return nothing for unknown ids', async () => {
      const square = adapter(() => json(200, {}));

      expect(await square.batchRetrieveCatalogObjects(['NOPE'])).toEqual([]);
    });

    it('should not call the API for an empty id list', async () => {
      const square = adapter(() => json(200, {}));

      expect(await square.batchRetrieveCatalogObjects([])).toEqual([]);
      expect(calls).toHaveLength(0);
    });

    it('should turn a server error into a provider error', async () => {
      const square = adapter(() => json(500, {}));

      await expect(square.batchRetrieveCatalogObjects(['ITEM_1'])).rejects.toMatchObject({
        code: 'HTTP_500',
        details: { status: 500 },
      });
    });
  });
});
