import { applyDecorators } from '@nestjs/common';
import { ApiOperation, ApiResponse, ApiBody, ApiHeader } from '@nestjs/swagger';
import { IntakeFate } from '../../../core/domain/enums';
import { InvalidPayloadDto, WebhookAckDto } from '../../dto';

/**
 * Swagger decorator for the Square webhook endpoint
 */
export const ApiWebhookEndpoint = () => {
  return applyDecorators(
    ApiOperation({
      summary: 'Receive Square payment webhook',
      description:
        'Receives Square notifications. Completed payments are claimed and their items dispensed in the background; the response only reports how intake classified the notification.',
    }),
    ApiHeader({
      name: 'x-square-hmacsha256-signature',
      description:
        'Base64 HMAC-SHA256 of the notification URL followed by the raw body. Checked when a signature key is configured.',
      required: false,
    }),
    ApiBody({
      description: 'Raw webhook payload from Square',
      required: true,
      schema: {
        type: 'object',
        additionalProperties: true,
        example: {
          merchant_id: 'MLEXAMPLE',
          type: 'payment.updated',
          event_id: 'evt_8f2c1',
          created_at: '2025-01-01T12:00:00Z',
          data: {
            type: 'payment',
            id: 'pay_1',
            object: {
              payment: {
                id: 'pay_1',
                status: 'COMPLETED',
                order_id: 'ord_1',
              },
            },
          },
        },
      },
    }),
    ApiResponse({
      status: 200,
      description: `Webhook classified: ${Object.values(IntakeFate)
        .filter((fate) => fate !== IntakeFate.PARSE_ERROR)
        .join(', ')}`,
      type: WebhookAckDto,
    }),
    ApiResponse({
      status: 400,
      description: 'Body missing, not JSON, or not shaped like a notification',
      type: InvalidPayloadDto,
    }),
  );
};
