import { ApiProperty, ApiPropertyOptional } from '@nestjs/swagger';
import { IntakeFate } from '../../core/domain/enums';

/**
 * Acknowledgement returned for every readable webhook
 */
export class WebhookAckDto {
  @ApiProperty({
    description: 'What intake decided for this notification',
    enum: IntakeFate,
    example: IntakeFate.ACCEPTED,
  })
  fate!: IntakeFate;

  @ApiProperty({
    description: 'Human-readable outcome',
    example: 'Webhook received and processing started',
  })
  message!: string;

  @ApiPropertyOptional({
    description: 'Provider event id',
    example: 'evt_8f2c1',
  })
  eventId?: string;

  @ApiPropertyOptional({
    description: 'Order id, when the event was accepted',
    example: 'ord_1',
  })
  orderId?: string;
}

/**
 * Body of a 400 for an unreadable webhook
 */
export class InvalidPayloadDto {
  @ApiProperty({ example: 'Invalid payload' })
  error!: string;
}
