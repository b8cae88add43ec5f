import {
  BadRequestException,
  Controller,
  HttpCode,
  HttpStatus,
  Logger,
  Post,
  RawBodyRequest,
  Req,
} from '@nestjs/common';
import { ApiTags } from '@nestjs/swagger';
import type { Request } from 'express';
import { IntakeFate } from '../../../core/domain/enums';
import type { IntakeResult } from '../../../core';
import { ApiWebhookEndpoint } from '../../../_shared/swagger/decorators';
import { WebhookAckDto } from '../../../_shared/dto';
import { VendingService } from '../services/vending.service';

const FATE_MESSAGES: Record<Exclude<IntakeFate, IntakeFate.PARSE_ERROR>, string> = {
  [IntakeFate.ACCEPTED]: 'Webhook received and processing started',
  [IntakeFate.IGNORED]: 'Event ignored',
  [IntakeFate.SIGNATURE_FAILED]: 'Webhook signature verification failed',
};

/**
 * Webhook Controller
 *
 * The endpoint Square posts payment notifications to. It answers as soon as
 * intake has classified the notification; dispensing happens afterwards.
 */
@ApiTags('Ingest')
@Controller('webhook')
export class WebhookController {
  private readonly logger = new Logger(WebhookController.name);

  constructor(private readonly vendingService: VendingService) {}

  @Post('square')
  @HttpCode(HttpStatus.OK)
  @ApiWebhookEndpoint()
  async handleSquareWebhook(
    @Req() request: RawBodyRequest<Request>,
  ): Promise<WebhookAckDto> {
    const rawBody = request.rawBody;
    if (!rawBody || rawBody.length === 0) {
      this.logger.warn('Webhook without a readable JSON body');
      throw new BadRequestException({ error: 'Invalid payload' });
    }

    const result = await this.vendingService.processWebhook(
      rawBody,
      request.headers,
    );

    return this.formatResponse(result);
  }

  private formatResponse(result: IntakeResult): WebhookAckDto {
    if (result.fate === IntakeFate.PARSE_ERROR) {
      throw new BadRequestException({ error: 'Invalid payload' });
    }

    return {
      fate: result.fate,
      message: FATE_MESSAGES[result.fate],
      eventId: result.eventId,
      orderId: result.orderId,
    };
  }
}
