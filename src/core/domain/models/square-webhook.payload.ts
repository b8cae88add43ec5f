import { Type } from 'class-transformer';
import { IsOptional, IsString, ValidateNested } from 'class-validator';

/**
 * Shape of a Square webhook notification, as far as intake reads it.
 * Every field is optional: missing fields make an event irrelevant, while a
 * field of the wrong type makes the body unparseable.
 *
 * Property names follow the wire format.
 */
export class SquarePaymentPayload {
  @IsOptional()
  @IsString()
  id?: string;

  @IsOptional()
  @IsString()
  status?: string;

  @IsOptional()
  @IsString()
  order_id?: string;

  @IsOptional()
  @IsString()
  location_id?: string;
}

export class SquareEventObject {
  @IsOptional()
  @ValidateNested()
  @Type(() => SquarePaymentPayload)
  payment?: SquarePaymentPayload;
}

export class SquareEventData {
  @IsOptional()
  @IsString()
  type?: string;

  @IsOptional()
  @IsString()
  id?: string;

  @IsOptional()
  @ValidateNested()
  @Type(() => SquareEventObject)
  object?: SquareEventObject;
}

export class SquareWebhookPayload {
  @IsOptional()
  @IsString()
  merchant_id?: string;

  @IsOptional()
  @IsString()
  type?: string;

  @IsOptional()
  @IsString()
  event_id?: string;

  @IsOptional()
  @IsString()
  created_at?: string;

  @IsOptional()
  @ValidateNested()
  @Type(() => SquareEventData)
  data?: SquareEventData;
}
