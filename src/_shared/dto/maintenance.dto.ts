import {
  ArrayMaxSize,
  ArrayNotEmpty,
  IsArray,
  IsInt,
  IsOptional,
  Max,
  Min,
} from 'class-validator';
import { ApiProperty, ApiPropertyOptional } from '@nestjs/swagger';

export const MAX_CHANNEL_INDEX = 16;
export const MAX_PULSE_MS = 10000;

/**
 * DTO for pulsing relay channels by hand
 */
export class PulseChannelsDto {
  @ApiProperty({
    description: 'Relay channels to engage',
    example: [2, 7],
    type: [Number],
  })
  @IsArray()
  @ArrayNotEmpty()
  @ArrayMaxSize(MAX_CHANNEL_INDEX)
  @IsInt({ each: true })
  @Min(1, { each: true })
  @Max(MAX_CHANNEL_INDEX, { each: true })
  channels!: number[];

  @ApiPropertyOptional({
    description: 'How long to hold the channels engaged',
    example: 5000,
    minimum: 1,
    maximum: MAX_PULSE_MS,
  })
  @IsOptional()
  @IsInt()
  @Min(1)
  @Max(MAX_PULSE_MS)
  durationMs?: number;
}

/**
 * Response for an accepted manual dispense
 */
export class DispenseAcceptedDto {
  @ApiProperty({ example: 'B3' })
  slotId!: string;

  @ApiProperty({ example: [2, 7, 12, 14], type: [Number] })
  channels!: number[];
}

/**
 * Response for an accepted pulse
 */
export class PulseAcceptedDto {
  @ApiProperty({ example: [2, 7], type: [Number] })
  channels!: number[];

  @ApiProperty({ example: 5000 })
  durationMs!: number;
}
