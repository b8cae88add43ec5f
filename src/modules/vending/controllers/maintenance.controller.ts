import {
  Body,
  Controller,
  Get,
  HttpCode,
  HttpStatus,
  NotFoundException,
  Param,
  Post,
  UseGuards,
  ValidationPipe,
} from '@nestjs/common';
import { ApiTags } from '@nestjs/swagger';
import {
  DispenseAcceptedDto,
  PulseAcceptedDto,
  PulseChannelsDto,
} from '../../../_shared/dto';
import {
  ApiDispenseSlot,
  ApiListSlots,
  ApiPulseChannels,
} from '../../../_shared/swagger/decorators';
import { MaintenanceAuthGuard } from '../guards/maintenance-auth.guard';
import { VendingService } from '../services/vending.service';

/**
 * Maintenance Controller
 *
 * Bench operations for the enclosure: inspect the slot table, release a
 * slot without an order, pulse individual relays.
 */
@ApiTags('Maintenance')
@Controller('maintenance')
@UseGuards(MaintenanceAuthGuard)
export class MaintenanceController {
  constructor(private readonly vendingService: VendingService) {}

  @Get('slots')
  @ApiListSlots()
  listSlots(): Record<string, number[]> {
    return this.vendingService.listSlots();
  }

  @Post('slots/:slotId/dispense')
  @HttpCode(HttpStatus.ACCEPTED)
  @ApiDispenseSlot()
  dispense(@Param('slotId') slotId: string): DispenseAcceptedDto {
    const channels = this.vendingService.dispenseSlot(slotId);
    if (!channels) {
      throw new NotFoundException(`Unknown slot: ${slotId}`);
    }
    return { slotId, channels };
  }

  @Post('channels/pulse')
  @HttpCode(HttpStatus.ACCEPTED)
  @ApiPulseChannels()
  pulse(
    @Body(new ValidationPipe({ transform: true, whitelist: true }))
    dto: PulseChannelsDto,
  ): PulseAcceptedDto {
    return this.vendingService.pulseChannels(dto.channels, dto.durationMs);
  }
}
