import { applyDecorators } from '@nestjs/common';
import {
  ApiBearerAuth,
  ApiOperation,
  ApiParam,
  ApiResponse,
} from '@nestjs/swagger';
import { DispenseAcceptedDto, PulseAcceptedDto } from '../../dto';

const maintenanceAuth = () =>
  applyDecorators(
    ApiBearerAuth(),
    ApiResponse({ status: 401, description: 'Missing or wrong maintenance key' }),
    ApiResponse({ status: 404, description: 'Maintenance endpoints disabled' }),
  );

export const ApiListSlots = () => {
  return applyDecorators(
    ApiOperation({ summary: 'List slots and the channels each one drives' }),
    ApiResponse({
      status: 200,
      schema: {
        type: 'object',
        additionalProperties: { type: 'array', items: { type: 'number' } },
        example: { B3: [2, 7, 12, 14] },
      },
    }),
    maintenanceAuth(),
  );
};

export const ApiDispenseSlot = () => {
  return applyDecorators(
    ApiOperation({
      summary: 'Dispense from a slot by hand',
      description: 'Runs one dispense cycle in the background, outside any order',
    }),
    ApiParam({ name: 'slotId', example: 'B3' }),
    ApiResponse({ status: 202, type: DispenseAcceptedDto }),
    ApiResponse({ status: 404, description: 'Unknown slot' }),
    maintenanceAuth(),
  );
};

export const ApiPulseChannels = () => {
  return applyDecorators(
    ApiOperation({
      summary: 'Engage relay channels for a bounded time',
      description: 'Bench test for wiring; channels return to idle afterwards',
    }),
    ApiResponse({ status: 202, type: PulseAcceptedDto }),
    ApiResponse({ status: 400, description: 'Invalid channel list or duration' }),
    maintenanceAuth(),
  );
};
