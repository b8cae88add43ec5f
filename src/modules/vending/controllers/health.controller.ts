import { Controller, Get, HttpCode, HttpStatus } from '@nestjs/common';
import { ApiTags } from '@nestjs/swagger';
import {
  ApiHealthCheck,
  ApiLivenessCheck,
  ApiReadinessCheck,
  ApiServiceStatistics,
} from '../../../_shared/swagger/decorators';
import { ReadinessReport, VendingService } from '../services/vending.service';

/**
 * Health Controller
 */
@ApiTags('Health')
@Controller()
export class HealthController {
  constructor(private readonly vendingService: VendingService) {}

  @Get()
  @HttpCode(HttpStatus.OK)
  @ApiLivenessCheck()
  root(): { message: string } {
    return { message: 'Vending controller is running' };
  }

  @Get('health')
  @HttpCode(HttpStatus.OK)
  @ApiHealthCheck()
  health(): {
    status: string;
    timestamp: Date;
    uptime: number;
  } {
    return {
      status: 'healthy',
      timestamp: new Date(),
      uptime: process.uptime(),
    };
  }

  @Get('health/ready')
  @ApiReadinessCheck()
  async readiness(): Promise<ReadinessReport> {
    return this.vendingService.getReadiness();
  }

  @Get('health/stats')
  @ApiServiceStatistics()
  statistics(): ReturnType<VendingService['getStatistics']> {
    return this.vendingService.getStatistics();
  }
}
