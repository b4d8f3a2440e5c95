import { Controller, Get } from '@nestjs/common';
import { ApiOperation, ApiResponse, ApiTags } from '@nestjs/swagger';

import { HealthService } from './health.service';
import type { AppHealthStatus } from './health.types';
import { HEALTH_STATUS_SCHEMA } from '../common/swagger/api-schemas';

@ApiTags('Health')
@Controller('health')
export class HealthController {
  public constructor(private readonly healthService: HealthService) {}

  @Get()
  @ApiOperation({ summary: 'Liveness with telegram and dispatcher state' })
  @ApiResponse({ status: 200, description: 'Health status', schema: HEALTH_STATUS_SCHEMA })
  public getHealthStatus(): AppHealthStatus {
    return this.healthService.getHealthStatus();
  }
}
