import { Controller, Get } from '@nestjs/common';
import { ApiOperation, ApiResponse, ApiTags } from '@nestjs/swagger';

import type { DispatcherRuntimeSnapshot } from './runtime-status.interfaces';
import { RuntimeStatusService } from './runtime-status.service';
import { DISPATCHER_SNAPSHOT_SCHEMA } from '../common/swagger/api-schemas';

@ApiTags('Runtime')
@Controller('runtime')
export class RuntimeController {
  public constructor(private readonly runtimeStatusService: RuntimeStatusService) {}

  @Get()
  @ApiOperation({ summary: 'Dispatcher state and counters' })
  @ApiResponse({ status: 200, description: 'Dispatcher snapshot', schema: DISPATCHER_SNAPSHOT_SCHEMA })
  public getRuntime(): DispatcherRuntimeSnapshot {
    return this.runtimeStatusService.getSnapshot();
  }
}
