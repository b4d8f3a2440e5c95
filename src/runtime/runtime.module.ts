import { Global, Module } from '@nestjs/common';

import { RuntimeController } from './runtime.controller';
import { RuntimeStatusService } from './runtime-status.service';

@Global()
@Module({
  controllers: [RuntimeController],
  providers: [RuntimeStatusService],
  exports: [RuntimeStatusService],
})
export class RuntimeModule {}
