import { Module } from '@nestjs/common';

import { ConfigModule } from './config/config.module';
import { HealthModule } from './health/health.module';
import { ObservabilityModule } from './observability/observability.module';
import { RateLimitingModule } from './rate-limiting/rate-limiting.module';
import { RuntimeModule } from './runtime/runtime.module';
import { TelegramModule } from './telegram/telegram.module';

@Module({
  imports: [
    ConfigModule,
    RuntimeModule,
    RateLimitingModule,
    ObservabilityModule,
    TelegramModule,
    HealthModule,
  ],
})
export class AppModule {}
