import { describe, expect, it } from 'vitest';

import { MetricsCollectorService } from './metrics-collector.service';
import { MetricsService } from './metrics.service';
import type { AppConfigService } from '../config/app-config.service';
import { type ILimiterMetrics, LimiterKey } from '../rate-limiting/bottleneck-rate-limiter.interfaces';
import type { BottleneckRateLimiterService } from '../rate-limiting/bottleneck-rate-limiter.service';
import {
  DispatcherState,
  INITIAL_DISPATCHER_SNAPSHOT,
} from '../runtime/runtime-status.interfaces';
import { RuntimeStatusService } from '../runtime/runtime-status.service';

describe('MetricsCollectorService', (): void => {
  it('publishes limiter queue sizes and dispatcher gauges', async (): Promise<void> => {
    const metricsService: MetricsService = new MetricsService();
    const runtimeStatusService: RuntimeStatusService = new RuntimeStatusService();
    runtimeStatusService.setSnapshot({
      ...INITIAL_DISPATCHER_SNAPSHOT,
      state: DispatcherState.IDLE_POLLING,
      offset: 43,
      activeListeners: 2,
    });
    const rateLimiterStub = {
      getAllKeys: (): readonly LimiterKey[] => [LimiterKey.TELEGRAM_OUTBOUND],
      getMetrics: (): ILimiterMetrics => ({ queueSize: 4, running: 1, completed: 9, failed: 0 }),
    } as unknown as BottleneckRateLimiterService;
    const collector: MetricsCollectorService = new MetricsCollectorService(
      metricsService,
      rateLimiterStub,
      runtimeStatusService,
      { metricsEnabled: false } as unknown as AppConfigService,
    );

    collector.collect();
    const exposition: string = await metricsService.getMetrics();

    expect(exposition).toContain('rate_limit_queue_size{limiter="telegram_outbound"} 4');
    expect(exposition).toContain('telegram_active_listeners 2');
    expect(exposition).toContain('telegram_dispatcher_offset 43');
  });
});
