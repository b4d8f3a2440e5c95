import { type IBottleneckConfig, LimiterKey } from './bottleneck-rate-limiter.interfaces';
import type { AppConfigService } from '../config/app-config.service';

export function buildLimiterConfigs(
  config: AppConfigService,
): ReadonlyMap<LimiterKey, IBottleneckConfig> {
  const map = new Map<LimiterKey, IBottleneckConfig>();

  map.set(LimiterKey.TELEGRAM_OUTBOUND, {
    minTime: config.outboundMinTimeMs,
    maxConcurrent: config.outboundMaxConcurrent,
  });

  return map;
}
