import { Injectable } from '@nestjs/common';

import type { AppHealthStatus, ComponentHealth } from './health.types';
import { AppConfigService } from '../config/app-config.service';
import {
  type DispatcherRuntimeSnapshot,
  DispatcherState,
} from '../runtime/runtime-status.interfaces';
import { RuntimeStatusService } from '../runtime/runtime-status.service';

@Injectable()
export class HealthService {
  public constructor(
    private readonly appConfigService: AppConfigService,
    private readonly runtimeStatusService: RuntimeStatusService,
  ) {}

  public getHealthStatus(): AppHealthStatus {
    const telegram: ComponentHealth = {
      ok: this.appConfigService.telegramEnabled,
      details: this.appConfigService.telegramEnabled
        ? 'enabled'
        : 'disabled by TELEGRAM_ENABLED=false',
    };
    const dispatcher: ComponentHealth = this.getDispatcherHealth();

    return {
      status: dispatcher.ok ? 'ok' : 'degraded',
      telegram,
      dispatcher,
    };
  }

  private getDispatcherHealth(): ComponentHealth {
    if (!this.appConfigService.telegramEnabled) {
      return { ok: true, details: 'not started, telegram disabled' };
    }

    const snapshot: DispatcherRuntimeSnapshot = this.runtimeStatusService.getSnapshot();

    if (snapshot.state === DispatcherState.STOPPED) {
      return { ok: false, details: 'dispatcher is stopped' };
    }

    if (this.runtimeStatusService.isPollingDegraded()) {
      return {
        ok: false,
        details: `polling failing consecutiveFailures=${String(snapshot.consecutivePollFailures)}`,
      };
    }

    return {
      ok: true,
      details: `state=${snapshot.state} offset=${String(snapshot.offset)}`,
    };
  }
}
