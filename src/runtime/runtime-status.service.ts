import { Injectable, Logger } from '@nestjs/common';

import {
  type DispatcherRuntimeSnapshot,
  INITIAL_DISPATCHER_SNAPSHOT,
} from './runtime-status.interfaces';
import { RateLimitedWarningEmitter } from '../common/utils/logging/rate-limited-warning-emitter';

const WARN_COOLDOWN_MS = 60_000;
const POLL_FAILURE_WARN_THRESHOLD = 5;
const POLL_FAILURE_WARN_KEY = 'dispatcher:poll_failures';

@Injectable()
export class RuntimeStatusService {
  private readonly logger: Logger = new Logger(RuntimeStatusService.name);
  private readonly warningEmitter: RateLimitedWarningEmitter = new RateLimitedWarningEmitter(
    WARN_COOLDOWN_MS,
  );
  private snapshot: DispatcherRuntimeSnapshot = INITIAL_DISPATCHER_SNAPSHOT;

  public setSnapshot(snapshot: DispatcherRuntimeSnapshot): void {
    this.snapshot = snapshot;
    this.evaluatePollHealth(snapshot);
  }

  public getSnapshot(): DispatcherRuntimeSnapshot {
    return this.snapshot;
  }

  public isPollingDegraded(): boolean {
    return this.snapshot.consecutivePollFailures >= POLL_FAILURE_WARN_THRESHOLD;
  }

  private evaluatePollHealth(snapshot: DispatcherRuntimeSnapshot): void {
    if (snapshot.consecutivePollFailures === 0) {
      this.warningEmitter.reset(POLL_FAILURE_WARN_KEY);
      return;
    }

    if (
      snapshot.consecutivePollFailures >= POLL_FAILURE_WARN_THRESHOLD &&
      this.warningEmitter.shouldEmit(POLL_FAILURE_WARN_KEY)
    ) {
      this.logger.warn(
        `Polling degraded consecutiveFailures=${String(snapshot.consecutivePollFailures)} lastError=${snapshot.lastErrorMessage ?? 'n/a'}`,
      );
    }
  }
}
