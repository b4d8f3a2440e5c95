import { Injectable, Logger, type OnModuleDestroy } from '@nestjs/common';
import Bottleneck from 'bottleneck';

import {
  type IBottleneckConfig,
  type ILimiterMetrics,
  LimiterKey,
  RequestPriority,
} from './bottleneck-rate-limiter.interfaces';
import { buildLimiterConfigs } from './rate-limiter-config.factory';
import { AppConfigService } from '../config/app-config.service';

type LimiterEntry = {
  readonly limiter: Bottleneck;
  completed: number;
  failed: number;
};

/**
 * Named bottleneck limiters. On shutdown queued jobs are allowed to finish,
 * so replies already accepted by a handler still reach the chat.
 */
@Injectable()
export class BottleneckRateLimiterService implements OnModuleDestroy {
  private readonly logger: Logger = new Logger(BottleneckRateLimiterService.name);
  private readonly entries: Map<LimiterKey, LimiterEntry> = new Map<LimiterKey, LimiterEntry>();

  public constructor(appConfigService: AppConfigService) {
    for (const [key, config] of buildLimiterConfigs(appConfigService)) {
      this.entries.set(key, this.createEntry(key, config));
    }
  }

  public async schedule<T>(
    key: LimiterKey,
    operation: () => Promise<T>,
    priority: RequestPriority = RequestPriority.NORMAL,
  ): Promise<T> {
    const entry: LimiterEntry | undefined = this.entries.get(key);

    if (entry === undefined) {
      throw new Error(`No rate limiter configured for key=${key}`);
    }

    try {
      const result: T = await entry.limiter.schedule({ priority }, operation);
      entry.completed += 1;
      return result;
    } catch (error: unknown) {
      entry.failed += 1;
      throw error;
    }
  }

  public getMetrics(key: LimiterKey): ILimiterMetrics {
    const entry: LimiterEntry | undefined = this.entries.get(key);

    if (entry === undefined) {
      return { queueSize: 0, running: 0, completed: 0, failed: 0 };
    }

    const counts: Bottleneck.Counts = entry.limiter.counts();

    return {
      queueSize: counts.QUEUED + counts.RECEIVED,
      running: counts.RUNNING + counts.EXECUTING,
      completed: entry.completed,
      failed: entry.failed,
    };
  }

  public getAllKeys(): readonly LimiterKey[] {
    return [...this.entries.keys()];
  }

  public async onModuleDestroy(): Promise<void> {
    await Promise.all(
      [...this.entries].map(
        async ([key, entry]: [LimiterKey, LimiterEntry]): Promise<void> => this.drain(key, entry),
      ),
    );
  }

  private createEntry(key: LimiterKey, config: IBottleneckConfig): LimiterEntry {
    const limiter: Bottleneck = new Bottleneck({
      minTime: config.minTime,
      maxConcurrent: config.maxConcurrent,
    });

    limiter.on('error', (error: unknown): void => {
      const message: string = error instanceof Error ? error.message : String(error);
      this.logger.error(`Bottleneck error limiter=${key}: ${message}`);
    });

    this.logger.debug(
      `Limiter ready key=${key} minTime=${String(config.minTime)} maxConcurrent=${String(config.maxConcurrent)}`,
    );

    return { limiter, completed: 0, failed: 0 };
  }

  private async drain(key: LimiterKey, entry: LimiterEntry): Promise<void> {
    const pending: number = entry.limiter.counts().QUEUED;

    try {
      await entry.limiter.stop({ dropWaitingJobs: false });
      this.logger.log(`Rate limiter stopped key=${key} drained=${String(pending)}`);
    } catch (error: unknown) {
      const message: string = error instanceof Error ? error.message : String(error);
      this.logger.error(`Failed to stop rate limiter key=${key}: ${message}`);
    }
  }
}
