import { Injectable } from '@nestjs/common';
import { collectDefaultMetrics, Counter, Gauge, Histogram, Registry } from 'prom-client';

// Long polls hold for up to the poll timeout, so buckets stretch past 30s
/* eslint-disable no-magic-numbers */
const POLL_DURATION_BUCKETS: number[] = [0.1, 0.5, 1, 5, 10, 20, 30, 35, 60];
/* eslint-enable no-magic-numbers */

@Injectable()
export class MetricsService {
  private readonly registry: Registry;

  public readonly telegramUpdatesTotal: Counter;
  public readonly telegramApiRequestsTotal: Counter;
  public readonly telegramPollDurationSeconds: Histogram;
  public readonly telegramDispatcherOffset: Gauge;
  public readonly telegramActiveListeners: Gauge;
  public readonly rateLimitQueueSize: Gauge;

  public constructor() {
    this.registry = new Registry();

    collectDefaultMetrics({ register: this.registry });

    this.telegramUpdatesTotal = new Counter({
      name: 'telegram_updates_total',
      help: 'Inbound updates by processing outcome',
      labelNames: ['outcome'] as const,
      registers: [this.registry],
    });

    this.telegramApiRequestsTotal = new Counter({
      name: 'telegram_api_requests_total',
      help: 'Bot API calls by method and outcome',
      labelNames: ['method', 'outcome'] as const,
      registers: [this.registry],
    });

    this.telegramPollDurationSeconds = new Histogram({
      name: 'telegram_poll_duration_seconds',
      help: 'Long poll duration in seconds',
      buckets: POLL_DURATION_BUCKETS,
      registers: [this.registry],
    });

    this.telegramDispatcherOffset = new Gauge({
      name: 'telegram_dispatcher_offset',
      help: 'Next update id expected by the dispatcher',
      registers: [this.registry],
    });

    this.telegramActiveListeners = new Gauge({
      name: 'telegram_active_listeners',
      help: 'Conversation listeners waiting for input',
      registers: [this.registry],
    });

    this.rateLimitQueueSize = new Gauge({
      name: 'rate_limit_queue_size',
      help: 'Current queue size for rate limiter',
      labelNames: ['limiter'] as const,
      registers: [this.registry],
    });
  }

  public async getMetrics(): Promise<string> {
    return this.registry.metrics();
  }

  public getContentType(): string {
    return this.registry.contentType;
  }
}
