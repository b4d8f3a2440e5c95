export enum LimiterKey {
  TELEGRAM_OUTBOUND = 'telegram_outbound',
}

// Bottleneck priority: lower number = higher priority (0–9 range)
/* eslint-disable no-magic-numbers */
export enum RequestPriority {
  CRITICAL = 1,
  HIGH = 5,
  NORMAL = 7,
  LOW = 9,
}
/* eslint-enable no-magic-numbers */

export interface IBottleneckConfig {
  readonly minTime: number;
  readonly maxConcurrent: number;
}

export interface ILimiterMetrics {
  readonly queueSize: number;
  readonly running: number;
  readonly completed: number;
  readonly failed: number;
}
