export type NodeEnv = 'development' | 'test' | 'production';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export type TelegramAckStrategy = 'update' | 'batch' | 'both';

export type AppConfig = {
  readonly appVersion: string;
  readonly nodeEnv: NodeEnv;
  readonly port: number;
  readonly logLevel: LogLevel;
  readonly metricsEnabled: boolean;
  readonly telegramEnabled: boolean;
  readonly botToken: string | null;
  readonly telegramApiBaseUrl: string;
  readonly telegramAdminIds: readonly number[];
  readonly pollTimeoutSec: number;
  readonly pollLimit: number;
  readonly pollRequestMarginMs: number;
  readonly sendTimeoutMs: number;
  readonly loopIdleMs: number;
  readonly pollConflictBackoffMs: number;
  readonly pollRateLimitBackoffMs: number;
  readonly sendRateLimitBackoffMs: number;
  readonly ackStrategy: TelegramAckStrategy;
  readonly seenUpdatesCapacity: number;
  readonly seenCallbacksCapacity: number;
  readonly messageHashesCapacity: number;
  readonly rapidRepeatWindowSec: number;
  readonly messageCooldownMs: number;
  readonly callbackCooldownMs: number;
  readonly rateLedgerTtlSec: number;
  readonly listenerTtlSec: number;
  readonly outboundMinTimeMs: number;
  readonly outboundMaxConcurrent: number;
  readonly sendRetryAttempts: number;
};
