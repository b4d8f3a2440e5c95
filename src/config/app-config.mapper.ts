import type { ParsedEnv } from './app-config.schema';
import type { AppConfig } from './app-config.types';

export const mapAppConfig = (parsedEnv: ParsedEnv): AppConfig => ({
  ...mapCoreConfig(parsedEnv),
  ...mapPollingConfig(parsedEnv),
  ...mapGuardConfig(parsedEnv),
  ...mapOutboundConfig(parsedEnv),
});

const mapCoreConfig = (
  parsedEnv: ParsedEnv,
): Pick<
  AppConfig,
  | 'appVersion'
  | 'nodeEnv'
  | 'port'
  | 'logLevel'
  | 'metricsEnabled'
  | 'telegramEnabled'
  | 'botToken'
  | 'telegramApiBaseUrl'
  | 'telegramAdminIds'
> => ({
  appVersion: parsedEnv.APP_VERSION,
  nodeEnv: parsedEnv.NODE_ENV,
  port: parsedEnv.PORT,
  logLevel: parsedEnv.LOG_LEVEL,
  metricsEnabled: parsedEnv.METRICS_ENABLED,
  telegramEnabled: parsedEnv.TELEGRAM_ENABLED,
  botToken: parsedEnv.BOT_TOKEN ?? null,
  telegramApiBaseUrl: parsedEnv.TELEGRAM_API_BASE_URL.replace(/\/+$/, ''),
  telegramAdminIds: parseNumericIdList(parsedEnv.TELEGRAM_ADMIN_IDS),
});

const mapPollingConfig = (
  parsedEnv: ParsedEnv,
): Pick<
  AppConfig,
  | 'pollTimeoutSec'
  | 'pollLimit'
  | 'pollRequestMarginMs'
  | 'sendTimeoutMs'
  | 'loopIdleMs'
  | 'pollConflictBackoffMs'
  | 'pollRateLimitBackoffMs'
  | 'sendRateLimitBackoffMs'
  | 'ackStrategy'
> => ({
  pollTimeoutSec: parsedEnv.TELEGRAM_POLL_TIMEOUT_SEC,
  pollLimit: parsedEnv.TELEGRAM_POLL_LIMIT,
  pollRequestMarginMs: parsedEnv.TELEGRAM_POLL_REQUEST_MARGIN_MS,
  sendTimeoutMs: parsedEnv.TELEGRAM_SEND_TIMEOUT_MS,
  loopIdleMs: parsedEnv.TELEGRAM_LOOP_IDLE_MS,
  pollConflictBackoffMs: parsedEnv.TELEGRAM_POLL_CONFLICT_BACKOFF_MS,
  pollRateLimitBackoffMs: parsedEnv.TELEGRAM_POLL_RATE_LIMIT_BACKOFF_MS,
  sendRateLimitBackoffMs: parsedEnv.TELEGRAM_SEND_RATE_LIMIT_BACKOFF_MS,
  ackStrategy: parsedEnv.TELEGRAM_ACK_STRATEGY,
});

const mapGuardConfig = (
  parsedEnv: ParsedEnv,
): Pick<
  AppConfig,
  | 'seenUpdatesCapacity'
  | 'seenCallbacksCapacity'
  | 'messageHashesCapacity'
  | 'rapidRepeatWindowSec'
  | 'messageCooldownMs'
  | 'callbackCooldownMs'
  | 'rateLedgerTtlSec'
  | 'listenerTtlSec'
> => ({
  seenUpdatesCapacity: parsedEnv.TELEGRAM_SEEN_UPDATES_CAPACITY,
  seenCallbacksCapacity: parsedEnv.TELEGRAM_SEEN_CALLBACKS_CAPACITY,
  messageHashesCapacity: parsedEnv.TELEGRAM_MESSAGE_HASHES_CAPACITY,
  rapidRepeatWindowSec: parsedEnv.TELEGRAM_RAPID_REPEAT_WINDOW_SEC,
  messageCooldownMs: parsedEnv.TELEGRAM_MESSAGE_COOLDOWN_MS,
  callbackCooldownMs: parsedEnv.TELEGRAM_CALLBACK_COOLDOWN_MS,
  rateLedgerTtlSec: parsedEnv.TELEGRAM_RATE_LEDGER_TTL_SEC,
  listenerTtlSec: parsedEnv.TELEGRAM_LISTENER_TTL_SEC,
});

const mapOutboundConfig = (
  parsedEnv: ParsedEnv,
): Pick<AppConfig, 'outboundMinTimeMs' | 'outboundMaxConcurrent' | 'sendRetryAttempts'> => ({
  outboundMinTimeMs: parsedEnv.TELEGRAM_OUTBOUND_MIN_TIME_MS,
  outboundMaxConcurrent: parsedEnv.TELEGRAM_OUTBOUND_MAX_CONCURRENT,
  sendRetryAttempts: parsedEnv.TELEGRAM_SEND_RETRY_ATTEMPTS,
});

const parseNumericIdList = (rawValue: string | undefined): readonly number[] => {
  if (!rawValue) {
    return [];
  }

  return rawValue
    .split(',')
    .map((value: string): number => Number.parseInt(value.trim(), 10))
    .filter((value: number): boolean => Number.isSafeInteger(value));
};
