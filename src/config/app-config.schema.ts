import { readFileSync } from 'node:fs';
import { resolve } from 'node:path';
import { z } from 'zod';

const booleanSchema = z
  .union([z.boolean(), z.string()])
  .transform((value: string | boolean): boolean => {
    if (typeof value === 'boolean') {
      return value;
    }

    const normalizedValue: string = value.trim().toLowerCase();

    return normalizedValue === 'true' || normalizedValue === '1' || normalizedValue === 'yes';
  });

const FALLBACK_APP_VERSION = '0.0.0';

const resolvePackageVersion = (): string => {
  try {
    const packageJsonPath: string = resolve(process.cwd(), 'package.json');
    const packageJsonRaw: string = readFileSync(packageJsonPath, 'utf8');
    const packageJsonParsed: unknown = JSON.parse(packageJsonRaw);

    if (
      typeof packageJsonParsed === 'object' &&
      packageJsonParsed !== null &&
      'version' in packageJsonParsed
    ) {
      const versionValue: unknown = packageJsonParsed.version;

      if (typeof versionValue === 'string' && versionValue.trim().length > 0) {
        return versionValue.trim();
      }
    }
  } catch {
    return FALLBACK_APP_VERSION;
  }

  return FALLBACK_APP_VERSION;
};

const DEFAULT_APP_VERSION: string = resolvePackageVersion();
const DEFAULT_PORT = 3000;
const DEFAULT_TELEGRAM_API_BASE_URL = 'https://api.telegram.org';
const DEFAULT_POLL_TIMEOUT_SEC = 30;
const DEFAULT_POLL_LIMIT = 50;
const MAX_POLL_LIMIT = 100;
const DEFAULT_POLL_REQUEST_MARGIN_MS = 5000;
const DEFAULT_SEND_TIMEOUT_MS = 10_000;
const DEFAULT_LOOP_IDLE_MS = 300;
const DEFAULT_POLL_CONFLICT_BACKOFF_MS = 500;
const DEFAULT_POLL_RATE_LIMIT_BACKOFF_MS = 2000;
const DEFAULT_SEND_RATE_LIMIT_BACKOFF_MS = 1000;
const DEFAULT_SEEN_UPDATES_CAPACITY = 2000;
const DEFAULT_SEEN_CALLBACKS_CAPACITY = 1000;
const DEFAULT_MESSAGE_HASHES_CAPACITY = 1000;
const DEFAULT_RAPID_REPEAT_WINDOW_SEC = 2;
const DEFAULT_MESSAGE_COOLDOWN_MS = 1000;
const DEFAULT_CALLBACK_COOLDOWN_MS = 500;
const DEFAULT_RATE_LEDGER_TTL_SEC = 3600;
const DEFAULT_OUTBOUND_MIN_TIME_MS = 35;
const DEFAULT_OUTBOUND_MAX_CONCURRENT = 1;
const DEFAULT_SEND_RETRY_ATTEMPTS = 3;

const optionalNonEmptyStringSchema = z
  .string()
  .trim()
  .optional()
  .transform((value: string | undefined): string | undefined => {
    if (typeof value !== 'string') {
      return undefined;
    }

    return value.length > 0 ? value : undefined;
  });

export const envSchema = z.object({
  APP_VERSION: z.string().trim().min(1).default(DEFAULT_APP_VERSION),
  NODE_ENV: z.enum(['development', 'test', 'production']).default('development'),
  PORT: z.coerce.number().int().positive().default(DEFAULT_PORT),
  LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error']).default('info'),
  METRICS_ENABLED: booleanSchema.default(true),
  TELEGRAM_ENABLED: booleanSchema.default(false),
  BOT_TOKEN: optionalNonEmptyStringSchema,
  TELEGRAM_API_BASE_URL: z.url().default(DEFAULT_TELEGRAM_API_BASE_URL),
  TELEGRAM_POLL_TIMEOUT_SEC: z.coerce.number().int().min(0).default(DEFAULT_POLL_TIMEOUT_SEC),
  TELEGRAM_POLL_LIMIT: z.coerce
    .number()
    .int()
    .positive()
    .max(MAX_POLL_LIMIT)
    .default(DEFAULT_POLL_LIMIT),
  TELEGRAM_POLL_REQUEST_MARGIN_MS: z.coerce
    .number()
    .int()
    .min(0)
    .default(DEFAULT_POLL_REQUEST_MARGIN_MS),
  TELEGRAM_SEND_TIMEOUT_MS: z.coerce.number().int().positive().default(DEFAULT_SEND_TIMEOUT_MS),
  TELEGRAM_LOOP_IDLE_MS: z.coerce.number().int().min(0).default(DEFAULT_LOOP_IDLE_MS),
  TELEGRAM_POLL_CONFLICT_BACKOFF_MS: z.coerce
    .number()
    .int()
    .min(0)
    .default(DEFAULT_POLL_CONFLICT_BACKOFF_MS),
  TELEGRAM_POLL_RATE_LIMIT_BACKOFF_MS: z.coerce
    .number()
    .int()
    .min(0)
    .default(DEFAULT_POLL_RATE_LIMIT_BACKOFF_MS),
  TELEGRAM_SEND_RATE_LIMIT_BACKOFF_MS: z.coerce
    .number()
    .int()
    .min(0)
    .default(DEFAULT_SEND_RATE_LIMIT_BACKOFF_MS),
  TELEGRAM_ACK_STRATEGY: z.enum(['update', 'batch', 'both']).default('update'),
  TELEGRAM_SEEN_UPDATES_CAPACITY: z.coerce
    .number()
    .int()
    .positive()
    .default(DEFAULT_SEEN_UPDATES_CAPACITY),
  TELEGRAM_SEEN_CALLBACKS_CAPACITY: z.coerce
    .number()
    .int()
    .positive()
    .default(DEFAULT_SEEN_CALLBACKS_CAPACITY),
  TELEGRAM_MESSAGE_HASHES_CAPACITY: z.coerce
    .number()
    .int()
    .positive()
    .default(DEFAULT_MESSAGE_HASHES_CAPACITY),
  TELEGRAM_RAPID_REPEAT_WINDOW_SEC: z.coerce
    .number()
    .min(0)
    .default(DEFAULT_RAPID_REPEAT_WINDOW_SEC),
  TELEGRAM_MESSAGE_COOLDOWN_MS: z.coerce
    .number()
    .int()
    .min(0)
    .default(DEFAULT_MESSAGE_COOLDOWN_MS),
  TELEGRAM_CALLBACK_COOLDOWN_MS: z.coerce
    .number()
    .int()
    .min(0)
    .default(DEFAULT_CALLBACK_COOLDOWN_MS),
  TELEGRAM_RATE_LEDGER_TTL_SEC: z.coerce
    .number()
    .int()
    .positive()
    .default(DEFAULT_RATE_LEDGER_TTL_SEC),
  TELEGRAM_LISTENER_TTL_SEC: z.coerce.number().int().min(0).default(0),
  TELEGRAM_OUTBOUND_MIN_TIME_MS: z.coerce
    .number()
    .int()
    .min(0)
    .default(DEFAULT_OUTBOUND_MIN_TIME_MS),
  TELEGRAM_OUTBOUND_MAX_CONCURRENT: z.coerce
    .number()
    .int()
    .positive()
    .default(DEFAULT_OUTBOUND_MAX_CONCURRENT),
  TELEGRAM_SEND_RETRY_ATTEMPTS: z.coerce
    .number()
    .int()
    .positive()
    .default(DEFAULT_SEND_RETRY_ATTEMPTS),
  TELEGRAM_ADMIN_IDS: optionalNonEmptyStringSchema,
});

export type ParsedEnv = z.infer<typeof envSchema>;
