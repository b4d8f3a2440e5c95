import type { ParsedEnv } from './app-config.schema';

export function assertTelegramConfig(parsedEnv: ParsedEnv): void {
  assertCredentials(parsedEnv);
  assertRateLedgerConfig(parsedEnv);
}

function assertCredentials(parsedEnv: ParsedEnv): void {
  if (parsedEnv.TELEGRAM_ENABLED && !parsedEnv.BOT_TOKEN) {
    throw new Error('BOT_TOKEN is required when TELEGRAM_ENABLED=true');
  }
}

function assertRateLedgerConfig(parsedEnv: ParsedEnv): void {
  const ledgerTtlMs: number = parsedEnv.TELEGRAM_RATE_LEDGER_TTL_SEC * 1000;

  if (ledgerTtlMs < parsedEnv.TELEGRAM_MESSAGE_COOLDOWN_MS) {
    throw new Error('TELEGRAM_RATE_LEDGER_TTL_SEC must cover TELEGRAM_MESSAGE_COOLDOWN_MS');
  }

  if (ledgerTtlMs < parsedEnv.TELEGRAM_CALLBACK_COOLDOWN_MS) {
    throw new Error('TELEGRAM_RATE_LEDGER_TTL_SEC must cover TELEGRAM_CALLBACK_COOLDOWN_MS');
  }
}
