import type { TelegramCallFailure } from './telegram-transport.interfaces';

export class TelegramRetryableError extends Error {
  public constructor(public readonly failure: TelegramCallFailure) {
    super(`Telegram call failed reason=${failure.reason}: ${failure.description}`);
    this.name = 'TelegramRetryableError';
  }
}
