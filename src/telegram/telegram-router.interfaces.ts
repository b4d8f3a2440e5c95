import type { ListenerHandler } from './conversation-listener.interfaces';
import type { TelegramUpdate } from './telegram-api.schemas';

export type UpdateHandler = (update: TelegramUpdate, chatId: number) => Promise<void> | void;

export type TextMatcher = (text: string) => boolean;

export enum RouteOutcome {
  HANDLED = 'handled',
  UNKNOWN = 'unknown',
  FAILED = 'failed',
  UNHANDLED = 'unhandled',
}

export type PrefixRoute = {
  readonly prefix: string;
  readonly handler: UpdateHandler;
};

export type TextInterceptor = {
  readonly name: string;
  readonly matcher: TextMatcher;
  readonly handler: ListenerHandler;
};
