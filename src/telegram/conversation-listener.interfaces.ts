import type { TelegramUpdate } from './telegram-api.schemas';

export type ListenerHandler = (
  update: TelegramUpdate,
  chatId: number,
  text: string,
) => Promise<void> | void;

export type ConversationListener = {
  readonly chatId: number;
  readonly kind: string;
  readonly handler: ListenerHandler;
  readonly registeredAtIso: string;
};
