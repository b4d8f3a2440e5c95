import type { TelegramUpdate } from '../telegram-api.schemas';

const DEFAULT_MESSAGE_DATE = 1_700_000_000;

export type TextUpdateInput = {
  readonly updateId: number;
  readonly chatId: number;
  readonly text: string;
  readonly senderId?: number;
  readonly username?: string;
  readonly date?: number;
};

export type CallbackUpdateInput = {
  readonly updateId: number;
  readonly chatId: number;
  readonly data: string;
  readonly senderId?: number;
  readonly username?: string;
  readonly callbackId?: string;
  readonly messageId?: number;
};

export const buildTextUpdate = (input: TextUpdateInput): TelegramUpdate => {
  const senderId: number = input.senderId ?? input.chatId;

  return {
    update_id: input.updateId,
    message: {
      message_id: input.updateId,
      date: input.date ?? DEFAULT_MESSAGE_DATE + input.updateId * 10,
      chat: { id: input.chatId, type: 'private' },
      from: { id: senderId, is_bot: false, first_name: 'Test', username: input.username },
      text: input.text,
    },
  };
};

export const buildCallbackUpdate = (input: CallbackUpdateInput): TelegramUpdate => {
  const senderId: number = input.senderId ?? input.chatId;

  return {
    update_id: input.updateId,
    callback_query: {
      id: input.callbackId ?? `cb-${String(input.updateId)}`,
      from: { id: senderId, is_bot: false, first_name: 'Test', username: input.username },
      message: {
        message_id: input.messageId ?? 1,
        chat: { id: input.chatId, type: 'private' },
      },
      data: input.data,
    },
  };
};
