import type { InlineKeyboardMarkup } from 'telegraf/types';

import type { TelegramUpdate } from './telegram-api.schemas';

export enum TelegramCallOutcome {
  SUCCESS = 'success',
  RETRYABLE = 'retryable',
  FATAL = 'fatal',
}

export enum TelegramFailureReason {
  TIMEOUT = 'timeout',
  CONFLICT = 'conflict',
  RATE_LIMITED = 'rate_limited',
  HTTP_ERROR = 'http_error',
  NETWORK = 'network',
  INVALID_RESPONSE = 'invalid_response',
  API_ERROR = 'api_error',
  NOT_CONFIGURED = 'not_configured',
}

export enum TelegramParseMode {
  HTML = 'HTML',
  MARKDOWN_V2 = 'MarkdownV2',
}

export type TelegramChatAction = 'typing' | 'upload_document';

export type TelegramCallSuccess = {
  readonly ok: true;
  readonly outcome: TelegramCallOutcome.SUCCESS;
  readonly result: unknown;
  readonly duplicateHandled: boolean;
};

export type TelegramCallFailure = {
  readonly ok: false;
  readonly outcome: TelegramCallOutcome.RETRYABLE | TelegramCallOutcome.FATAL;
  readonly reason: TelegramFailureReason;
  readonly httpStatus: number | null;
  readonly description: string;
  readonly retryAfterSec: number | null;
};

export type TelegramCallResult = TelegramCallSuccess | TelegramCallFailure;

export type PollSuccess = {
  readonly ok: true;
  readonly updates: readonly TelegramUpdate[];
};

export type PollResult = PollSuccess | TelegramCallFailure;

export type TelegramSendOptions = {
  readonly parseMode?: TelegramParseMode;
  readonly replyMarkup?: InlineKeyboardMarkup;
  readonly disableWebPagePreview?: boolean;
};

export type TelegramDocument = {
  readonly filename: string;
  readonly content: string;
  readonly mimeType?: string;
};

export type TelegramDocumentOptions = {
  readonly caption?: string;
};

export interface ITelegramTransport {
  clearBacklog(): Promise<number | null>;
  getUpdates(offset: number): Promise<PollResult>;
  acknowledge(nextOffset: number): Promise<boolean>;
  sendMessage(
    chatId: number,
    text: string,
    options?: TelegramSendOptions,
  ): Promise<TelegramCallResult>;
  editMessageText(
    messageId: number,
    chatId: number,
    text: string,
    options?: TelegramSendOptions,
  ): Promise<TelegramCallResult>;
  answerCallbackQuery(callbackQueryId: string, text?: string): Promise<boolean>;
  sendChatAction(chatId: number, action: TelegramChatAction): Promise<boolean>;
  sendDocument(
    chatId: number,
    document: TelegramDocument,
    options?: TelegramDocumentOptions,
  ): Promise<boolean>;
}
