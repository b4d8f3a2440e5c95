import { Inject, Injectable, Logger } from '@nestjs/common';

import { TelegramRetryableError } from './telegram-sender.errors';
import {
  type ITelegramTransport,
  type TelegramCallResult,
  type TelegramDocument,
  type TelegramDocumentOptions,
  type TelegramSendOptions,
  TelegramCallOutcome,
} from './telegram-transport.interfaces';
import { TELEGRAM_TRANSPORT } from './telegram.tokens';
import { executeWithExponentialBackoff } from '../common/utils/network/exponential-backoff.util';
import { AppConfigService } from '../config/app-config.service';

const SEND_RETRY_BASE_DELAY_MS = 1000;
const SEND_RETRY_MAX_DELAY_MS = 30_000;
const MS_IN_SECOND = 1000;

@Injectable()
export class TelegramSenderService {
  private readonly logger: Logger = new Logger(TelegramSenderService.name);

  public constructor(
    private readonly appConfigService: AppConfigService,
    @Inject(TELEGRAM_TRANSPORT) private readonly transport: ITelegramTransport,
  ) {}

  public async sendText(
    chatId: number,
    text: string,
    options: TelegramSendOptions = {},
  ): Promise<TelegramCallResult> {
    this.logger.debug(`sendText start chatId=${String(chatId)} textLength=${String(text.length)}`);

    const result: TelegramCallResult = await this.transport.sendMessage(chatId, text, options);
    this.logResult('sendText', chatId, result);
    return result;
  }

  public async editText(
    chatId: number,
    messageId: number,
    text: string,
    options: TelegramSendOptions = {},
  ): Promise<TelegramCallResult> {
    const result: TelegramCallResult = await this.transport.editMessageText(
      messageId,
      chatId,
      text,
      options,
    );
    this.logResult('editText', chatId, result);
    return result;
  }

  public async sendDocument(
    chatId: number,
    document: TelegramDocument,
    options: TelegramDocumentOptions = {},
  ): Promise<boolean> {
    await this.transport.sendChatAction(chatId, 'upload_document');
    return this.transport.sendDocument(chatId, document, options);
  }

  /**
   * Same as `sendText`, but retryable failures (timeouts, 429, 5xx) are
   * retried with exponential backoff. A `retry_after` hint from the API
   * replaces the computed delay.
   */
  public async sendTextWithRetry(
    chatId: number,
    text: string,
    options: TelegramSendOptions = {},
  ): Promise<TelegramCallResult> {
    try {
      return await executeWithExponentialBackoff<TelegramCallResult>(
        async (): Promise<TelegramCallResult> => {
          const result: TelegramCallResult = await this.transport.sendMessage(
            chatId,
            text,
            options,
          );

          if (!result.ok && result.outcome === TelegramCallOutcome.RETRYABLE) {
            throw new TelegramRetryableError(result);
          }

          return result;
        },
        {
          maxAttempts: this.appConfigService.sendRetryAttempts,
          baseDelayMs: SEND_RETRY_BASE_DELAY_MS,
          maxDelayMs: SEND_RETRY_MAX_DELAY_MS,
          shouldRetry: (error: unknown): boolean => error instanceof TelegramRetryableError,
          delayHintMs: (error: unknown): number | null =>
            error instanceof TelegramRetryableError && error.failure.retryAfterSec !== null
              ? error.failure.retryAfterSec * MS_IN_SECOND
              : null,
          onRetry: (error: unknown, attempt: number, delayMs: number): void => {
            const errorMessage: string = error instanceof Error ? error.message : String(error);
            this.logger.warn(
              `sendText retry chatId=${String(chatId)} attempt=${String(attempt)} delayMs=${String(delayMs)} reason=${errorMessage}`,
            );
          },
        },
      );
    } catch (error: unknown) {
      if (error instanceof TelegramRetryableError) {
        this.logger.warn(`sendText gave up chatId=${String(chatId)} reason=${error.failure.reason}`);
        return error.failure;
      }

      throw error;
    }
  }

  private logResult(operation: string, chatId: number, result: TelegramCallResult): void {
    if (!result.ok) {
      this.logger.warn(
        `${operation} failed chatId=${String(chatId)} outcome=${result.outcome} reason=${result.reason} status=${String(result.httpStatus)}`,
      );
      return;
    }

    if (result.duplicateHandled) {
      this.logger.debug(`${operation} duplicate handled chatId=${String(chatId)}`);
    }
  }
}
