import { Inject, Injectable, Logger } from '@nestjs/common';

import {
  telegramApiResponseSchema,
  telegramUpdateIdSchema,
  telegramUpdateSchema,
  type TelegramApiResponse,
  type TelegramUpdate,
} from './telegram-api.schemas';
import {
  type ITelegramTransport,
  type PollResult,
  type TelegramCallFailure,
  type TelegramCallResult,
  type TelegramChatAction,
  type TelegramDocument,
  type TelegramDocumentOptions,
  type TelegramSendOptions,
  TelegramCallOutcome,
  TelegramFailureReason,
} from './telegram-transport.interfaces';
import { TELEGRAM_FETCH, type FetchFn } from './telegram.tokens';
import { sleep } from '../common/utils/network/sleep.util';
import { AppConfigService } from '../config/app-config.service';
import { MetricsService } from '../observability/metrics.service';
import { LimiterKey, RequestPriority } from '../rate-limiting/bottleneck-rate-limiter.interfaces';
import { BottleneckRateLimiterService } from '../rate-limiting/bottleneck-rate-limiter.service';

const ALLOWED_UPDATES: readonly string[] = ['message', 'callback_query'];
const DIAGNOSTIC_BODY_LIMIT = 200;
const HTTP_OK = 200;
const HTTP_CONFLICT = 409;
const HTTP_TOO_MANY_REQUESTS = 429;
const HTTP_SERVER_ERROR = 500;
const MS_IN_SECOND = 1000;

type TelegramApiMethod =
  | 'getUpdates'
  | 'deleteWebhook'
  | 'sendMessage'
  | 'editMessageText'
  | 'answerCallbackQuery'
  | 'sendChatAction'
  | 'sendDocument';

type TelegramRequestBody =
  | { readonly kind: 'json'; readonly payload: Readonly<Record<string, unknown>> }
  | { readonly kind: 'multipart'; readonly form: FormData };

type TelegramHttpRequest = {
  readonly httpMethod: 'GET' | 'POST';
  readonly query: URLSearchParams | null;
  readonly body: TelegramRequestBody | null;
  readonly timeoutMs: number;
};

type TelegramHttpExchange =
  | { readonly kind: 'response'; readonly status: number; readonly bodyText: string }
  | { readonly kind: 'timeout' }
  | { readonly kind: 'network'; readonly message: string }
  | { readonly kind: 'not_configured' };

type UpdatesQuery = {
  readonly offset: number;
  readonly limit: number;
  readonly timeoutSec: number;
};

@Injectable()
export class TelegramTransportService implements ITelegramTransport {
  private readonly logger: Logger = new Logger(TelegramTransportService.name);

  public constructor(
    private readonly appConfigService: AppConfigService,
    private readonly rateLimiterService: BottleneckRateLimiterService,
    private readonly metricsService: MetricsService,
    @Inject(TELEGRAM_FETCH) private readonly fetchFn: FetchFn,
  ) {}

  public async clearBacklog(): Promise<number | null> {
    const webhookResult: TelegramCallResult = await this.post(
      'deleteWebhook',
      { kind: 'json', payload: { drop_pending_updates: false } },
      false,
    );

    if (!webhookResult.ok) {
      this.logger.warn(
        `deleteWebhook failed reason=${webhookResult.reason} description=${webhookResult.description}`,
      );
    }

    const latest: PollResult = await this.fetchUpdates({ offset: -1, limit: 1, timeoutSec: 0 });

    if (!latest.ok) {
      this.logger.warn(
        `Backlog lookup failed reason=${latest.reason} description=${latest.description}`,
      );
      return null;
    }

    const lastUpdate: TelegramUpdate | undefined = latest.updates[latest.updates.length - 1];

    if (lastUpdate === undefined) {
      this.logger.log('No pending updates at startup');
      return null;
    }

    const nextOffset: number = lastUpdate.update_id + 1;
    const drained: boolean = await this.acknowledge(nextOffset);

    this.logger.log(
      `Backlog cleared lastUpdateId=${String(lastUpdate.update_id)} nextOffset=${String(nextOffset)} drained=${String(drained)}`,
    );

    return nextOffset;
  }

  public async getUpdates(offset: number): Promise<PollResult> {
    return this.fetchUpdates({
      offset,
      limit: this.appConfigService.pollLimit,
      timeoutSec: this.appConfigService.pollTimeoutSec,
    });
  }

  public async acknowledge(nextOffset: number): Promise<boolean> {
    const result: PollResult = await this.fetchUpdates({
      offset: nextOffset,
      limit: 1,
      timeoutSec: 0,
    });

    if (!result.ok) {
      this.logger.warn(
        `Acknowledge failed offset=${String(nextOffset)} reason=${result.reason} description=${result.description}`,
      );
    }

    return result.ok;
  }

  public async sendMessage(
    chatId: number,
    text: string,
    options: TelegramSendOptions = {},
  ): Promise<TelegramCallResult> {
    return this.post(
      'sendMessage',
      { kind: 'json', payload: this.buildTextPayload(chatId, text, options) },
      true,
    );
  }

  public async editMessageText(
    messageId: number,
    chatId: number,
    text: string,
    options: TelegramSendOptions = {},
  ): Promise<TelegramCallResult> {
    return this.post(
      'editMessageText',
      {
        kind: 'json',
        payload: { message_id: messageId, ...this.buildTextPayload(chatId, text, options) },
      },
      true,
    );
  }

  public async answerCallbackQuery(callbackQueryId: string, text?: string): Promise<boolean> {
    const result: TelegramCallResult = await this.post(
      'answerCallbackQuery',
      {
        kind: 'json',
        payload: {
          callback_query_id: callbackQueryId,
          ...(text !== undefined ? { text } : {}),
        },
      },
      false,
    );

    return this.reportAuxiliaryResult('answerCallbackQuery', result);
  }

  public async sendChatAction(chatId: number, action: TelegramChatAction): Promise<boolean> {
    const result: TelegramCallResult = await this.post(
      'sendChatAction',
      { kind: 'json', payload: { chat_id: chatId, action } },
      false,
    );

    return this.reportAuxiliaryResult('sendChatAction', result);
  }

  public async sendDocument(
    chatId: number,
    document: TelegramDocument,
    options: TelegramDocumentOptions = {},
  ): Promise<boolean> {
    const form: FormData = new FormData();
    form.append('chat_id', String(chatId));
    form.append(
      'document',
      new Blob([document.content], { type: document.mimeType ?? 'application/octet-stream' }),
      document.filename,
    );

    if (options.caption !== undefined) {
      form.append('caption', options.caption);
    }

    const result: TelegramCallResult = await this.post(
      'sendDocument',
      { kind: 'multipart', form },
      true,
    );

    return this.reportAuxiliaryResult('sendDocument', result);
  }

  private async fetchUpdates(query: UpdatesQuery): Promise<PollResult> {
    const params: URLSearchParams = new URLSearchParams({
      offset: String(query.offset),
      limit: String(query.limit),
      timeout: String(query.timeoutSec),
      allowed_updates: JSON.stringify(ALLOWED_UPDATES),
    });

    const exchange: TelegramHttpExchange = await this.request('getUpdates', {
      httpMethod: 'GET',
      query: params,
      body: null,
      timeoutMs: query.timeoutSec * MS_IN_SECOND + this.appConfigService.pollRequestMarginMs,
    });

    const result: PollResult = this.mapPollExchange(exchange);
    this.recordRequest('getUpdates', result.ok ? TelegramCallOutcome.SUCCESS : result.outcome);
    return result;
  }

  private mapPollExchange(exchange: TelegramHttpExchange): PollResult {
    switch (exchange.kind) {
      case 'not_configured':
        return this.notConfiguredFailure();
      case 'timeout':
        // Idle long poll: the server held the request and nothing arrived.
        return { ok: true, updates: [] };
      case 'network':
        return this.buildFailure(
          TelegramCallOutcome.RETRYABLE,
          TelegramFailureReason.NETWORK,
          null,
          exchange.message,
          null,
        );
      case 'response':
        return this.mapPollResponse(exchange.status, exchange.bodyText);
    }
  }

  private mapPollResponse(status: number, bodyText: string): PollResult {
    const response: TelegramApiResponse | null = this.parseApiResponse(bodyText);

    if (status !== HTTP_OK) {
      return this.mapHttpFailure(status, bodyText, response);
    }

    if (response === null) {
      this.logger.error(
        `getUpdates returned malformed body: ${truncateForDiagnostics(bodyText)}`,
      );
      return this.buildFailure(
        TelegramCallOutcome.RETRYABLE,
        TelegramFailureReason.INVALID_RESPONSE,
        status,
        truncateForDiagnostics(bodyText),
        null,
      );
    }

    if (!response.ok) {
      return this.buildFailure(
        TelegramCallOutcome.RETRYABLE,
        TelegramFailureReason.API_ERROR,
        status,
        response.description ?? 'unknown api error',
        null,
      );
    }

    if (!Array.isArray(response.result)) {
      this.logger.error('getUpdates returned a non-array result');
      return this.buildFailure(
        TelegramCallOutcome.RETRYABLE,
        TelegramFailureReason.INVALID_RESPONSE,
        status,
        'result is not an array',
        null,
      );
    }

    return { ok: true, updates: this.parseUpdates(response.result) };
  }

  private parseUpdates(rawUpdates: readonly unknown[]): TelegramUpdate[] {
    const updates: TelegramUpdate[] = [];

    for (const rawUpdate of rawUpdates) {
      const parsedUpdate = telegramUpdateSchema.safeParse(rawUpdate);

      if (parsedUpdate.success) {
        updates.push(parsedUpdate.data);
        continue;
      }

      const parsedId = telegramUpdateIdSchema.safeParse(rawUpdate);

      if (parsedId.success) {
        this.logger.warn(
          `Update payload rejected updateId=${String(parsedId.data.update_id)}: ${parsedUpdate.error.message}`,
        );
        updates.push({ update_id: parsedId.data.update_id });
        continue;
      }

      this.logger.error(`Dropping update without update_id: ${parsedUpdate.error.message}`);
    }

    return updates;
  }

  private async post(
    method: TelegramApiMethod,
    body: TelegramRequestBody,
    throttled: boolean,
  ): Promise<TelegramCallResult> {
    const request: TelegramHttpRequest = {
      httpMethod: 'POST',
      query: null,
      body,
      timeoutMs: this.appConfigService.sendTimeoutMs,
    };

    const exchange: TelegramHttpExchange = throttled
      ? await this.rateLimiterService.schedule(
          LimiterKey.TELEGRAM_OUTBOUND,
          async (): Promise<TelegramHttpExchange> => this.request(method, request),
          RequestPriority.NORMAL,
        )
      : await this.request(method, request);

    const result: TelegramCallResult = await this.mapCallExchange(method, exchange);
    this.recordRequest(method, result.outcome);
    return result;
  }

  private async mapCallExchange(
    method: TelegramApiMethod,
    exchange: TelegramHttpExchange,
  ): Promise<TelegramCallResult> {
    switch (exchange.kind) {
      case 'not_configured':
        return this.notConfiguredFailure();
      case 'timeout':
        return this.buildFailure(
          TelegramCallOutcome.RETRYABLE,
          TelegramFailureReason.TIMEOUT,
          null,
          `${method} timed out after ${String(this.appConfigService.sendTimeoutMs)}ms`,
          null,
        );
      case 'network':
        return this.buildFailure(
          TelegramCallOutcome.RETRYABLE,
          TelegramFailureReason.NETWORK,
          null,
          exchange.message,
          null,
        );
      case 'response':
        return this.mapCallResponse(method, exchange.status, exchange.bodyText);
    }
  }

  private async mapCallResponse(
    method: TelegramApiMethod,
    status: number,
    bodyText: string,
  ): Promise<TelegramCallResult> {
    const response: TelegramApiResponse | null = this.parseApiResponse(bodyText);

    if (status === HTTP_CONFLICT) {
      // A racing sender already delivered this call; retrying would double-send.
      this.logger.warn(`${method} returned 409, treating as already delivered`);
      return {
        ok: true,
        outcome: TelegramCallOutcome.SUCCESS,
        result: response?.result ?? null,
        duplicateHandled: true,
      };
    }

    if (status === HTTP_TOO_MANY_REQUESTS) {
      const failure: TelegramCallFailure = this.mapHttpFailure(status, bodyText, response);
      this.logger.warn(
        `${method} rate limited, backing off ${String(this.appConfigService.sendRateLimitBackoffMs)}ms`,
      );
      await sleep(this.appConfigService.sendRateLimitBackoffMs);
      return failure;
    }

    if (status !== HTTP_OK) {
      const failure: TelegramCallFailure = this.mapHttpFailure(status, bodyText, response);
      this.logger.warn(
        `${method} failed status=${String(status)} body=${failure.description}`,
      );
      return failure;
    }

    if (response === null) {
      this.logger.error(`${method} returned malformed body: ${truncateForDiagnostics(bodyText)}`);
      return this.buildFailure(
        TelegramCallOutcome.FATAL,
        TelegramFailureReason.INVALID_RESPONSE,
        status,
        truncateForDiagnostics(bodyText),
        null,
      );
    }

    if (!response.ok) {
      return this.buildFailure(
        TelegramCallOutcome.FATAL,
        TelegramFailureReason.API_ERROR,
        status,
        response.description ?? 'unknown api error',
        null,
      );
    }

    return {
      ok: true,
      outcome: TelegramCallOutcome.SUCCESS,
      result: response.result ?? null,
      duplicateHandled: false,
    };
  }

  private mapHttpFailure(
    status: number,
    bodyText: string,
    response: TelegramApiResponse | null,
  ): TelegramCallFailure {
    const description: string = truncateForDiagnostics(bodyText);

    if (status === HTTP_CONFLICT) {
      return this.buildFailure(
        TelegramCallOutcome.RETRYABLE,
        TelegramFailureReason.CONFLICT,
        status,
        description,
        null,
      );
    }

    if (status === HTTP_TOO_MANY_REQUESTS) {
      return this.buildFailure(
        TelegramCallOutcome.RETRYABLE,
        TelegramFailureReason.RATE_LIMITED,
        status,
        description,
        response?.parameters?.retry_after ?? null,
      );
    }

    return this.buildFailure(
      status >= HTTP_SERVER_ERROR ? TelegramCallOutcome.RETRYABLE : TelegramCallOutcome.FATAL,
      TelegramFailureReason.HTTP_ERROR,
      status,
      description,
      null,
    );
  }

  private parseApiResponse(bodyText: string): TelegramApiResponse | null {
    let rawBody: unknown;

    try {
      rawBody = JSON.parse(bodyText);
    } catch {
      return null;
    }

    const parsed = telegramApiResponseSchema.safeParse(rawBody);
    return parsed.success ? parsed.data : null;
  }

  private async request(
    method: TelegramApiMethod,
    request: TelegramHttpRequest,
  ): Promise<TelegramHttpExchange> {
    const botToken: string | null = this.appConfigService.botToken;

    if (botToken === null) {
      return { kind: 'not_configured' };
    }

    const queryString: string = request.query !== null ? `?${request.query.toString()}` : '';
    const url: string = `${this.appConfigService.telegramApiBaseUrl}/bot${botToken}/${method}${queryString}`;
    const init: RequestInit = {
      method: request.httpMethod,
      signal: AbortSignal.timeout(request.timeoutMs),
      ...buildRequestBody(request.body),
    };

    try {
      const response: Response = await this.fetchFn(url, init);
      const bodyText: string = await response.text();

      this.logger.debug(`${method} status=${String(response.status)}`);
      return { kind: 'response', status: response.status, bodyText };
    } catch (error: unknown) {
      if (isAbortError(error)) {
        return { kind: 'timeout' };
      }

      const message: string = error instanceof Error ? error.message : String(error);
      this.logger.warn(`${method} network error: ${message}`);
      return { kind: 'network', message };
    }
  }

  private reportAuxiliaryResult(method: TelegramApiMethod, result: TelegramCallResult): boolean {
    if (!result.ok) {
      this.logger.warn(
        `${method} failed reason=${result.reason} status=${String(result.httpStatus)} description=${result.description}`,
      );
    }

    return result.ok;
  }

  private recordRequest(method: TelegramApiMethod, outcome: TelegramCallOutcome): void {
    this.metricsService.telegramApiRequestsTotal.inc({ method, outcome });
  }

  private notConfiguredFailure(): TelegramCallFailure {
    return this.buildFailure(
      TelegramCallOutcome.FATAL,
      TelegramFailureReason.NOT_CONFIGURED,
      null,
      'BOT_TOKEN is not configured',
      null,
    );
  }

  private buildFailure(
    outcome: TelegramCallFailure['outcome'],
    reason: TelegramFailureReason,
    httpStatus: number | null,
    description: string,
    retryAfterSec: number | null,
  ): TelegramCallFailure {
    return { ok: false, outcome, reason, httpStatus, description, retryAfterSec };
  }

  private buildTextPayload(
    chatId: number,
    text: string,
    options: TelegramSendOptions,
  ): Record<string, unknown> {
    return {
      chat_id: chatId,
      text,
      ...(options.parseMode !== undefined ? { parse_mode: options.parseMode } : {}),
      ...(options.replyMarkup !== undefined ? { reply_markup: options.replyMarkup } : {}),
      ...(options.disableWebPagePreview !== undefined
        ? { disable_web_page_preview: options.disableWebPagePreview }
        : {}),
    };
  }
}

const buildRequestBody = (body: TelegramRequestBody | null): Pick<RequestInit, 'headers' | 'body'> => {
  if (body === null) {
    return {};
  }

  if (body.kind === 'multipart') {
    return { body: body.form };
  }

  return {
    headers: { 'content-type': 'application/json' },
    body: JSON.stringify(body.payload),
  };
};

const isAbortError = (error: unknown): boolean =>
  error instanceof Error && (error.name === 'TimeoutError' || error.name === 'AbortError');

const truncateForDiagnostics = (bodyText: string): string =>
  bodyText.length > DIAGNOSTIC_BODY_LIMIT ? bodyText.slice(0, DIAGNOSTIC_BODY_LIMIT) : bodyText;
