import { afterEach, describe, expect, it, vi } from 'vitest';

import { TelegramSenderService } from './telegram-sender.service';
import {
  type TelegramCallFailure,
  type TelegramCallResult,
  TelegramCallOutcome,
  TelegramFailureReason,
} from './telegram-transport.interfaces';
import { FakeTelegramTransport } from './testing/fake-telegram-transport';
import type { AppConfigService } from '../config/app-config.service';

const createConfigStub = (): AppConfigService =>
  ({ sendRetryAttempts: 3 }) as unknown as AppConfigService;

const rateLimitedFailure = (retryAfterSec: number | null): TelegramCallFailure => ({
  ok: false,
  outcome: TelegramCallOutcome.RETRYABLE,
  reason: TelegramFailureReason.RATE_LIMITED,
  httpStatus: 429,
  description: 'Too Many Requests',
  retryAfterSec,
});

describe('TelegramSenderService', (): void => {
  afterEach((): void => {
    vi.useRealTimers();
  });

  it('passes a handled duplicate through as success without retrying', async (): Promise<void> => {
    const transport: FakeTelegramTransport = new FakeTelegramTransport();
    const sender: TelegramSenderService = new TelegramSenderService(createConfigStub(), transport);
    transport.enqueueSendResult({
      ok: true,
      outcome: TelegramCallOutcome.SUCCESS,
      result: null,
      duplicateHandled: true,
    });

    const result: TelegramCallResult = await sender.sendTextWithRetry(555, 'hello');

    expect(result).toEqual({
      ok: true,
      outcome: TelegramCallOutcome.SUCCESS,
      result: null,
      duplicateHandled: true,
    });
    expect(transport.sentMessages).toHaveLength(1);
  });

  it('retries retryable failures using the retry_after hint', async (): Promise<void> => {
    vi.useFakeTimers();
    const transport: FakeTelegramTransport = new FakeTelegramTransport();
    const sender: TelegramSenderService = new TelegramSenderService(createConfigStub(), transport);
    transport.enqueueSendResult(rateLimitedFailure(2));

    const pending: Promise<TelegramCallResult> = sender.sendTextWithRetry(555, 'hello');
    await vi.advanceTimersByTimeAsync(2000);
    const result: TelegramCallResult = await pending;

    expect(result.ok).toBe(true);
    expect(transport.sentMessages).toHaveLength(2);
  });

  it('returns the last failure once attempts are exhausted', async (): Promise<void> => {
    vi.useFakeTimers();
    const transport: FakeTelegramTransport = new FakeTelegramTransport();
    const sender: TelegramSenderService = new TelegramSenderService(createConfigStub(), transport);
    transport.enqueueSendResult(rateLimitedFailure(1));
    transport.enqueueSendResult(rateLimitedFailure(1));
    transport.enqueueSendResult(rateLimitedFailure(null));

    const pending: Promise<TelegramCallResult> = sender.sendTextWithRetry(555, 'hello');
    await vi.advanceTimersByTimeAsync(5000);
    const result: TelegramCallResult = await pending;

    expect(result).toEqual(rateLimitedFailure(null));
    expect(transport.sentMessages).toHaveLength(3);
  });

  it('does not retry fatal failures', async (): Promise<void> => {
    const transport: FakeTelegramTransport = new FakeTelegramTransport();
    const sender: TelegramSenderService = new TelegramSenderService(createConfigStub(), transport);
    const fatal: TelegramCallFailure = {
      ok: false,
      outcome: TelegramCallOutcome.FATAL,
      reason: TelegramFailureReason.HTTP_ERROR,
      httpStatus: 400,
      description: 'Bad Request: chat not found',
      retryAfterSec: null,
    };
    transport.enqueueSendResult(fatal);

    await expect(sender.sendTextWithRetry(555, 'hello')).resolves.toEqual(fatal);
    expect(transport.sentMessages).toHaveLength(1);
  });

  it('announces an upload before sending a document', async (): Promise<void> => {
    const transport: FakeTelegramTransport = new FakeTelegramTransport();
    const sender: TelegramSenderService = new TelegramSenderService(createConfigStub(), transport);

    const sent: boolean = await sender.sendDocument(555, { filename: 'a.json', content: '{}' });

    expect(sent).toBe(true);
    expect(transport.chatActions).toEqual([{ chatId: 555, action: 'upload_document' }]);
    expect(transport.documents[0]?.document.filename).toBe('a.json');
  });
});
