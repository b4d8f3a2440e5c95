import type { TelegramUpdate } from '../telegram-api.schemas';
import {
  type ITelegramTransport,
  type PollResult,
  type TelegramCallResult,
  type TelegramChatAction,
  type TelegramDocument,
  type TelegramDocumentOptions,
  type TelegramSendOptions,
  TelegramCallOutcome,
} from '../telegram-transport.interfaces';

const FIRST_OUTBOUND_MESSAGE_ID = 1000;

export type FakeSentMessage = {
  readonly chatId: number;
  readonly text: string;
  readonly options: TelegramSendOptions;
};

export type FakeEditedMessage = FakeSentMessage & {
  readonly messageId: number;
};

export type FakeChatAction = {
  readonly chatId: number;
  readonly action: TelegramChatAction;
};

export type FakeSentDocument = {
  readonly chatId: number;
  readonly document: TelegramDocument;
  readonly options: TelegramDocumentOptions;
};

/**
 * In-process transport for tests and the local harness. Poll results are
 * served from a queue; an empty queue behaves like an idle long poll and
 * yields to the event loop once.
 */
export class FakeTelegramTransport implements ITelegramTransport {
  public readonly sentMessages: FakeSentMessage[] = [];
  public readonly editedMessages: FakeEditedMessage[] = [];
  public readonly answeredCallbacks: string[] = [];
  public readonly chatActions: FakeChatAction[] = [];
  public readonly documents: FakeSentDocument[] = [];
  public readonly polledOffsets: number[] = [];
  public readonly acknowledgedOffsets: number[] = [];
  public clearBacklogCalls: number = 0;

  private readonly pollQueue: PollResult[] = [];
  private readonly sendQueue: TelegramCallResult[] = [];
  private backlogNextOffset: number | null = null;
  private backlogGate: Promise<void> | null = null;
  private sendFailure: Error | null = null;
  private nextMessageId: number = FIRST_OUTBOUND_MESSAGE_ID;

  public setBacklog(nextOffset: number | null): void {
    this.backlogNextOffset = nextOffset;
  }

  /** Keeps `clearBacklog` pending until the returned release function is called. */
  public holdBacklog(): () => void {
    let release: () => void = (): void => undefined;
    this.backlogGate = new Promise<void>((resolve: () => void): void => {
      release = resolve;
    });
    return release;
  }

  /** Makes every following `sendMessage` reject, or restores normal sends with `null`. */
  public failSendsWith(error: Error | null): void {
    this.sendFailure = error;
  }

  public enqueueUpdates(updates: readonly TelegramUpdate[]): void {
    this.pollQueue.push({ ok: true, updates });
  }

  public enqueuePollResult(result: PollResult): void {
    this.pollQueue.push(result);
  }

  public enqueueSendResult(result: TelegramCallResult): void {
    this.sendQueue.push(result);
  }

  public sentTexts(chatId?: number): string[] {
    return this.sentMessages
      .filter((message: FakeSentMessage): boolean =>
        chatId === undefined ? true : message.chatId === chatId,
      )
      .map((message: FakeSentMessage): string => message.text);
  }

  public async clearBacklog(): Promise<number | null> {
    this.clearBacklogCalls += 1;

    if (this.backlogGate !== null) {
      await this.backlogGate;
    }

    return this.backlogNextOffset;
  }

  public async getUpdates(offset: number): Promise<PollResult> {
    this.polledOffsets.push(offset);
    const next: PollResult | undefined = this.pollQueue.shift();

    if (next !== undefined) {
      return next;
    }

    await new Promise<void>((resolve: () => void): void => {
      setImmediate(resolve);
    });
    return { ok: true, updates: [] };
  }

  public async acknowledge(nextOffset: number): Promise<boolean> {
    this.acknowledgedOffsets.push(nextOffset);
    return true;
  }

  public async sendMessage(
    chatId: number,
    text: string,
    options: TelegramSendOptions = {},
  ): Promise<TelegramCallResult> {
    this.sentMessages.push({ chatId, text, options });

    if (this.sendFailure !== null) {
      throw this.sendFailure;
    }

    return this.nextSendResult();
  }

  public async editMessageText(
    messageId: number,
    chatId: number,
    text: string,
    options: TelegramSendOptions = {},
  ): Promise<TelegramCallResult> {
    this.editedMessages.push({ messageId, chatId, text, options });
    return this.nextSendResult();
  }

  public async answerCallbackQuery(callbackQueryId: string): Promise<boolean> {
    this.answeredCallbacks.push(callbackQueryId);
    return true;
  }

  public async sendChatAction(chatId: number, action: TelegramChatAction): Promise<boolean> {
    this.chatActions.push({ chatId, action });
    return true;
  }

  public async sendDocument(
    chatId: number,
    document: TelegramDocument,
    options: TelegramDocumentOptions = {},
  ): Promise<boolean> {
    this.documents.push({ chatId, document, options });
    return true;
  }

  private nextSendResult(): TelegramCallResult {
    const queued: TelegramCallResult | undefined = this.sendQueue.shift();

    if (queued !== undefined) {
      return queued;
    }

    this.nextMessageId += 1;
    return {
      ok: true,
      outcome: TelegramCallOutcome.SUCCESS,
      result: { message_id: this.nextMessageId },
      duplicateHandled: false,
    };
  }
}
