import { describe, expect, it } from 'vitest';

import { LocalBotHarness } from './local-bot-harness';
import type { FakeSentMessage } from './fake-telegram-transport';
import type { HarnessRunResult, HarnessUser } from './local-bot-harness.interfaces';
import { buildTextUpdate } from './telegram-update.builders';
import type { ChatProfile } from '../../profiles/chat-profile.interfaces';
import type { TelegramUpdate } from '../telegram-api.schemas';
import {
  TelegramCallOutcome,
  TelegramFailureReason,
} from '../telegram-transport.interfaces';

const USER: HarnessUser = { chatId: 555, username: 'tester' };
const EVM_ADDRESS = '0xAbCdEf0000000000000000000000000000000001';

const firstReplyText = (result: HarnessRunResult): string => result.replies[0]?.text ?? '';

describe('LocalBotHarness', (): void => {
  it('greets on /start with the main menu and creates a profile', async (): Promise<void> => {
    const harness: LocalBotHarness = new LocalBotHarness();

    const result: HarnessRunResult = await harness.sendText({ user: USER, text: '/start' });
    const profile: ChatProfile | null = await harness.profiles.findByChatId(555);

    expect(firstReplyText(result).split('\n')[0]).toBe('Hello, <b>Test</b>!');
    expect(result.replies[0]?.options.replyMarkup?.inline_keyboard[0]?.[0]).toMatchObject({
      text: 'Wallet',
      callback_data: 'menu_wallet',
    });
    expect(profile?.username).toBe('tester');
  });

  it('lists registered commands on /help', async (): Promise<void> => {
    const harness: LocalBotHarness = new LocalBotHarness();

    const result: HarnessRunResult = await harness.sendText({ user: USER, text: '/help' });

    expect(firstReplyText(result)).toContain(
      'Registered commands: /start, /help, /status, /wallet, /cancel, /export',
    );
  });

  it('keeps asking for a wallet until a valid address arrives', async (): Promise<void> => {
    const harness: LocalBotHarness = new LocalBotHarness();

    const prompt: HarnessRunResult = await harness.sendText({ user: USER, text: '/wallet' });
    const invalid: HarnessRunResult = await harness.sendText({ user: USER, text: 'ABC123' });

    expect(firstReplyText(prompt)).toBe(
      'No wallet linked yet.\nSend an EVM (0x...) or Solana address, or /cancel.',
    );
    expect(firstReplyText(invalid)).toBe(
      '<code>ABC123</code> is not a wallet address. Try again or /cancel.',
    );
    expect(harness.fixture.listeners.has(555)).toBe(true);

    const saved: HarnessRunResult = await harness.sendText({ user: USER, text: EVM_ADDRESS });

    expect(firstReplyText(saved)).toBe(
      'Wallet saved: <code>0xabcdef0000000000000000000000000000000001</code> (evm)',
    );
    expect(harness.fixture.listeners.has(555)).toBe(false);
  });

  it('retries the wallet confirmation after a retryable send failure', async (): Promise<void> => {
    const harness: LocalBotHarness = new LocalBotHarness({ sendRetryAttempts: 2 });
    await harness.sendText({ user: USER, text: '/wallet' });
    harness.fixture.transport.enqueueSendResult({
      ok: false,
      outcome: TelegramCallOutcome.RETRYABLE,
      reason: TelegramFailureReason.RATE_LIMITED,
      httpStatus: 429,
      description: 'Too Many Requests',
      retryAfterSec: 0,
    });

    const saved: HarnessRunResult = await harness.sendText({ user: USER, text: EVM_ADDRESS });
    const profile: ChatProfile | null = await harness.profiles.findByChatId(555);

    expect(saved.replies.map((reply: FakeSentMessage): string => reply.text)).toEqual([
      'Wallet saved: <code>0xabcdef0000000000000000000000000000000001</code> (evm)',
      'Wallet saved: <code>0xabcdef0000000000000000000000000000000001</code> (evm)',
    ]);
    expect(profile?.walletAddress).toBe('0xabcdef0000000000000000000000000000000001');
  });

  it('serves commands while a wallet prompt is pending', async (): Promise<void> => {
    const harness: LocalBotHarness = new LocalBotHarness();

    await harness.sendText({ user: USER, text: '/wallet' });
    const status: HarnessRunResult = await harness.sendText({ user: USER, text: '/status' });

    expect(firstReplyText(status).split('\n')[0]).toBe('<b>Dispatcher status</b>');
    expect(harness.fixture.listeners.get(555)?.kind).toBe('wallet_address');
  });

  it('cancels a pending conversation once', async (): Promise<void> => {
    const harness: LocalBotHarness = new LocalBotHarness();

    await harness.sendText({ user: USER, text: '/wallet' });
    const cancelled: HarnessRunResult = await harness.sendText({ user: USER, text: '/cancel' });
    const again: HarnessRunResult = await harness.sendText({ user: USER, text: '/cancel' });

    expect(firstReplyText(cancelled)).toBe('Cancelled.');
    expect(firstReplyText(again)).toBe('Nothing to cancel.');
  });

  it('shows guard stats in /status for admins only', async (): Promise<void> => {
    const harness: LocalBotHarness = new LocalBotHarness({ telegramAdminIds: [42] });

    const adminStatus: HarnessRunResult = await harness.sendText({
      user: { chatId: 42 },
      text: '/status',
    });
    const userStatus: HarnessRunResult = await harness.sendText({ user: USER, text: '/status' });

    expect(firstReplyText(adminStatus).split('\n')).toContain('<b>Guard</b>');
    expect(firstReplyText(userStatus).split('\n')).not.toContain('<b>Guard</b>');
  });

  it('edits the menu message for help topics and answers the callback', async (): Promise<void> => {
    const harness: LocalBotHarness = new LocalBotHarness();

    const result: HarnessRunResult = await harness.pressButton({
      user: USER,
      callbackData: 'help_topic:guard',
      messageId: 77,
    });

    expect(result.callbackAnswers).toEqual(['cb-1']);
    expect(result.replies).toHaveLength(0);
    expect(result.edits[0]?.messageId).toBe(77);
    expect(result.edits[0]?.text.split('\n')[0]).toBe('<b>Duplicates and limits</b>');
  });

  it('reports an unknown help topic as a handler error', async (): Promise<void> => {
    const harness: LocalBotHarness = new LocalBotHarness();

    const result: HarnessRunResult = await harness.pressButton({
      user: USER,
      callbackData: 'help_topic:nope',
    });

    expect(firstReplyText(result)).toBe('Error processing request: Unknown help topic: nope');
    expect(harness.fixture.dispatcher.getSnapshot().handlerErrors).toBe(1);
  });

  it('exports the profile as a json document with a cooldown', async (): Promise<void> => {
    const harness: LocalBotHarness = new LocalBotHarness();

    const exported: HarnessRunResult = await harness.sendText({ user: USER, text: '/export' });
    const repeated: HarnessRunResult = await harness.sendText({ user: USER, text: '/export' });

    expect(exported.documents[0]?.document.filename).toBe('profile-555.json');
    expect(exported.documents[0]?.document.mimeType).toBe('application/json');
    expect(harness.fixture.transport.chatActions).toEqual([
      { chatId: 555, action: 'upload_document' },
    ]);
    expect(JSON.parse(exported.documents[0]?.document.content ?? '{}')).toMatchObject({
      chatId: 555,
      username: 'tester',
      walletAddress: null,
    });
    expect(repeated.documents).toHaveLength(0);
    expect(firstReplyText(repeated)).toBe('Export was requested recently, try again later.');
  });

  it('points free text to /help', async (): Promise<void> => {
    const harness: LocalBotHarness = new LocalBotHarness();

    const result: HarnessRunResult = await harness.sendText({ user: USER, text: 'hello there' });

    expect(firstReplyText(result)).toBe('Use /help to see what I can do.');
  });

  it('ignores a redelivered update', async (): Promise<void> => {
    const harness: LocalBotHarness = new LocalBotHarness();
    const update: TelegramUpdate = buildTextUpdate({ updateId: 500, chatId: 555, text: '/help' });

    const first: HarnessRunResult = await harness.redeliver(update);
    const second: HarnessRunResult = await harness.redeliver(update);

    expect(first.replies).toHaveLength(1);
    expect(second.replies).toHaveLength(0);
    expect(harness.fixture.dispatcher.getSnapshot().duplicates).toBe(1);
  });
});
