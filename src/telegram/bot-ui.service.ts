import { Injectable } from '@nestjs/common';
import { Markup } from 'telegraf';
import type { InlineKeyboardButton } from 'telegraf/types';

import {
  HELP_TOPIC_CALLBACK_PREFIX,
  HelpTopic,
  MENU_BACK_CALLBACK,
  MENU_HELP_CALLBACK,
  MENU_STATUS_CALLBACK,
  MENU_WALLET_CALLBACK,
} from './bot.constants';
import type { GuardStats } from './update-guard.interfaces';
import { type TelegramSendOptions, TelegramParseMode } from './telegram-transport.interfaces';
import type { ChatProfile } from '../profiles/chat-profile.interfaces';
import type { DispatcherRuntimeSnapshot } from '../runtime/runtime-status.interfaces';

const HELP_TOPIC_TITLES: Readonly<Record<HelpTopic, string>> = {
  [HelpTopic.GUARD]: 'Duplicates and limits',
  [HelpTopic.LISTENERS]: 'Conversations',
  [HelpTopic.COMMANDS]: 'Commands',
};

@Injectable()
export class BotUiService {
  public buildStartMessage(displayName: string | null): string {
    const greeting: string =
      displayName === null ? 'Hello!' : `Hello, <b>${escapeHtml(displayName)}</b>!`;

    return [
      greeting,
      'This bot answers commands and menu buttons through a long-polling dispatcher.',
      '',
      'Quick start:',
      '/wallet - link a wallet address',
      '/status - dispatcher state',
      '/export - download your profile',
      '/help - everything else',
    ].join('\n');
  }

  public buildHelpMessage(commands: readonly string[]): string {
    return [
      '<b>Help</b>',
      '',
      `Registered commands: ${commands.map((command: string): string => escapeHtml(command)).join(', ')}`,
      '',
      'Pick a topic below for details.',
    ].join('\n');
  }

  public buildHelpTopicMessage(topic: HelpTopic): string {
    switch (topic) {
      case HelpTopic.GUARD:
        return [
          `<b>${HELP_TOPIC_TITLES[topic]}</b>`,
          'Repeated deliveries of the same update or button press are ignored.',
          'Sending the same text twice within a couple of seconds counts once.',
          'Commands and buttons have a short cooldown per user.',
        ].join('\n');
      case HelpTopic.LISTENERS:
        return [
          `<b>${HELP_TOPIC_TITLES[topic]}</b>`,
          'Some commands wait for your next message, for example /wallet.',
          'Any command still works while the bot is waiting.',
          '/cancel stops the current conversation.',
        ].join('\n');
      case HelpTopic.COMMANDS:
        return [
          `<b>${HELP_TOPIC_TITLES[topic]}</b>`,
          '/start - main menu',
          '/help - this help',
          '/status - dispatcher state',
          '/wallet - link a wallet address',
          '/cancel - stop the current conversation',
          '/export - profile as a JSON file',
        ].join('\n');
    }
  }

  public buildStatusMessage(
    snapshot: DispatcherRuntimeSnapshot,
    guardStats: GuardStats | null,
  ): string {
    const lines: string[] = [
      '<b>Dispatcher status</b>',
      `State: ${snapshot.state}`,
      `Offset: ${formatNullable(snapshot.offset)}`,
      `Last update: ${formatNullable(snapshot.lastUpdateId)}`,
      `Processed: ${String(snapshot.processed)}`,
      `Duplicates: ${String(snapshot.duplicates)}`,
      `Rate limited: ${String(snapshot.rateLimited)}`,
      `Handler errors: ${String(snapshot.handlerErrors)}`,
      `Poll failures: ${String(snapshot.pollFailures)}`,
      `Active conversations: ${String(snapshot.activeListeners)}`,
    ];

    if (snapshot.lastErrorMessage !== null) {
      lines.push(`Last error: ${escapeHtml(snapshot.lastErrorMessage)}`);
    }

    if (guardStats !== null) {
      lines.push(
        '',
        '<b>Guard</b>',
        `Seen updates: ${String(guardStats.seenUpdates)} (evicted ${String(guardStats.evictedUpdates)})`,
        `Seen callbacks: ${String(guardStats.seenCallbacks)}`,
        `Message hashes: ${String(guardStats.messageHashes)}`,
        `Tracked senders: ${String(guardStats.trackedSenders)}`,
        `Rate ledger entries: ${String(guardStats.rateLedgerEntries)} (evicted ${String(guardStats.evictedLedgerEntries)})`,
      );
    }

    return lines.join('\n');
  }

  public buildWalletPrompt(profile: ChatProfile | null): string {
    const walletAddress: string | null = profile?.walletAddress ?? null;
    const current: string =
      walletAddress === null
        ? 'No wallet linked yet.'
        : `Current wallet: <code>${escapeHtml(walletAddress)}</code> (${String(profile?.walletNetwork)})`;

    return [current, 'Send an EVM (0x...) or Solana address, or /cancel.'].join('\n');
  }

  public buildWalletSavedMessage(profile: ChatProfile): string {
    return `Wallet saved: <code>${escapeHtml(profile.walletAddress ?? '')}</code> (${String(profile.walletNetwork)})`;
  }

  public buildInvalidWalletMessage(rawValue: string): string {
    return `<code>${escapeHtml(rawValue)}</code> is not a wallet address. Try again or /cancel.`;
  }

  public buildMainMenuOptions(): TelegramSendOptions {
    const rows: InlineKeyboardButton.CallbackButton[][] = [
      [
        Markup.button.callback('Wallet', MENU_WALLET_CALLBACK),
        Markup.button.callback('Status', MENU_STATUS_CALLBACK),
      ],
      [Markup.button.callback('Help', MENU_HELP_CALLBACK)],
    ];

    return this.withKeyboard(rows);
  }

  public buildHelpOptions(): TelegramSendOptions {
    const rows: InlineKeyboardButton.CallbackButton[][] = [
      Object.values(HelpTopic).map(
        (topic: HelpTopic): InlineKeyboardButton.CallbackButton =>
          Markup.button.callback(HELP_TOPIC_TITLES[topic], `${HELP_TOPIC_CALLBACK_PREFIX}${topic}`),
      ),
      [Markup.button.callback('Back', MENU_BACK_CALLBACK)],
    ];

    return this.withKeyboard(rows);
  }

  public buildBackOptions(): TelegramSendOptions {
    return this.withKeyboard([[Markup.button.callback('Back', MENU_BACK_CALLBACK)]]);
  }

  public htmlOptions(): TelegramSendOptions {
    return { parseMode: TelegramParseMode.HTML, disableWebPagePreview: true };
  }

  private withKeyboard(rows: InlineKeyboardButton.CallbackButton[][]): TelegramSendOptions {
    return {
      ...this.htmlOptions(),
      replyMarkup: Markup.inlineKeyboard(rows).reply_markup,
    };
  }
}

export const parseHelpTopic = (callbackData: string): HelpTopic | null => {
  const rawTopic: string = callbackData.slice(HELP_TOPIC_CALLBACK_PREFIX.length);

  return Object.values(HelpTopic).find((topic: HelpTopic): boolean => topic === rawTopic) ?? null;
};

export const escapeHtml = (value: string): string =>
  value
    .replaceAll('&', '&amp;')
    .replaceAll('<', '&lt;')
    .replaceAll('>', '&gt;')
    .replaceAll('"', '&quot;')
    .replaceAll("'", '&#39;');

const formatNullable = (value: number | null): string => (value === null ? 'n/a' : String(value));
