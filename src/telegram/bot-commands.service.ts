import { Injectable, Logger, type OnModuleInit } from '@nestjs/common';

import { BotUiService, parseHelpTopic } from './bot-ui.service';
import {
  EXPORT_COOLDOWN_MS,
  EXPORT_MIME_TYPE,
  HELP_TOPIC_CALLBACK_PREFIX,
  type HelpTopic,
  MENU_BACK_CALLBACK,
  MENU_HELP_CALLBACK,
  MENU_STATUS_CALLBACK,
  MENU_WALLET_CALLBACK,
  WALLET_ADDRESS_LISTENER_KIND,
} from './bot.constants';
import { ConversationListenerRegistry } from './conversation-listener.registry';
import type { TelegramUpdate, TelegramUser } from './telegram-api.schemas';
import { TelegramRouterService } from './telegram-router.service';
import { TelegramSenderService } from './telegram-sender.service';
import type { TelegramSendOptions } from './telegram-transport.interfaces';
import { GuardActionKind } from './update-guard.interfaces';
import { UpdateGuardService } from './update-guard.service';
import { AppConfigService } from '../config/app-config.service';
import type { ChatProfile, WalletBinding } from '../profiles/chat-profile.interfaces';
import { ChatProfileRepository } from '../profiles/chat-profile.repository';
import { parseWalletAddress } from '../profiles/wallet-address.parser';
import { RuntimeStatusService } from '../runtime/runtime-status.service';

const EXPORT_JSON_INDENT = 2;

/**
 * Application handlers riding on the dispatcher. Everything here is
 * registered into the router at module init; the dispatcher knows nothing
 * about individual commands.
 */
@Injectable()
export class BotCommandsService implements OnModuleInit {
  private readonly logger: Logger = new Logger(BotCommandsService.name);

  public constructor(
    private readonly appConfigService: AppConfigService,
    private readonly routerService: TelegramRouterService,
    private readonly senderService: TelegramSenderService,
    private readonly listenerRegistry: ConversationListenerRegistry,
    private readonly guardService: UpdateGuardService,
    private readonly runtimeStatusService: RuntimeStatusService,
    private readonly profileRepository: ChatProfileRepository,
    private readonly uiService: BotUiService,
  ) {}

  public onModuleInit(): void {
    this.registerRoutes();
  }

  public registerRoutes(): void {
    this.routerService.registerCommand('/start', this.handleStart.bind(this));
    this.routerService.registerCommand('/help', this.handleHelp.bind(this));
    this.routerService.registerCommand('/status', this.handleStatus.bind(this));
    this.routerService.registerCommand('/wallet', this.handleWallet.bind(this));
    this.routerService.registerCommand('/cancel', this.handleCancel.bind(this));
    this.routerService.registerCommand('/export', this.handleExport.bind(this));

    this.routerService.registerCallback(MENU_WALLET_CALLBACK, this.handleWallet.bind(this));
    this.routerService.registerCallback(MENU_STATUS_CALLBACK, this.handleStatusMenu.bind(this));
    this.routerService.registerCallback(MENU_HELP_CALLBACK, this.handleHelpMenu.bind(this));
    this.routerService.registerCallback(MENU_BACK_CALLBACK, this.handleBackMenu.bind(this));
    this.routerService.registerCallbackPrefix(
      HELP_TOPIC_CALLBACK_PREFIX,
      this.handleHelpTopic.bind(this),
    );

    this.routerService.setTextFallback(this.handleFreeText.bind(this));
    this.logger.log(`Bot routes registered commands=${this.routerService.listCommands().join(',')}`);
  }

  private async handleStart(update: TelegramUpdate, chatId: number): Promise<void> {
    const sender: TelegramUser | null = resolveSender(update);
    await this.profileRepository.ensureProfile(chatId, sender?.username ?? null);

    await this.senderService.sendText(
      chatId,
      this.uiService.buildStartMessage(sender?.first_name ?? sender?.username ?? null),
      this.uiService.buildMainMenuOptions(),
    );
  }

  private async handleHelp(_update: TelegramUpdate, chatId: number): Promise<void> {
    await this.senderService.sendText(
      chatId,
      this.uiService.buildHelpMessage(this.routerService.listCommands()),
      this.uiService.buildHelpOptions(),
    );
  }

  private async handleHelpMenu(update: TelegramUpdate, chatId: number): Promise<void> {
    await this.replyOrEdit(
      update,
      chatId,
      this.uiService.buildHelpMessage(this.routerService.listCommands()),
      this.uiService.buildHelpOptions(),
    );
  }

  private async handleHelpTopic(update: TelegramUpdate, chatId: number): Promise<void> {
    const data: string = update.callback_query?.data ?? '';
    const topic: HelpTopic | null = parseHelpTopic(data);

    if (topic === null) {
      throw new Error(`Unknown help topic: ${data.slice(HELP_TOPIC_CALLBACK_PREFIX.length)}`);
    }

    await this.replyOrEdit(
      update,
      chatId,
      this.uiService.buildHelpTopicMessage(topic),
      this.uiService.buildHelpOptions(),
    );
  }

  private async handleBackMenu(update: TelegramUpdate, chatId: number): Promise<void> {
    const sender: TelegramUser | null = resolveSender(update);

    await this.replyOrEdit(
      update,
      chatId,
      this.uiService.buildStartMessage(sender?.first_name ?? sender?.username ?? null),
      this.uiService.buildMainMenuOptions(),
    );
  }

  private async handleStatus(update: TelegramUpdate, chatId: number): Promise<void> {
    await this.senderService.sendText(
      chatId,
      this.buildStatusText(update),
      this.uiService.htmlOptions(),
    );
  }

  private async handleStatusMenu(update: TelegramUpdate, chatId: number): Promise<void> {
    await this.replyOrEdit(
      update,
      chatId,
      this.buildStatusText(update),
      this.uiService.buildBackOptions(),
    );
  }

  private async handleWallet(update: TelegramUpdate, chatId: number): Promise<void> {
    const profile: ChatProfile | null = await this.profileRepository.findByChatId(chatId);

    this.listenerRegistry.add(chatId, WALLET_ADDRESS_LISTENER_KIND, this.handleWalletAddress.bind(this));
    await this.senderService.sendText(
      chatId,
      this.uiService.buildWalletPrompt(profile),
      this.uiService.htmlOptions(),
    );
    this.logger.debug(
      `Wallet prompt sent chatId=${String(chatId)} updateId=${String(update.update_id)}`,
    );
  }

  private async handleWalletAddress(
    _update: TelegramUpdate,
    chatId: number,
    text: string,
  ): Promise<void> {
    const wallet: WalletBinding | null = parseWalletAddress(text);

    if (wallet === null) {
      // Keep waiting until a valid address or /cancel arrives.
      this.listenerRegistry.add(
        chatId,
        WALLET_ADDRESS_LISTENER_KIND,
        this.handleWalletAddress.bind(this),
      );
      await this.senderService.sendText(
        chatId,
        this.uiService.buildInvalidWalletMessage(text),
        this.uiService.htmlOptions(),
      );
      return;
    }

    const profile: ChatProfile = await this.profileRepository.bindWallet(chatId, wallet);
    this.logger.log(`Wallet linked chatId=${String(chatId)} network=${wallet.network}`);
    // The listener is already consumed, so this reply is the only confirmation the user gets.
    await this.senderService.sendTextWithRetry(
      chatId,
      this.uiService.buildWalletSavedMessage(profile),
      this.uiService.buildMainMenuOptions(),
    );
  }

  private async handleCancel(_update: TelegramUpdate, chatId: number): Promise<void> {
    const removed: boolean = this.listenerRegistry.remove(chatId);

    await this.senderService.sendText(
      chatId,
      removed ? 'Cancelled.' : 'Nothing to cancel.',
    );
  }

  private async handleExport(update: TelegramUpdate, chatId: number): Promise<void> {
    const sender: TelegramUser | null = resolveSender(update);
    const identity: number = sender?.id ?? chatId;

    if (this.guardService.isRateLimited(identity, GuardActionKind.EXPORT, EXPORT_COOLDOWN_MS)) {
      await this.senderService.sendText(chatId, 'Export was requested recently, try again later.');
      return;
    }

    const profile: ChatProfile = await this.profileRepository.ensureProfile(
      chatId,
      sender?.username ?? null,
    );
    const delivered: boolean = await this.senderService.sendDocument(
      chatId,
      {
        filename: `profile-${String(chatId)}.json`,
        content: JSON.stringify(profile, null, EXPORT_JSON_INDENT),
        mimeType: EXPORT_MIME_TYPE,
      },
      { caption: 'Your profile' },
    );

    if (!delivered) {
      throw new Error('export delivery failed');
    }
  }

  private async handleFreeText(
    _update: TelegramUpdate,
    chatId: number,
    _text: string,
  ): Promise<void> {
    await this.senderService.sendText(
      chatId,
      'Use /help to see what I can do.',
      this.uiService.buildMainMenuOptions(),
    );
  }

  private buildStatusText(update: TelegramUpdate): string {
    const sender: TelegramUser | null = resolveSender(update);
    const isAdmin: boolean = sender !== null && this.appConfigService.isAdmin(sender.id);

    return this.uiService.buildStatusMessage(
      this.runtimeStatusService.getSnapshot(),
      isAdmin ? this.guardService.getStats() : null,
    );
  }

  /** Menu buttons edit the message they sit on; without one, a new message is sent. */
  private async replyOrEdit(
    update: TelegramUpdate,
    chatId: number,
    text: string,
    options: TelegramSendOptions,
  ): Promise<void> {
    const messageId: number | undefined = update.callback_query?.message?.message_id;

    if (messageId === undefined) {
      await this.senderService.sendText(chatId, text, options);
      return;
    }

    await this.senderService.editText(chatId, messageId, text, options);
  }
}

const resolveSender = (update: TelegramUpdate): TelegramUser | null =>
  update.message?.from ?? update.callback_query?.from ?? null;
