import {
  Inject,
  Injectable,
  Logger,
  type OnApplicationBootstrap,
  type OnModuleDestroy,
} from '@nestjs/common';

import type { ConversationListener } from './conversation-listener.interfaces';
import { ConversationListenerRegistry } from './conversation-listener.registry';
import type {
  TelegramCallbackQuery,
  TelegramMessage,
  TelegramUpdate,
} from './telegram-api.schemas';
import { type MutableDispatcherCounters, UpdateOutcome } from './telegram-dispatcher.interfaces';
import { RouteOutcome } from './telegram-router.interfaces';
import { TelegramRouterService } from './telegram-router.service';
import {
  type ITelegramTransport,
  type PollResult,
  type TelegramCallFailure,
  TelegramFailureReason,
} from './telegram-transport.interfaces';
import { TELEGRAM_TRANSPORT } from './telegram.tokens';
import { GuardActionKind } from './update-guard.interfaces';
import { UpdateGuardService } from './update-guard.service';
import { sleep } from '../common/utils/network/sleep.util';
import { AppConfigService } from '../config/app-config.service';
import type { TelegramAckStrategy } from '../config/app-config.types';
import { MetricsService } from '../observability/metrics.service';
import {
  type DispatcherRuntimeSnapshot,
  DispatcherState,
} from '../runtime/runtime-status.interfaces';
import { RuntimeStatusService } from '../runtime/runtime-status.service';

const MS_IN_SECOND = 1000;

/**
 * Long-polling driver. Owns the offset cursor and feeds each update, in
 * order and one at a time, through guard, listener check and router.
 *
 * The offset moves past an update once it has been handled, whether the
 * handler succeeded or not, so a poisoned update is never redelivered.
 */
@Injectable()
export class TelegramDispatcherService implements OnApplicationBootstrap, OnModuleDestroy {
  private readonly logger: Logger = new Logger(TelegramDispatcherService.name);
  private readonly counters: MutableDispatcherCounters = {
    processed: 0,
    duplicates: 0,
    rateLimited: 0,
    handlerErrors: 0,
    pollFailures: 0,
  };
  private state: DispatcherState = DispatcherState.STOPPED;
  private offset: number = 0;
  private lastUpdateId: number | null = null;
  private consecutivePollFailures: number = 0;
  private lastPollAtIso: string | null = null;
  private lastErrorMessage: string | null = null;
  private running: boolean = false;
  private loopPromise: Promise<void> | null = null;
  private startPromise: Promise<void> | null = null;

  public constructor(
    private readonly appConfigService: AppConfigService,
    @Inject(TELEGRAM_TRANSPORT) private readonly transport: ITelegramTransport,
    private readonly guard: UpdateGuardService,
    private readonly listeners: ConversationListenerRegistry,
    private readonly router: TelegramRouterService,
    private readonly runtimeStatusService: RuntimeStatusService,
    private readonly metricsService: MetricsService,
  ) {}

  public async onApplicationBootstrap(): Promise<void> {
    if (!this.appConfigService.telegramEnabled) {
      this.logger.log('Telegram dispatcher disabled by TELEGRAM_ENABLED=false');
      return;
    }

    await this.start();
  }

  public async onModuleDestroy(): Promise<void> {
    await this.stop();
  }

  /**
   * Clears the backlog and launches the loop. Overlapping calls share the
   * same startup; a `stop()` issued during the backlog clear wins.
   */
  public async start(): Promise<void> {
    if (this.startPromise !== null) {
      return this.startPromise;
    }

    if (this.running) {
      this.logger.warn('Dispatcher already running');
      return;
    }

    this.running = true;
    const startPromise: Promise<void> = this.launch();
    this.startPromise = startPromise;

    try {
      await startPromise;
    } catch (error: unknown) {
      this.running = false;
      throw error;
    } finally {
      this.startPromise = null;
    }
  }

  /** Resolves once a pending startup, the in-flight poll and its batch have finished. */
  public async stop(): Promise<void> {
    const startPromise: Promise<void> | null = this.startPromise;

    if (!this.running && startPromise === null && this.loopPromise === null) {
      return;
    }

    this.running = false;
    this.logger.log('Dispatcher stopping');

    if (startPromise !== null) {
      await startPromise.catch((error: unknown): void => {
        const errorMessage: string = error instanceof Error ? error.message : String(error);
        this.logger.warn(`Dispatcher startup failed during stop: ${errorMessage}`);
      });
    }

    const loopPromise: Promise<void> | null = this.loopPromise;

    if (loopPromise !== null) {
      await loopPromise;
    }

    this.loopPromise = null;
    this.setState(DispatcherState.STOPPED);
  }

  public isRunning(): boolean {
    return this.running;
  }

  public getOffset(): number {
    return this.offset;
  }

  public getState(): DispatcherState {
    return this.state;
  }

  public getSnapshot(): DispatcherRuntimeSnapshot {
    return {
      state: this.state,
      offset: this.offset,
      lastUpdateId: this.lastUpdateId,
      ...this.counters,
      consecutivePollFailures: this.consecutivePollFailures,
      activeListeners: this.listeners.size(),
      lastPollAtIso: this.lastPollAtIso,
      lastErrorMessage: this.lastErrorMessage,
      updatedAtIso: new Date().toISOString(),
    };
  }

  /** One poll cycle. Returns how many updates were fed through the pipeline. */
  public async pollOnce(): Promise<number> {
    const stopTimer: () => number = this.metricsService.telegramPollDurationSeconds.startTimer();
    const result: PollResult = await this.transport.getUpdates(this.offset);
    stopTimer();
    this.lastPollAtIso = new Date().toISOString();

    if (!result.ok) {
      await this.handlePollFailure(result);
      return 0;
    }

    this.consecutivePollFailures = 0;

    if (result.updates.length === 0) {
      this.publishSnapshot();
      return 0;
    }

    this.setState(DispatcherState.PROCESSING_BATCH);

    try {
      await this.acknowledgeBatch(result.updates);

      for (const update of result.updates) {
        await this.processUpdate(update);
        this.advanceOffset(update.update_id);
        await this.acknowledgeUpdate(update.update_id);
      }
    } finally {
      this.setState(DispatcherState.IDLE_POLLING);
    }

    return result.updates.length;
  }

  public async processUpdate(update: TelegramUpdate): Promise<void> {
    try {
      const callbackQuery: TelegramCallbackQuery | undefined = update.callback_query;

      // Answered even for duplicates so the client stops its loading spinner.
      if (callbackQuery !== undefined) {
        await this.transport.answerCallbackQuery(callbackQuery.id);
      }

      if (this.guard.isDuplicateUpdate(update.update_id)) {
        this.logger.log(`Skipping duplicate update updateId=${String(update.update_id)}`);
        this.recordOutcome(UpdateOutcome.DUPLICATE);
        return;
      }

      if (callbackQuery !== undefined) {
        await this.processCallback(update, callbackQuery);
        return;
      }

      if (update.message !== undefined) {
        await this.processMessage(update, update.message);
        return;
      }

      this.logger.debug(`Ignoring update without payload updateId=${String(update.update_id)}`);
      this.recordOutcome(UpdateOutcome.IGNORED);
    } catch (error: unknown) {
      const errorMessage: string = error instanceof Error ? error.message : String(error);
      const errorStack: string | undefined = error instanceof Error ? error.stack : undefined;

      this.lastErrorMessage = errorMessage;
      this.logger.error(
        `Update processing failed updateId=${String(update.update_id)}: ${errorMessage}`,
        errorStack,
      );
      this.recordOutcome(UpdateOutcome.FAILED);
    } finally {
      this.publishSnapshot();
    }
  }

  private async launch(): Promise<void> {
    const backlogOffset: number | null = await this.transport.clearBacklog();

    if (backlogOffset !== null) {
      this.offset = Math.max(this.offset, backlogOffset);
    }

    if (!this.running) {
      this.logger.log('Dispatcher stopped before the loop started');
      return;
    }

    this.setState(DispatcherState.IDLE_POLLING);
    this.logger.log(
      `Dispatcher started offset=${String(this.offset)} ackStrategy=${this.appConfigService.ackStrategy}`,
    );
    this.loopPromise = this.runLoop();
  }

  private async runLoop(): Promise<void> {
    while (this.running) {
      try {
        await this.pollOnce();
      } catch (error: unknown) {
        const errorMessage: string = error instanceof Error ? error.message : String(error);
        const errorStack: string | undefined = error instanceof Error ? error.stack : undefined;

        this.lastErrorMessage = errorMessage;
        this.logger.error(`Poll cycle failed: ${errorMessage}`, errorStack);
      }

      await sleep(this.appConfigService.loopIdleMs);
    }

    this.logger.log(`Dispatcher loop exited offset=${String(this.offset)}`);
  }

  private async processCallback(
    update: TelegramUpdate,
    callbackQuery: TelegramCallbackQuery,
  ): Promise<void> {
    if (this.guard.isDuplicateCallback(callbackQuery.id)) {
      this.logger.log(`Skipping duplicate callback callbackId=${callbackQuery.id}`);
      this.recordOutcome(UpdateOutcome.DUPLICATE);
      return;
    }

    const senderId: number = callbackQuery.from.id;
    const chatId: number = callbackQuery.message?.chat.id ?? senderId;

    if (
      this.guard.isRateLimited(
        senderId,
        GuardActionKind.CALLBACK,
        this.appConfigService.callbackCooldownMs,
      )
    ) {
      this.logger.debug(`Callback rate limited senderId=${String(senderId)}`);
      this.recordOutcome(UpdateOutcome.RATE_LIMITED);
      return;
    }

    if (callbackQuery.data === undefined) {
      this.recordOutcome(UpdateOutcome.IGNORED);
      return;
    }

    const outcome: RouteOutcome = await this.router.routeCallback(
      callbackQuery.data,
      update,
      chatId,
    );
    this.recordRouteOutcome(outcome);
  }

  private async processMessage(update: TelegramUpdate, message: TelegramMessage): Promise<void> {
    const text: string | undefined = message.text;

    if (text === undefined) {
      this.logger.debug(`Ignoring non-text message updateId=${String(update.update_id)}`);
      this.recordOutcome(UpdateOutcome.IGNORED);
      return;
    }

    const chatId: number = message.chat.id;
    const senderId: number = message.from?.id ?? chatId;

    if (
      this.guard.isRateLimited(
        senderId,
        GuardActionKind.MESSAGE,
        this.appConfigService.messageCooldownMs,
      )
    ) {
      this.logger.debug(`Message rate limited senderId=${String(senderId)}`);
      this.recordOutcome(UpdateOutcome.RATE_LIMITED);
      return;
    }

    if (this.guard.isDuplicateMessage(message)) {
      this.logger.log(`Skipping duplicate message updateId=${String(update.update_id)}`);
      this.recordOutcome(UpdateOutcome.DUPLICATE);
      return;
    }

    const interceptOutcome: RouteOutcome = await this.router.interceptText(text, update, chatId);

    if (interceptOutcome !== RouteOutcome.UNHANDLED) {
      this.recordRouteOutcome(interceptOutcome);
      return;
    }

    if (text.trimStart().startsWith('/')) {
      this.recordRouteOutcome(await this.router.routeCommand(text, update, chatId));
      return;
    }

    const listener: ConversationListener | null = this.listeners.take(chatId);

    if (listener !== null) {
      this.logger.debug(`Listener consumed chatId=${String(chatId)} kind=${listener.kind}`);
      this.recordRouteOutcome(
        await this.router.runHandler(`listener=${listener.kind}`, chatId, async (): Promise<void> =>
          listener.handler(update, chatId, text),
        ),
      );
      return;
    }

    this.recordRouteOutcome(await this.router.routeText(text, update, chatId));
  }

  private async handlePollFailure(failure: TelegramCallFailure): Promise<void> {
    const backoffMs: number = this.resolvePollBackoffMs(failure);

    this.counters.pollFailures += 1;
    this.consecutivePollFailures += 1;
    this.lastErrorMessage = `${failure.reason}: ${failure.description}`;
    this.logger.warn(
      `Poll failed reason=${failure.reason} status=${String(failure.httpStatus)} backoffMs=${String(backoffMs)}`,
    );
    this.publishSnapshot();
    await sleep(backoffMs);
  }

  private resolvePollBackoffMs(failure: TelegramCallFailure): number {
    if (failure.reason === TelegramFailureReason.CONFLICT) {
      return this.appConfigService.pollConflictBackoffMs;
    }

    if (failure.reason === TelegramFailureReason.RATE_LIMITED) {
      const hintedMs: number =
        failure.retryAfterSec !== null ? failure.retryAfterSec * MS_IN_SECOND : 0;
      return Math.max(this.appConfigService.pollRateLimitBackoffMs, hintedMs);
    }

    return 0;
  }

  private async acknowledgeBatch(updates: readonly TelegramUpdate[]): Promise<void> {
    const strategy: TelegramAckStrategy = this.appConfigService.ackStrategy;
    const lastUpdate: TelegramUpdate | undefined = updates[updates.length - 1];

    if ((strategy === 'batch' || strategy === 'both') && lastUpdate !== undefined) {
      await this.transport.acknowledge(lastUpdate.update_id + 1);
    }
  }

  private async acknowledgeUpdate(updateId: number): Promise<void> {
    const strategy: TelegramAckStrategy = this.appConfigService.ackStrategy;

    if (strategy === 'update' || strategy === 'both') {
      await this.transport.acknowledge(updateId + 1);
    }
  }

  private advanceOffset(updateId: number): void {
    this.offset = Math.max(this.offset, updateId + 1);
    this.lastUpdateId = updateId;
    this.metricsService.telegramDispatcherOffset.set(this.offset);
  }

  private recordRouteOutcome(outcome: RouteOutcome): void {
    switch (outcome) {
      case RouteOutcome.HANDLED:
        this.recordOutcome(UpdateOutcome.PROCESSED);
        return;
      case RouteOutcome.UNKNOWN:
        this.recordOutcome(UpdateOutcome.UNKNOWN_ROUTE);
        return;
      case RouteOutcome.FAILED:
        this.recordOutcome(UpdateOutcome.FAILED);
        return;
      case RouteOutcome.UNHANDLED:
        this.recordOutcome(UpdateOutcome.IGNORED);
        return;
    }
  }

  private recordOutcome(outcome: UpdateOutcome): void {
    this.metricsService.telegramUpdatesTotal.inc({ outcome });

    if (outcome === UpdateOutcome.PROCESSED || outcome === UpdateOutcome.UNKNOWN_ROUTE) {
      this.counters.processed += 1;
    } else if (outcome === UpdateOutcome.DUPLICATE) {
      this.counters.duplicates += 1;
    } else if (outcome === UpdateOutcome.RATE_LIMITED) {
      this.counters.rateLimited += 1;
    } else if (outcome === UpdateOutcome.FAILED) {
      this.counters.handlerErrors += 1;
    }
  }

  private setState(state: DispatcherState): void {
    this.state = state;
    this.publishSnapshot();
  }

  private publishSnapshot(): void {
    this.runtimeStatusService.setSnapshot(this.getSnapshot());
  }
}
