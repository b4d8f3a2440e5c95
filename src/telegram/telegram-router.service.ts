import { Injectable, Logger } from '@nestjs/common';

import type { ListenerHandler } from './conversation-listener.interfaces';
import type { TelegramUpdate } from './telegram-api.schemas';
import {
  type PrefixRoute,
  type TextInterceptor,
  type TextMatcher,
  type UpdateHandler,
  RouteOutcome,
} from './telegram-router.interfaces';
import { TelegramSenderService } from './telegram-sender.service';

/**
 * Routing table for commands, callback data and free text.
 *
 * Exact routes are checked first, then prefix routes in registration
 * order. Callback data carrying dynamic suffixes (`help_topic:guard`)
 * is served by prefix routes.
 */
@Injectable()
export class TelegramRouterService {
  private readonly logger: Logger = new Logger(TelegramRouterService.name);
  private readonly commands: Map<string, UpdateHandler> = new Map<string, UpdateHandler>();
  private readonly commandPrefixes: PrefixRoute[] = [];
  private readonly callbacks: Map<string, UpdateHandler> = new Map<string, UpdateHandler>();
  private readonly callbackPrefixes: PrefixRoute[] = [];
  private readonly textInterceptors: TextInterceptor[] = [];
  private textFallback: ListenerHandler | null = null;

  public constructor(private readonly senderService: TelegramSenderService) {}

  public registerCommand(command: string, handler: UpdateHandler): void {
    const normalizedCommand: string = normalizeCommandKey(command);

    if (this.commands.has(normalizedCommand)) {
      this.logger.warn(`Command route replaced command=${normalizedCommand}`);
    }

    this.commands.set(normalizedCommand, handler);
  }

  public registerCommandPrefix(prefix: string, handler: UpdateHandler): void {
    this.commandPrefixes.push({ prefix: normalizeCommandKey(prefix), handler });
  }

  public registerCallback(data: string, handler: UpdateHandler): void {
    if (this.callbacks.has(data)) {
      this.logger.warn(`Callback route replaced data=${data}`);
    }

    this.callbacks.set(data, handler);
  }

  public registerCallbackPrefix(prefix: string, handler: UpdateHandler): void {
    this.callbackPrefixes.push({ prefix, handler });
  }

  public registerTextInterceptor(
    name: string,
    matcher: TextMatcher,
    handler: ListenerHandler,
  ): void {
    this.textInterceptors.push({ name, matcher, handler });
  }

  public setTextFallback(handler: ListenerHandler | null): void {
    this.textFallback = handler;
  }

  public listCommands(): readonly string[] {
    return [...this.commands.keys()];
  }

  public async routeCommand(
    text: string,
    update: TelegramUpdate,
    chatId: number,
  ): Promise<RouteOutcome> {
    const command: string = parseCommand(text);
    const handler: UpdateHandler | null =
      this.commands.get(command) ?? findPrefixHandler(this.commandPrefixes, command);

    if (handler === null) {
      this.logger.debug(`Unknown command chatId=${String(chatId)} command=${command}`);
      await this.senderService.sendText(chatId, `Unknown command: ${command}`);
      return RouteOutcome.UNKNOWN;
    }

    return this.runHandler(`command=${command}`, chatId, async (): Promise<void> =>
      handler(update, chatId),
    );
  }

  public async routeCallback(
    data: string,
    update: TelegramUpdate,
    chatId: number,
  ): Promise<RouteOutcome> {
    const handler: UpdateHandler | null =
      this.callbacks.get(data) ?? findPrefixHandler(this.callbackPrefixes, data);

    if (handler === null) {
      this.logger.debug(`Unknown callback chatId=${String(chatId)} data=${data}`);
      await this.senderService.sendText(chatId, `Unknown action: ${data}`);
      return RouteOutcome.UNKNOWN;
    }

    return this.runHandler(`callback=${data}`, chatId, async (): Promise<void> =>
      handler(update, chatId),
    );
  }

  public async interceptText(
    text: string,
    update: TelegramUpdate,
    chatId: number,
  ): Promise<RouteOutcome> {
    const interceptor: TextInterceptor | undefined = this.textInterceptors.find(
      (candidate: TextInterceptor): boolean => candidate.matcher(text),
    );

    if (interceptor === undefined) {
      return RouteOutcome.UNHANDLED;
    }

    return this.runHandler(`interceptor=${interceptor.name}`, chatId, async (): Promise<void> =>
      interceptor.handler(update, chatId, text),
    );
  }

  public async routeText(
    text: string,
    update: TelegramUpdate,
    chatId: number,
  ): Promise<RouteOutcome> {
    const fallback: ListenerHandler | null = this.textFallback;

    if (fallback === null) {
      return RouteOutcome.UNHANDLED;
    }

    return this.runHandler('text_fallback', chatId, async (): Promise<void> =>
      fallback(update, chatId, text),
    );
  }

  /**
   * Runs a handler and turns a thrown error into a log entry plus a
   * generic reply, so one failing handler never reaches the poll loop.
   */
  public async runHandler(
    label: string,
    chatId: number,
    action: () => Promise<void>,
  ): Promise<RouteOutcome> {
    try {
      await action();
      return RouteOutcome.HANDLED;
    } catch (error: unknown) {
      const errorMessage: string = error instanceof Error ? error.message : String(error);
      const errorStack: string | undefined = error instanceof Error ? error.stack : undefined;

      this.logger.error(
        `Handler failed ${label} chatId=${String(chatId)}: ${errorMessage}`,
        errorStack,
      );
      await this.senderService.sendText(chatId, `Error processing request: ${errorMessage}`);
      return RouteOutcome.FAILED;
    }
  }
}

const normalizeCommandKey = (command: string): string => {
  const trimmed: string = command.trim().toLowerCase();
  return trimmed.startsWith('/') ? trimmed : `/${trimmed}`;
};

const parseCommand = (text: string): string => {
  const firstToken: string = text.trim().split(/\s+/)[0] ?? '';
  const withoutMention: string = firstToken.split('@')[0] ?? firstToken;
  return withoutMention.toLowerCase();
};

const findPrefixHandler = (
  routes: readonly PrefixRoute[],
  key: string,
): UpdateHandler | null => {
  const route: PrefixRoute | undefined = routes.find((candidate: PrefixRoute): boolean =>
    key.startsWith(candidate.prefix),
  );

  return route?.handler ?? null;
};
