import { Injectable, Logger } from '@nestjs/common';

import type { ConversationListener, ListenerHandler } from './conversation-listener.interfaces';
import { AppConfigService } from '../config/app-config.service';
import { SimpleCacheImpl } from '../infra/cache';

/**
 * At most one pending free-text listener per chat. Registering again for
 * the same chat replaces the previous listener.
 */
@Injectable()
export class ConversationListenerRegistry {
  private readonly logger: Logger = new Logger(ConversationListenerRegistry.name);
  private readonly listeners: SimpleCacheImpl<ConversationListener>;

  public constructor(appConfigService: AppConfigService) {
    this.listeners = new SimpleCacheImpl<ConversationListener>({
      ttlSec: appConfigService.listenerTtlSec,
      onExpire: (key: string): void => {
        this.logger.log(`Listener expired unanswered key=${key}`);
      },
    });
  }

  public add(chatId: number, kind: string, handler: ListenerHandler): void {
    const key: string = this.toKey(chatId);
    const existing: ConversationListener | undefined = this.listeners.get(key);

    if (existing !== undefined) {
      this.logger.log(
        `Replacing listener chatId=${String(chatId)} previousKind=${existing.kind} kind=${kind}`,
      );
    }

    this.listeners.set(key, {
      chatId,
      kind,
      handler,
      registeredAtIso: new Date().toISOString(),
    });
    this.logger.debug(`Listener registered chatId=${String(chatId)} kind=${kind}`);
  }

  public remove(chatId: number): boolean {
    return this.listeners.del(this.toKey(chatId));
  }

  /** Removes and returns the listener so the caller consumes it exactly once. */
  public take(chatId: number): ConversationListener | null {
    return this.listeners.take(this.toKey(chatId)) ?? null;
  }

  public get(chatId: number): ConversationListener | null {
    return this.listeners.get(this.toKey(chatId)) ?? null;
  }

  public has(chatId: number): boolean {
    return this.listeners.has(this.toKey(chatId));
  }

  public size(): number {
    return this.listeners.size();
  }

  private toKey(chatId: number): string {
    return `chat:${String(chatId)}`;
  }
}
