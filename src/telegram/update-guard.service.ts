import { createHash } from 'node:crypto';

import { Injectable, Logger } from '@nestjs/common';

import type { TelegramMessage } from './telegram-api.schemas';
import type { GuardActionKind, GuardStats, RecentSenderMessage } from './update-guard.interfaces';
import { RecentIdWindow } from '../common/utils/collections/recent-id-window';
import { AppConfigService } from '../config/app-config.service';
import { SimpleCacheImpl } from '../infra/cache';

const MAX_TRACKED_IDENTITIES = 10_000;

/**
 * Admit-or-reject decisions for inbound updates.
 *
 * Every method is synchronous, so each check-and-insert completes
 * without interleaving on the event loop. State is process-local and
 * resets on restart.
 */
@Injectable()
export class UpdateGuardService {
  private readonly logger: Logger = new Logger(UpdateGuardService.name);
  private readonly seenUpdates: RecentIdWindow<number>;
  private readonly seenCallbacks: RecentIdWindow<string>;
  private readonly messageHashes: RecentIdWindow<string>;
  private readonly lastMessages: SimpleCacheImpl<RecentSenderMessage>;
  private readonly rateLedger: SimpleCacheImpl<number>;
  private readonly rapidRepeatWindowSec: number;

  public constructor(appConfigService: AppConfigService) {
    this.seenUpdates = new RecentIdWindow<number>(appConfigService.seenUpdatesCapacity);
    this.seenCallbacks = new RecentIdWindow<string>(appConfigService.seenCallbacksCapacity);
    this.messageHashes = new RecentIdWindow<string>(appConfigService.messageHashesCapacity);
    this.rapidRepeatWindowSec = appConfigService.rapidRepeatWindowSec;
    this.lastMessages = new SimpleCacheImpl<RecentSenderMessage>({
      ttlSec: appConfigService.rateLedgerTtlSec,
      maxKeys: MAX_TRACKED_IDENTITIES,
    });
    this.rateLedger = new SimpleCacheImpl<number>({
      ttlSec: appConfigService.rateLedgerTtlSec,
      maxKeys: MAX_TRACKED_IDENTITIES,
    });
  }

  public isDuplicateUpdate(updateId: number): boolean {
    return !this.seenUpdates.add(updateId);
  }

  public isDuplicateCallback(callbackId: string): boolean {
    return !this.seenCallbacks.add(callbackId);
  }

  public isDuplicateMessage(message: TelegramMessage): boolean {
    const senderId: number = message.from?.id ?? message.chat.id;
    const text: string = message.text ?? '';
    const signature: string = `${String(senderId)}:${String(message.chat.id)}:${text}:${String(Math.floor(message.date))}`;
    const digest: string = createHash('sha256').update(signature).digest('hex');

    if (this.messageHashes.has(digest)) {
      this.logger.debug(`Exact message repeat senderId=${String(senderId)}`);
      return true;
    }

    const senderKey: string = `sender:${String(senderId)}`;
    const previous: RecentSenderMessage | undefined = this.lastMessages.get(senderKey);

    if (
      previous !== undefined &&
      previous.text === text &&
      Math.abs(message.date - previous.date) < this.rapidRepeatWindowSec
    ) {
      this.logger.debug(`Rapid message repeat senderId=${String(senderId)}`);
      return true;
    }

    // Only admitted messages become the comparison point for the next one.
    this.messageHashes.add(digest);
    this.lastMessages.set(senderKey, { text, date: message.date });
    return false;
  }

  /**
   * Sliding-window cooldown per identity and action kind. Admission stamps
   * the ledger even if the caller fails afterwards, so a failed action
   * still spends its slot.
   */
  public isRateLimited(
    identity: number | string,
    actionKind: GuardActionKind,
    cooldownMs: number,
    nowEpochMs: number = Date.now(),
  ): boolean {
    const ledgerKey: string = `${String(identity)}:${actionKind}`;
    const lastActionMs: number | undefined = this.rateLedger.get(ledgerKey);

    if (lastActionMs !== undefined && nowEpochMs - lastActionMs < cooldownMs) {
      return true;
    }

    this.rateLedger.set(ledgerKey, nowEpochMs);
    return false;
  }

  public getStats(): GuardStats {
    return {
      seenUpdates: this.seenUpdates.size,
      seenCallbacks: this.seenCallbacks.size,
      messageHashes: this.messageHashes.size,
      trackedSenders: this.lastMessages.size(),
      rateLedgerEntries: this.rateLedger.size(),
      evictedLedgerEntries: this.rateLedger.stats().evictions,
      evictedUpdates: this.seenUpdates.evicted,
    };
  }
}
