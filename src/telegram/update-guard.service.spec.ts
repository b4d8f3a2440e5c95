import { describe, expect, it } from 'vitest';

import type { TelegramMessage } from './telegram-api.schemas';
import { GuardActionKind } from './update-guard.interfaces';
import { UpdateGuardService } from './update-guard.service';
import type { AppConfigService } from '../config/app-config.service';

const createConfigStub = (seenUpdatesCapacity: number = 2000): AppConfigService =>
  ({
    seenUpdatesCapacity,
    seenCallbacksCapacity: 1000,
    messageHashesCapacity: 1000,
    rapidRepeatWindowSec: 2,
    rateLedgerTtlSec: 3600,
  }) as unknown as AppConfigService;

const buildMessage = (text: string, date: number, senderId: number = 1): TelegramMessage => ({
  message_id: date,
  date,
  chat: { id: 555, type: 'private' },
  from: { id: senderId, is_bot: false, first_name: 'Test' },
  text,
});

describe('UpdateGuardService', (): void => {
  it('admits a fresh update id once and rejects repeats without growing', (): void => {
    const guard: UpdateGuardService = new UpdateGuardService(createConfigStub());

    expect(guard.isDuplicateUpdate(100)).toBe(false);
    expect(guard.getStats().seenUpdates).toBe(1);
    expect(guard.isDuplicateUpdate(100)).toBe(true);
    expect(guard.getStats().seenUpdates).toBe(1);
    expect(guard.isDuplicateUpdate(101)).toBe(false);
    expect(guard.getStats().seenUpdates).toBe(2);
  });

  it('never holds more update ids than its capacity', (): void => {
    const guard: UpdateGuardService = new UpdateGuardService(createConfigStub());

    for (let updateId: number = 1; updateId <= 2500; updateId += 1) {
      guard.isDuplicateUpdate(updateId);
      expect(guard.getStats().seenUpdates).toBeLessThanOrEqual(2000);
    }

    expect(guard.getStats().evictedUpdates).toBe(500);
    expect(guard.isDuplicateUpdate(2500)).toBe(true);
    expect(guard.isDuplicateUpdate(1)).toBe(false);
  });

  it('tracks callback ids separately from update ids', (): void => {
    const guard: UpdateGuardService = new UpdateGuardService(createConfigStub());

    expect(guard.isDuplicateUpdate(7)).toBe(false);
    expect(guard.isDuplicateCallback('7')).toBe(false);
    expect(guard.isDuplicateCallback('7')).toBe(true);
  });

  it('rejects an exact message repeat', (): void => {
    const guard: UpdateGuardService = new UpdateGuardService(createConfigStub());

    expect(guard.isDuplicateMessage(buildMessage('hello', 1000))).toBe(false);
    expect(guard.isDuplicateMessage(buildMessage('hello', 1000))).toBe(true);
  });

  it('rejects identical text from the same sender inside the rapid window', (): void => {
    const guard: UpdateGuardService = new UpdateGuardService(createConfigStub());

    expect(guard.isDuplicateMessage(buildMessage('hello', 1000))).toBe(false);
    expect(guard.isDuplicateMessage(buildMessage('hello', 1001))).toBe(true);
    expect(guard.isDuplicateMessage(buildMessage('hello', 1004))).toBe(false);
    expect(guard.isDuplicateMessage(buildMessage('other', 1005))).toBe(false);
    expect(guard.isDuplicateMessage(buildMessage('other', 1005, 2))).toBe(false);
  });

  it('compares a repeat against the last admitted message, not the last rejected one', (): void => {
    const guard: UpdateGuardService = new UpdateGuardService(createConfigStub());

    const verdicts: boolean[] = [100, 101, 102, 103, 104].map((date: number): boolean =>
      guard.isDuplicateMessage(buildMessage('yes', date)),
    );

    expect(verdicts).toEqual([false, true, false, true, false]);
    expect(guard.getStats().messageHashes).toBe(3);
  });

  it('admits then rejects inside the cooldown and admits again after it', (): void => {
    const guard: UpdateGuardService = new UpdateGuardService(createConfigStub());

    expect(guard.isRateLimited(1, GuardActionKind.MESSAGE, 1000, 10_000)).toBe(false);
    expect(guard.isRateLimited(1, GuardActionKind.MESSAGE, 1000, 10_500)).toBe(true);
    expect(guard.isRateLimited(1, GuardActionKind.MESSAGE, 1000, 11_000)).toBe(false);
    expect(guard.isRateLimited(1, GuardActionKind.MESSAGE, 1000, 12_000)).toBe(false);
  });

  it('keeps separate ledgers per identity and action kind', (): void => {
    const guard: UpdateGuardService = new UpdateGuardService(createConfigStub());

    expect(guard.isRateLimited(1, GuardActionKind.MESSAGE, 1000, 10_000)).toBe(false);
    expect(guard.isRateLimited(1, GuardActionKind.CALLBACK, 500, 10_100)).toBe(false);
    expect(guard.isRateLimited(2, GuardActionKind.MESSAGE, 1000, 10_100)).toBe(false);
    expect(guard.getStats().rateLedgerEntries).toBe(3);
  });
});
