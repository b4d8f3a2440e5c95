import { Logger } from '@nestjs/common';
import { afterEach, describe, expect, it, vi } from 'vitest';

import type { ConversationListener } from './conversation-listener.interfaces';
import { ConversationListenerRegistry } from './conversation-listener.registry';
import type { AppConfigService } from '../config/app-config.service';

const createRegistry = (listenerTtlSec: number = 0): ConversationListenerRegistry =>
  new ConversationListenerRegistry({ listenerTtlSec } as unknown as AppConfigService);

describe('ConversationListenerRegistry', (): void => {
  afterEach((): void => {
    vi.useRealTimers();
    vi.restoreAllMocks();
  });

  it('keeps only the last listener registered for a chat', (): void => {
    const registry: ConversationListenerRegistry = createRegistry();
    const first = vi.fn();
    const second = vi.fn();

    registry.add(555, 'wallet_address', first);
    registry.add(555, 'label', second);

    const listener: ConversationListener | null = registry.get(555);

    expect(registry.size()).toBe(1);
    expect(listener?.kind).toBe('label');
    expect(listener?.handler).toBe(second);
  });

  it('hands out a listener once', (): void => {
    const registry: ConversationListenerRegistry = createRegistry();
    registry.add(555, 'wallet_address', vi.fn());

    expect(registry.take(555)?.kind).toBe('wallet_address');
    expect(registry.take(555)).toBeNull();
    expect(registry.has(555)).toBe(false);
  });

  it('treats removing an absent listener as a no-op', (): void => {
    const registry: ConversationListenerRegistry = createRegistry();
    registry.add(1, 'wallet_address', vi.fn());

    expect(registry.remove(2)).toBe(false);
    expect(registry.remove(1)).toBe(true);
    expect(registry.remove(1)).toBe(false);
  });

  it('drops listeners that outlive their ttl', (): void => {
    vi.useFakeTimers();
    vi.setSystemTime(new Date('2026-01-01T00:00:00.000Z'));
    const registry: ConversationListenerRegistry = createRegistry(60);
    registry.add(555, 'wallet_address', vi.fn());

    vi.setSystemTime(new Date('2026-01-01T00:01:01.000Z'));

    expect(registry.take(555)).toBeNull();
  });

  it('stops counting an expired listener as active', (): void => {
    vi.useFakeTimers();
    vi.setSystemTime(new Date('2026-01-01T00:00:00.000Z'));
    const logSpy = vi.spyOn(Logger.prototype, 'log').mockImplementation((): void => undefined);
    const registry: ConversationListenerRegistry = createRegistry(60);
    registry.add(555, 'wallet_address', vi.fn());
    vi.setSystemTime(new Date('2026-01-01T00:00:30.000Z'));
    registry.add(777, 'wallet_address', vi.fn());

    vi.setSystemTime(new Date('2026-01-01T00:01:01.000Z'));

    expect(registry.size()).toBe(1);
    expect(registry.has(777)).toBe(true);
    expect(logSpy).toHaveBeenCalledWith('Listener expired unanswered key=chat:555');
  });
});
