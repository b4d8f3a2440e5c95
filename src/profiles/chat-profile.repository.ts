import { Injectable } from '@nestjs/common';

import type { ChatProfile, IChatProfileRepository, WalletBinding } from './chat-profile.interfaces';

/**
 * Process-local profile store. Profiles vanish on restart; a durable
 * implementation can replace it behind `IChatProfileRepository`.
 */
@Injectable()
export class ChatProfileRepository implements IChatProfileRepository {
  private readonly profiles: Map<number, ChatProfile> = new Map<number, ChatProfile>();

  public async findByChatId(chatId: number): Promise<ChatProfile | null> {
    return this.profiles.get(chatId) ?? null;
  }

  public async ensureProfile(chatId: number, username: string | null): Promise<ChatProfile> {
    const existing: ChatProfile | undefined = this.profiles.get(chatId);

    if (existing !== undefined) {
      if (username === null || existing.username === username) {
        return existing;
      }

      return this.save({ ...existing, username, updatedAtIso: new Date().toISOString() });
    }

    const nowIso: string = new Date().toISOString();
    return this.save({
      chatId,
      username,
      walletAddress: null,
      walletNetwork: null,
      createdAtIso: nowIso,
      updatedAtIso: nowIso,
    });
  }

  public async bindWallet(chatId: number, wallet: WalletBinding): Promise<ChatProfile> {
    const profile: ChatProfile = await this.ensureProfile(chatId, null);

    return this.save({
      ...profile,
      walletAddress: wallet.address,
      walletNetwork: wallet.network,
      updatedAtIso: new Date().toISOString(),
    });
  }

  private save(profile: ChatProfile): ChatProfile {
    this.profiles.set(profile.chatId, profile);
    return profile;
  }
}
