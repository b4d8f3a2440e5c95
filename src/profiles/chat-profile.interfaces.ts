export enum WalletNetwork {
  EVM = 'evm',
  SOLANA = 'solana',
}

export type ChatProfile = {
  readonly chatId: number;
  readonly username: string | null;
  readonly walletAddress: string | null;
  readonly walletNetwork: WalletNetwork | null;
  readonly createdAtIso: string;
  readonly updatedAtIso: string;
};

export type WalletBinding = {
  readonly address: string;
  readonly network: WalletNetwork;
};

export interface IChatProfileRepository {
  findByChatId(chatId: number): Promise<ChatProfile | null>;
  ensureProfile(chatId: number, username: string | null): Promise<ChatProfile>;
  bindWallet(chatId: number, wallet: WalletBinding): Promise<ChatProfile>;
}
