import { type WalletBinding, WalletNetwork } from './chat-profile.interfaces';

const EVM_ADDRESS_PATTERN: RegExp = /^0x[a-fA-F0-9]{40}$/;
const SOLANA_ADDRESS_PATTERN: RegExp = /^[1-9A-HJ-NP-Za-km-z]{32,44}$/;

export const parseWalletAddress = (rawValue: string): WalletBinding | null => {
  const candidate: string = rawValue.trim();

  if (EVM_ADDRESS_PATTERN.test(candidate)) {
    return { address: candidate.toLowerCase(), network: WalletNetwork.EVM };
  }

  if (SOLANA_ADDRESS_PATTERN.test(candidate)) {
    return { address: candidate, network: WalletNetwork.SOLANA };
  }

  return null;
};
