export enum GuardActionKind {
  MESSAGE = 'message',
  CALLBACK = 'callback',
  EXPORT = 'export',
}

export type GuardStats = {
  readonly seenUpdates: number;
  readonly seenCallbacks: number;
  readonly messageHashes: number;
  readonly trackedSenders: number;
  readonly rateLedgerEntries: number;
  readonly evictedLedgerEntries: number;
  readonly evictedUpdates: number;
};

export type RecentSenderMessage = {
  readonly text: string;
  readonly date: number;
};
