export enum UpdateOutcome {
  PROCESSED = 'processed',
  UNKNOWN_ROUTE = 'unknown_route',
  DUPLICATE = 'duplicate',
  RATE_LIMITED = 'rate_limited',
  FAILED = 'failed',
  IGNORED = 'ignored',
}

export type MutableDispatcherCounters = {
  processed: number;
  duplicates: number;
  rateLimited: number;
  handlerErrors: number;
  pollFailures: number;
};
