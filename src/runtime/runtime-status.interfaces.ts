export enum DispatcherState {
  STOPPED = 'stopped',
  IDLE_POLLING = 'idle_polling',
  PROCESSING_BATCH = 'processing_batch',
}

export type DispatcherCounters = {
  readonly processed: number;
  readonly duplicates: number;
  readonly rateLimited: number;
  readonly handlerErrors: number;
  readonly pollFailures: number;
};

export type DispatcherRuntimeSnapshot = DispatcherCounters & {
  readonly state: DispatcherState;
  readonly offset: number | null;
  readonly lastUpdateId: number | null;
  readonly consecutivePollFailures: number;
  readonly activeListeners: number;
  readonly lastPollAtIso: string | null;
  readonly lastErrorMessage: string | null;
  readonly updatedAtIso: string | null;
};

export const INITIAL_DISPATCHER_SNAPSHOT: DispatcherRuntimeSnapshot = {
  state: DispatcherState.STOPPED,
  offset: null,
  lastUpdateId: null,
  processed: 0,
  duplicates: 0,
  rateLimited: 0,
  handlerErrors: 0,
  pollFailures: 0,
  consecutivePollFailures: 0,
  activeListeners: 0,
  lastPollAtIso: null,
  lastErrorMessage: null,
  updatedAtIso: null,
};
