export interface ISimpleCache<T> {
  get(key: string): T | undefined;
  set(key: string, value: T): void;
  take(key: string): T | undefined;
  del(key: string): boolean;
  has(key: string): boolean;
  size(): number;
  stats(): ICacheStats;
}

export interface ICacheStats {
  readonly keys: number;
  readonly hits: number;
  readonly misses: number;
  readonly evictions: number;
}

export type SimpleCacheOptions = {
  readonly ttlSec: number;
  readonly maxKeys?: number;
  readonly checkperiod?: number;
  /** Called when an entry is found past its ttl, on access or on the check period. */
  readonly onExpire?: (key: string) => void;
};
