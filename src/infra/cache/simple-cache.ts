import NodeCache from 'node-cache';

import type { ICacheStats, ISimpleCache, SimpleCacheOptions } from './cache.interfaces';

/**
 * node-cache with insertion-order eviction once `maxKeys` is reached.
 * Entries are stored by reference.
 */
export class SimpleCacheImpl<T> implements ISimpleCache<T> {
  private readonly cache: NodeCache;
  private readonly maxKeys: number | undefined;
  private evictions: number = 0;

  public constructor(options: SimpleCacheOptions) {
    this.maxKeys = options.maxKeys;
    this.cache = new NodeCache({
      stdTTL: options.ttlSec,
      checkperiod: options.checkperiod ?? 0,
      useClones: false,
    });

    const onExpire: ((key: string) => void) | undefined = options.onExpire;

    if (onExpire !== undefined) {
      this.cache.on('expired', (key: NodeCache.Key): void => {
        onExpire(String(key));
      });
    }
  }

  public get(key: string): T | undefined {
    return this.cache.get<T>(key);
  }

  public set(key: string, value: T): void {
    if (this.maxKeys !== undefined) {
      this.evictIfNeeded(key, this.maxKeys);
    }
    this.cache.set(key, value);
  }

  public take(key: string): T | undefined {
    return this.cache.take<T>(key);
  }

  public del(key: string): boolean {
    return this.cache.del(key) > 0;
  }

  public has(key: string): boolean {
    return this.cache.has(key);
  }

  /** Live entries only. Entries past their ttl are purged (and reported) on the way. */
  public size(): number {
    return this.liveKeys().length;
  }

  public stats(): ICacheStats {
    const nodeStats: NodeCache.Stats = this.cache.getStats();
    return {
      keys: nodeStats.keys,
      hits: nodeStats.hits,
      misses: nodeStats.misses,
      evictions: this.evictions,
    };
  }

  private evictIfNeeded(incomingKey: string, maxKeys: number): void {
    if (this.cache.has(incomingKey)) {
      return;
    }

    const allKeys: string[] = this.liveKeys();

    while (allKeys.length >= maxKeys) {
      const oldestKey: string | undefined = allKeys.shift();

      if (oldestKey === undefined) {
        break;
      }

      this.cache.del(oldestKey);
      this.evictions += 1;
    }
  }

  private liveKeys(): string[] {
    // node-cache only drops an expired entry once it is read or checked.
    return this.cache.keys().filter((key: string): boolean => this.cache.has(key));
  }
}
