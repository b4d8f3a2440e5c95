export { type ISimpleCache, type ICacheStats, type SimpleCacheOptions } from './cache.interfaces';
export { SimpleCacheImpl } from './simple-cache';
