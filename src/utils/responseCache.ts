import NodeCache from 'node-cache';
import { createLogger, type Logger } from './logger';

export interface ResponseCacheOptions {
  ttlSeconds: number;
  maxEntries: number;
  logger?: Logger;
}

export interface ResponseCacheStats {
  entries: number;
  evictions: number;
}

/**
 * TTL cache with a hard entry bound. When full, the oldest inserted key is
 * evicted before the new one goes in; reads do not refresh an entry's
 * position.
 */
export class ResponseCache<T = unknown> {
  private readonly cache: NodeCache;
  private readonly maxEntries: number;
  private readonly logger: Logger;
  private evictions = 0;

  constructor(options: ResponseCacheOptions) {
    if (!Number.isFinite(options.ttlSeconds) || options.ttlSeconds <= 0) {
      throw new RangeError(`ttlSeconds must be a positive number, got ${options.ttlSeconds}`);
    }
    if (!Number.isInteger(options.maxEntries) || options.maxEntries < 1) {
      throw new RangeError(`maxEntries must be a positive integer, got ${options.maxEntries}`);
    }

    this.maxEntries = options.maxEntries;
    this.logger = options.logger ?? createLogger('response-cache');
    this.cache = new NodeCache({
      stdTTL: options.ttlSeconds,
      checkperiod: 0, // expired keys are dropped on read or evicted by the bound
      useClones: false,
      maxKeys: options.maxEntries,
    });
  }

  get(key: string): T | undefined {
    return this.cache.get<T>(key);
  }

  set(key: string, value: T): void {
    // Re-inserting moves the key to the back of the eviction order.
    this.cache.del(key);

    const keys = this.cache.keys().filter(live => this.cache.has(live));
    for (let i = 0; keys.length - i >= this.maxEntries; i++) {
      this.cache.del(keys[i]);
      this.evictions++;
      this.logger.debug({ key: keys[i] }, 'Cache evicted (oldest)');
    }

    this.cache.set(key, value);
  }

  /** Live entries; expired ones are purged while counting. */
  get size(): number {
    return this.cache.keys().filter(key => this.cache.has(key)).length;
  }

  clear(): void {
    this.cache.flushAll();
  }

  getStats(): ResponseCacheStats {
    return { entries: this.size, evictions: this.evictions };
  }
}
