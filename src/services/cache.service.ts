import { logger } from '../config/logger.config';

interface CacheEntry<T> {
  value: T;
  expiresAt: number;
}

/**
 * In-process TTL cache for reference data (player index, season tables,
 * percentile distributions). Entries are replaced, never mutated.
 * Concurrent loads of the same key share one in-flight promise.
 */
export class CacheService<T> {
  private readonly entries = new Map<string, CacheEntry<T>>();
  private readonly inFlight = new Map<string, Promise<T>>();

  constructor(
    private readonly prefix: string,
    private readonly defaultTtlSeconds = 300,
    private readonly now: () => number = Date.now
  ) {}

  get(key: string): T | null {
    const entry = this.entries.get(this.prefix + key);
    if (!entry) return null;
    if (entry.expiresAt <= this.now()) {
      this.entries.delete(this.prefix + key);
      return null;
    }
    return entry.value;
  }

  set(key: string, value: T, ttlSeconds = this.defaultTtlSeconds): void {
    this.entries.set(this.prefix + key, { value, expiresAt: this.now() + ttlSeconds * 1000 });
  }

  /**
   * Return the cached value, or run the loader once and cache its result.
   * A failed load is not cached.
   */
  async getOrLoad(
    key: string,
    loader: () => Promise<T>,
    ttlSeconds = this.defaultTtlSeconds
  ): Promise<T> {
    const cached = this.get(key);
    if (cached !== null) return cached;

    const pending = this.inFlight.get(this.prefix + key);
    if (pending) return pending;

    const load = loader()
      .then((value) => {
        this.set(key, value, ttlSeconds);
        logger.debug('Cache filled', { key: this.prefix + key, ttlSeconds });
        return value;
      })
      .finally(() => {
        this.inFlight.delete(this.prefix + key);
      });

    this.inFlight.set(this.prefix + key, load);
    return load;
  }
}
