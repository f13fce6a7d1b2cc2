import { ICacheManager } from './ICacheManager.js';
import { componentLogger, type Logger } from '../../logger.js';

interface CacheEntry {
  value: unknown;
  expiresAt: number;
}

// in-process cache with per-region TTL; concurrent misses on one key share a single populate
export class MemoryCacheManager implements ICacheManager {
  private entries: Map<string, CacheEntry> = new Map();
  private inFlight: Map<string, Promise<unknown>> = new Map();
  private readonly log: Logger;

  constructor(
    private readonly regionTtlSeconds: Record<string, number> = {},
    private readonly defaultTtlSeconds: number = 300,
    logger?: Logger
  ) {
    this.log = logger ?? componentLogger('MemoryCacheManager');
  }

  async getOrCompute<T>(key: string, region: string, factory: () => Promise<T>): Promise<T> {
    const fullKey = this.fullKey(key, region);

    const entry = this.entries.get(fullKey);
    if (entry && entry.expiresAt > Date.now()) {
      this.log.debug({ key: fullKey }, 'cache hit');
      return entry.value as T;
    }
    if (entry) this.entries.delete(fullKey);

    const pending = this.inFlight.get(fullKey);
    if (pending) {
      this.log.debug({ key: fullKey }, 'awaiting in-flight populate');
      return pending as Promise<T>;
    }

    this.log.debug({ key: fullKey }, 'cache miss');
    const populate: Promise<T> = factory().then(
      (value) => {
        // invalidate() drops the in-flight marker, so a stale result no longer owns the key
        if (this.inFlight.get(fullKey) === populate) {
          this.inFlight.delete(fullKey);
          this.store(fullKey, value, region);
        }
        return value;
      },
      (error: unknown) => {
        if (this.inFlight.get(fullKey) === populate) {
          this.inFlight.delete(fullKey);
        }
        throw error;
      }
    );
    this.inFlight.set(fullKey, populate);
    return populate;
  }

  invalidate(key: string, region: string): void {
    const fullKey = this.fullKey(key, region);
    this.entries.delete(fullKey);
    this.inFlight.delete(fullKey);
  }

  clearRegion(region: string): void {
    const prefix = `${region}|`;
    for (const fullKey of [...this.entries.keys(), ...this.inFlight.keys()]) {
      if (fullKey.startsWith(prefix)) {
        this.entries.delete(fullKey);
        this.inFlight.delete(fullKey);
      }
    }
  }

  // Utility methods for testing
  size(): number {
    return this.entries.size;
  }

  trackedKeys(): number {
    return this.entries.size + this.inFlight.size;
  }

  private store(fullKey: string, value: unknown, region: string): void {
    const now = Date.now();
    for (const [other, entry] of this.entries) {
      if (entry.expiresAt <= now) this.entries.delete(other);
    }
    this.entries.set(fullKey, { value, expiresAt: now + this.ttlFor(region) * 1000 });
  }

  private ttlFor(region: string): number {
    return this.regionTtlSeconds[region] ?? this.defaultTtlSeconds;
  }

  private fullKey(key: string, region: string): string {
    return `${region}|${key}`;
  }
}
