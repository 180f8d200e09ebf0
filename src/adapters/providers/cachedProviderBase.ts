import { describeError } from "../../core/errors";
import type { CacheStore } from "../persistence/store";

/**
 * Cache-aside over a shared CacheStore. An unreachable or corrupt store is
 * treated as a miss, and a failed write still returns the fresh value.
 */
export abstract class CachedProviderBase<TRequest, TValue> {
  protected abstract readonly label: string;

  constructor(protected readonly store: CacheStore) {}

  protected abstract cacheKey(request: TRequest): string;

  protected abstract loadFresh(request: TRequest): Promise<TValue>;

  /** Validates a stored value; `null` discards it. */
  protected abstract revive(cached: unknown): TValue | null;

  async getOrCompute(request: TRequest, ttlMs: number): Promise<TValue> {
    const key = this.cacheKey(request);
    const cached = await this.readCached(key);
    if (cached !== null) {
      console.info(`[${this.label}] hit ${key}`);
      return cached;
    }

    const fresh = await this.loadFresh(request);
    if (ttlMs > 0) {
      await this.writeCached(key, fresh, ttlMs);
    }
    return fresh;
  }

  async invalidate(request: TRequest): Promise<void> {
    const key = this.cacheKey(request);
    try {
      await this.store.delete(key);
    } catch (error) {
      console.warn(`[${this.label}] delete failed for ${key}: ${describeError(error)}`);
    }
  }

  private async readCached(key: string): Promise<TValue | null> {
    let raw: unknown;
    try {
      raw = await this.store.get(key);
    } catch (error) {
      console.warn(`[${this.label}] read failed for ${key}, computing fresh: ${describeError(error)}`);
      return null;
    }
    if (raw === null || raw === undefined) return null;

    const revived = this.revive(raw);
    if (revived === null) {
      console.warn(`[${this.label}] discarding malformed entry ${key}`);
    }
    return revived;
  }

  private async writeCached(key: string, value: TValue, ttlMs: number): Promise<void> {
    try {
      await this.store.set(key, value, ttlMs);
    } catch (error) {
      console.warn(`[${this.label}] write failed for ${key}: ${describeError(error)}`);
    }
  }
}
