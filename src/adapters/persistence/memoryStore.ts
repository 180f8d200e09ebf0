import { DEFAULT_TOKEN_SAFETY_MARGIN_MS, isTokenUsable } from "./store";
import type { CacheStore, ProviderToken, StoreClockOptions, TokenStore } from "./store";

export class MemoryTokenStore implements TokenStore {
  private token: ProviderToken | null = null;
  private readonly now: () => number;
  private readonly safetyMarginMs: number;

  constructor(readonly provider: string, options: StoreClockOptions = {}) {
    this.now = options.now ?? Date.now;
    this.safetyMarginMs = options.safetyMarginMs ?? DEFAULT_TOKEN_SAFETY_MARGIN_MS;
  }

  async get(): Promise<ProviderToken | null> {
    return this.token ? { ...this.token } : null;
  }

  async put(accessToken: string, expiresAt: number): Promise<void> {
    this.token = { accessToken, expiresAt };
  }

  async clear(): Promise<void> {
    this.token = null;
  }

  async isValid(): Promise<boolean> {
    return isTokenUsable(await this.get(), this.now(), this.safetyMarginMs);
  }
}

type MemoryCacheEntry = {
  expiresAt: number;
  payload: string;
};

// Values round-trip through JSON so callers see the same shapes a durable backend returns.
export class MemoryCacheStore implements CacheStore {
  private readonly entries = new Map<string, MemoryCacheEntry>();
  private readonly now: () => number;

  constructor(options: Pick<StoreClockOptions, "now"> = {}) {
    this.now = options.now ?? Date.now;
  }

  async get(key: string): Promise<unknown | null> {
    const entry = this.entries.get(key);
    if (!entry) return null;
    if (entry.expiresAt <= this.now()) {
      this.entries.delete(key);
      return null;
    }
    const value: unknown = JSON.parse(entry.payload);
    return value;
  }

  async set(key: string, value: unknown, ttlMs: number): Promise<void> {
    this.entries.set(key, {
      expiresAt: this.now() + ttlMs,
      payload: JSON.stringify(value)
    });
  }

  async delete(key: string): Promise<void> {
    this.entries.delete(key);
  }
}
