export type ProviderToken = {
  accessToken: string;
  /** Epoch milliseconds after which the token must not be sent upstream. */
  expiresAt: number;
};

/**
 * Single token slot for one provider. Reads and writes are best-effort: an
 * unreachable backend reads as "no token" and a failed write is dropped, so
 * the caller falls back to a refresh instead of failing.
 */
export type TokenStore = {
  readonly provider: string;
  get(): Promise<ProviderToken | null>;
  put(accessToken: string, expiresAt: number): Promise<void>;
  clear(): Promise<void>;
  isValid(): Promise<boolean>;
};

/** Key/value store with per-entry TTL; failures surface as CacheStoreError. */
export type CacheStore = {
  get(key: string): Promise<unknown | null>;
  set(key: string, value: unknown, ttlMs: number): Promise<void>;
  delete(key: string): Promise<void>;
};

export type StoreClockOptions = {
  now?: () => number;
  safetyMarginMs?: number;
};

export const DEFAULT_TOKEN_SAFETY_MARGIN_MS = 60_000;

export function isTokenUsable(token: ProviderToken | null, now: number, safetyMarginMs: number): boolean {
  if (!token || !token.accessToken) return false;
  return token.expiresAt - now > safetyMarginMs;
}
