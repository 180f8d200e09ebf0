import dayjs from "dayjs";
import { z } from "zod";
import type { SupabaseClient } from "@supabase/supabase-js";
import { CacheStoreError, describeError } from "../../core/errors";
import { DEFAULT_TOKEN_SAFETY_MARGIN_MS, isTokenUsable } from "./store";
import type { CacheStore, ProviderToken, StoreClockOptions, TokenStore } from "./store";

const TOKENS_TABLE = "app_provider_tokens";
const RESULT_CACHE_TABLE = "app_flight_result_cache";

const TokenRowSchema = z.object({
  access_token: z.string().min(1),
  expires_at: z.string()
});

const CacheRowSchema = z.object({
  payload: z.unknown(),
  expires_at: z.string()
});

export class SupabaseTokenStore implements TokenStore {
  private readonly now: () => number;
  private readonly safetyMarginMs: number;

  constructor(
    private readonly client: SupabaseClient,
    readonly provider: string,
    options: StoreClockOptions = {}
  ) {
    this.now = options.now ?? Date.now;
    this.safetyMarginMs = options.safetyMarginMs ?? DEFAULT_TOKEN_SAFETY_MARGIN_MS;
  }

  async get(): Promise<ProviderToken | null> {
    try {
      const response = await this.client
        .from(TOKENS_TABLE)
        .select("access_token, expires_at")
        .eq("provider", this.provider)
        .maybeSingle();
      if (response.error) {
        console.warn(`[token] read failed for ${this.provider}: ${response.error.message}`);
        return null;
      }
      const row = TokenRowSchema.safeParse(response.data);
      if (!row.success) return null;
      const expiresAt = dayjs(row.data.expires_at);
      if (!expiresAt.isValid()) return null;
      return { accessToken: row.data.access_token, expiresAt: expiresAt.valueOf() };
    } catch (error) {
      console.warn(`[token] read failed for ${this.provider}: ${describeError(error)}`);
      return null;
    }
  }

  async put(accessToken: string, expiresAt: number): Promise<void> {
    try {
      const response = await this.client.from(TOKENS_TABLE).upsert({
        provider: this.provider,
        access_token: accessToken,
        expires_at: dayjs(expiresAt).toISOString()
      });
      if (response.error) {
        console.warn(`[token] write failed for ${this.provider}: ${response.error.message}`);
      }
    } catch (error) {
      console.warn(`[token] write failed for ${this.provider}: ${describeError(error)}`);
    }
  }

  async clear(): Promise<void> {
    try {
      const response = await this.client.from(TOKENS_TABLE).delete().eq("provider", this.provider);
      if (response.error) {
        console.warn(`[token] clear failed for ${this.provider}: ${response.error.message}`);
      }
    } catch (error) {
      console.warn(`[token] clear failed for ${this.provider}: ${describeError(error)}`);
    }
  }

  async isValid(): Promise<boolean> {
    return isTokenUsable(await this.get(), this.now(), this.safetyMarginMs);
  }
}

export class SupabaseCacheStore implements CacheStore {
  private readonly now: () => number;

  constructor(private readonly client: SupabaseClient, options: Pick<StoreClockOptions, "now"> = {}) {
    this.now = options.now ?? Date.now;
  }

  async get(key: string): Promise<unknown | null> {
    const response = await this.client
      .from(RESULT_CACHE_TABLE)
      .select("payload, expires_at")
      .eq("fingerprint", key)
      .maybeSingle();
    if (response.error) {
      throw new CacheStoreError(`Result cache read failed: ${response.error.message}`);
    }
    const row = CacheRowSchema.safeParse(response.data);
    if (!row.success) return null;
    const expiresAt = dayjs(row.data.expires_at);
    if (!expiresAt.isValid() || expiresAt.valueOf() <= this.now()) return null;
    return row.data.payload ?? null;
  }

  async set(key: string, value: unknown, ttlMs: number): Promise<void> {
    const response = await this.client.from(RESULT_CACHE_TABLE).upsert({
      fingerprint: key,
      payload: value,
      expires_at: dayjs(this.now() + ttlMs).toISOString()
    });
    if (response.error) {
      throw new CacheStoreError(`Result cache write failed: ${response.error.message}`);
    }
  }

  async delete(key: string): Promise<void> {
    const response = await this.client.from(RESULT_CACHE_TABLE).delete().eq("fingerprint", key);
    if (response.error) {
      throw new CacheStoreError(`Result cache delete failed: ${response.error.message}`);
    }
  }
}
