import dayjs from "dayjs";
import { AuthError, describeError } from "../core/errors";
import { DEFAULT_TOKEN_SAFETY_MARGIN_MS, isTokenUsable } from "../adapters/persistence/store";
import type { TokenStore } from "../adapters/persistence/store";
import type { AccessTokenGrant } from "../adapters/integrations/amadeus";
import { RefreshGuard } from "../runtime/refreshGuard";

export type TokenExchange = () => Promise<AccessTokenGrant>;

export type TokenProviderOptions = {
  now?: () => number;
  safetyMarginMs?: number;
};

/**
 * Hands out bearer tokens for one provider, refreshing through the
 * client-credentials exchange when the stored token is missing or close to
 * expiry.
 *
 * Only one refresh runs at a time per process. A caller that loses the
 * guard does not wait on it: it takes whatever token is stored, as long as
 * that token has not actually expired, and otherwise shares the result of
 * the refresh already in flight.
 */
export class TokenProvider {
  private readonly guard = new RefreshGuard();
  private inFlight: Promise<string> | null = null;
  private readonly now: () => number;
  private readonly safetyMarginMs: number;

  constructor(
    private readonly store: TokenStore,
    private readonly exchange: TokenExchange,
    options: TokenProviderOptions = {}
  ) {
    this.now = options.now ?? Date.now;
    this.safetyMarginMs = options.safetyMarginMs ?? DEFAULT_TOKEN_SAFETY_MARGIN_MS;
  }

  get provider(): string {
    return this.store.provider;
  }

  async ensureToken(): Promise<string> {
    const stored = await this.store.get();
    if (stored && isTokenUsable(stored, this.now(), this.safetyMarginMs)) {
      return stored.accessToken;
    }

    const release = this.guard.tryAcquire();
    if (!release) {
      return this.useConcurrentRefresh();
    }

    const refresh = this.refreshUnlessStored();
    this.inFlight = refresh;
    try {
      return await refresh;
    } finally {
      this.inFlight = null;
      release();
    }
  }

  async invalidate(): Promise<void> {
    console.info(`[token] clearing stored ${this.provider} token`);
    await this.store.clear();
  }

  private async useConcurrentRefresh(): Promise<string> {
    const pending = this.inFlight;
    const current = await this.store.get();
    if (current && current.expiresAt > this.now()) {
      return current.accessToken;
    }
    if (pending) {
      return pending;
    }
    throw new AuthError(`A ${this.provider} token refresh is already running and no usable token is stored.`);
  }

  // A read that started before the previous holder's put can arrive after it released the guard.
  private async refreshUnlessStored(): Promise<string> {
    const current = await this.store.get();
    if (current && isTokenUsable(current, this.now(), this.safetyMarginMs)) {
      return current.accessToken;
    }
    return this.refresh();
  }

  private async refresh(): Promise<string> {
    console.info(`[token] fetching new ${this.provider} access token`);
    let grant: AccessTokenGrant;
    try {
      grant = await this.exchange();
    } catch (error) {
      if (error instanceof AuthError) throw error;
      throw new AuthError(`Token exchange failed: ${describeError(error)}`, { cause: error });
    }

    const expiresAt = dayjs(this.now())
      .add(grant.expiresInSeconds, "second")
      .subtract(this.safetyMarginMs, "millisecond")
      .valueOf();
    await this.store.put(grant.accessToken, expiresAt);
    console.info(`[token] stored ${this.provider} token, expires ${dayjs(expiresAt).toISOString()}`);
    return grant.accessToken;
  }
}
