import { appConfig, hasAmadeusCredentials } from "../config/appConfig";
import type { PersistenceDriver } from "../config/appConfig";
import type { CacheStore, TokenStore } from "../adapters/persistence/store";
import { MemoryCacheStore, MemoryTokenStore } from "../adapters/persistence/memoryStore";
import { SupabaseCacheStore, SupabaseTokenStore } from "../adapters/persistence/supabaseStore";
import { getSupabaseAdmin } from "../adapters/persistence/supabaseClient";
import { AmadeusClient } from "../adapters/integrations/amadeus";
import type { FetchLike } from "../adapters/integrations/amadeus";
import { AmadeusFlightAdapter } from "../adapters/providers/amadeus";
import type { FlightAdapter } from "../adapters/providers/types";
import { TokenProvider } from "../services/tokenProvider";
import { FlightSearchService } from "../services/flightSearchService";
import { FlightResultCache } from "../services/flightResultCache";

const AMADEUS_PROVIDER = "amadeus";

export type AppContainerOptions = {
  persistenceDriver?: PersistenceDriver;
  flightAdapters?: FlightAdapter[];
  fetchImpl?: FetchLike;
  now?: () => number;
  resultsTtlMs?: number;
  resultsCacheEnabled?: boolean;
};

export class AppContainer {
  private tokenStore: TokenStore | null = null;
  private cacheStore: CacheStore | null = null;
  private amadeusClient: AmadeusClient | null = null;
  private tokenProvider: TokenProvider | null = null;
  private flightAdapters: FlightAdapter[] | null = null;
  private flightSearchService: FlightSearchService | null = null;
  private flightResultCache: FlightResultCache | null = null;

  constructor(private readonly options: AppContainerOptions = {}) {}

  get persistenceDriver(): PersistenceDriver {
    return this.options.persistenceDriver ?? appConfig.persistenceDriver;
  }

  get resultsTtlMs(): number {
    return this.options.resultsTtlMs ?? appConfig.flightResultsTtlSeconds * 1000;
  }

  get resultsCacheEnabled(): boolean {
    return this.options.resultsCacheEnabled ?? appConfig.flightResultsCacheEnabled;
  }

  getTokenStore(): TokenStore {
    if (!this.tokenStore) {
      const clock = { now: this.options.now, safetyMarginMs: safetyMarginMs() };
      this.tokenStore =
        this.persistenceDriver === "memory"
          ? new MemoryTokenStore(AMADEUS_PROVIDER, clock)
          : new SupabaseTokenStore(getSupabaseAdmin(), AMADEUS_PROVIDER, clock);
    }
    return this.tokenStore;
  }

  getCacheStore(): CacheStore {
    if (!this.cacheStore) {
      const clock = { now: this.options.now };
      this.cacheStore =
        this.persistenceDriver === "memory"
          ? new MemoryCacheStore(clock)
          : new SupabaseCacheStore(getSupabaseAdmin(), clock);
    }
    return this.cacheStore;
  }

  getAmadeusClient(): AmadeusClient {
    if (!this.amadeusClient) {
      this.amadeusClient = new AmadeusClient({
        baseUrl: appConfig.amadeusBaseUrl,
        tokenUrl: appConfig.amadeusTokenUrl,
        clientId: appConfig.amadeusClientId,
        clientSecret: appConfig.amadeusClientSecret,
        timeoutMs: appConfig.providerTimeoutMs,
        fetchImpl: this.options.fetchImpl
      });
    }
    return this.amadeusClient;
  }

  getTokenProvider(): TokenProvider {
    if (!this.tokenProvider) {
      const client = this.getAmadeusClient();
      this.tokenProvider = new TokenProvider(this.getTokenStore(), () => client.requestAccessToken(), {
        now: this.options.now,
        safetyMarginMs: safetyMarginMs()
      });
    }
    return this.tokenProvider;
  }

  getFlightAdapters(): FlightAdapter[] {
    if (!this.flightAdapters) {
      this.flightAdapters = this.options.flightAdapters ?? [
        new AmadeusFlightAdapter(this.getAmadeusClient(), this.getTokenProvider(), {
          enabled: hasAmadeusCredentials(),
          retry: {
            maxAttempts: appConfig.providerRetryAttempts,
            initialDelayMs: appConfig.providerRetryDelayMs,
            maxDelayMs: 2000,
            backoffMultiplier: 2
          }
        })
      ];
    }
    return this.flightAdapters;
  }

  getFlightSearchService(): FlightSearchService {
    if (!this.flightSearchService) {
      this.flightSearchService = new FlightSearchService(this.getFlightAdapters());
    }
    return this.flightSearchService;
  }

  getFlightResultCache(): FlightResultCache {
    if (!this.flightResultCache) {
      this.flightResultCache = new FlightResultCache(this.getCacheStore(), this.getFlightSearchService());
    }
    return this.flightResultCache;
  }
}

function safetyMarginMs(): number {
  return appConfig.tokenSafetyMarginSeconds * 1000;
}

let container: AppContainer | null = null;

export function getAppContainer(): AppContainer {
  if (!container) {
    container = new AppContainer();
  }
  return container;
}
