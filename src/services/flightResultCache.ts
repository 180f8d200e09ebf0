import { flightQueryFingerprint } from "../core/fingerprint";
import type { FlightQuery } from "../core/flightQuery";
import { FlightResultListSchema } from "../core/flightResult";
import type { FlightResult } from "../core/flightResult";
import { CachedProviderBase } from "../adapters/providers/cachedProviderBase";
import type { CacheStore } from "../adapters/persistence/store";
import type { FlightSearchEngine } from "./flightSearchService";

const KEY_PREFIX = "flightResults:";

export class FlightResultCache extends CachedProviderBase<FlightQuery, FlightResult[]> {
  protected readonly label = "result-cache";

  constructor(store: CacheStore, private readonly engine: FlightSearchEngine) {
    super(store);
  }

  protected cacheKey(query: FlightQuery): string {
    return `${KEY_PREFIX}${flightQueryFingerprint(query)}`;
  }

  protected loadFresh(query: FlightQuery): Promise<FlightResult[]> {
    return this.engine.searchFlights(query);
  }

  protected revive(cached: unknown): FlightResult[] | null {
    const parsed = FlightResultListSchema.safeParse(cached);
    return parsed.success ? parsed.data : null;
  }
}
