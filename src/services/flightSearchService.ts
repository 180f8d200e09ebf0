import { nanoid } from "nanoid";
import { describeError } from "../core/errors";
import type { FlightQuery } from "../core/flightQuery";
import type { FlightResult } from "../core/flightResult";
import { rankFlightResults } from "../core/ranking";
import type { FlightAdapter } from "../adapters/providers/types";

export type FlightSearchEngine = {
  searchFlights(query: FlightQuery): Promise<FlightResult[]>;
};

/**
 * Fans a query out to every adapter that supports it, then filters, ranks
 * and truncates the merged list. Results are merged in adapter registration
 * order whatever order the calls finish in.
 */
export class FlightSearchService implements FlightSearchEngine {
  constructor(private readonly adapters: readonly FlightAdapter[]) {}

  get providerNames(): string[] {
    return this.adapters.map((adapter) => adapter.name);
  }

  async searchFlights(query: FlightQuery): Promise<FlightResult[]> {
    const searchId = nanoid(10);
    console.info(`[flight-search] ${searchId} ${query.origin} -> ${query.destination} (${query.intent})`);

    if (this.adapters.length === 0) {
      console.warn(`[flight-search] ${searchId} no adapters registered`);
      return [];
    }

    const active = this.adapters.filter((adapter) => supportsSafely(adapter, query, searchId));
    const settled = await Promise.allSettled(
      active.map((adapter) => Promise.resolve().then(() => adapter.search(query)))
    );

    const merged: FlightResult[] = [];
    settled.forEach((outcome, index) => {
      const adapterName = active[index]?.name ?? "unknown";
      if (outcome.status === "fulfilled") {
        merged.push(...outcome.value);
      } else {
        console.warn(`[flight-search] ${searchId} adapter ${adapterName} failed: ${describeError(outcome.reason)}`);
      }
    });

    const ranked = rankFlightResults(merged, query);
    console.info(`[flight-search] ${searchId} retrieved ${merged.length}, returning ${ranked.length}`);
    return ranked;
  }
}

function supportsSafely(adapter: FlightAdapter, query: FlightQuery, searchId: string): boolean {
  try {
    return adapter.supports(query);
  } catch (error) {
    console.warn(`[flight-search] ${searchId} adapter ${adapter.name} rejected query: ${describeError(error)}`);
    return false;
  }
}
