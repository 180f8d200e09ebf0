import { resolveIntent } from "./flightQuery";
import type { FlightQuery } from "./flightQuery";
import type { FlightResult } from "./flightResult";

type FilterCriteria = Pick<FlightQuery, "minPrice" | "maxPrice" | "currency">;

export function applyFlightFilters(results: readonly FlightResult[], criteria: FilterCriteria): FlightResult[] {
  const currency = criteria.currency?.trim().toUpperCase() || null;
  return results.filter((result) => {
    if (criteria.minPrice !== null && result.price < criteria.minPrice) return false;
    if (criteria.maxPrice !== null && result.price > criteria.maxPrice) return false;
    if (currency && result.currency.trim().toUpperCase() !== currency) return false;
    return true;
  });
}

/**
 * Orders results for the query intent. Sorting is stable, so ties keep the
 * order adapters returned them in; "direct" only removes connecting flights
 * and leaves the accumulated order untouched.
 */
export function rankByIntent(results: readonly FlightResult[], intent: string | null | undefined): FlightResult[] {
  switch (resolveIntent(intent)) {
    case "earliest":
      return results.slice().sort((a, b) => compareStrings(a.departureTime, b.departureTime));
    case "direct":
      return results.filter((result) => result.stops === 0);
    case "cheapest":
    case "price_range":
    case "default":
      return results.slice().sort((a, b) => a.price - b.price);
  }
}

export function truncateResults(results: readonly FlightResult[], limit: number | null | undefined): FlightResult[] {
  if (typeof limit !== "number" || limit <= 0 || results.length <= limit) return results.slice();
  return results.slice(0, limit);
}

export function rankFlightResults(results: readonly FlightResult[], query: FlightQuery): FlightResult[] {
  const filtered = applyFlightFilters(results, query);
  const ranked = rankByIntent(filtered, query.intent);
  return truncateResults(ranked, query.limit);
}

function compareStrings(a: string, b: string): number {
  if (a === b) return 0;
  return a < b ? -1 : 1;
}
