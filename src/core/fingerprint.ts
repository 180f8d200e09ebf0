import type { FlightQuery } from "./flightQuery";

const FINGERPRINT_DELIMITER = "_";

type FingerprintFields = Pick<
  FlightQuery,
  "origin" | "destination" | "passengers" | "cabinClass" | "currency" | "intent" | "minPrice" | "maxPrice"
>;

/**
 * Result-cache key for a query.
 *
 * Only the fields below take part. Departure and return dates, region,
 * airline and limit are ignored, so two searches that differ only in those
 * share one cache entry until it expires. Callers that need date-accurate
 * results should shorten the TTL or bypass the cache.
 */
export function flightQueryFingerprint(query: FingerprintFields): string {
  return [
    normalizeText(query.origin),
    normalizeText(query.destination),
    String(query.passengers ?? null),
    normalizeText(query.cabinClass),
    normalizeText(query.currency),
    normalizeText(query.intent),
    String(query.minPrice ?? null),
    String(query.maxPrice ?? null)
  ].join(FINGERPRINT_DELIMITER);
}

function normalizeText(value: string | null | undefined): string {
  if (value === null || value === undefined) return "null";
  return value.replace(/\s+/g, "").toUpperCase();
}
