import { z } from "zod";
import { MappingError, ProviderError, describeError } from "../../core/errors";
import type { FlightQuery } from "../../core/flightQuery";
import type { FlightResult } from "../../core/flightResult";
import type { AmadeusClient } from "../integrations/amadeus";
import type { TokenProvider } from "../../services/tokenProvider";
import { DEFAULT_RETRY_OPTIONS, withRetry } from "../../runtime/retry";
import type { RetryOptions } from "../../runtime/retry";
import type { FlightAdapter } from "./types";

const SegmentSchema = z.object({
  departure: z.object({ iataCode: z.string().min(1), at: z.string().min(1) }),
  arrival: z.object({ iataCode: z.string().min(1), at: z.string().min(1) }),
  carrierCode: z.string().min(1)
});

const ItinerarySchema = z.object({
  segments: z.array(SegmentSchema).min(1)
});

const OfferSchema = z.object({
  id: z.union([z.string(), z.number()]).transform(String),
  price: z.object({
    currency: z.string().min(1),
    total: z.union([z.string(), z.number()])
  }),
  itineraries: z.array(z.unknown()).min(1)
});

export type AmadeusAdapterOptions = {
  enabled: boolean;
  retry?: RetryOptions;
};

export class AmadeusFlightAdapter implements FlightAdapter {
  readonly name = "amadeus";
  private readonly retry: RetryOptions;

  constructor(
    private readonly client: AmadeusClient,
    private readonly tokens: TokenProvider,
    private readonly options: AmadeusAdapterOptions
  ) {
    this.retry = {
      ...(options.retry ?? DEFAULT_RETRY_OPTIONS),
      isRetryable: isRetryableSearchError
    };
  }

  supports(query: FlightQuery): boolean {
    return this.options.enabled && Boolean(query.origin && query.destination && query.departDate);
  }

  async search(query: FlightQuery): Promise<FlightResult[]> {
    console.info(`[amadeus] searching ${query.origin} -> ${query.destination} on ${query.departDate}`);
    try {
      return await withRetry(
        async () => this.searchWithToken(query, await this.tokens.ensureToken()),
        this.retry,
        this.name
      );
    } catch (error) {
      console.warn(`[amadeus] search failed, returning no results: ${describeError(error)}`);
      return [];
    }
  }

  async searchWithToken(query: FlightQuery, accessToken: string): Promise<FlightResult[]> {
    let payload: unknown;
    try {
      payload = await this.client.searchFlightOffers(query, accessToken);
    } catch (error) {
      if (error instanceof ProviderError && error.status === 401) {
        await this.tokens.invalidate();
      }
      throw error;
    }

    const results = mapAmadeusOffers(payload, { provider: this.name, cabinClass: query.cabinClass });
    console.info(`[amadeus] parsed ${results.length} flight offers`);
    return results;
  }
}

// A rejected token is cleared before the retry, so the next attempt refreshes it.
function isRetryableSearchError(error: unknown): boolean {
  return error instanceof ProviderError && (error.retryable || error.status === 401);
}

type MappingContext = {
  provider: string;
  cabinClass: string;
};

export function mapAmadeusOffers(payload: unknown, context: MappingContext): FlightResult[] {
  const offers = extractOffers(payload);
  const results: FlightResult[] = [];
  for (const offer of offers) {
    try {
      results.push(mapAmadeusOffer(offer, context));
    } catch (error) {
      console.warn(`[amadeus] skipping offer: ${describeError(error)}`);
    }
  }
  return results;
}

export function mapAmadeusOffer(raw: unknown, context: MappingContext): FlightResult {
  const offer = OfferSchema.safeParse(raw);
  if (!offer.success) {
    throw new MappingError(offerIdOf(raw), "offer is missing id, price or itineraries");
  }

  const itinerary = ItinerarySchema.safeParse(offer.data.itineraries[0]);
  if (!itinerary.success) {
    throw new MappingError(offer.data.id, `offer ${offer.data.id} has no usable segments`);
  }

  const segments = itinerary.data.segments;
  const first = segments[0];
  const last = segments[segments.length - 1];
  const price = parsePrice(offer.data.price.total);
  if (price === null) {
    throw new MappingError(offer.data.id, `offer ${offer.data.id} has a non-numeric total price`);
  }

  return {
    provider: context.provider,
    providerFlightId: offer.data.id,
    origin: first.departure.iataCode,
    destination: last.arrival.iataCode,
    airline: first.carrierCode,
    departureTime: first.departure.at,
    arrivalTime: last.arrival.at,
    stops: segments.length - 1,
    price,
    currency: offer.data.price.currency,
    cabinClass: context.cabinClass
  };
}

function extractOffers(payload: unknown): unknown[] {
  if (typeof payload !== "object" || payload === null || !("data" in payload)) return [];
  return Array.isArray(payload.data) ? payload.data : [];
}

function offerIdOf(raw: unknown): string | null {
  if (typeof raw !== "object" || raw === null || !("id" in raw)) return null;
  return typeof raw.id === "string" || typeof raw.id === "number" ? String(raw.id) : null;
}

function parsePrice(total: string | number): number | null {
  if (typeof total === "number") return Number.isFinite(total) ? total : null;
  const trimmed = total.trim();
  if (!trimmed) return null;
  const parsed = Number(trimmed);
  return Number.isFinite(parsed) ? parsed : null;
}
