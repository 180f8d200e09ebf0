import { FlightQuerySchema } from "../../src/core/flightQuery";
import type { FlightQuery, FlightQueryInput } from "../../src/core/flightQuery";
import type { FlightResult } from "../../src/core/flightResult";
import type { FlightAdapter } from "../../src/adapters/providers/types";

export function makeQuery(overrides: Partial<FlightQueryInput> = {}): FlightQuery {
  return FlightQuerySchema.parse({
    origin: "DEL",
    destination: "BOM",
    departDate: "2026-11-01",
    ...overrides
  });
}

export function makeResult(overrides: Partial<FlightResult> = {}): FlightResult {
  return {
    provider: "test",
    providerFlightId: "offer-1",
    origin: "DEL",
    destination: "BOM",
    airline: "AI",
    departureTime: "2026-11-01T08:00:00",
    arrivalTime: "2026-11-01T10:10:00",
    stops: 0,
    price: 5000,
    currency: "INR",
    cabinClass: "ECONOMY",
    ...overrides
  };
}

export type FakeAdapter = FlightAdapter & { calls: number };

export function fakeAdapter(
  name: string,
  results: FlightResult[] | (() => Promise<FlightResult[]>),
  supported = true
): FakeAdapter {
  const adapter: FakeAdapter = {
    name,
    calls: 0,
    supports: () => supported,
    search: async () => {
      adapter.calls += 1;
      return typeof results === "function" ? results() : results;
    }
  };
  return adapter;
}

export type Deferred<T> = {
  promise: Promise<T>;
  resolve: (value: T) => void;
  reject: (reason: unknown) => void;
};

export function deferred<T>(): Deferred<T> {
  let resolve: (value: T) => void = () => undefined;
  let reject: (reason: unknown) => void = () => undefined;
  const promise = new Promise<T>((res, rej) => {
    resolve = res;
    reject = rej;
  });
  return { promise, resolve, reject };
}

export function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { "Content-Type": "application/json" }
  });
}
