import test from "node:test";
import assert from "node:assert/strict";
import { MemoryCacheStore } from "../../src/adapters/persistence/memoryStore";
import type { CacheStore } from "../../src/adapters/persistence/store";
import { CacheStoreError } from "../../src/core/errors";
import { flightQueryFingerprint } from "../../src/core/fingerprint";
import type { FlightQuery } from "../../src/core/flightQuery";
import type { FlightResult } from "../../src/core/flightResult";
import { FlightResultCache } from "../../src/services/flightResultCache";
import { makeQuery, makeResult } from "../support/fixtures";

const TTL_MS = 600_000;

function countingEngine(results: FlightResult[]) {
  const engine = {
    calls: 0,
    async searchFlights(_query: FlightQuery): Promise<FlightResult[]> {
      engine.calls += 1;
      return results;
    }
  };
  return engine;
}

test("getOrCompute serves a second equivalent query from the cache", async () => {
  const engine = countingEngine([makeResult({ providerFlightId: "a", price: 3000 })]);
  const cache = new FlightResultCache(new MemoryCacheStore(), engine);

  const first = await cache.getOrCompute(makeQuery({ departDate: "2026-11-01", limit: 5 }), TTL_MS);
  const second = await cache.getOrCompute(makeQuery({ departDate: "2026-11-20", limit: 1 }), TTL_MS);

  assert.equal(engine.calls, 1);
  assert.deepEqual(second, first);
  assert.deepEqual(second.map((result) => result.providerFlightId), ["a"]);
});

test("getOrCompute recomputes for a query with a different fingerprint", async () => {
  const engine = countingEngine([makeResult()]);
  const cache = new FlightResultCache(new MemoryCacheStore(), engine);

  await cache.getOrCompute(makeQuery({ intent: "cheapest" }), TTL_MS);
  await cache.getOrCompute(makeQuery({ intent: "earliest" }), TTL_MS);

  assert.equal(engine.calls, 2);
});

test("getOrCompute treats entries older than the TTL as absent", async () => {
  let now = 5_000_000;
  const engine = countingEngine([makeResult()]);
  const cache = new FlightResultCache(new MemoryCacheStore({ now: () => now }), engine);
  const query = makeQuery();

  await cache.getOrCompute(query, TTL_MS);
  now += TTL_MS - 1;
  await cache.getOrCompute(query, TTL_MS);
  assert.equal(engine.calls, 1);

  now += 1;
  await cache.getOrCompute(query, TTL_MS);
  assert.equal(engine.calls, 2);
});

test("getOrCompute falls through to live results when the store is unreachable", async () => {
  const unreachable: CacheStore = {
    get: async () => {
      throw new CacheStoreError("connection refused");
    },
    set: async () => {
      throw new CacheStoreError("connection refused");
    },
    delete: async () => {
      throw new CacheStoreError("connection refused");
    }
  };
  const engine = countingEngine([makeResult({ providerFlightId: "live" })]);
  const cache = new FlightResultCache(unreachable, engine);

  const first = await cache.getOrCompute(makeQuery(), TTL_MS);
  const second = await cache.getOrCompute(makeQuery(), TTL_MS);

  assert.deepEqual(first.map((result) => result.providerFlightId), ["live"]);
  assert.deepEqual(second.map((result) => result.providerFlightId), ["live"]);
  assert.equal(engine.calls, 2);
});

test("getOrCompute discards a malformed cached entry", async () => {
  const store = new MemoryCacheStore();
  const query = makeQuery();
  await store.set(`flightResults:${flightQueryFingerprint(query)}`, [{ price: "cheap" }], TTL_MS);
  const engine = countingEngine([makeResult({ providerFlightId: "fresh" })]);
  const cache = new FlightResultCache(store, engine);

  const results = await cache.getOrCompute(query, TTL_MS);

  assert.equal(engine.calls, 1);
  assert.deepEqual(results.map((result) => result.providerFlightId), ["fresh"]);
});

test("getOrCompute does not store anything with a zero TTL", async () => {
  const engine = countingEngine([makeResult()]);
  const cache = new FlightResultCache(new MemoryCacheStore(), engine);

  await cache.getOrCompute(makeQuery(), 0);
  await cache.getOrCompute(makeQuery(), 0);

  assert.equal(engine.calls, 2);
});

test("invalidate drops the entry for a query", async () => {
  const engine = countingEngine([makeResult()]);
  const cache = new FlightResultCache(new MemoryCacheStore(), engine);
  const query = makeQuery();

  await cache.getOrCompute(query, TTL_MS);
  await cache.invalidate(query);
  await cache.getOrCompute(query, TTL_MS);

  assert.equal(engine.calls, 2);
});
