import test from "node:test";
import assert from "node:assert/strict";
import { AmadeusClient } from "../../src/adapters/integrations/amadeus";
import type { FetchLike } from "../../src/adapters/integrations/amadeus";
import { AuthError, ProviderError } from "../../src/core/errors";
import { jsonResponse, makeQuery } from "../support/fixtures";

type RecordedCall = { url: string; init?: RequestInit };

function makeClient(respond: (call: RecordedCall) => Promise<Response>) {
  const calls: RecordedCall[] = [];
  const fetchImpl: FetchLike = async (url, init) => {
    const call = { url, init };
    calls.push(call);
    return respond(call);
  };
  const client = new AmadeusClient({
    baseUrl: "https://flights.test/v2/shopping/",
    tokenUrl: "https://flights.test/v1/security/oauth2/token",
    clientId: "test-client",
    clientSecret: "test-secret",
    timeoutMs: 1000,
    fetchImpl
  });
  return { client, calls };
}

test("requestAccessToken posts a form-encoded client-credentials grant", async () => {
  const { client, calls } = makeClient(async () => jsonResponse({ access_token: "test-token", expires_in: 1799 }));

  const grant = await client.requestAccessToken();

  assert.deepEqual(grant, { accessToken: "test-token", expiresInSeconds: 1799 });
  assert.equal(calls.length, 1);
  assert.equal(calls[0].url, "https://flights.test/v1/security/oauth2/token");
  assert.equal(calls[0].init?.method, "POST");
  assert.equal(calls[0].init?.body, "grant_type=client_credentials&client_id=test-client&client_secret=test-secret");
  assert.equal(new Headers(calls[0].init?.headers).get("Content-Type"), "application/x-www-form-urlencoded");
});

test("requestAccessToken raises AuthError on a non-2xx answer", async () => {
  const { client } = makeClient(async () => jsonResponse({ error: "invalid_client" }, 401));
  await assert.rejects(client.requestAccessToken(), (error: unknown) => {
    assert.ok(error instanceof AuthError);
    assert.equal(error.message, "Token endpoint answered HTTP 401.");
    return true;
  });
});

test("requestAccessToken raises AuthError on a malformed body", async () => {
  const { client } = makeClient(async () => jsonResponse({ token_type: "Bearer" }));
  await assert.rejects(client.requestAccessToken(), AuthError);
});

test("requestAccessToken raises AuthError when the request itself fails", async () => {
  const { client } = makeClient(async () => {
    throw new TypeError("fetch failed");
  });
  await assert.rejects(client.requestAccessToken(), (error: unknown) => {
    assert.ok(error instanceof AuthError);
    assert.equal(error.message, "Token request failed: fetch failed");
    return true;
  });
});

test("searchFlightOffers sends the query parameters and bearer token", async () => {
  const { client, calls } = makeClient(async () => jsonResponse({ data: [] }));

  const payload = await client.searchFlightOffers(makeQuery({ passengers: 2, limit: 5 }), "test-token");

  assert.deepEqual(payload, { data: [] });
  assert.equal(
    calls[0].url,
    "https://flights.test/v2/shopping/flight-offers?originLocationCode=DEL&destinationLocationCode=BOM&departureDate=2026-11-01&adults=2&currencyCode=INR&max=5"
  );
  assert.equal(new Headers(calls[0].init?.headers).get("Authorization"), "Bearer test-token");
});

test("searchFlightOffers asks for ten offers when the limit is zero", async () => {
  const { client, calls } = makeClient(async () => jsonResponse({ data: [] }));
  await client.searchFlightOffers(makeQuery({ limit: 0 }), "test-token");
  assert.equal(new URL(calls[0].url).searchParams.get("max"), "10");
});

test("searchFlightOffers marks server errors as retryable and client errors as final", async () => {
  const server = makeClient(async () => jsonResponse({ errors: [] }, 503));
  await assert.rejects(server.client.searchFlightOffers(makeQuery(), "test-token"), (error: unknown) => {
    assert.ok(error instanceof ProviderError);
    assert.equal(error.status, 503);
    assert.equal(error.retryable, true);
    return true;
  });

  const badRequest = makeClient(async () => jsonResponse({ errors: [] }, 400));
  await assert.rejects(badRequest.client.searchFlightOffers(makeQuery(), "test-token"), (error: unknown) => {
    assert.ok(error instanceof ProviderError);
    assert.equal(error.status, 400);
    assert.equal(error.retryable, false);
    return true;
  });
});
