import { z } from "zod";
import { AuthError, ProviderError, describeError } from "../../core/errors";
import type { FlightQuery } from "../../core/flightQuery";

export type FetchLike = (url: string, init?: RequestInit) => Promise<Response>;

export type AmadeusClientConfig = {
  baseUrl: string;
  tokenUrl: string;
  clientId: string;
  clientSecret: string;
  timeoutMs: number;
  fetchImpl?: FetchLike;
};

export type AccessTokenGrant = {
  accessToken: string;
  expiresInSeconds: number;
};

const TokenResponseSchema = z.object({
  access_token: z.string().min(1),
  expires_in: z.coerce.number().int().positive()
});

const PROVIDER = "amadeus";
const DEFAULT_MAX_OFFERS = 10;

export class AmadeusClient {
  private readonly fetchImpl: FetchLike;

  constructor(private readonly config: AmadeusClientConfig) {
    this.fetchImpl = config.fetchImpl ?? ((url, init) => fetch(url, init));
  }

  async requestAccessToken(): Promise<AccessTokenGrant> {
    const form = new URLSearchParams({
      grant_type: "client_credentials",
      client_id: this.config.clientId,
      client_secret: this.config.clientSecret
    });

    let response: Response;
    try {
      response = await this.fetchImpl(this.config.tokenUrl, {
        method: "POST",
        headers: {
          "Content-Type": "application/x-www-form-urlencoded",
          Accept: "application/json"
        },
        body: form.toString(),
        signal: timeoutSignal(this.config.timeoutMs)
      });
    } catch (error) {
      throw new AuthError(`Token request failed: ${describeError(error)}`, { cause: error });
    }

    if (!response.ok) {
      throw new AuthError(`Token endpoint answered HTTP ${response.status}.`);
    }

    let payload: unknown;
    try {
      payload = await response.json();
    } catch (error) {
      throw new AuthError("Token endpoint returned invalid JSON.", { cause: error });
    }

    const parsed = TokenResponseSchema.safeParse(payload);
    if (!parsed.success) {
      throw new AuthError("Token response is missing access_token or expires_in.");
    }
    return {
      accessToken: parsed.data.access_token,
      expiresInSeconds: parsed.data.expires_in
    };
  }

  async searchFlightOffers(query: FlightQuery, accessToken: string): Promise<unknown> {
    const url = new URL(`${this.config.baseUrl.replace(/\/+$/, "")}/flight-offers`);
    url.searchParams.set("originLocationCode", query.origin);
    url.searchParams.set("destinationLocationCode", query.destination);
    url.searchParams.set("departureDate", query.departDate);
    url.searchParams.set("adults", String(query.passengers));
    url.searchParams.set("currencyCode", query.currency);
    url.searchParams.set("max", String(query.limit > 0 ? query.limit : DEFAULT_MAX_OFFERS));

    let response: Response;
    try {
      response = await this.fetchImpl(url.toString(), {
        method: "GET",
        headers: {
          Authorization: `Bearer ${accessToken}`,
          Accept: "application/json"
        },
        signal: timeoutSignal(this.config.timeoutMs)
      });
    } catch (error) {
      throw new ProviderError(PROVIDER, `Search request failed: ${describeError(error)}`, {
        retryable: true,
        cause: error
      });
    }

    if (!response.ok) {
      const body = await response.text().catch(() => "");
      throw new ProviderError(PROVIDER, `Search answered HTTP ${response.status}: ${body.slice(0, 500)}`, {
        status: response.status,
        retryable: response.status === 429 || response.status >= 500
      });
    }

    try {
      const payload: unknown = await response.json();
      return payload;
    } catch (error) {
      throw new ProviderError(PROVIDER, "Search returned invalid JSON.", { retryable: false, cause: error });
    }
  }
}

function timeoutSignal(timeoutMs: number): AbortSignal | undefined {
  return timeoutMs > 0 ? AbortSignal.timeout(timeoutMs) : undefined;
}
