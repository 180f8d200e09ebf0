export type GatewayErrorCode = "AUTH_FAILED" | "PROVIDER_FAILED" | "MAPPING_FAILED" | "CACHE_STORE_FAILED";

export class GatewayError extends Error {
  readonly code: GatewayErrorCode;

  constructor(code: GatewayErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "GatewayError";
    this.code = code;
  }
}

/** Token exchange failed: network error, non-2xx answer or a malformed body. */
export class AuthError extends GatewayError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("AUTH_FAILED", message, options);
    this.name = "AuthError";
  }
}

export class ProviderError extends GatewayError {
  readonly provider: string;
  readonly status: number | null;
  readonly retryable: boolean;

  constructor(
    provider: string,
    message: string,
    details: { status?: number | null; retryable: boolean; cause?: unknown }
  ) {
    super("PROVIDER_FAILED", message, { cause: details.cause });
    this.name = "ProviderError";
    this.provider = provider;
    this.status = details.status ?? null;
    this.retryable = details.retryable;
  }
}

export class MappingError extends GatewayError {
  readonly offerId: string | null;

  constructor(offerId: string | null, message: string) {
    super("MAPPING_FAILED", message);
    this.name = "MappingError";
    this.offerId = offerId;
  }
}

export class CacheStoreError extends GatewayError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("CACHE_STORE_FAILED", message, options);
    this.name = "CacheStoreError";
  }
}

export function describeError(error: unknown): string {
  if (error instanceof Error) return error.message;
  return String(error);
}
