import dotenv from "dotenv";

dotenv.config();

function envFlag(name: string, defaultValue: boolean): boolean {
  const value = process.env[name];
  if (value === undefined) return defaultValue;
  const normalized = value.trim().toLowerCase();
  if (["1", "true", "yes", "on"].includes(normalized)) return true;
  if (["0", "false", "no", "off"].includes(normalized)) return false;
  return defaultValue;
}

function envNumber(name: string, defaultValue: number): number {
  const value = process.env[name];
  if (value === undefined || value.trim() === "") return defaultValue;
  const parsed = Number(value);
  return Number.isFinite(parsed) ? parsed : defaultValue;
}

export type PersistenceDriver = "supabase" | "memory";

function persistenceDriverFromEnv(): PersistenceDriver {
  return process.env.PERSISTENCE_DRIVER?.trim().toLowerCase() === "memory" ? "memory" : "supabase";
}

export const appConfig = {
  port: envNumber("PORT", 5001),
  amadeusBaseUrl: process.env.AMADEUS_BASE_URL ?? "https://test.api.amadeus.com/v2/shopping",
  amadeusTokenUrl: process.env.AMADEUS_TOKEN_URL ?? "https://test.api.amadeus.com/v1/security/oauth2/token",
  amadeusClientId: process.env.AMADEUS_CLIENT_ID ?? "",
  amadeusClientSecret: process.env.AMADEUS_CLIENT_SECRET ?? "",
  providerTimeoutMs: envNumber("PROVIDER_TIMEOUT_MS", 8000),
  providerRetryAttempts: envNumber("PROVIDER_RETRY_ATTEMPTS", 3),
  providerRetryDelayMs: envNumber("PROVIDER_RETRY_DELAY_MS", 200),
  tokenSafetyMarginSeconds: envNumber("TOKEN_SAFETY_MARGIN_SECONDS", 60),
  flightResultsTtlSeconds: envNumber("FLIGHT_RESULTS_TTL_SECONDS", 600),
  flightResultsCacheEnabled: envFlag("FLIGHT_RESULTS_CACHE_ENABLED", true),
  persistenceDriver: persistenceDriverFromEnv(),
  supabaseUrl: process.env.SUPABASE_URL ?? "",
  supabaseServiceKey: process.env.SUPABASE_API_KEY ?? ""
};

export function hasAmadeusCredentials(): boolean {
  return Boolean(appConfig.amadeusClientId && appConfig.amadeusClientSecret);
}

export function assertSupabaseConfig(): void {
  if (!appConfig.supabaseUrl || !appConfig.supabaseServiceKey) {
    throw new Error("Missing Supabase config. Set SUPABASE_URL/SUPABASE_API_KEY or PERSISTENCE_DRIVER=memory.");
  }
}
