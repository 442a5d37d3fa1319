import * as dotenv from "dotenv";
import { z } from "zod";
import { BoundaryMode } from "./aqi-standards";

export const DEFAULT_PROVIDER_BASE_URL =
  "https://api.gios.gov.pl/pjp-api/v1/rest";

const booleanFlag = (fallback: boolean) =>
  z
    .enum(["true", "false", "1", "0", "yes", "no"])
    .optional()
    .transform((value) =>
      value === undefined ? fallback : ["true", "1", "yes"].includes(value)
    );

const commaList = (fallback: string) =>
  z
    .string()
    .optional()
    .transform((value) =>
      (value ?? fallback)
        .split(",")
        .map((entry) => entry.trim())
        .filter((entry) => entry.length > 0)
    );

const envSchema = z.object({
  AQ_CITIES: commaList("Warszawa,Kraków,Gdańsk").pipe(
    z.array(z.string()).min(1, "at least one city must be configured")
  ),
  AQ_PROVIDER_BASE_URL: z.string().url().default(DEFAULT_PROVIDER_BASE_URL),
  AQ_CACHE_TTL_SECONDS: z.coerce.number().int().nonnegative().default(3600),
  AQ_ALLOW_SYNTHETIC_FALLBACK: booleanFlag(true),
  AQ_USE_SYNTHETIC_DATA: booleanFlag(false),
  AQ_REQUEST_TIMEOUT_MS: z.coerce.number().int().positive().default(30000),
  AQ_MAX_RETRIES: z.coerce.number().int().min(1).default(3),
  AQ_CITY_DEADLINE_MS: z.coerce.number().int().nonnegative().default(0),
  AQ_BOUNDARY_MODE: z.enum(["inclusive", "exclusive"]).default("inclusive"),
  AQ_CORS_ORIGINS: commaList("http://localhost:3000"),
  PORT: z.coerce.number().int().positive().default(3001),
});

export interface Settings {
  readonly cities: readonly string[];
  readonly providerBaseUrl: string;
  readonly cacheTtlMs: number;
  readonly allowSyntheticFallback: boolean;
  readonly useSyntheticData: boolean;
  readonly requestTimeoutMs: number;
  readonly maxRetries: number;
  /** 0 disables the per-city deadline. */
  readonly cityDeadlineMs: number;
  readonly boundaryMode: BoundaryMode;
  readonly corsOrigins: readonly string[];
  readonly port: number;
}

export class SettingsError extends Error {
  constructor(readonly issues: string[]) {
    super(`Invalid configuration:\n  - ${issues.join("\n  - ")}`);
    this.name = "SettingsError";
  }
}

export function parseSettings(
  env: Record<string, string | undefined>
): Settings {
  // Treat empty strings like unset variables so `FOO=` in .env keeps defaults
  const cleaned = Object.fromEntries(
    Object.entries(env).filter(([, value]) => value !== undefined && value !== "")
  );
  const result = envSchema.safeParse(cleaned);

  if (!result.success) {
    throw new SettingsError(
      result.error.issues.map(
        (issue) => `${issue.path.join(".") || "env"}: ${issue.message}`
      )
    );
  }

  const parsed = result.data;
  return Object.freeze({
    cities: Object.freeze([...new Set(parsed.AQ_CITIES)]),
    providerBaseUrl: parsed.AQ_PROVIDER_BASE_URL.replace(/\/+$/, ""),
    cacheTtlMs: parsed.AQ_CACHE_TTL_SECONDS * 1000,
    allowSyntheticFallback: parsed.AQ_ALLOW_SYNTHETIC_FALLBACK,
    useSyntheticData: parsed.AQ_USE_SYNTHETIC_DATA,
    requestTimeoutMs: parsed.AQ_REQUEST_TIMEOUT_MS,
    maxRetries: parsed.AQ_MAX_RETRIES,
    cityDeadlineMs: parsed.AQ_CITY_DEADLINE_MS,
    boundaryMode: parsed.AQ_BOUNDARY_MODE,
    corsOrigins: Object.freeze(parsed.AQ_CORS_ORIGINS),
    port: parsed.PORT,
  });
}

/**
 * Reads `.env` (if any) into the process environment, then validates it.
 * Called once at start-up; everything downstream receives the result.
 */
export function loadSettings(): Settings {
  const result = dotenv.config();
  if (result.error) {
    console.warn("No .env file found! Using environment variables from process.");
  } else {
    console.log("Environment variables loaded from .env");
  }
  return parseSettings(process.env);
}
