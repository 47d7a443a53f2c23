import "dotenv/config";
import { JOB_LIMITS } from "./jobs";

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

export interface AppConfig {
  databaseUrl: string;
  databaseSsl: boolean;
  proxyUrls: string[];
  allowDirectFallback: boolean;
  captchaApiKey: string | null;
  captchaApiUrl: string;
  concurrency: number;
  fetchTimeoutMs: number;
  rawCachePath: string | null;
  rawCacheTtlMs: number;
}

type Env = Record<string, string | undefined>;

function parsePositiveInt(name: string, raw: string | undefined, fallback: number): number {
  if (raw === undefined || raw.trim() === "") return fallback;
  const value = Number(raw);
  if (!Number.isInteger(value) || value <= 0) {
    throw new ConfigError(`${name} must be a positive integer (got "${raw}")`);
  }
  return value;
}

function parseBoolean(name: string, raw: string | undefined, fallback: boolean): boolean {
  if (raw === undefined || raw.trim() === "") return fallback;
  const normalized = raw.trim().toLowerCase();
  if (["1", "true", "yes", "on"].includes(normalized)) return true;
  if (["0", "false", "no", "off"].includes(normalized)) return false;
  throw new ConfigError(`${name} must be a boolean (got "${raw}")`);
}

/**
 * Validates and loads application environment variables into a structured config object.
 * Only the database URL is mandatory. Proxy and captcha credentials are optional:
 * without them the pipeline runs proxy-less and leaves challenges unsolved.
 * @param env - Environment to read from (defaults to process.env)
 * @returns A validated AppConfig
 * @throws ConfigError if a required variable is missing or a value is malformed
 */
export function loadConfig(env: Env = process.env): AppConfig {
  const {
    DATABASE_URL,
    DATABASE_SSL,
    PROXY_URLS,
    ALLOW_DIRECT_FALLBACK,
    CAPTCHA_API_KEY,
    CAPTCHA_API_URL,
    EXTRACT_CONCURRENCY,
    FETCH_TIMEOUT_MS,
    RAW_CACHE_PATH,
    RAW_CACHE_TTL_HOURS
  } = env;

  if (!DATABASE_URL) throw new ConfigError("DATABASE_URL is required");

  const proxyUrls = (PROXY_URLS ?? "")
    .split(",")
    .map((entry) => entry.trim())
    .filter((entry) => entry.length > 0);

  for (const proxyUrl of proxyUrls) {
    try {
      new URL(proxyUrl);
    } catch {
      throw new ConfigError(`PROXY_URLS contains an invalid URL: ${proxyUrl}`);
    }
  }

  return {
    databaseUrl: DATABASE_URL,
    databaseSsl: parseBoolean("DATABASE_SSL", DATABASE_SSL, false),
    proxyUrls,
    allowDirectFallback: parseBoolean(
      "ALLOW_DIRECT_FALLBACK",
      ALLOW_DIRECT_FALLBACK,
      true
    ),
    captchaApiKey: CAPTCHA_API_KEY?.trim() || null,
    captchaApiUrl: CAPTCHA_API_URL?.trim() || "https://2captcha.com",
    concurrency: parsePositiveInt(
      "EXTRACT_CONCURRENCY",
      EXTRACT_CONCURRENCY,
      JOB_LIMITS.DEFAULT_CONCURRENCY
    ),
    fetchTimeoutMs: parsePositiveInt(
      "FETCH_TIMEOUT_MS",
      FETCH_TIMEOUT_MS,
      JOB_LIMITS.FETCH_TIMEOUT_MS
    ),
    rawCachePath: RAW_CACHE_PATH?.trim() || null,
    rawCacheTtlMs:
      parsePositiveInt("RAW_CACHE_TTL_HOURS", RAW_CACHE_TTL_HOURS, 24) *
      60 *
      60 *
      1000
  };
}
