// src/config.ts
import "dotenv/config";
import { ConfigError } from "./errors.js";

export type Config = {
  FINNHUB_API_KEY: string;
  FINNHUB_TIMEOUT_MS: number;
  EMAIL_USER: string;
  EMAIL_APP_PASSWORD: string;
  /** Comma-delimited list, split when the mail is built. */
  EMAIL_TO: string;
  SMTP_HOST: string;
  SMTP_PORT: number;
  MIN_OFFER_AMOUNT_USD: number;
  /** Send a "none today" notice when nothing qualifies. */
  NOTIFY_WHEN_EMPTY: boolean;
  SCHEDULE_CRON: string;
  SCHEDULE_TZ: string;
};

type Env = Record<string, string | undefined>;

const REQUIRED = [
  "FINNHUB_API_KEY",
  "EMAIL_USER",
  "EMAIL_APP_PASSWORD",
  "EMAIL_TO",
] as const;

function str(env: Env, key: string): string | undefined {
  const v = env[key]?.trim();
  return v ? v : undefined;
}

function num(env: Env, key: string, fallback: number): number {
  const raw = str(env, key);
  if (raw === undefined) return fallback;
  const n = Number(raw.replace(/_/g, ""));
  if (!Number.isFinite(n) || n < 0) {
    throw new ConfigError(`${key} must be a non-negative number, got "${raw}"`, [
      key,
    ]);
  }
  return n;
}

function port(env: Env, key: string, fallback: number): number {
  const n = num(env, key, fallback);
  if (!Number.isInteger(n) || n < 1 || n > 65_535) {
    throw new ConfigError(
      `${key} must be an integer from 1 to 65535, got "${str(env, key)}"`,
      [key]
    );
  }
  return n;
}

function timeZone(env: Env, key: string, fallback: string): string {
  const tz = str(env, key) ?? fallback;
  try {
    new Intl.DateTimeFormat("en-US", { timeZone: tz });
  } catch {
    throw new ConfigError(`${key} is not a known time zone: "${tz}"`, [key]);
  }
  return tz;
}

function bool(env: Env, key: string, fallback: boolean): boolean {
  const raw = str(env, key)?.toLowerCase();
  if (raw === undefined) return fallback;
  if (["1", "true", "yes", "on"].includes(raw)) return true;
  if (["0", "false", "no", "off"].includes(raw)) return false;
  throw new ConfigError(`${key} must be a boolean, got "${raw}"`, [key]);
}

/**
 * Reads the monitor's settings from the environment (`.env` is loaded on
 * import). All missing required variables are reported in one ConfigError.
 */
export function loadConfig(env: Env = process.env): Config {
  const values: Env = {
    ...env,
    // API_KEY is accepted as a generic alias for the Finnhub token
    FINNHUB_API_KEY: str(env, "FINNHUB_API_KEY") ?? str(env, "API_KEY"),
  };

  const missing = REQUIRED.filter((k) => str(values, k) === undefined);
  if (missing.length) {
    throw new ConfigError(
      `Missing required environment variables: ${missing.join(", ")}`,
      [...missing]
    );
  }

  const required = (key: (typeof REQUIRED)[number]): string => {
    const v = str(values, key);
    if (v === undefined) throw new ConfigError(`Missing ${key}`, [key]);
    return v;
  };

  return {
    FINNHUB_API_KEY: required("FINNHUB_API_KEY"),
    FINNHUB_TIMEOUT_MS: num(env, "FINNHUB_TIMEOUT_MS", 30_000),
    EMAIL_USER: required("EMAIL_USER"),
    EMAIL_APP_PASSWORD: required("EMAIL_APP_PASSWORD"),
    EMAIL_TO: required("EMAIL_TO"),
    SMTP_HOST: str(env, "SMTP_HOST") ?? "smtp.gmail.com",
    SMTP_PORT: port(env, "SMTP_PORT", 587),
    MIN_OFFER_AMOUNT_USD: num(env, "MIN_OFFER_AMOUNT_USD", 200_000_000),
    NOTIFY_WHEN_EMPTY: bool(env, "NOTIFY_WHEN_EMPTY", false),
    SCHEDULE_CRON: str(env, "SCHEDULE_CRON") ?? "0 9 * * *",
    SCHEDULE_TZ: timeZone(env, "SCHEDULE_TZ", "Asia/Dubai"),
  };
}
