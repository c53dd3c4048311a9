import dotenv from "dotenv";

dotenv.config();

const DEFAULT_MBTA_BASE_URL = "https://api-v3.mbta.com";
const DEFAULT_MBTA_MAX_RETRIES = 2;
const DEFAULT_MBTA_RETRY_BASE_DELAY_MS = 500;
const DEFAULT_MBTA_RETRY_MAX_DELAY_MS = 4_000;
const DEFAULT_MBTA_REQUEST_TIMEOUT_MS = 10_000;
const DEFAULT_BOARD_CONFIG_PATH = "board.json";
export type LogLevel = "debug" | "info" | "warn" | "error";

export interface AppConfig {
  mbtaApiBaseUrl: string;
  mbtaApiKey: string | undefined;
  logLevel: LogLevel;
  mbtaMaxRetries: number;
  mbtaRetryBaseDelayMs: number;
  mbtaRetryMaxDelayMs: number;
  mbtaRequestTimeoutMs: number;
  boardConfigPath: string;
}

// The board goes to stdout; only diagnostics should reach the terminal by default.
export const normalizeLogLevel = (value?: string): LogLevel => {
  const normalized = (value ?? "").toLowerCase();
  if (normalized === "debug" || normalized === "info" || normalized === "error") {
    return normalized;
  }
  return "warn";
};

export const parseNonNegativeNumber = (value: string | undefined, fallback: number): number => {
  if (value === undefined || value.trim() === "") return fallback;
  const parsed = Number(value);
  if (Number.isFinite(parsed) && parsed >= 0) return parsed;
  return fallback;
};

export const config: AppConfig = {
  mbtaApiBaseUrl: process.env.MBTA_API_BASE_URL ?? DEFAULT_MBTA_BASE_URL,
  mbtaApiKey: process.env.MBTA_API_KEY || undefined,
  logLevel: normalizeLogLevel(process.env.LOG_LEVEL),
  mbtaMaxRetries: parseNonNegativeNumber(process.env.MBTA_MAX_RETRIES, DEFAULT_MBTA_MAX_RETRIES),
  mbtaRetryBaseDelayMs: parseNonNegativeNumber(
    process.env.MBTA_RETRY_BASE_DELAY_MS,
    DEFAULT_MBTA_RETRY_BASE_DELAY_MS,
  ),
  mbtaRetryMaxDelayMs: parseNonNegativeNumber(
    process.env.MBTA_RETRY_MAX_DELAY_MS,
    DEFAULT_MBTA_RETRY_MAX_DELAY_MS,
  ),
  mbtaRequestTimeoutMs: parseNonNegativeNumber(
    process.env.MBTA_REQUEST_TIMEOUT_MS,
    DEFAULT_MBTA_REQUEST_TIMEOUT_MS,
  ),
  boardConfigPath: process.env.BOARD_CONFIG_PATH ?? DEFAULT_BOARD_CONFIG_PATH,
};
