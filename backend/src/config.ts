import dotenv from "dotenv";

dotenv.config();

const DEFAULT_PORT = 4000;
const DEFAULT_NWS_USER_AGENT = "roadglance/0.1 (ops@example.com)";
const DEFAULT_UTC_OFFSET = "-08:00";
const DEFAULT_WAYPOINT_INTERVAL_MILES = 15;
const DEFAULT_STATION_MATCH_RADIUS_MILES = 15;
const DEFAULT_STATION_SNAP_RADIUS_MILES = 15;
const DEFAULT_STATION_MIN_SPACING_MILES = 5;
const DEFAULT_GAP_FILL_THRESHOLD_MILES = 30;
const DEFAULT_REST_DURATION_MINUTES = 20;
const DEFAULT_FEED_TIMEOUT_MS = 10_000;
const DEFAULT_FEED_MAX_RETRIES = 2;
const DEFAULT_FEED_RETRY_BASE_DELAY_MS = 400;
const DEFAULT_FEED_RETRY_MAX_DELAY_MS = 4_000;
const DEFAULT_NWS_RATE_LIMIT_WINDOW_MS = 1_000;
const DEFAULT_NWS_RATE_LIMIT_MAX_REQUESTS = 5;
type LogLevel = "debug" | "info" | "warn" | "error";

export interface AppConfig {
  port: number;
  googleApiKey: string | undefined;
  tomorrowApiKey: string | undefined;
  nwsUserAgent: string;
  logLevel: LogLevel;
  defaultUtcOffset: string;
  waypointIntervalMiles: number;
  stationMatchRadiusMiles: number;
  stationSnapRadiusMiles: number;
  stationMinSpacingMiles: number;
  gapFillThresholdMiles: number;
  restDurationMinutes: number;
  feedTimeoutMs: number;
  feedMaxRetries: number;
  feedRetryBaseDelayMs: number;
  feedRetryMaxDelayMs: number;
  nwsRateLimitWindowMs: number;
  nwsRateLimitMaxRequests: number;
}

const normalizeLogLevel = (value?: string): LogLevel => {
  const normalized = (value ?? "").toLowerCase();
  if (normalized === "debug" || normalized === "warn" || normalized === "error") {
    return normalized;
  }
  return "info";
};

const parsePositiveNumber = (value: string | undefined, fallback: number): number => {
  const parsed = Number(value);
  if (Number.isFinite(parsed) && parsed > 0) return parsed;
  return fallback;
};

const parseNonNegativeInteger = (value: string | undefined, fallback: number): number => {
  const parsed = Number(value);
  if (Number.isInteger(parsed) && parsed >= 0) return parsed;
  return fallback;
};

const normalizeUtcOffset = (value: string | undefined): string => {
  if (value && /^[+-]\d{2}:\d{2}$/.test(value)) return value;
  return DEFAULT_UTC_OFFSET;
};

const gapFillThresholdMiles = parsePositiveNumber(
  process.env.GAP_FILL_THRESHOLD_MILES,
  DEFAULT_GAP_FILL_THRESHOLD_MILES,
);

export const config: AppConfig = {
  port: Number(process.env.PORT ?? DEFAULT_PORT),
  googleApiKey: process.env.GOOGLE_API_KEY,
  tomorrowApiKey: process.env.TOMORROW_API_KEY,
  nwsUserAgent: process.env.NWS_USER_AGENT ?? DEFAULT_NWS_USER_AGENT,
  logLevel: normalizeLogLevel(process.env.LOG_LEVEL),
  defaultUtcOffset: normalizeUtcOffset(process.env.DEFAULT_UTC_OFFSET),
  // fill spacing is capped at the gap threshold
  waypointIntervalMiles: Math.min(
    gapFillThresholdMiles,
    parsePositiveNumber(process.env.WAYPOINT_INTERVAL_MILES, DEFAULT_WAYPOINT_INTERVAL_MILES),
  ),
  stationMatchRadiusMiles: parsePositiveNumber(
    process.env.STATION_MATCH_RADIUS_MILES,
    DEFAULT_STATION_MATCH_RADIUS_MILES,
  ),
  stationSnapRadiusMiles: parsePositiveNumber(
    process.env.STATION_SNAP_RADIUS_MILES,
    DEFAULT_STATION_SNAP_RADIUS_MILES,
  ),
  stationMinSpacingMiles: parsePositiveNumber(
    process.env.STATION_MIN_SPACING_MILES,
    DEFAULT_STATION_MIN_SPACING_MILES,
  ),
  gapFillThresholdMiles,
  restDurationMinutes: parsePositiveNumber(process.env.REST_DURATION_MINUTES, DEFAULT_REST_DURATION_MINUTES),
  feedTimeoutMs: parsePositiveNumber(process.env.FEED_TIMEOUT_MS, DEFAULT_FEED_TIMEOUT_MS),
  feedMaxRetries: parseNonNegativeInteger(process.env.FEED_MAX_RETRIES, DEFAULT_FEED_MAX_RETRIES),
  feedRetryBaseDelayMs: parsePositiveNumber(
    process.env.FEED_RETRY_BASE_DELAY_MS,
    DEFAULT_FEED_RETRY_BASE_DELAY_MS,
  ),
  feedRetryMaxDelayMs: parsePositiveNumber(
    process.env.FEED_RETRY_MAX_DELAY_MS,
    DEFAULT_FEED_RETRY_MAX_DELAY_MS,
  ),
  nwsRateLimitWindowMs: parsePositiveNumber(
    process.env.NWS_RATE_LIMIT_WINDOW_MS,
    DEFAULT_NWS_RATE_LIMIT_WINDOW_MS,
  ),
  nwsRateLimitMaxRequests: parsePositiveNumber(
    process.env.NWS_RATE_LIMIT_MAX_REQUESTS,
    DEFAULT_NWS_RATE_LIMIT_MAX_REQUESTS,
  ),
};
