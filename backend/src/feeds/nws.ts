import { config } from "../config";
import type { Advisory, AdvisoryReading, AdvisorySeverity, Coordinate, NwsPeriod } from "../models/domain";
import { safeErrorMessage } from "../utils/errors";
import { readArray, readNumber, readRecord, readString } from "../utils/json";
import { logger } from "../utils/logger";
import { HOUR_MS, parseTimestamp } from "../utils/time";
import { FeedClient } from "./feedClient";

const NWS_BASE_URL = "https://api.weather.gov";

const log = logger.child("nws");

export const createNwsClient = () =>
  new FeedClient({
    name: "nws",
    baseUrl: NWS_BASE_URL,
    headers: { "User-Agent": config.nwsUserAgent, Accept: "application/geo+json" },
    rateLimit: { windowMs: config.nwsRateLimitWindowMs, maxRequests: config.nwsRateLimitMaxRequests },
  });

const parseWindSpeed = (value: string | null): number | null => {
  if (!value) return null;
  const match = /(\d+)/.exec(value);
  return match?.[1] ? Number(match[1]) : null;
};

export const parseHourlyPeriod = (period: unknown): AdvisoryReading => ({
  temperatureF: readNumber(period, "temperature"),
  windSpeedMph: parseWindSpeed(readString(period, "windSpeed")),
  windDirection: readString(period, "windDirection"),
  conditionText: readString(period, "shortForecast"),
  precipitationProbability: readNumber(readRecord(period, "probabilityOfPrecipitation"), "value"),
});

export const parseForecastPeriods = (payload: unknown): NwsPeriod[] =>
  readArray(readRecord(payload, "properties"), "periods").flatMap((period) => {
    const startTime = parseTimestamp(readString(period, "startTime"));
    if (startTime === null) return [];
    return [{ startTime, endTime: parseTimestamp(readString(period, "endTime")), reading: parseHourlyPeriod(period) }];
  });

/** Period containing `target`, else the one starting closest to it. */
export const findNwsReading = (periods: NwsPeriod[], target: Date): AdvisoryReading | null => {
  const targetMs = target.getTime();
  const containing = periods.find((period) => {
    const end = period.endTime ?? period.startTime + HOUR_MS;
    return period.startTime <= targetMs && targetMs < end;
  });
  if (containing) return containing.reading;

  let closest: NwsPeriod | null = null;
  for (const period of periods) {
    if (!closest || Math.abs(period.startTime - targetMs) < Math.abs(closest.startTime - targetMs)) {
      closest = period;
    }
  }
  return closest ? closest.reading : null;
};

const normalizeSeverity = (value: string | null): AdvisorySeverity => {
  const normalized = (value ?? "").toLowerCase();
  if (normalized === "extreme" || normalized === "severe" || normalized === "moderate" || normalized === "minor") {
    return normalized;
  }
  return "unknown";
};

export const parseAlerts = (payload: unknown): Advisory[] =>
  readArray(payload, "features").flatMap((feature) => {
    const props = readRecord(feature, "properties");
    if (!props) return [];
    return [
      {
        event: readString(props, "event") ?? "",
        headline: readString(props, "headline") ?? "",
        severity: normalizeSeverity(readString(props, "severity")),
        description: readString(props, "description") ?? "",
        onset: readString(props, "onset"),
        expires: readString(props, "expires"),
      },
    ];
  });

/** Two-step lookup: /points resolves the grid, then its hourly forecast. */
export const fetchNwsForecast = async (client: FeedClient, point: Coordinate): Promise<NwsPeriod[] | null> => {
  try {
    const pointPayload = await client.getJson(`/points/${point.lat.toFixed(4)},${point.lng.toFixed(4)}`);
    const forecastUrl = readString(readRecord(pointPayload, "properties"), "forecastHourly");
    if (!forecastUrl) return null;
    const forecastPayload = await client.getJson(forecastUrl);
    return parseForecastPeriods(forecastPayload);
  } catch (error) {
    log.warn("Hourly forecast unavailable", { ...point, message: safeErrorMessage(error) });
    return null;
  }
};

export const fetchNwsAlerts = async (client: FeedClient, point: Coordinate): Promise<Advisory[]> => {
  try {
    const payload = await client.getJson("/alerts/active", {
      point: `${point.lat.toFixed(4)},${point.lng.toFixed(4)}`,
    });
    return parseAlerts(payload);
  } catch (error) {
    log.warn("Active alerts unavailable", { ...point, message: safeErrorMessage(error) });
    return [];
  }
};
