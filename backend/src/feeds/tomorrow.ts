import { config } from "../config";
import type { Coordinate, PrecipitationType, RoadRiskReading, TomorrowInterval } from "../models/domain";
import weatherCodes from "../data/tomorrowWeatherCodes.json";
import { safeErrorMessage } from "../utils/errors";
import { readArray, readNumber, readRecord, readString } from "../utils/json";
import { logger } from "../utils/logger";
import { parseTimestamp } from "../utils/time";
import { celsiusToFahrenheit, kmToMiles, msToMph } from "../utils/units";
import { FeedClient } from "./feedClient";

const TOMORROW_BASE_URL = "https://api.tomorrow.io";
const FIELDS = [
  "temperature",
  "precipitationProbability",
  "precipitationType",
  "precipitationIntensity",
  "windSpeed",
  "windGust",
  "visibility",
  "weatherCode",
  "roadRisk",
].join(",");
/** Calls per route; remaining waypoints borrow the nearest sampled series. */
export const MAX_SAMPLED_POINTS = 5;

const WEATHER_CODES: Record<string, string> = weatherCodes;

const PRECIPITATION_TYPES: Record<number, PrecipitationType> = {
  0: "none",
  1: "rain",
  2: "snow",
  3: "freezing_rain",
  4: "sleet",
};

const log = logger.child("tomorrow-io");

export const createTomorrowClient = () => new FeedClient({ name: "tomorrow-io", baseUrl: TOMORROW_BASE_URL });

const toPrecipitationType = (code: number | null): PrecipitationType | null => {
  if (code === null) return null;
  return PRECIPITATION_TYPES[code] ?? "unknown";
};

/** Metric units: °C, m/s, km. */
export const parseTomorrowValues = (values: unknown): RoadRiskReading => {
  const temperature = readNumber(values, "temperature");
  const windSpeed = readNumber(values, "windSpeed");
  const windGust = readNumber(values, "windGust");
  const visibility = readNumber(values, "visibility");
  const weatherCode = readNumber(values, "weatherCode");
  return {
    temperatureF: temperature === null ? null : celsiusToFahrenheit(temperature),
    precipitationProbability: readNumber(values, "precipitationProbability"),
    precipitationType: toPrecipitationType(readNumber(values, "precipitationType")),
    precipitationIntensityMmHr: readNumber(values, "precipitationIntensity"),
    windSpeedMph: windSpeed === null ? null : msToMph(windSpeed),
    windGustsMph: windGust === null ? null : msToMph(windGust),
    visibilityMiles: visibility === null ? null : kmToMiles(visibility),
    weatherCode,
    weatherText: weatherCode === null ? null : WEATHER_CODES[String(weatherCode)] ?? "Unknown",
    roadRiskScore: readNumber(values, "roadRisk"),
    roadRiskLabel: readString(values, "roadRiskLabel"),
  };
};

export const parseTimeline = (payload: unknown): TomorrowInterval[] => {
  const timeline = readArray(readRecord(payload, "data"), "timelines")[0];
  return readArray(timeline, "intervals").flatMap((interval) => {
    const startTime = parseTimestamp(readString(interval, "startTime"));
    if (startTime === null) return [];
    return [{ startTime, reading: parseTomorrowValues(readRecord(interval, "values")) }];
  });
};

export const findTomorrowReading = (intervals: TomorrowInterval[], target: Date): RoadRiskReading | null => {
  const targetMs = target.getTime();
  let best: TomorrowInterval | null = null;
  for (const interval of intervals) {
    if (!best || Math.abs(interval.startTime - targetMs) < Math.abs(best.startTime - targetMs)) {
      best = interval;
    }
  }
  return best ? best.reading : null;
};

/** Up to MAX_SAMPLED_POINTS indices spread evenly from first to last. */
export const sampleIndices = (count: number, maxSamples = MAX_SAMPLED_POINTS): number[] => {
  if (count <= 0) return [];
  if (count <= maxSamples) return Array.from({ length: count }, (_, index) => index);
  const step = (count - 1) / (maxSamples - 1);
  return Array.from({ length: maxSamples }, (_, index) => Math.round(index * step));
};

/** For every waypoint, the position in `sampled` of the nearest sampled index. */
export const nearestSampleSlots = (count: number, sampled: number[]): number[] =>
  Array.from({ length: count }, (_, waypointIndex) => {
    let bestSlot = 0;
    sampled.forEach((sampledIndex, slot) => {
      const best = sampled[bestSlot] ?? 0;
      if (Math.abs(sampledIndex - waypointIndex) < Math.abs(best - waypointIndex)) bestSlot = slot;
    });
    return bestSlot;
  });

export const fetchTomorrowTimeline = async (client: FeedClient, point: Coordinate): Promise<TomorrowInterval[]> => {
  if (!config.tomorrowApiKey) return [];
  try {
    const payload = await client.getJson("/v4/timelines", {
      location: `${point.lat.toFixed(4)},${point.lng.toFixed(4)}`,
      fields: FIELDS,
      timesteps: "1h",
      units: "metric",
      apikey: config.tomorrowApiKey,
    });
    return parseTimeline(payload);
  } catch (error) {
    log.warn("Timeline unavailable", { ...point, message: safeErrorMessage(error) });
    return [];
  }
};

/** Samples a handful of waypoints and hands each waypoint its nearest sampled timeline. */
export const fetchTomorrowForWaypoints = async (
  client: FeedClient,
  points: Coordinate[],
): Promise<TomorrowInterval[][]> => {
  const sampled = sampleIndices(points.length);
  const timelines = await Promise.all(
    sampled.map((index) => {
      const point = points[index];
      return point ? fetchTomorrowTimeline(client, point) : Promise.resolve([]);
    }),
  );
  return nearestSampleSlots(points.length, sampled).map((slot) => timelines[slot] ?? []);
};
