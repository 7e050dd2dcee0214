import type { Coordinate, NumericWeatherReading, OpenMeteoSeries, SunTimes } from "../models/domain";
import { safeErrorMessage } from "../utils/errors";
import { ensureArray, readNumber, readNumberArray, readRecord, readStringArray } from "../utils/json";
import { logger } from "../utils/logger";
import { localDateKey, parseLocalTimestamp } from "../utils/time";
import { celsiusToFahrenheit, cmToInches, kmhToMph, metersToFeet, metersToMiles } from "../utils/units";
import { FeedClient } from "./feedClient";

const OPEN_METEO_BASE_URL = "https://api.open-meteo.com";
const HOURLY_VARS = [
  "temperature_2m",
  "precipitation",
  "snowfall",
  "snow_depth",
  "visibility",
  "wind_speed_10m",
  "wind_gusts_10m",
  "wind_direction_10m",
  "freezing_level_height",
  "weather_code",
].join(",");
const DAILY_VARS = "sunrise,sunset";
const FORECAST_DAYS = 7;

const log = logger.child("open-meteo");

export const createOpenMeteoClient = () => new FeedClient({ name: "open-meteo", baseUrl: OPEN_METEO_BASE_URL });

const mapOrNull = (value: number | null | undefined, convert: (input: number) => number) =>
  value === null || value === undefined ? null : convert(value);

const pick = (values: Array<number | null>, index: number) => values[index] ?? null;

/** One location block of a (possibly batched) forecast response. */
export const parseOpenMeteoLocation = (payload: unknown): OpenMeteoSeries | null => {
  const hourly = readRecord(payload, "hourly");
  if (!hourly) return null;
  const utcOffsetSeconds = readNumber(payload, "utc_offset_seconds") ?? 0;

  const times = readStringArray(hourly, "time");
  const temperature = readNumberArray(hourly, "temperature_2m");
  const precipitation = readNumberArray(hourly, "precipitation");
  const snowfall = readNumberArray(hourly, "snowfall");
  const snowDepth = readNumberArray(hourly, "snow_depth");
  const visibility = readNumberArray(hourly, "visibility");
  const windSpeed = readNumberArray(hourly, "wind_speed_10m");
  const windGusts = readNumberArray(hourly, "wind_gusts_10m");
  const windDirection = readNumberArray(hourly, "wind_direction_10m");
  const freezingLevel = readNumberArray(hourly, "freezing_level_height");
  const weatherCode = readNumberArray(hourly, "weather_code");

  const hourlyTimes: number[] = [];
  const readings: NumericWeatherReading[] = [];
  times.forEach((time, index) => {
    const timestamp = time ? parseLocalTimestamp(time, utcOffsetSeconds) : null;
    if (timestamp === null) return;
    hourlyTimes.push(timestamp);
    readings.push({
      temperatureF: mapOrNull(pick(temperature, index), celsiusToFahrenheit),
      precipitationMmHr: pick(precipitation, index),
      snowfallCmHr: pick(snowfall, index),
      // snow_depth is reported in meters
      snowDepthIn: mapOrNull(pick(snowDepth, index), (meters) => cmToInches(meters * 100)),
      visibilityMiles: mapOrNull(pick(visibility, index), metersToMiles),
      windSpeedMph: mapOrNull(pick(windSpeed, index), kmhToMph),
      windGustsMph: mapOrNull(pick(windGusts, index), kmhToMph),
      windDirectionDeg: pick(windDirection, index),
      freezingLevelFt: mapOrNull(pick(freezingLevel, index), metersToFeet),
      weatherCode: pick(weatherCode, index),
    });
  });

  const daily = readRecord(payload, "daily");
  const toInstant = (value: string | null) => (value ? parseLocalTimestamp(value, utcOffsetSeconds) : null);

  return {
    utcOffsetSeconds,
    hourlyTimes,
    hourly: readings,
    dailyDates: readStringArray(daily, "time").map((date) => date ?? ""),
    sunrises: readStringArray(daily, "sunrise").map(toInstant),
    sunsets: readStringArray(daily, "sunset").map(toInstant),
  };
};

/** Reading at the hourly slot closest to `target`. */
export const findOpenMeteoReading = (series: OpenMeteoSeries, target: Date): NumericWeatherReading | null => {
  const targetMs = target.getTime();
  let bestIndex = -1;
  let bestDiff = Infinity;
  series.hourlyTimes.forEach((time, index) => {
    const diff = Math.abs(time - targetMs);
    if (diff < bestDiff) {
      bestDiff = diff;
      bestIndex = index;
    }
  });
  return series.hourly[bestIndex] ?? null;
};

/** Sunrise/sunset for the local calendar day of `target`; falls back to the first day. */
export const findSunTimes = (series: OpenMeteoSeries, target: Date): SunTimes | null => {
  if (series.dailyDates.length === 0) return null;
  const key = localDateKey(target, series.utcOffsetSeconds);
  const matchIndex = series.dailyDates.indexOf(key);
  const index = matchIndex >= 0 ? matchIndex : 0;
  const sunrise = series.sunrises[index];
  const sunset = series.sunsets[index];
  if (sunrise === null || sunrise === undefined || sunset === null || sunset === undefined) return null;
  return { sunrise: new Date(sunrise), sunset: new Date(sunset) };
};

/** One batched request for every waypoint; a failure yields nulls for all of them. */
export const fetchOpenMeteo = async (
  client: FeedClient,
  points: Coordinate[],
): Promise<Array<OpenMeteoSeries | null>> => {
  if (points.length === 0) return [];
  try {
    const payload = await client.getJson("/v1/forecast", {
      latitude: points.map((point) => point.lat.toFixed(4)).join(","),
      longitude: points.map((point) => point.lng.toFixed(4)).join(","),
      hourly: HOURLY_VARS,
      daily: DAILY_VARS,
      forecast_days: FORECAST_DAYS,
      temperature_unit: "celsius",
      wind_speed_unit: "kmh",
      timezone: "auto",
    });
    const blocks = ensureArray(payload);
    return points.map((_, index) => parseOpenMeteoLocation(blocks[index]));
  } catch (error) {
    log.warn("Forecast fetch failed; omitting source", { message: safeErrorMessage(error) });
    return points.map(() => null);
  }
};
