import type { LightLevel } from "../models/domain";
import { MINUTE_MS } from "../utils/time";

const TWILIGHT_WINDOW_MS = 30 * MINUTE_MS;

/**
 * Twilight within 30 minutes (inclusive) of sunrise or sunset, day between
 * them, night otherwise. Without sun times the arrival counts as day.
 */
export const classifyLightLevel = (
  arrival: Date,
  sunrise: Date | null | undefined,
  sunset: Date | null | undefined,
): LightLevel => {
  if (!sunrise || !sunset) return "day";
  const at = arrival.getTime();
  const rise = sunrise.getTime();
  const set = sunset.getTime();

  if (Math.abs(at - rise) <= TWILIGHT_WINDOW_MS || Math.abs(at - set) <= TWILIGHT_WINDOW_MS) {
    return "twilight";
  }
  if (at > rise + TWILIGHT_WINDOW_MS && at < set - TWILIGHT_WINDOW_MS) {
    return "day";
  }
  return "night";
};
