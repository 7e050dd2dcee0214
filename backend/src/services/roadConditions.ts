import { config } from "../config";
import type { Advisory, ChainControl, Coordinate, RoadSurfaceReading, StationObservation } from "../models/domain";
import { haversineMiles, roundTo } from "../utils/geo";
import { parseTimestamp } from "../utils/time";
import { normalizeChainLevel } from "./severity";

const toSurfaceReading = (station: StationObservation, distanceMiles: number): RoadSurfaceReading => ({
  stationName: station.name,
  pavementStatus: station.pavementStatus,
  pavementTempF: station.pavementTempF,
  airTempF: station.airTempF,
  visibilityMiles: station.visibilityMiles,
  windSpeedMph: station.windSpeedMph,
  precipitationType: station.precipitationType,
  distanceMiles: roundTo(distanceMiles, 1),
});

/** Nearest station within `radiusMiles` of the point, or null. */
export const matchStationToWaypoint = (
  stations: StationObservation[],
  point: Coordinate,
  radiusMiles = config.stationMatchRadiusMiles,
): RoadSurfaceReading | null => {
  let best: StationObservation | null = null;
  let bestDistance = Infinity;
  for (const station of stations) {
    const distance = haversineMiles(point, station);
    if (distance < bestDistance && distance <= radiusMiles) {
      best = station;
      bestDistance = distance;
    }
  }
  return best ? toSurfaceReading(best, bestDistance) : null;
};

export const surfaceReadingForStation = (station: StationObservation, point: Coordinate): RoadSurfaceReading =>
  toSurfaceReading(station, haversineMiles(point, station));

const HIGHWAY_PATTERN = /\b(?:I|US|SR|CA|Hwy|Highway|Route)[-\s]?(\d{1,3})\b/gi;
const DIRECTION_PATTERN = /\b(north|south|east|west)(?:bound)?\b/i;

const highwayNumber = (value: string) => /(\d{1,3})/.exec(value)?.[1] ?? null;

/** "E", "East" and "Eastbound" all normalize to "E"; empty when unknown. */
const directionInitial = (value: string | null | undefined) => {
  const trimmed = (value ?? "").trim().toUpperCase();
  return /^[NSEW]/.test(trimmed) ? trimmed.charAt(0) : "";
};

const CHAIN_RANK: Record<string, number> = { R3: 3, R2: 2, R1: 1 };

const chainRank = (control: ChainControl) => CHAIN_RANK[normalizeChainLevel(control.level)] ?? 0;

/**
 * Chain control for the highway named in a turn instruction. Matching is
 * textual: a control applies when the instruction names its highway and, if
 * the instruction names a direction, the directions agree. The most
 * restrictive applicable control wins.
 */
export const matchChainControl = (controls: ChainControl[], instruction: string): ChainControl | null => {
  if (!instruction || controls.length === 0) return null;
  const mentioned = new Set(Array.from(instruction.matchAll(HIGHWAY_PATTERN), (match) => match[1]));
  if (mentioned.size === 0) return null;
  const direction = directionInitial(DIRECTION_PATTERN.exec(instruction)?.[1]);

  let best: ChainControl | null = null;
  for (const control of controls) {
    const number = highwayNumber(control.highway);
    if (!number || !mentioned.has(number)) continue;
    const controlDirection = directionInitial(control.direction);
    if (direction && controlDirection && controlDirection !== direction) continue;
    if (!best || chainRank(control) > chainRank(best)) best = control;
  }
  return best;
};

/** An advisory without expiry stays active; otherwise it must expire strictly after the ETA. */
export const alertActiveAt = (advisory: Pick<Advisory, "expires">, eta: Date): boolean => {
  if (!advisory.expires) return true;
  const expires = parseTimestamp(advisory.expires);
  if (expires === null) return true;
  return expires > eta.getTime();
};
