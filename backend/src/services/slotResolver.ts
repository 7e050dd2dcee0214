import type { RestStopPayload, SlotPayload, TimelineEntry } from "@roadglance/core";
import { findNwsReading } from "../feeds/nws";
import { findOpenMeteoReading, findSunTimes } from "../feeds/openMeteo";
import { findTomorrowReading } from "../feeds/tomorrow";
import type {
  Advisory,
  LightLevel,
  MergedObservation,
  ParsedRoute,
  RawSeries,
  RestStopPlace,
  RoadSurfaceReading,
  SunTimes,
  Waypoint,
} from "../models/domain";
import { HOUR_MS, ceilHour, floorHour } from "../utils/time";
import { adjustedEtas } from "./etaModel";
import { classifyLightLevel } from "./lightLevel";
import { alertActiveAt, matchStationToWaypoint, surfaceReadingForStation } from "./roadConditions";
import { applyRestDelays, insertRestStops } from "./restStops";
import { buildSegment, dedupeAlerts } from "./segmentAssembly";
import { computeWeatherSlowdown } from "./severity";
import { mergeObservations } from "./weatherMerge";

export const SLOT_WINDOW_HOURS = 48;

/** Hourly departures within 48 hours either side of `center`, never earlier than `now`. */
export const departureWindow = (center: Date, now: Date = new Date()): Date[] => {
  const earliest = Math.max(now.getTime(), center.getTime() - SLOT_WINDOW_HOURS * HOUR_MS);
  const start = ceilHour(new Date(earliest)).getTime();
  const end = floorHour(new Date(center.getTime() + SLOT_WINDOW_HOURS * HOUR_MS)).getTime();
  const departures: Date[] = [];
  for (let time = start; time <= end; time += HOUR_MS) {
    departures.push(new Date(time));
  }
  return departures;
};

export interface ResolvedPoint {
  observation: MergedObservation;
  surface: RoadSurfaceReading | null;
  advisories: Advisory[];
  sun: SunTimes | null;
  lightLevel: LightLevel;
}

/** Reads every source at each waypoint's ETA and merges the result. */
export const resolveAtEtas = (raw: RawSeries, waypoints: Waypoint[], etas: Date[]): ResolvedPoint[] =>
  waypoints.map((waypoint, index) => {
    const eta = etas[index] ?? etas[etas.length - 1] ?? new Date(0);
    const openMeteo = raw.openMeteo[index] ?? null;
    const periods = raw.nws[index] ?? null;
    const sun = openMeteo ? findSunTimes(openMeteo, eta) : null;

    const observation = mergeObservations({
      numeric: openMeteo ? findOpenMeteoReading(openMeteo, eta) : null,
      roadRisk: findTomorrowReading(raw.tomorrow[index] ?? [], eta),
      advisory: periods ? findNwsReading(periods, eta) : null,
    });

    return {
      observation,
      surface: waypoint.station
        ? surfaceReadingForStation(waypoint.station, waypoint)
        : matchStationToWaypoint(raw.stations, waypoint),
      advisories: (raw.nwsAlerts[index] ?? []).filter((advisory) => alertActiveAt(advisory, eta)),
      sun,
      lightLevel: classifyLightLevel(eta, sun?.sunrise, sun?.sunset),
    };
  });

export interface SlotContext {
  route: ParsedRoute;
  waypoints: Waypoint[];
  raw: RawSeries;
  speedFactor: number;
  restIndices: number[];
  restPlaces: RestStopPlace[];
  restDurationMinutes: number;
}

type DrivingContext = Pick<SlotContext, "route" | "waypoints" | "raw" | "speedFactor">;

/**
 * ETAs without rest breaks: constant-speed ETAs first, then again with each
 * segment slowed by the conditions forecast at its starting waypoint.
 */
export const drivingEtas = (context: DrivingContext, departure: Date): Date[] => {
  const { route, waypoints, raw, speedFactor } = context;
  const firstPass = adjustedEtas(waypoints, route.totalDurationSeconds, departure, speedFactor);
  const resolved = resolveAtEtas(raw, waypoints, firstPass);
  const slowdowns = resolved
    .slice(0, -1)
    .map((point) => computeWeatherSlowdown(point.observation, point.lightLevel));
  return adjustedEtas(waypoints, route.totalDurationSeconds, departure, speedFactor, slowdowns);
};

export interface ResolvedSlot extends SlotPayload {
  restStops: RestStopPayload[];
}

const isRestStop = (entry: TimelineEntry): entry is RestStopPayload => entry.type === "rest_stop";

export const resolveSlot = (context: SlotContext, departure: Date): ResolvedSlot => {
  const { route, waypoints, raw } = context;
  const etas = applyRestDelays(drivingEtas(context, departure), context.restIndices, context.restDurationMinutes);
  const resolved = resolveAtEtas(raw, waypoints, etas);

  const segments = waypoints.map((waypoint, index) => {
    const point = resolved[index];
    return buildSegment({
      index,
      waypoint,
      eta: etas[index] ?? departure,
      steps: route.steps,
      chainControls: raw.chainControls,
      observation: point?.observation ?? mergeObservations({}),
      surface: point?.surface ?? null,
      advisories: point?.advisories ?? [],
      lightLevel: point?.lightLevel ?? "day",
      sun: point?.sun ?? null,
    });
  });

  const timeline = insertRestStops(segments, context.restPlaces, context.restDurationMinutes);
  const arrival = etas[etas.length - 1] ?? departure;

  return {
    departure: departure.toISOString(),
    arrival: arrival.toISOString(),
    segments: timeline,
    alerts: dedupeAlerts(resolved.map((point) => point.advisories)),
    restStops: timeline.filter(isRestStop),
  };
};

export const toSlotPayload = ({ departure, arrival, segments, alerts }: ResolvedSlot): SlotPayload => ({
  departure,
  arrival,
  segments,
  alerts,
});
