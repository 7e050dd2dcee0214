import type { RouteConditionsResponse, SlotPayload } from "@roadglance/core";
import type { FeedFetchers } from "../feeds";
import type { StationObservation } from "../models/domain";
import { roundTo } from "../utils/geo";
import { safeErrorMessage } from "../utils/errors";
import { logger } from "../utils/logger";
import { fetchRawSeries } from "./rawSeries";
import { planRestStops, resolveRestStopPlaces } from "./restStops";
import { departureWindow, drivingEtas, resolveSlot, toSlotPayload, type SlotContext } from "./slotResolver";
import { placeWaypoints } from "./waypointPlacement";

const log = logger.child("route-conditions");

const METERS_PER_MILE = 1609.344;

export interface RouteConditionsRequest {
  origin: string;
  destination: string;
  departure: Date;
  speedFactor: number;
  /** 0 disables rest stops. */
  restIntervalMinutes: number;
  restDurationMinutes: number;
}

const loadStations = async (fetchers: FeedFetchers): Promise<StationObservation[]> => {
  try {
    return await fetchers.fetchStations();
  } catch (error) {
    log.warn("Road weather stations unavailable", { message: safeErrorMessage(error) });
    return [];
  }
};

/**
 * Route, waypoints and every feed are fetched once; each departure slot then
 * re-reads the same series at its own ETAs. Only the route fetch can fail the
 * request.
 */
export const buildRouteConditions = async (
  request: RouteConditionsRequest,
  fetchers: FeedFetchers,
  now: Date = new Date(),
): Promise<RouteConditionsResponse> => {
  const startedAt = Date.now();
  const [route, stations] = await Promise.all([
    fetchers.fetchRoute(request.origin, request.destination, request.departure),
    loadStations(fetchers),
  ]);

  const waypoints = placeWaypoints(route.points, stations);
  const raw = await fetchRawSeries(fetchers, waypoints, stations);

  const driving = { route, waypoints, raw, speedFactor: request.speedFactor };
  const restIndices = planRestStops(drivingEtas(driving, request.departure), request.restIntervalMinutes);
  const restPlaces = await resolveRestStopPlaces(restIndices, waypoints, fetchers.lookupPlace);

  const context: SlotContext = {
    ...driving,
    restIndices,
    restPlaces,
    restDurationMinutes: request.restDurationMinutes,
  };

  const primary = resolveSlot(context, request.departure);
  const window = departureWindow(request.departure, now);
  const slots: Record<string, SlotPayload> = {};
  for (const departure of window) {
    slots[departure.toISOString()] = toSlotPayload(resolveSlot(context, departure));
  }
  slots[primary.departure] = toSlotPayload(primary);

  const first = window[0];
  const last = window[window.length - 1];

  log.info("Route conditions built", {
    waypoints: waypoints.length,
    restStops: restIndices.length,
    slots: Object.keys(slots).length,
    sources: raw.sources,
    durationMs: Date.now() - startedAt,
  });

  return {
    route: {
      summary: route.summary,
      totalDistanceMiles: roundTo(route.totalDistanceMeters / METERS_PER_MILE, 1),
      totalDurationMinutes: Math.round(route.totalDurationSeconds / 60),
      departure: primary.departure,
      arrival: primary.arrival,
      polyline: route.encodedPolyline,
    },
    segments: primary.segments,
    alerts: primary.alerts,
    sources: [...raw.sources],
    restStops: primary.restStops,
    slots,
    sliderRange: first && last ? { start: first.toISOString(), end: last.toISOString() } : null,
  };
};
