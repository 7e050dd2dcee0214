import { config } from "../config";
import type { Coordinate, StationObservation, Waypoint } from "../models/domain";
import { cumulativeDistances, isValidCoordinate, pointAlongRoute, projectOntoRoute } from "../utils/geo";
import { logger } from "../utils/logger";

export interface PlacementOptions {
  snapRadiusMiles?: number;
  minSpacingMiles?: number;
  gapThresholdMiles?: number;
  fillIntervalMiles?: number;
}

const log = logger.child("placement");

const fillWaypoint = (point: Coordinate, alongRouteMiles: number): Waypoint => ({
  lat: point.lat,
  lng: point.lng,
  kind: "fill",
  alongRouteMiles,
  station: null,
});

/**
 * Stations close enough to the route, ordered by route position, with
 * crowded neighbours dropped (the first station along the route wins).
 */
const snapStations = (
  points: Coordinate[],
  distances: number[],
  stations: StationObservation[],
  snapRadiusMiles: number,
  minSpacingMiles: number,
): Waypoint[] => {
  const candidates: Waypoint[] = [];
  for (const station of stations) {
    if (!isValidCoordinate(station.lat, station.lng)) continue;
    const projection = projectOntoRoute(points, distances, station);
    if (!projection || projection.offsetMiles > snapRadiusMiles) continue;
    candidates.push({
      lat: station.lat,
      lng: station.lng,
      kind: "rwis",
      alongRouteMiles: projection.alongRouteMiles,
      station,
    });
  }
  candidates.sort((a, b) => a.alongRouteMiles - b.alongRouteMiles);

  const accepted: Waypoint[] = [];
  for (const candidate of candidates) {
    const previous = accepted[accepted.length - 1];
    if (previous && candidate.alongRouteMiles - previous.alongRouteMiles < minSpacingMiles) continue;
    accepted.push(candidate);
  }
  return accepted;
};

/**
 * A station sitting on an endpoint takes over that endpoint instead of
 * adding a second waypoint at the same route position. The endpoint keeps
 * the route's own coordinates.
 */
const endpointWaypoint = (endpoint: Coordinate, alongRouteMiles: number, station: Waypoint | undefined): Waypoint =>
  station ? { ...station, lat: endpoint.lat, lng: endpoint.lng, alongRouteMiles } : fillWaypoint(endpoint, alongRouteMiles);

export const placeWaypoints = (
  points: Coordinate[],
  stations: StationObservation[],
  options: PlacementOptions = {},
): Waypoint[] => {
  const snapRadiusMiles = options.snapRadiusMiles ?? config.stationSnapRadiusMiles;
  const minSpacingMiles = options.minSpacingMiles ?? config.stationMinSpacingMiles;
  const gapThresholdMiles = options.gapThresholdMiles ?? config.gapFillThresholdMiles;
  const fillIntervalMiles = Math.min(options.fillIntervalMiles ?? config.waypointIntervalMiles, gapThresholdMiles);

  const origin = points[0];
  const destination = points[points.length - 1];
  if (!origin || !destination) return [];
  if (points.length === 1) return [fillWaypoint(origin, 0)];

  const distances = cumulativeDistances(points);
  const totalMiles = distances[distances.length - 1] ?? 0;

  const snapped = snapStations(points, distances, stations, snapRadiusMiles, minSpacingMiles);
  const anchors = [
    endpointWaypoint(origin, 0, snapped.find((waypoint) => waypoint.alongRouteMiles <= 0)),
    ...snapped.filter((waypoint) => waypoint.alongRouteMiles > 0 && waypoint.alongRouteMiles < totalMiles),
    endpointWaypoint(destination, totalMiles, snapped.find((waypoint) => waypoint.alongRouteMiles >= totalMiles)),
  ];

  const placed: Waypoint[] = [];
  anchors.forEach((anchor, index) => {
    placed.push(anchor);
    const next = anchors[index + 1];
    if (!next || next.alongRouteMiles - anchor.alongRouteMiles <= gapThresholdMiles) return;
    for (
      let target = anchor.alongRouteMiles + fillIntervalMiles;
      target < next.alongRouteMiles;
      target += fillIntervalMiles
    ) {
      const point = pointAlongRoute(points, distances, target);
      if (point) placed.push(fillWaypoint(point, target));
    }
  });

  log.debug("Waypoints placed", {
    total: placed.length,
    rwis: placed.filter((waypoint) => waypoint.kind === "rwis").length,
    routeMiles: Math.round(totalMiles),
  });
  return placed;
};
