import polyline from "@mapbox/polyline";
import type { Coordinate } from "../models/domain";

const EARTH_RADIUS_MILES = 3958.8;

const toRadians = (degrees: number) => (degrees * Math.PI) / 180;

export const haversineMiles = (from: Coordinate, to: Coordinate): number => {
  const dLat = toRadians(to.lat - from.lat);
  const dLng = toRadians(to.lng - from.lng);
  const a =
    Math.sin(dLat / 2) ** 2 +
    Math.cos(toRadians(from.lat)) * Math.cos(toRadians(to.lat)) * Math.sin(dLng / 2) ** 2;
  return EARTH_RADIUS_MILES * 2 * Math.atan2(Math.sqrt(a), Math.sqrt(1 - a));
};

export const isValidCoordinate = (lat: unknown, lng: unknown): boolean =>
  typeof lat === "number" &&
  typeof lng === "number" &&
  Number.isFinite(lat) &&
  Number.isFinite(lng) &&
  Math.abs(lat) <= 90 &&
  Math.abs(lng) <= 180;

export const decodeRoutePolyline = (encoded: string | null | undefined): Coordinate[] => {
  if (!encoded) return [];
  return polyline.decode(encoded).flatMap(([lat, lng]) => {
    if (lat === undefined || lng === undefined) return [];
    return [{ lat, lng }];
  });
};

/** Running along-route distance in miles at each vertex; first entry is 0. */
export const cumulativeDistances = (points: Coordinate[]): number[] => {
  const distances: number[] = [];
  let total = 0;
  let previous: Coordinate | undefined;
  for (const point of points) {
    if (previous) total += haversineMiles(previous, point);
    distances.push(total);
    previous = point;
  }
  return distances;
};

export interface RouteProjection {
  /** Straight-line miles from the point to its nearest vertex. */
  offsetMiles: number;
  /** Along-route miles of that vertex. */
  alongRouteMiles: number;
}

export const projectOntoRoute = (
  points: Coordinate[],
  distances: number[],
  target: Coordinate,
): RouteProjection | null => {
  let best: RouteProjection | null = null;
  for (let i = 0; i < points.length; i += 1) {
    const point = points[i];
    if (!point) continue;
    const offsetMiles = haversineMiles(point, target);
    if (!best || offsetMiles < best.offsetMiles) {
      best = { offsetMiles, alongRouteMiles: distances[i] ?? 0 };
    }
  }
  return best;
};

/**
 * Coordinate reached after walking `targetMiles` along the polyline,
 * interpolated linearly inside the vertex pair that spans it.
 */
export const pointAlongRoute = (points: Coordinate[], distances: number[], targetMiles: number): Coordinate | null => {
  const first = points[0];
  if (!first) return null;
  if (targetMiles <= 0) return first;
  for (let i = 1; i < points.length; i += 1) {
    const start = points[i - 1];
    const end = points[i];
    const startMiles = distances[i - 1];
    const endMiles = distances[i];
    if (!start || !end || startMiles === undefined || endMiles === undefined) continue;
    if (endMiles >= targetMiles) {
      const span = endMiles - startMiles;
      const fraction = span > 0 ? (targetMiles - startMiles) / span : 0;
      return {
        lat: start.lat + (end.lat - start.lat) * fraction,
        lng: start.lng + (end.lng - start.lng) * fraction,
      };
    }
  }
  return points[points.length - 1] ?? null;
};

export const roundTo = (value: number, digits: number): number => {
  const factor = 10 ** digits;
  return Math.round(value * factor) / factor;
};
