import type { Waypoint } from "../models/domain";
import { addSeconds } from "../utils/time";

/** Floor for the combined speed factor of one segment. */
export const MIN_EFFECTIVE_FACTOR = 0.1;

type RoutePositioned = Pick<Waypoint, "alongRouteMiles">;

const segmentDistances = (waypoints: RoutePositioned[]): number[] => {
  const distances: number[] = [];
  for (let i = 1; i < waypoints.length; i += 1) {
    const previous = waypoints[i - 1];
    const current = waypoints[i];
    if (!previous || !current) continue;
    distances.push(Math.max(0, current.alongRouteMiles - previous.alongRouteMiles));
  }
  return distances;
};

const accumulate = (departure: Date, segmentSeconds: number[]): Date[] => {
  const etas = [departure];
  let elapsed = 0;
  segmentSeconds.forEach((seconds) => {
    elapsed += seconds;
    etas.push(addSeconds(departure, elapsed));
  });
  return etas;
};

/** Constant-speed ETAs: the trip duration is split in proportion to along-route distance. */
export const baseEtas = (waypoints: RoutePositioned[], totalDurationSeconds: number, departure: Date): Date[] =>
  adjustedEtas(waypoints, totalDurationSeconds, departure, 1, []);

/**
 * ETAs where segment i (waypoint i → i+1) takes its proportional share of
 * the trip divided by `globalSpeedFactor * slowdowns[i]`.
 */
export const adjustedEtas = (
  waypoints: RoutePositioned[],
  totalDurationSeconds: number,
  departure: Date,
  globalSpeedFactor = 1,
  slowdowns: number[] = [],
): Date[] => {
  if (waypoints.length === 0) return [];
  if (waypoints.length === 1) return [departure];

  const distances = segmentDistances(waypoints);
  const totalDistance = distances.reduce((sum, distance) => sum + distance, 0);
  if (totalDistance === 0) return waypoints.map(() => departure);

  const segmentSeconds = distances.map((distance, index) => {
    const baseSeconds = (distance / totalDistance) * totalDurationSeconds;
    const effective = Math.max(globalSpeedFactor * (slowdowns[index] ?? 1), MIN_EFFECTIVE_FACTOR);
    return baseSeconds / effective;
  });
  return accumulate(departure, segmentSeconds);
};
