import type { RestStopPayload, SegmentPayload, TimelineEntry } from "@roadglance/core";
import type { RestStopPlace, Waypoint } from "../models/domain";
import type { PlaceLookup } from "../feeds/places";
import { roundTo } from "../utils/geo";
import { logger } from "../utils/logger";
import { MINUTE_MS, addMinutes } from "../utils/time";

const log = logger.child("rest-stops");

/**
 * Waypoint indices where a rest break falls: the first waypoint at which
 * driving time since the last break reaches the interval. The destination is
 * never a rest stop.
 */
export const planRestStops = (etas: Date[], driveIntervalMinutes: number): number[] => {
  if (etas.length < 2 || driveIntervalMinutes <= 0) return [];
  const intervalMs = driveIntervalMinutes * MINUTE_MS;
  const positions: number[] = [];
  let lastRest = etas[0]?.getTime() ?? 0;

  for (let i = 1; i < etas.length; i += 1) {
    const eta = etas[i];
    if (!eta || eta.getTime() - lastRest < intervalMs) continue;
    if (i === etas.length - 1) break;
    positions.push(i);
    lastRest = eta.getTime();
  }
  return positions;
};

/**
 * Shifts every ETA by one rest duration per rest index strictly before it;
 * the rest happens after arriving at its waypoint.
 */
export const applyRestDelays = (etas: Date[], restIndices: number[], restDurationMinutes: number): Date[] => {
  const rests = new Set(restIndices);
  let delayMinutes = 0;
  return etas.map((eta, index) => {
    const shifted = addMinutes(eta, delayMinutes);
    if (rests.has(index)) delayMinutes += restDurationMinutes;
    return shifted;
  });
};

/**
 * One place lookup per rest position, done once per request. Positions
 * without a result keep the waypoint's own coordinates.
 */
export const resolveRestStopPlaces = async (
  restIndices: number[],
  waypoints: Waypoint[],
  lookup: PlaceLookup,
): Promise<RestStopPlace[]> => {
  const places = await Promise.all(
    restIndices.map(async (waypointIndex): Promise<RestStopPlace | null> => {
      const waypoint = waypoints[waypointIndex];
      if (!waypoint) return null;
      const place = await lookup({ lat: waypoint.lat, lng: waypoint.lng });
      return {
        waypointIndex,
        alongRouteMiles: waypoint.alongRouteMiles,
        placeName: place?.name ?? null,
        location: place?.location ?? { lat: waypoint.lat, lng: waypoint.lng },
      };
    }),
  );
  const resolved = places.filter((place): place is RestStopPlace => place !== null);
  log.debug("Rest stops resolved", {
    requested: restIndices.length,
    named: resolved.filter((place) => place.placeName !== null).length,
  });
  return resolved;
};

export const restStopLabel = (mileMarker: number) => `Rest stop (mile ${mileMarker})`;

const isSegment = (entry: TimelineEntry | undefined): entry is SegmentPayload => entry?.type === "waypoint";

/**
 * Splices a rest stop after the segment of each place's waypoint. Stops are
 * inserted from the furthest back so earlier indices stay valid.
 */
export const insertRestStops = (
  segments: SegmentPayload[],
  places: RestStopPlace[],
  restDurationMinutes: number,
): TimelineEntry[] => {
  const timeline: TimelineEntry[] = [...segments];
  const ordered = [...places].sort(
    (a, b) => b.alongRouteMiles - a.alongRouteMiles || b.waypointIndex - a.waypointIndex,
  );

  for (const place of ordered) {
    const anchor = timeline[place.waypointIndex];
    if (!isSegment(anchor)) continue;
    const arrive = new Date(anchor.eta);
    const restStop: RestStopPayload = {
      type: "rest_stop",
      location: { lat: roundTo(place.location.lat, 5), lng: roundTo(place.location.lng, 5) },
      placeName: place.placeName ?? restStopLabel(anchor.mileMarker),
      restDurationMinutes,
      etaArrive: arrive.toISOString(),
      etaDepart: addMinutes(arrive, restDurationMinutes).toISOString(),
      mileMarker: anchor.mileMarker,
    };
    timeline.splice(place.waypointIndex + 1, 0, restStop);
  }
  return timeline;
};
