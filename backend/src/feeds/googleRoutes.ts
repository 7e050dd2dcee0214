import { config } from "../config";
import type { Coordinate, ParsedRoute, RouteStep } from "../models/domain";
import { RouteUnavailableError, safeErrorMessage } from "../utils/errors";
import { decodeRoutePolyline } from "../utils/geo";
import { isRecord, readArray, readNumber, readRecord, readString, toNumber } from "../utils/json";
import { logger } from "../utils/logger";
import { FeedClient } from "./feedClient";

const ROUTES_BASE_URL = "https://routes.googleapis.com";
const COMPUTE_ROUTES_PATH = "/directions/v2:computeRoutes";
const FIELD_MASK = [
  "routes.polyline.encodedPolyline",
  "routes.legs.steps.navigationInstruction",
  "routes.legs.steps.startLocation",
  "routes.legs.steps.endLocation",
  "routes.legs.duration",
  "routes.legs.distanceMeters",
  "routes.description",
].join(",");

const log = logger.child("google-routes");

export const createRoutesClient = (apiKey = config.googleApiKey) =>
  new FeedClient({
    name: "google-routes",
    baseUrl: ROUTES_BASE_URL,
    headers: apiKey ? { "X-Goog-Api-Key": apiKey, "X-Goog-FieldMask": FIELD_MASK } : { "X-Goog-FieldMask": FIELD_MASK },
  });

const readLatLng = (location: unknown): Coordinate | null => {
  const latLng = readRecord(location, "latLng");
  const lat = readNumber(latLng, "latitude");
  const lng = readNumber(latLng, "longitude");
  if (lat === null || lng === null) return null;
  return { lat, lng };
};

/** Durations arrive as protobuf strings such as "5400s". */
export const parseDurationSeconds = (value: unknown): number => {
  if (typeof value === "string") return toNumber(value.replace(/s$/, "")) ?? 0;
  return toNumber(value) ?? 0;
};

const parseStep = (step: unknown): RouteStep => {
  const navigation = readRecord(step, "navigationInstruction");
  return {
    instruction: readString(navigation, "instructions") ?? "",
    maneuver: readString(navigation, "maneuver") ?? "",
    startLocation: readLatLng(readRecord(step, "startLocation")),
    endLocation: readLatLng(readRecord(step, "endLocation")),
  };
};

/** Maps a computeRoutes payload; throws when no usable route is present. */
export const parseRoutesResponse = (payload: unknown): ParsedRoute => {
  const error = readRecord(payload, "error");
  if (error) {
    throw new RouteUnavailableError(`Routing API error: ${readString(error, "message") ?? "unknown error"}`);
  }
  const route = readArray(payload, "routes")[0];
  if (!isRecord(route)) {
    throw new RouteUnavailableError("No route found between those locations.");
  }

  const legs = readArray(route, "legs");
  const steps = legs.flatMap((leg) => readArray(leg, "steps").map(parseStep));
  const totalDurationSeconds = legs.reduce<number>(
    (sum, leg) => sum + (isRecord(leg) ? parseDurationSeconds(leg.duration) : 0),
    0,
  );
  const totalDistanceMeters = legs.reduce<number>((sum, leg) => sum + (readNumber(leg, "distanceMeters") ?? 0), 0);
  const encodedPolyline = readString(readRecord(route, "polyline"), "encodedPolyline") ?? "";
  const points = decodeRoutePolyline(encodedPolyline);
  if (points.length === 0) {
    throw new RouteUnavailableError("Route returned without geometry.");
  }

  return {
    encodedPolyline,
    points,
    steps,
    totalDurationSeconds,
    totalDistanceMeters,
    summary: readString(route, "description") ?? "",
  };
};

export const fetchRoute = async (
  client: FeedClient,
  origin: string,
  destination: string,
  departure: Date,
): Promise<ParsedRoute> => {
  let payload: unknown;
  try {
    payload = await client.postJson(COMPUTE_ROUTES_PATH, {
      origin: { address: origin },
      destination: { address: destination },
      travelMode: "DRIVE",
      routingPreference: "TRAFFIC_AWARE",
      // the API rejects past departure times
      ...(departure.getTime() > Date.now() ? { departureTime: departure.toISOString() } : {}),
    });
  } catch (error) {
    log.error("Route request failed", { origin, destination, message: safeErrorMessage(error) });
    throw new RouteUnavailableError(`Routing provider unavailable: ${safeErrorMessage(error)}`);
  }
  const route = parseRoutesResponse(payload);
  log.info("Route fetched", {
    points: route.points.length,
    steps: route.steps.length,
    durationSeconds: route.totalDurationSeconds,
  });
  return route;
};
