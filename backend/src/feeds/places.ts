import { config } from "../config";
import type { Coordinate } from "../models/domain";
import { safeErrorMessage } from "../utils/errors";
import { readArray, readNumber, readRecord, readString } from "../utils/json";
import { logger } from "../utils/logger";
import { FeedClient } from "./feedClient";

const PLACES_BASE_URL = "https://places.googleapis.com";
const SEARCH_RADIUS_METERS = 8046.72;

const log = logger.child("google-places");

export interface NearbyPlace {
  name: string;
  location: Coordinate;
}

export type PlaceLookup = (point: Coordinate) => Promise<NearbyPlace | null>;

export const createPlacesClient = (apiKey = config.googleApiKey) =>
  new FeedClient({
    name: "google-places",
    baseUrl: PLACES_BASE_URL,
    headers: {
      "X-Goog-FieldMask": "places.displayName,places.location",
      ...(apiKey ? { "X-Goog-Api-Key": apiKey } : {}),
    },
  });

export const parseNearbyPlace = (payload: unknown, origin: Coordinate): NearbyPlace | null => {
  const place = readArray(payload, "places")[0];
  if (!place) return null;
  const location = readRecord(place, "location");
  return {
    name: readString(readRecord(place, "displayName"), "text") ?? "Rest Stop",
    location: {
      lat: readNumber(location, "latitude") ?? origin.lat,
      lng: readNumber(location, "longitude") ?? origin.lng,
    },
  };
};

/** Nearest rest area or gas station within five miles, or null. Never throws. */
export const createPlaceLookup =
  (client: FeedClient): PlaceLookup =>
  async (point) => {
    try {
      const payload = await client.postJson("/v1/places:searchNearby", {
        includedTypes: ["rest_stop", "gas_station"],
        maxResultCount: 1,
        locationRestriction: {
          circle: {
            center: { latitude: point.lat, longitude: point.lng },
            radius: SEARCH_RADIUS_METERS,
          },
        },
      });
      return parseNearbyPlace(payload, point);
    } catch (error) {
      log.warn("Nearby search failed", { ...point, message: safeErrorMessage(error) });
      return null;
    }
  };
