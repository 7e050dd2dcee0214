import type { ChainControl, StationObservation } from "../models/domain";
import { safeErrorMessage } from "../utils/errors";
import { isValidCoordinate } from "../utils/geo";
import { isRecord, readArray, readNumber, readRecord, readString, type JsonRecord } from "../utils/json";
import { logger } from "../utils/logger";
import { FeedClient } from "./feedClient";

const CWWP2_BASE_URL = "https://cwwp2.dot.ca.gov";
export const CHAIN_CONTROL_DISTRICTS = [1, 2, 3, 6, 7, 8, 9, 10, 11];
export const RWIS_DISTRICTS = [2, 3, 6, 8, 9, 10];

const pad = (district: number) => String(district).padStart(2, "0");
const chainControlPath = (district: number) => `/data/d${district}/cc/ccStatusD${pad(district)}.json`;
const rwisPath = (district: number) => `/data/d${district}/rwis/rwisStatusD${pad(district)}.json`;

const log = logger.child("caltrans");

export const createCaltransClient = () => new FeedClient({ name: "caltrans", baseUrl: CWWP2_BASE_URL, maxRetries: 0 });

/** District files are either a bare array or `{ data: [...] }`, entries optionally wrapped in `cc`/`rwis`. */
const unwrapEntries = (payload: unknown, wrapperKey: string): JsonRecord[] => {
  const entries = Array.isArray(payload) ? payload : readArray(payload, "data");
  return entries.flatMap((entry) => {
    const inner = readRecord(entry, wrapperKey);
    if (inner) return [inner];
    return isRecord(entry) ? [entry] : [];
  });
};

const readMeasurement = (entry: JsonRecord, key: string): number | null => {
  const measurement = entry[key];
  if (isRecord(measurement)) return readNumber(measurement, "value");
  return readNumber(entry, key);
};

export const parseChainControl = (entry: JsonRecord): ChainControl => ({
  highway: readString(entry, "highway") ?? "",
  direction: readString(entry, "direction") ?? "",
  level: readString(entry, "controlStatus") ?? "",
  beginPostmile: readNumber(entry, "beginPostmile"),
  endPostmile: readNumber(entry, "endPostmile"),
  description: readString(entry, "description") ?? "",
});

/** Stations without usable coordinates are dropped. */
export const parseStation = (entry: JsonRecord, fallbackId: string): StationObservation | null => {
  const location = readRecord(entry, "location");
  const lat = readNumber(location, "latitude");
  const lng = readNumber(location, "longitude");
  if (lat === null || lng === null || !isValidCoordinate(lat, lng)) return null;
  const name = readString(location, "locationName") ?? readString(entry, "name") ?? `Station ${fallbackId}`;
  return {
    stationId: readString(entry, "index") ?? readString(entry, "stationId") ?? fallbackId,
    name,
    lat,
    lng,
    pavementStatus: readString(entry, "surfaceStatus"),
    pavementTempF: readMeasurement(entry, "surfaceTemperature"),
    airTempF: readMeasurement(entry, "airTemperature"),
    visibilityMiles: readMeasurement(entry, "visibility"),
    windSpeedMph: readMeasurement(entry, "windSpeed"),
    precipitationType: readString(entry, "precipitationType"),
  };
};

export const parseChainControlPayload = (payload: unknown): ChainControl[] =>
  unwrapEntries(payload, "cc")
    .map(parseChainControl)
    .filter((control) => control.level !== "");

export const parseStationPayload = (payload: unknown, district: number): StationObservation[] =>
  unwrapEntries(payload, "rwis").flatMap((entry, index) => {
    const station = parseStation(entry, `d${district}-${index}`);
    return station ? [station] : [];
  });

const fetchDistricts = async <T>(
  districts: number[],
  load: (district: number) => Promise<T[]>,
  feed: string,
): Promise<T[]> => {
  const results = await Promise.allSettled(districts.map((district) => load(district)));
  return results.flatMap((result, index) => {
    if (result.status === "fulfilled") return result.value;
    log.warn("District feed unavailable; skipping", {
      feed,
      district: districts[index],
      message: safeErrorMessage(result.reason),
    });
    return [];
  });
};

export const fetchChainControls = async (client: FeedClient): Promise<ChainControl[]> =>
  fetchDistricts(
    CHAIN_CONTROL_DISTRICTS,
    async (district) => parseChainControlPayload(await client.getJson(chainControlPath(district))),
    "chain-control",
  );

export const fetchStations = async (client: FeedClient): Promise<StationObservation[]> =>
  fetchDistricts(
    RWIS_DISTRICTS,
    async (district) => parseStationPayload(await client.getJson(rwisPath(district)), district),
    "rwis",
  );
