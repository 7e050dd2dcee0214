import type { FeedFetchers } from "../feeds";
import { SOURCE_LABELS, type RawSeries, type SourceLabel, type StationObservation, type Waypoint } from "../models/domain";
import { safeErrorMessage } from "../utils/errors";
import { logger } from "../utils/logger";

const log = logger.child("raw-series");

type RawFetchers = Omit<FeedFetchers, "fetchRoute" | "fetchStations" | "lookupPlace">;

const settledValue = <T>(result: PromiseSettledResult<T>, fallback: T, source: string): T => {
  if (result.status === "fulfilled") return result.value;
  log.warn("Source failed; continuing without it", { source, message: safeErrorMessage(result.reason) });
  return fallback;
};

/**
 * Fetches every weather and road feed for the waypoint set at once. The
 * result is reused by every departure slot; a failed source becomes
 * nulls/empties for all waypoints.
 */
export const fetchRawSeries = async (
  fetchers: RawFetchers,
  waypoints: Waypoint[],
  stations: StationObservation[],
): Promise<RawSeries> => {
  const points = waypoints.map((waypoint) => ({ lat: waypoint.lat, lng: waypoint.lng }));

  const [openMeteoResult, nwsResult, alertsResult, tomorrowResult, chainResult] = await Promise.allSettled([
    fetchers.fetchOpenMeteo(points),
    Promise.all(points.map((point) => fetchers.fetchNwsForecast(point))),
    Promise.all(points.map((point) => fetchers.fetchNwsAlerts(point))),
    fetchers.fetchTomorrow(points),
    fetchers.fetchChainControls(),
  ]);

  const openMeteo = settledValue(openMeteoResult, points.map(() => null), "open-meteo");
  const nws = settledValue(nwsResult, points.map(() => null), "nws");
  const nwsAlerts = settledValue(alertsResult, points.map(() => []), "nws-alerts");
  const tomorrow = settledValue(tomorrowResult, points.map(() => []), "tomorrow-io");
  const chainControls = settledValue(chainResult, [], "caltrans-chain-control");

  const sources = new Set<SourceLabel>();
  if (openMeteo.some((series) => series !== null)) sources.add(SOURCE_LABELS["open-meteo"]);
  if (nws.some((periods) => periods !== null)) sources.add(SOURCE_LABELS.nws);
  if (tomorrow.some((intervals) => intervals.length > 0)) sources.add(SOURCE_LABELS["tomorrow-io"]);
  if (chainControls.length > 0 || stations.length > 0) sources.add(SOURCE_LABELS.caltrans);

  const raw: RawSeries = {
    openMeteo,
    nws,
    nwsAlerts,
    tomorrow,
    chainControls,
    stations,
    sources: Array.from(sources).sort(),
  };
  log.info("Raw series fetched", { waypoints: waypoints.length, sources: raw.sources });
  return raw;
};
