import type {
  Advisory,
  ChainControl,
  Coordinate,
  NwsPeriod,
  OpenMeteoSeries,
  ParsedRoute,
  StationObservation,
  TomorrowInterval,
} from "../models/domain";
import { createCaltransClient, fetchChainControls, fetchStations } from "./caltrans";
import { createRoutesClient, fetchRoute } from "./googleRoutes";
import { createNwsClient, fetchNwsAlerts, fetchNwsForecast } from "./nws";
import { createOpenMeteoClient, fetchOpenMeteo } from "./openMeteo";
import { createPlaceLookup, createPlacesClient, type PlaceLookup } from "./places";
import { createTomorrowClient, fetchTomorrowForWaypoints } from "./tomorrow";

/** Every upstream call the request pipeline makes, injectable for tests. */
export interface FeedFetchers {
  fetchRoute: (origin: string, destination: string, departure: Date) => Promise<ParsedRoute>;
  fetchStations: () => Promise<StationObservation[]>;
  fetchChainControls: () => Promise<ChainControl[]>;
  fetchOpenMeteo: (points: Coordinate[]) => Promise<Array<OpenMeteoSeries | null>>;
  fetchNwsForecast: (point: Coordinate) => Promise<NwsPeriod[] | null>;
  fetchNwsAlerts: (point: Coordinate) => Promise<Advisory[]>;
  fetchTomorrow: (points: Coordinate[]) => Promise<TomorrowInterval[][]>;
  lookupPlace: PlaceLookup;
}

export const createFeedFetchers = (): FeedFetchers => {
  const routes = createRoutesClient();
  const caltrans = createCaltransClient();
  const openMeteo = createOpenMeteoClient();
  const nws = createNwsClient();
  const tomorrow = createTomorrowClient();
  const places = createPlacesClient();

  return {
    fetchRoute: (origin, destination, departure) => fetchRoute(routes, origin, destination, departure),
    fetchStations: () => fetchStations(caltrans),
    fetchChainControls: () => fetchChainControls(caltrans),
    fetchOpenMeteo: (points) => fetchOpenMeteo(openMeteo, points),
    fetchNwsForecast: (point) => fetchNwsForecast(nws, point),
    fetchNwsAlerts: (point) => fetchNwsAlerts(nws, point),
    fetchTomorrow: (points) => fetchTomorrowForWaypoints(tomorrow, points),
    lookupPlace: createPlaceLookup(places),
  };
};
