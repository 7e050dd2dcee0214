import test from "node:test";
import assert from "node:assert/strict";
import type { FeedFetchers } from "../feeds";
import type { Coordinate, NwsPeriod, ParsedRoute } from "../models/domain";
import { buildRouteConditions, type RouteConditionsRequest } from "../services/routeConditions";
import { RouteUnavailableError } from "../utils/errors";

const departure = new Date("2026-03-10T12:00:00.000Z");

// one degree of longitude (~69.1 mi) with a vertex every 0.1°
const routePoints: Coordinate[] = Array.from({ length: 11 }, (_, index) => ({ lat: 0, lng: index / 10 }));

const route: ParsedRoute = {
  encodedPolyline: "encoded",
  points: routePoints,
  steps: [
    {
      instruction: "Head east on I-80",
      maneuver: "DEPART",
      startLocation: { lat: 0, lng: 0 },
      endLocation: { lat: 0, lng: 1 },
    },
  ],
  totalDurationSeconds: 3600,
  totalDistanceMeters: 160934.4,
  summary: "I-80 E",
};

const nwsPeriods: NwsPeriod[] = [
  {
    startTime: departure.getTime(),
    endTime: null,
    reading: {
      temperatureF: 45,
      windSpeedMph: 5,
      windDirection: "W",
      conditionText: "Mostly Cloudy",
      precipitationProbability: 10,
    },
  },
];

const createFetchers = (overrides: Partial<FeedFetchers> = {}): FeedFetchers => ({
  fetchRoute: async () => route,
  fetchStations: async () => [],
  fetchChainControls: async () => [],
  fetchOpenMeteo: async (points) => points.map(() => null),
  fetchNwsForecast: async () => nwsPeriods,
  fetchNwsAlerts: async () => [],
  fetchTomorrow: async (points) => points.map(() => []),
  lookupPlace: async () => ({ name: "Summit Rest Area", location: { lat: 0.001, lng: 0.65 } }),
  ...overrides,
});

const request: RouteConditionsRequest = {
  origin: "Origin, CA",
  destination: "Destination, NV",
  departure,
  speedFactor: 1,
  restIntervalMinutes: 30,
  restDurationMinutes: 20,
};

test("builds the requested departure plus one slot per hour in the window", async () => {
  const response = await buildRouteConditions(request, createFetchers(), departure);

  assert.deepEqual(response.route, {
    summary: "I-80 E",
    totalDistanceMiles: 100,
    totalDurationMinutes: 60,
    departure: "2026-03-10T12:00:00.000Z",
    arrival: response.slots["2026-03-10T12:00:00.000Z"]?.arrival,
    polyline: "encoded",
  });
  assert.equal(Object.keys(response.slots).length, 49);
  assert.deepEqual(response.sliderRange, { start: "2026-03-10T12:00:00.000Z", end: "2026-03-12T12:00:00.000Z" });
  assert.deepEqual(response.sources, ["NWS"]);
  assert.deepEqual(response.alerts, []);

  // waypoints at 0, 15, 30, 45, 60 mi and the destination; a rest after mile 45
  assert.deepEqual(
    response.segments.map((entry) => entry.type),
    ["waypoint", "waypoint", "waypoint", "waypoint", "rest_stop", "waypoint", "waypoint"],
  );
  assert.equal(response.restStops.length, 1);
  assert.equal(response.restStops[0]?.placeName, "Summit Rest Area");
  assert.equal(response.restStops[0]?.mileMarker, 45);

  const arrival = Date.parse(response.route.arrival);
  assert.ok(Math.abs(arrival - Date.parse("2026-03-10T13:20:00.000Z")) <= 1);

  const first = response.segments[0];
  assert.ok(first?.type === "waypoint");
  assert.equal(first.turnInstruction, "Head east on I-80");
  assert.equal(first.weather.conditionText, "Mostly Cloudy");
  assert.deepEqual(first.weather.contributors, ["nws"]);
});

test("every slot reuses the same rest position with its own timestamps", async () => {
  const response = await buildRouteConditions(request, createFetchers(), departure);
  const later = response.slots["2026-03-11T06:00:00.000Z"];
  assert.ok(later);
  assert.equal(later.departure, "2026-03-11T06:00:00.000Z");
  const rest = later.segments[4];
  assert.ok(rest?.type === "rest_stop");
  assert.equal(rest.mileMarker, 45);
  assert.equal(rest.placeName, "Summit Rest Area");
  assert.ok(Date.parse(rest.etaArrive) > Date.parse(later.departure));
});

test("place lookups happen once per rest position", async () => {
  let lookups = 0;
  await buildRouteConditions(
    request,
    createFetchers({
      lookupPlace: async () => {
        lookups += 1;
        return null;
      },
    }),
    departure,
  );
  assert.equal(lookups, 1);
});

test("a failed route aborts the request", async () => {
  const fetchers = createFetchers({
    fetchRoute: async () => {
      throw new RouteUnavailableError("No route found between those locations.");
    },
  });
  await assert.rejects(buildRouteConditions(request, fetchers, departure), RouteUnavailableError);
});

test("failed weather and station feeds degrade instead of failing", async () => {
  const fetchers = createFetchers({
    fetchStations: async () => {
      throw new Error("district offline");
    },
    fetchOpenMeteo: async () => {
      throw new Error("upstream timeout");
    },
    fetchNwsForecast: async () => null,
  });

  const response = await buildRouteConditions({ ...request, restIntervalMinutes: 0 }, fetchers, departure);

  assert.deepEqual(response.sources, []);
  assert.equal(response.restStops.length, 0);
  assert.equal(response.segments.length, 6);
  const first = response.segments[0];
  assert.ok(first?.type === "waypoint");
  assert.equal(first.weather.temperatureF, null);
  assert.equal(first.severityScore, 0);
  assert.equal(first.dataSource, "fill");
});
