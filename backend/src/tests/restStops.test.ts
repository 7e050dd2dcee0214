import test from "node:test";
import assert from "node:assert/strict";
import type { RestStopPayload, SegmentPayload } from "@roadglance/core";
import type { Waypoint } from "../models/domain";
import type { PlaceLookup } from "../feeds/places";
import {
  applyRestDelays,
  insertRestStops,
  planRestStops,
  resolveRestStopPlaces,
  restStopLabel,
} from "../services/restStops";
import { buildSegment } from "../services/segmentAssembly";
import { mergeObservations } from "../services/weatherMerge";

const departure = new Date("2026-03-10T12:00:00.000Z");
const atMinutes = (minutes: number) => new Date(departure.getTime() + minutes * 60_000);
const asMinutes = (etas: Date[]) => etas.map((eta) => (eta.getTime() - departure.getTime()) / 60_000);

const makeWaypoint = (alongRouteMiles: number): Waypoint => ({
  lat: 39,
  lng: -120 + alongRouteMiles / 100,
  kind: "fill",
  alongRouteMiles,
  station: null,
});

const makeSegment = (index: number, waypoint: Waypoint, eta: Date): SegmentPayload =>
  buildSegment({
    index,
    waypoint,
    eta,
    steps: [],
    chainControls: [],
    observation: mergeObservations({}),
    surface: null,
    advisories: [],
    lightLevel: "day",
    sun: null,
  });

test("planRestStops marks the first waypoint reaching each interval", () => {
  const etas = [0, 30, 60, 90, 120, 150].map(atMinutes);
  assert.deepEqual(planRestStops(etas, 60), [2, 4]);
  assert.deepEqual(planRestStops(etas, 45), [2, 4]);
  assert.deepEqual(planRestStops(etas, 200), []);
});

test("a three-hour drive with hourly breaks rests twice, never at the destination", () => {
  // a waypoint every 20 minutes from 0 to 180
  const etas = Array.from({ length: 10 }, (_, index) => atMinutes(index * 20));
  assert.deepEqual(planRestStops(etas, 60), [3, 6]);
});

test("planRestStops never rests at the destination and can be disabled", () => {
  const etas = [0, 60, 120].map(atMinutes);
  assert.deepEqual(planRestStops(etas, 60), [1]);
  assert.deepEqual(planRestStops(etas, 0), []);
  assert.deepEqual(planRestStops([departure], 60), []);
});

test("applyRestDelays shifts only ETAs after each rest", () => {
  const etas = [0, 30, 60, 90].map(atMinutes);
  assert.deepEqual(asMinutes(applyRestDelays(etas, [1], 20)), [0, 30, 80, 110]);
  assert.deepEqual(asMinutes(applyRestDelays(etas, [0, 2], 15)), [0, 45, 75, 120]);
  assert.deepEqual(asMinutes(applyRestDelays(etas, [], 20)), [0, 30, 60, 90]);
});

test("applyRestDelays adds every earlier rest and keeps the order", () => {
  // uneven gaps between 0 and 400 minutes
  const inputMinutes = [0, 7, 25, 25, 60, 91, 130, 144, 200, 233, 260, 301, 345, 372, 400];
  const etas = inputMinutes.map(atMinutes);
  const restIndices = [2, 3, 7, 11];
  const restMinutes = 25;

  const shifted = asMinutes(applyRestDelays(etas, restIndices, restMinutes));

  assert.equal(shifted.length, inputMinutes.length);
  shifted.forEach((minutes, index) => {
    const earlierRests = restIndices.filter((restIndex) => restIndex < index).length;
    assert.equal(minutes, (inputMinutes[index] ?? Number.NaN) + earlierRests * restMinutes);
    if (index > 0) assert.ok(minutes >= (shifted[index - 1] ?? Number.POSITIVE_INFINITY));
  });
});

test("resolveRestStopPlaces looks up each position once and falls back to the waypoint", async () => {
  const waypoints = [makeWaypoint(0), makeWaypoint(40), makeWaypoint(80), makeWaypoint(120)];
  const calls: Array<{ lat: number; lng: number }> = [];
  const lookup: PlaceLookup = async (point) => {
    calls.push(point);
    if (calls.length === 1) return { name: "Donner Summit Rest Area", location: { lat: 39.3, lng: -120.3 } };
    return null;
  };

  const places = await resolveRestStopPlaces([1, 2], waypoints, lookup);

  assert.equal(calls.length, 2);
  assert.deepEqual(places, [
    { waypointIndex: 1, alongRouteMiles: 40, placeName: "Donner Summit Rest Area", location: { lat: 39.3, lng: -120.3 } },
    { waypointIndex: 2, alongRouteMiles: 80, placeName: null, location: { lat: 39, lng: -119.2 } },
  ]);
});

test("insertRestStops splices each stop after its segment", () => {
  const waypoints = [makeWaypoint(0), makeWaypoint(12.5), makeWaypoint(40), makeWaypoint(80)];
  const segments = waypoints.map((waypoint, index) => makeSegment(index, waypoint, atMinutes(index * 30)));

  const timeline = insertRestStops(
    segments,
    [
      { waypointIndex: 1, alongRouteMiles: 12.5, placeName: null, location: { lat: 39, lng: -119.875 } },
      { waypointIndex: 2, alongRouteMiles: 40, placeName: "Vista Point", location: { lat: 39.123456, lng: -119.6 } },
    ],
    20,
  );

  assert.deepEqual(
    timeline.map((entry) => entry.type),
    ["waypoint", "waypoint", "rest_stop", "waypoint", "rest_stop", "waypoint"],
  );
  const expectedFirst: RestStopPayload = {
    type: "rest_stop",
    location: { lat: 39, lng: -119.875 },
    placeName: "Rest stop (mile 12.5)",
    restDurationMinutes: 20,
    etaArrive: "2026-03-10T12:30:00.000Z",
    etaDepart: "2026-03-10T12:50:00.000Z",
    mileMarker: 12.5,
  };
  assert.deepEqual(timeline[2], expectedFirst);
  assert.deepEqual(timeline[4], {
    type: "rest_stop",
    location: { lat: 39.12346, lng: -119.6 },
    placeName: "Vista Point",
    restDurationMinutes: 20,
    etaArrive: "2026-03-10T13:00:00.000Z",
    etaDepart: "2026-03-10T13:20:00.000Z",
    mileMarker: 40,
  });
});

test("restStopLabel names the mile marker", () => {
  assert.equal(restStopLabel(87.3), "Rest stop (mile 87.3)");
});
