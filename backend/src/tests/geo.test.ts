import test from "node:test";
import assert from "node:assert/strict";
import {
  cumulativeDistances,
  decodeRoutePolyline,
  haversineMiles,
  isValidCoordinate,
  pointAlongRoute,
  projectOntoRoute,
  roundTo,
} from "../utils/geo";
import { celsiusToFahrenheit, cmToInches, kmhToMph, metersToFeet, metersToMiles, msToMph } from "../utils/units";

const ONE_DEGREE = haversineMiles({ lat: 0, lng: 0 }, { lat: 0, lng: 1 });
const equatorRoute = [
  { lat: 0, lng: 0 },
  { lat: 0, lng: 1 },
  { lat: 0, lng: 2 },
];

test("haversineMiles measures one degree of longitude at the equator", () => {
  assert.ok(Math.abs(ONE_DEGREE - 69.094) < 0.001);
  assert.equal(haversineMiles({ lat: 37.5, lng: -120 }, { lat: 37.5, lng: -120 }), 0);
});

test("cumulativeDistances starts at zero and accumulates each leg", () => {
  assert.deepEqual(cumulativeDistances(equatorRoute), [0, ONE_DEGREE, ONE_DEGREE * 2]);
  assert.deepEqual(cumulativeDistances([]), []);
});

test("projectOntoRoute reports the nearest vertex and its offset", () => {
  const distances = cumulativeDistances(equatorRoute);
  const projection = projectOntoRoute(equatorRoute, distances, { lat: 0.1, lng: 1 });
  assert.ok(projection);
  assert.equal(projection.alongRouteMiles, ONE_DEGREE);
  assert.ok(projection.offsetMiles > 6.9 && projection.offsetMiles < 7.0);
  assert.equal(projectOntoRoute([], [], { lat: 0, lng: 0 }), null);
});

test("pointAlongRoute interpolates inside the spanning leg", () => {
  const distances = cumulativeDistances(equatorRoute);
  const midway = pointAlongRoute(equatorRoute, distances, ONE_DEGREE * 1.5);
  assert.ok(midway);
  assert.equal(midway.lat, 0);
  assert.ok(Math.abs(midway.lng - 1.5) < 1e-9);
  assert.deepEqual(pointAlongRoute(equatorRoute, distances, -5), { lat: 0, lng: 0 });
  assert.deepEqual(pointAlongRoute(equatorRoute, distances, ONE_DEGREE * 10), { lat: 0, lng: 2 });
});

test("decodeRoutePolyline decodes an encoded polyline", () => {
  assert.deepEqual(decodeRoutePolyline("_p~iF~ps|U_ulLnnqC_mqNvxq`@"), [
    { lat: 38.5, lng: -120.2 },
    { lat: 40.7, lng: -120.95 },
    { lat: 43.252, lng: -126.453 },
  ]);
  assert.deepEqual(decodeRoutePolyline(null), []);
});

test("isValidCoordinate rejects out-of-range and non-numeric values", () => {
  assert.equal(isValidCoordinate(39.3, -120.3), true);
  assert.equal(isValidCoordinate(91, 0), false);
  assert.equal(isValidCoordinate(0, -181), false);
  assert.equal(isValidCoordinate("39.3", -120.3), false);
  assert.equal(isValidCoordinate(Number.NaN, 0), false);
});

test("unit conversions round to one decimal", () => {
  assert.equal(roundTo(12.345678, 2), 12.35);
  assert.equal(celsiusToFahrenheit(0), 32);
  assert.equal(celsiusToFahrenheit(-40), -40);
  assert.equal(kmhToMph(100), 62.1);
  assert.equal(msToMph(10), 22.4);
  assert.equal(metersToMiles(1609.344), 1);
  assert.equal(metersToFeet(1000), 3281);
  assert.equal(cmToInches(2.54), 1);
});
