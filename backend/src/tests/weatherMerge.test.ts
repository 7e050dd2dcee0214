import test from "node:test";
import assert from "node:assert/strict";
import type { AdvisoryReading, NumericWeatherReading, RoadRiskReading } from "../models/domain";
import { parseHourlyPeriod } from "../feeds/nws";
import { classifyFogLevel, classifyRainIntensity, mergeObservations } from "../services/weatherMerge";

const numericReading = (overrides: Partial<NumericWeatherReading> = {}): NumericWeatherReading => ({
  temperatureF: null,
  precipitationMmHr: null,
  snowfallCmHr: null,
  snowDepthIn: null,
  visibilityMiles: null,
  windSpeedMph: null,
  windGustsMph: null,
  windDirectionDeg: null,
  freezingLevelFt: null,
  weatherCode: null,
  ...overrides,
});

const roadRiskReading = (overrides: Partial<RoadRiskReading> = {}): RoadRiskReading => ({
  temperatureF: null,
  precipitationProbability: null,
  precipitationType: null,
  precipitationIntensityMmHr: null,
  windSpeedMph: null,
  windGustsMph: null,
  visibilityMiles: null,
  weatherCode: null,
  weatherText: null,
  roadRiskScore: null,
  roadRiskLabel: null,
  ...overrides,
});

const advisoryReading = (overrides: Partial<AdvisoryReading> = {}): AdvisoryReading => ({
  temperatureF: null,
  windSpeedMph: null,
  windDirection: null,
  conditionText: null,
  precipitationProbability: null,
  ...overrides,
});

test("classifyRainIntensity thresholds", () => {
  assert.equal(classifyRainIntensity(null), "none");
  assert.equal(classifyRainIntensity(0.05), "none");
  assert.equal(classifyRainIntensity(0.1), "light");
  assert.equal(classifyRainIntensity(0.49), "light");
  assert.equal(classifyRainIntensity(0.5), "moderate");
  assert.equal(classifyRainIntensity(3.99), "moderate");
  assert.equal(classifyRainIntensity(4), "heavy");
});

test("classifyFogLevel thresholds", () => {
  assert.equal(classifyFogLevel(undefined), "none");
  assert.equal(classifyFogLevel(6), "none");
  assert.equal(classifyFogLevel(5), "patchy");
  assert.equal(classifyFogLevel(1.5), "patchy");
  assert.equal(classifyFogLevel(1), "dense");
  assert.equal(classifyFogLevel(0.2), "dense");
});

test("merge with no sources yields nulls", () => {
  assert.deepEqual(mergeObservations({}), {
    temperatureF: null,
    windSpeedMph: null,
    windGustsMph: null,
    windDirectionDeg: null,
    precipitationProbability: null,
    precipitationType: null,
    precipitationMmHr: null,
    rainIntensity: "none",
    visibilityMiles: null,
    fogLevel: "none",
    snowfallCmHr: null,
    snowDepthIn: null,
    freezingLevelFt: null,
    conditionText: null,
    roadRiskScore: null,
    roadRiskLabel: null,
    contributors: [],
  });
});

test("merge applies a rule per field across all three sources", () => {
  const merged = mergeObservations({
    numeric: numericReading({
      temperatureF: 50,
      windSpeedMph: 10,
      windGustsMph: 25,
      windDirectionDeg: 270,
      precipitationMmHr: 1,
      visibilityMiles: 8,
      snowDepthIn: 3.5,
      freezingLevelFt: 6200,
    }),
    roadRisk: roadRiskReading({
      temperatureF: 53,
      windSpeedMph: 15,
      precipitationProbability: 60,
      precipitationType: "rain",
      precipitationIntensityMmHr: 2.5,
      visibilityMiles: 4,
      weatherText: "Rain",
      roadRiskScore: 2,
      roadRiskLabel: "Moderate",
    }),
    advisory: advisoryReading({
      temperatureF: 49,
      windSpeedMph: 20,
      precipitationProbability: 40,
      conditionText: "Light Rain",
    }),
  });

  assert.equal(merged.temperatureF, 51.5);
  assert.equal(merged.windSpeedMph, 20);
  assert.equal(merged.windGustsMph, 25);
  assert.equal(merged.windDirectionDeg, 270);
  assert.equal(merged.precipitationProbability, 60);
  assert.equal(merged.precipitationType, "rain");
  assert.equal(merged.precipitationMmHr, 2.5);
  assert.equal(merged.rainIntensity, "moderate");
  assert.equal(merged.visibilityMiles, 4);
  assert.equal(merged.fogLevel, "patchy");
  assert.equal(merged.snowDepthIn, 3.5);
  assert.equal(merged.freezingLevelFt, 6200);
  assert.equal(merged.conditionText, "Light Rain");
  assert.equal(merged.roadRiskScore, 2);
  assert.equal(merged.roadRiskLabel, "Moderate");
  assert.deepEqual(merged.contributors, ["open-meteo", "tomorrow-io", "nws"]);
});

test("precipitation type falls back to numeric snowfall and rate", () => {
  assert.equal(mergeObservations({ numeric: numericReading({ snowfallCmHr: 0.4 }) }).precipitationType, "snow");
  assert.equal(mergeObservations({ numeric: numericReading({ precipitationMmHr: 0.3 }) }).precipitationType, "rain");
  assert.equal(mergeObservations({ numeric: numericReading({ precipitationMmHr: 0 }) }).precipitationType, "none");
});

test("advisory temperature is used only when no numeric source has one", () => {
  const merged = mergeObservations({ advisory: advisoryReading({ temperatureF: 41, conditionText: "Fog" }) });
  assert.equal(merged.temperatureF, 41);
  assert.equal(merged.conditionText, "Fog");
  assert.deepEqual(merged.contributors, ["nws"]);

  const withRoadRisk = mergeObservations({
    roadRisk: roadRiskReading({ temperatureF: 38, weatherText: "Light Snow" }),
    advisory: advisoryReading({ temperatureF: 41 }),
  });
  assert.equal(withRoadRisk.temperatureF, 38);
  assert.equal(withRoadRisk.conditionText, "Light Snow");
});

test("a forecast period without a precipitation chance leaves the merged field null", () => {
  const reading = parseHourlyPeriod({
    startTime: "2026-03-10T05:00:00-08:00",
    temperature: 33,
    windSpeed: "5 mph",
    shortForecast: "Cloudy",
    probabilityOfPrecipitation: { unitCode: "wmoUnit:percent", value: null },
  });
  assert.equal(reading.precipitationProbability, null);

  const merged = mergeObservations({ advisory: reading });
  assert.equal(merged.precipitationProbability, null);
  assert.equal(merged.temperatureF, 33);
  assert.deepEqual(merged.contributors, ["nws"]);
});
