import test from "node:test";
import assert from "node:assert/strict";
import type { Advisory, ChainControl, LightLevel } from "../models/domain";
import {
  computeSeverity,
  computeWeatherSlowdown,
  effectiveWindMph,
  normalizeChainLevel,
  severityLabel,
  type SlowdownInput,
} from "../services/severity";
import { classifyFogLevel, classifyRainIntensity } from "../services/weatherMerge";

const clear: SlowdownInput = {
  visibilityMiles: null,
  windSpeedMph: null,
  windGustsMph: null,
  precipitationMmHr: null,
  rainIntensity: "none",
  fogLevel: "none",
  precipitationType: null,
  snowfallCmHr: null,
};

const chainControl = (level: string): ChainControl => ({
  highway: "I-80",
  direction: "E",
  level,
  beginPostmile: null,
  endPostmile: null,
  description: "",
});

const advisory = (severity: Advisory["severity"]): Advisory => ({
  event: "Winter Storm Warning",
  headline: `Winter Storm Warning (${severity})`,
  severity,
  description: "",
  onset: null,
  expires: null,
});

// visibility 2 mi (+2), 26 mph sustained (+1.5), 1 mm/hr (+1)
const wetAndWindy: SlowdownInput = {
  ...clear,
  visibilityMiles: 2,
  fogLevel: "patchy",
  windSpeedMph: 26,
  precipitationMmHr: 1,
  rainIntensity: "moderate",
};

test("effective wind takes the larger of sustained and 70% of gusts", () => {
  assert.equal(effectiveWindMph(25, 35), 25);
  assert.equal(effectiveWindMph(10, 50), 35);
  assert.equal(effectiveWindMph(null, null), 0);
});

test("chain levels normalize", () => {
  assert.equal(normalizeChainLevel("R-2"), "R2");
  assert.equal(normalizeChainLevel(" r1 "), "R1");
  assert.equal(normalizeChainLevel(null), "");
});

test("clear conditions score zero", () => {
  assert.deepEqual(computeSeverity(clear), { score: 0, label: "green" });
  assert.deepEqual(computeSeverity(clear, null, [], "night"), { score: 0, label: "green" });
});

test("gusts below the sustained wind add the >20 mph band only", () => {
  assert.deepEqual(computeSeverity({ ...clear, windSpeedMph: 25, windGustsMph: 35 }), { score: 1, label: "green" });
});

test("sustained wind flips the label between 25 and 26 mph", () => {
  // visibility 3 mi (+1), 1.5 mm/hr (+1); 35 mph gusts count as 24.5
  const base: SlowdownInput = {
    ...clear,
    visibilityMiles: 3,
    fogLevel: "patchy",
    windGustsMph: 35,
    precipitationMmHr: 1.5,
    rainIntensity: "moderate",
  };
  assert.equal(effectiveWindMph(25, 35), 25);
  // 25 mph sits in the > 20 band (+1), not above 25
  assert.deepEqual(computeSeverity({ ...base, windSpeedMph: 25 }), { score: 3, label: "green" });
  // 26 mph crosses into the > 25 band (+1.5): 3.5 rounds to 4
  assert.deepEqual(computeSeverity({ ...base, windSpeedMph: 26 }), { score: 4, label: "yellow" });
});

test("hazards add up and round to the nearest point", () => {
  assert.deepEqual(computeSeverity(wetAndWindy), { score: 5, label: "yellow" });
});

test("darkness compounds an existing hazard", () => {
  assert.deepEqual(computeSeverity(wetAndWindy, null, [], "night"), { score: 6, label: "yellow" });
  assert.deepEqual(computeSeverity(wetAndWindy, null, [], "twilight"), { score: 6, label: "yellow" });
  const downpour: SlowdownInput = { ...clear, precipitationMmHr: 5, rainIntensity: "heavy" };
  assert.deepEqual(computeSeverity(downpour, null, [], "night"), { score: 5, label: "yellow" });
});

test("road conditions and advisories contribute", () => {
  assert.deepEqual(computeSeverity(clear, { chainControl: chainControl("R-2"), pavementStatus: "Wet" }), {
    score: 3,
    label: "green",
  });
  assert.deepEqual(computeSeverity(clear, { pavementStatus: "ice" }, [advisory("moderate"), advisory("minor")]), {
    score: 3,
    label: "green",
  });
  assert.deepEqual(computeSeverity(clear, { chainControl: chainControl("R2") }, [advisory("severe")]), {
    score: 4,
    label: "yellow",
  });
});

test("score is capped at 10", () => {
  const extreme: SlowdownInput = {
    ...clear,
    visibilityMiles: 0.1,
    fogLevel: "dense",
    windSpeedMph: 50,
    precipitationMmHr: 10,
    rainIntensity: "heavy",
  };
  assert.deepEqual(
    computeSeverity(extreme, { chainControl: chainControl("R3"), pavementStatus: "snow" }, [advisory("extreme")], "night"),
    { score: 10, label: "red" },
  );
});

test("severity label bands", () => {
  assert.equal(severityLabel(3), "green");
  assert.equal(severityLabel(4), "yellow");
  assert.equal(severityLabel(6), "yellow");
  assert.equal(severityLabel(7), "red");
});

test("weather slowdown multiplies per hazard", () => {
  assert.equal(computeWeatherSlowdown(clear), 1);
  assert.equal(computeWeatherSlowdown({ ...clear, rainIntensity: "moderate" }), 0.8);
  assert.equal(computeWeatherSlowdown({ ...clear, rainIntensity: "moderate", precipitationType: "snow" }), 0.65);
  assert.equal(computeWeatherSlowdown({ ...clear, snowfallCmHr: 0.5 }), 0.65);
  assert.equal(computeWeatherSlowdown({ ...clear, windSpeedMph: 40 }), 0.85);
  const nightStorm = computeWeatherSlowdown({ ...clear, rainIntensity: "heavy", fogLevel: "dense" }, "night");
  assert.ok(Math.abs(nightStorm - 0.441) < 1e-9);
  // snow replaces rain, so night driving in snow takes no extra rain penalty
  assert.equal(computeWeatherSlowdown({ ...clear, rainIntensity: "light", precipitationType: "sleet" }, "night"), 0.65);
});

const LIGHT_LEVELS: LightLevel[] = ["day", "twilight", "night"];

/** Observation with rain and fog classified from the raw values, as the merge does. */
const observed = (visibilityMiles: number | null, windSpeedMph: number | null, precipitationMmHr: number | null) => ({
  visibilityMiles,
  windSpeedMph,
  windGustsMph: null,
  precipitationMmHr,
  rainIntensity: classifyRainIntensity(precipitationMmHr),
  fogLevel: classifyFogLevel(visibilityMiles),
});

const assertNonDecreasing = (scores: number[], label: string) => {
  for (let i = 1; i < scores.length; i += 1) {
    const previous = scores[i - 1];
    const current = scores[i];
    assert.ok(previous !== undefined && current !== undefined);
    assert.ok(current >= previous, `${label}: step ${i} dropped from ${previous} to ${current}`);
  }
};

test("severity never drops as a single hazard worsens", () => {
  for (const lightLevel of LIGHT_LEVELS) {
    // visibility 10 mi down to 0 in 0.05 mi steps
    const visibility = Array.from({ length: 201 }, (_, step) =>
      computeSeverity(observed(10 - step * 0.05, 10, 0.2), null, [], lightLevel).score,
    );
    assertNonDecreasing(visibility, `visibility/${lightLevel}`);

    // wind 0 to 60 mph in 0.5 mph steps
    const wind = Array.from({ length: 121 }, (_, step) =>
      computeSeverity(observed(4, step * 0.5, 0.2), null, [], lightLevel).score,
    );
    assertNonDecreasing(wind, `wind/${lightLevel}`);

    // precipitation 0 to 12 mm/hr in 0.1 mm/hr steps
    const precipitation = Array.from({ length: 121 }, (_, step) =>
      computeSeverity(observed(8, 15, step * 0.1), null, [], lightLevel).score,
    );
    assertNonDecreasing(precipitation, `precipitation/${lightLevel}`);
  }
});
