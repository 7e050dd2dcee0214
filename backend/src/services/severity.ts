import type { Advisory, ChainControl, LightLevel, MergedObservation, SeverityLabel } from "../models/domain";

export type SeverityInput = Pick<
  MergedObservation,
  "visibilityMiles" | "windSpeedMph" | "windGustsMph" | "precipitationMmHr" | "rainIntensity" | "fogLevel"
>;

export interface SeverityRoadInput {
  chainControl?: ChainControl | null;
  pavementStatus?: string | null;
}

export interface SeverityResult {
  score: number;
  label: SeverityLabel;
}

const MAX_SCORE = 10;

export const effectiveWindMph = (sustained: number | null, gusts: number | null): number =>
  Math.max(sustained ?? 0, gusts === null ? 0 : gusts * 0.7);

/** "R-2", "r2" and "R2" all normalize to "R2". */
export const normalizeChainLevel = (level: string | null | undefined) =>
  (level ?? "").replace(/[^a-z0-9]/gi, "").toUpperCase();

const visibilityPoints = (visibilityMiles: number | null) => {
  if (visibilityMiles === null) return 0;
  if (visibilityMiles < 0.25) return 4;
  if (visibilityMiles < 1) return 3;
  if (visibilityMiles < 3) return 2;
  if (visibilityMiles < 5) return 1;
  return 0;
};

// strict `>` at every breakpoint: 25 mph sustained stays in the > 20 band
const windPoints = (effectiveWind: number) => {
  if (effectiveWind > 45) return 3;
  if (effectiveWind > 35) return 2.5;
  if (effectiveWind > 25) return 1.5;
  if (effectiveWind > 20) return 1;
  return 0;
};

const precipitationPoints = (mmPerHour: number | null) => {
  if (mmPerHour === null) return 0;
  if (mmPerHour > 8) return 3;
  if (mmPerHour > 4) return 2.5;
  if (mmPerHour > 2) return 1.5;
  if (mmPerHour > 0.5) return 1;
  return 0;
};

const CHAIN_POINTS: Record<string, number> = { R3: 3, R2: 2, R1: 1 };

const roadPoints = (road: SeverityRoadInput | null | undefined) => {
  if (!road) return 0;
  let points = CHAIN_POINTS[normalizeChainLevel(road.chainControl?.level)] ?? 0;
  const pavement = (road.pavementStatus ?? "").trim().toLowerCase();
  if (pavement === "ice" || pavement === "snow") points += 2;
  else if (pavement === "wet") points += 0.5;
  return points;
};

const advisoryPoints = (advisories: Advisory[]) =>
  advisories.reduce((sum, advisory) => {
    if (advisory.severity === "extreme" || advisory.severity === "severe") return sum + 2;
    if (advisory.severity === "moderate") return sum + 1;
    return sum;
  }, 0);

const lightPoints = (observation: SeverityInput, effectiveWind: number, lightLevel: LightLevel) => {
  const hazardPresent = observation.rainIntensity !== "none" || observation.fogLevel !== "none" || effectiveWind > 25;
  if (!hazardPresent) return 0;
  if (lightLevel === "night") {
    return observation.rainIntensity === "heavy" || observation.fogLevel === "dense" ? 2 : 1;
  }
  if (lightLevel === "twilight") return 1;
  return 0;
};

export const severityLabel = (score: number): SeverityLabel => {
  if (score <= 3) return "green";
  if (score <= 6) return "yellow";
  return "red";
};

/** Additive hazard score, rounded and capped at 10, with its green/yellow/red band. */
export const computeSeverity = (
  observation: SeverityInput,
  road?: SeverityRoadInput | null,
  advisories: Advisory[] = [],
  lightLevel: LightLevel = "day",
): SeverityResult => {
  const wind = effectiveWindMph(observation.windSpeedMph, observation.windGustsMph);
  const raw =
    visibilityPoints(observation.visibilityMiles) +
    windPoints(wind) +
    precipitationPoints(observation.precipitationMmHr) +
    roadPoints(road) +
    advisoryPoints(advisories) +
    lightPoints(observation, wind, lightLevel);
  const score = Math.min(MAX_SCORE, Math.round(raw));
  return { score, label: severityLabel(score) };
};

const RAIN_SLOWDOWN: Record<MergedObservation["rainIntensity"], number> = {
  none: 1,
  light: 0.9,
  moderate: 0.8,
  heavy: 0.7,
};

const FROZEN_TYPES = new Set(["snow", "sleet", "freezing_rain"]);

export type SlowdownInput = SeverityInput & Pick<MergedObservation, "precipitationType" | "snowfallCmHr">;

/** Speed multiplier (≤ 1) for driving through these conditions. */
export const computeWeatherSlowdown = (observation: SlowdownInput, lightLevel: LightLevel = "day"): number => {
  let factor = 1;
  const snowing =
    FROZEN_TYPES.has(observation.precipitationType ?? "") || (observation.snowfallCmHr ?? 0) > 0;
  const raining = !snowing && observation.rainIntensity !== "none";

  if (snowing) factor *= 0.65;
  else factor *= RAIN_SLOWDOWN[observation.rainIntensity];

  if (observation.fogLevel === "dense") factor *= 0.7;
  else if (observation.fogLevel === "patchy") factor *= 0.85;

  if (effectiveWindMph(observation.windSpeedMph, observation.windGustsMph) > 35) factor *= 0.85;
  if (lightLevel === "night" && raining) factor *= 0.9;

  return factor;
};
