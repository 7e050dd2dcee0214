import type {
  AdvisoryReading,
  FogLevel,
  MergedObservation,
  NumericWeatherReading,
  PrecipitationType,
  RainIntensity,
  RoadRiskReading,
  SourceTag,
} from "../models/domain";
import { roundTo } from "../utils/geo";

export interface SourceReadings {
  /** Open-Meteo hourly values. */
  numeric?: NumericWeatherReading | null;
  /** Tomorrow.io, the purpose-built road-risk source. */
  roadRisk?: RoadRiskReading | null;
  /** NWS hourly forecast, the authoritative advisory source. */
  advisory?: AdvisoryReading | null;
}

export const classifyRainIntensity = (mmPerHour: number | null | undefined): RainIntensity => {
  if (mmPerHour === null || mmPerHour === undefined || mmPerHour < 0.1) return "none";
  if (mmPerHour < 0.5) return "light";
  if (mmPerHour < 4.0) return "moderate";
  return "heavy";
};

export const classifyFogLevel = (visibilityMiles: number | null | undefined): FogLevel => {
  if (visibilityMiles === null || visibilityMiles === undefined || visibilityMiles > 5.0) return "none";
  if (visibilityMiles > 1.0) return "patchy";
  return "dense";
};

const present = (values: Array<number | null | undefined>): number[] =>
  values.filter((value): value is number => typeof value === "number" && Number.isFinite(value));

const maxOf = (values: Array<number | null | undefined>): number | null => {
  const numbers = present(values);
  return numbers.length > 0 ? Math.max(...numbers) : null;
};

const minOf = (values: Array<number | null | undefined>): number | null => {
  const numbers = present(values);
  return numbers.length > 0 ? Math.min(...numbers) : null;
};

const meanOf = (values: Array<number | null | undefined>): number | null => {
  const numbers = present(values);
  if (numbers.length === 0) return null;
  return roundTo(numbers.reduce((sum, value) => sum + value, 0) / numbers.length, 1);
};

const deriveNumericPrecipitationType = (numeric: NumericWeatherReading | null): PrecipitationType | null => {
  if (!numeric) return null;
  if ((numeric.snowfallCmHr ?? 0) > 0) return "snow";
  if (numeric.precipitationMmHr === null) return null;
  return numeric.precipitationMmHr >= 0.1 ? "rain" : "none";
};

/**
 * One observation per point in time. Each field applies its own rule over
 * only the sources that supplied it; a field nobody supplied is null.
 */
export const mergeObservations = ({ numeric = null, roadRisk = null, advisory = null }: SourceReadings): MergedObservation => {
  const contributors: SourceTag[] = [];
  if (numeric) contributors.push("open-meteo");
  if (roadRisk) contributors.push("tomorrow-io");
  if (advisory) contributors.push("nws");

  const temperatureF =
    meanOf([numeric?.temperatureF, roadRisk?.temperatureF]) ?? advisory?.temperatureF ?? null;

  const precipitationMmHr = roadRisk?.precipitationIntensityMmHr ?? numeric?.precipitationMmHr ?? null;
  const visibilityMiles = minOf([numeric?.visibilityMiles, roadRisk?.visibilityMiles]);

  return {
    temperatureF,
    windSpeedMph: maxOf([numeric?.windSpeedMph, roadRisk?.windSpeedMph, advisory?.windSpeedMph]),
    windGustsMph: maxOf([numeric?.windGustsMph, roadRisk?.windGustsMph]),
    windDirectionDeg: numeric?.windDirectionDeg ?? null,
    precipitationProbability: maxOf([advisory?.precipitationProbability, roadRisk?.precipitationProbability]),
    precipitationType: roadRisk?.precipitationType ?? deriveNumericPrecipitationType(numeric),
    precipitationMmHr,
    rainIntensity: classifyRainIntensity(precipitationMmHr),
    visibilityMiles,
    fogLevel: classifyFogLevel(visibilityMiles),
    snowfallCmHr: numeric?.snowfallCmHr ?? null,
    snowDepthIn: numeric?.snowDepthIn ?? null,
    freezingLevelFt: numeric?.freezingLevelFt ?? null,
    conditionText: advisory?.conditionText ?? roadRisk?.weatherText ?? null,
    roadRiskScore: roadRisk?.roadRiskScore ?? null,
    roadRiskLabel: roadRisk?.roadRiskLabel ?? null,
    contributors,
  };
};
