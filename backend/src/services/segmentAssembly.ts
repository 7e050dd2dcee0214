import type {
  AdvisoryPayload,
  RouteAlertPayload,
  SegmentPayload,
  SourceLinks,
  WeatherPayload,
} from "@roadglance/core";
import type {
  Advisory,
  ChainControl,
  LightLevel,
  MergedObservation,
  RoadSurfaceReading,
  RouteStep,
  SunTimes,
  Waypoint,
} from "../models/domain";
import { haversineMiles, roundTo } from "../utils/geo";
import { matchChainControl } from "./roadConditions";
import { computeSeverity } from "./severity";

/** Instruction of the route step starting closest to the waypoint. */
export const nearestInstruction = (steps: RouteStep[], waypoint: Waypoint): string => {
  let best = "";
  let bestDistance = Infinity;
  for (const step of steps) {
    if (!step.startLocation) continue;
    const distance = haversineMiles(waypoint, step.startLocation);
    if (distance < bestDistance) {
      bestDistance = distance;
      best = step.instruction;
    }
  }
  return best;
};

export const buildSourceLinks = (
  lat: number,
  lng: number,
  observation: MergedObservation,
  surface: RoadSurfaceReading | null,
  chainControl: ChainControl | null,
): SourceLinks => {
  const links: SourceLinks = {
    nws: `https://forecast.weather.gov/MapClick.php?lat=${lat}&lon=${lng}`,
    openMeteo: `https://open-meteo.com/en/docs#latitude=${lat}&longitude=${lng}`,
  };
  if (observation.roadRiskScore !== null) links.tomorrowIo = "https://www.tomorrow.io/weather/";
  if (chainControl || surface?.pavementStatus) links.caltrans = "https://roads.dot.ca.gov/";
  return links;
};

const toWeatherPayload = (observation: MergedObservation): WeatherPayload => ({
  temperatureF: observation.temperatureF,
  windSpeedMph: observation.windSpeedMph,
  windGustsMph: observation.windGustsMph,
  windDirectionDeg: observation.windDirectionDeg,
  precipitationProbability: observation.precipitationProbability,
  precipitationType: observation.precipitationType,
  precipitationMmHr: observation.precipitationMmHr,
  rainIntensity: observation.rainIntensity,
  visibilityMiles: observation.visibilityMiles,
  fogLevel: observation.fogLevel,
  snowDepthIn: observation.snowDepthIn,
  freezingLevelFt: observation.freezingLevelFt,
  conditionText: observation.conditionText,
  roadRiskScore: observation.roadRiskScore,
  roadRiskLabel: observation.roadRiskLabel,
  contributors: [...observation.contributors],
});

export const toAdvisoryPayload = (advisory: Advisory): AdvisoryPayload => ({
  event: advisory.event,
  headline: advisory.headline,
  severity: advisory.severity,
  description: advisory.description,
  onset: advisory.onset,
  expires: advisory.expires,
});

export interface SegmentInput {
  index: number;
  waypoint: Waypoint;
  eta: Date;
  steps: RouteStep[];
  chainControls: ChainControl[];
  observation: MergedObservation;
  surface: RoadSurfaceReading | null;
  advisories: Advisory[];
  lightLevel: LightLevel;
  sun: SunTimes | null;
}

export const buildSegment = (input: SegmentInput): SegmentPayload => {
  const { waypoint, observation, surface, advisories } = input;
  const turnInstruction = nearestInstruction(input.steps, waypoint);
  const chainControl = matchChainControl(input.chainControls, turnInstruction);
  const severity = computeSeverity(
    observation,
    { chainControl, pavementStatus: surface?.pavementStatus ?? null },
    advisories,
    input.lightLevel,
  );
  const lat = roundTo(waypoint.lat, 5);
  const lng = roundTo(waypoint.lng, 5);

  return {
    type: "waypoint",
    index: input.index,
    location: { lat, lng },
    mileMarker: roundTo(waypoint.alongRouteMiles, 1),
    eta: input.eta.toISOString(),
    turnInstruction,
    weather: toWeatherPayload(observation),
    roadConditions: {
      chainControl: chainControl ? { ...chainControl } : null,
      pavementStatus: surface?.pavementStatus ?? null,
      pavementTempF: surface?.pavementTempF ?? null,
      alerts: advisories.map(toAdvisoryPayload),
    },
    severityScore: severity.score,
    severityLabel: severity.label,
    lightLevel: input.lightLevel,
    sunrise: input.sun ? input.sun.sunrise.toISOString() : null,
    sunset: input.sun ? input.sun.sunset.toISOString() : null,
    dataSource: waypoint.kind,
    stationName: waypoint.station?.name ?? surface?.stationName ?? null,
    sourceLinks: buildSourceLinks(lat, lng, observation, surface, chainControl),
  };
};

/** Route-level alert list: one entry per headline, listing every segment it touches. */
export const dedupeAlerts = (advisoriesBySegment: Advisory[][]): RouteAlertPayload[] => {
  const byHeadline = new Map<string, RouteAlertPayload>();
  advisoriesBySegment.forEach((advisories, segmentIndex) => {
    for (const advisory of advisories) {
      const existing = byHeadline.get(advisory.headline);
      if (existing) {
        if (!existing.affectedSegments.includes(segmentIndex)) existing.affectedSegments.push(segmentIndex);
        continue;
      }
      byHeadline.set(advisory.headline, { ...toAdvisoryPayload(advisory), affectedSegments: [segmentIndex] });
    }
  });
  return Array.from(byHeadline.values());
};
