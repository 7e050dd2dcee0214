export type IsoTimestamp = string;

export interface Coordinate {
  lat: number;
  lng: number;
}

export type WaypointKind = "rwis" | "fill";

/** Road weather information system station reading (Caltrans CWWP2). */
export interface StationObservation {
  stationId: string;
  name: string;
  lat: number;
  lng: number;
  pavementStatus: string | null;
  pavementTempF: number | null;
  airTempF: number | null;
  visibilityMiles: number | null;
  windSpeedMph: number | null;
  precipitationType: string | null;
}

export interface Waypoint extends Coordinate {
  kind: WaypointKind;
  alongRouteMiles: number;
  station: StationObservation | null;
}

export interface RouteStep {
  instruction: string;
  maneuver: string;
  startLocation: Coordinate | null;
  endLocation: Coordinate | null;
}

export interface ParsedRoute {
  encodedPolyline: string;
  points: Coordinate[];
  steps: RouteStep[];
  totalDurationSeconds: number;
  totalDistanceMeters: number;
  summary: string;
}

export type SourceTag = "open-meteo" | "tomorrow-io" | "nws";

export const SOURCE_LABELS = {
  "open-meteo": "Open-Meteo",
  "tomorrow-io": "Tomorrow.io",
  nws: "NWS",
  caltrans: "Caltrans CWWP2",
} as const;

export type SourceLabel = (typeof SOURCE_LABELS)[keyof typeof SOURCE_LABELS];

export type PrecipitationType = "none" | "rain" | "snow" | "freezing_rain" | "sleet" | "unknown";
export type RainIntensity = "none" | "light" | "moderate" | "heavy";
export type FogLevel = "none" | "patchy" | "dense";
export type LightLevel = "day" | "twilight" | "night";
export type SeverityLabel = "green" | "yellow" | "red";

/** Open-Meteo hourly values at one index, converted to imperial units. */
export interface NumericWeatherReading {
  temperatureF: number | null;
  precipitationMmHr: number | null;
  snowfallCmHr: number | null;
  snowDepthIn: number | null;
  visibilityMiles: number | null;
  windSpeedMph: number | null;
  windGustsMph: number | null;
  windDirectionDeg: number | null;
  freezingLevelFt: number | null;
  weatherCode: number | null;
}

/** Tomorrow.io timeline interval values. */
export interface RoadRiskReading {
  temperatureF: number | null;
  precipitationProbability: number | null;
  precipitationType: PrecipitationType | null;
  precipitationIntensityMmHr: number | null;
  windSpeedMph: number | null;
  windGustsMph: number | null;
  visibilityMiles: number | null;
  weatherCode: number | null;
  weatherText: string | null;
  roadRiskScore: number | null;
  roadRiskLabel: string | null;
}

/** NWS hourly forecast period. */
export interface AdvisoryReading {
  temperatureF: number | null;
  windSpeedMph: number | null;
  windDirection: string | null;
  conditionText: string | null;
  precipitationProbability: number | null;
}

export type AdvisorySeverity = "extreme" | "severe" | "moderate" | "minor" | "unknown";

export interface Advisory {
  event: string;
  headline: string;
  severity: AdvisorySeverity;
  description: string;
  onset: IsoTimestamp | null;
  expires: IsoTimestamp | null;
}

export interface ChainControl {
  highway: string;
  direction: string;
  level: string;
  beginPostmile: number | null;
  endPostmile: number | null;
  description: string;
}

export interface MergedObservation {
  temperatureF: number | null;
  windSpeedMph: number | null;
  windGustsMph: number | null;
  windDirectionDeg: number | null;
  precipitationProbability: number | null;
  precipitationType: PrecipitationType | null;
  precipitationMmHr: number | null;
  rainIntensity: RainIntensity;
  visibilityMiles: number | null;
  fogLevel: FogLevel;
  snowfallCmHr: number | null;
  snowDepthIn: number | null;
  freezingLevelFt: number | null;
  conditionText: string | null;
  roadRiskScore: number | null;
  roadRiskLabel: string | null;
  contributors: SourceTag[];
}

export interface RoadSurfaceReading {
  stationName: string;
  pavementStatus: string | null;
  pavementTempF: number | null;
  airTempF: number | null;
  visibilityMiles: number | null;
  windSpeedMph: number | null;
  precipitationType: string | null;
  distanceMiles: number;
}

export interface SunTimes {
  sunrise: Date;
  sunset: Date;
}

/** One Open-Meteo location block: hourly arrays plus daily sun times. */
export interface OpenMeteoSeries {
  utcOffsetSeconds: number;
  hourlyTimes: number[];
  hourly: NumericWeatherReading[];
  dailyDates: string[];
  sunrises: Array<number | null>;
  sunsets: Array<number | null>;
}

export interface NwsPeriod {
  startTime: number;
  endTime: number | null;
  reading: AdvisoryReading;
}

export interface TomorrowInterval {
  startTime: number;
  reading: RoadRiskReading;
}

/**
 * Everything fetched once per request, indexed by waypoint. Each slot
 * re-reads these arrays at its own ETAs.
 */
export interface RawSeries {
  openMeteo: Array<OpenMeteoSeries | null>;
  nws: Array<NwsPeriod[] | null>;
  nwsAlerts: Advisory[][];
  tomorrow: TomorrowInterval[][];
  chainControls: ChainControl[];
  stations: StationObservation[];
  sources: SourceLabel[];
}

export interface RestStopPlace {
  waypointIndex: number;
  alongRouteMiles: number;
  placeName: string | null;
  location: Coordinate;
}
