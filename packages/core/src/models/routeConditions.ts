import type { DataSource, IsoTimestamp, LatLng, LightLevel, SeverityLabel } from "./common";

export interface WeatherPayload {
  temperatureF: number | null;
  windSpeedMph: number | null;
  windGustsMph: number | null;
  windDirectionDeg: number | null;
  precipitationProbability: number | null;
  precipitationType: string | null;
  precipitationMmHr: number | null;
  rainIntensity: "none" | "light" | "moderate" | "heavy";
  visibilityMiles: number | null;
  fogLevel: "none" | "patchy" | "dense";
  snowDepthIn: number | null;
  freezingLevelFt: number | null;
  conditionText: string | null;
  roadRiskScore: number | null;
  roadRiskLabel: string | null;
  contributors: string[];
}

export interface ChainControlPayload {
  highway: string;
  direction: string;
  level: string;
  beginPostmile: number | null;
  endPostmile: number | null;
  description: string;
}

export interface AdvisoryPayload {
  event: string;
  headline: string;
  severity: string;
  description: string;
  onset: IsoTimestamp | null;
  expires: IsoTimestamp | null;
}

export interface RoadConditionsPayload {
  chainControl: ChainControlPayload | null;
  pavementStatus: string | null;
  pavementTempF: number | null;
  alerts: AdvisoryPayload[];
}

export interface SourceLinks {
  nws: string;
  openMeteo: string;
  tomorrowIo?: string;
  caltrans?: string;
}

export interface SegmentPayload {
  type: "waypoint";
  index: number;
  location: LatLng;
  mileMarker: number;
  eta: IsoTimestamp;
  turnInstruction: string;
  weather: WeatherPayload;
  roadConditions: RoadConditionsPayload;
  severityScore: number;
  severityLabel: SeverityLabel;
  lightLevel: LightLevel;
  sunrise: IsoTimestamp | null;
  sunset: IsoTimestamp | null;
  dataSource: DataSource;
  stationName: string | null;
  sourceLinks: SourceLinks;
}

export interface RestStopPayload {
  type: "rest_stop";
  location: LatLng;
  placeName: string;
  restDurationMinutes: number;
  etaArrive: IsoTimestamp;
  etaDepart: IsoTimestamp;
  mileMarker: number;
}

export type TimelineEntry = SegmentPayload | RestStopPayload;

export interface RouteAlertPayload extends AdvisoryPayload {
  affectedSegments: number[];
}

export interface SlotPayload {
  departure: IsoTimestamp;
  arrival: IsoTimestamp;
  segments: TimelineEntry[];
  alerts: RouteAlertPayload[];
}

export interface RouteSummaryPayload {
  summary: string;
  totalDistanceMiles: number;
  totalDurationMinutes: number;
  departure: IsoTimestamp;
  arrival: IsoTimestamp;
  polyline: string;
}

export interface SliderRange {
  start: IsoTimestamp;
  end: IsoTimestamp;
}

export interface RouteConditionsResponse {
  route: RouteSummaryPayload;
  segments: TimelineEntry[];
  alerts: RouteAlertPayload[];
  sources: string[];
  restStops: RestStopPayload[];
  slots: Record<IsoTimestamp, SlotPayload>;
  sliderRange: SliderRange | null;
}
