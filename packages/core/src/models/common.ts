export interface LatLng {
  lat: number;
  lng: number;
}

export type IsoTimestamp = string;

export type DataSource = "rwis" | "fill";

export type SeverityLabel = "green" | "yellow" | "red";

export type LightLevel = "day" | "twilight" | "night";

export interface RoadGlanceErrorResponse {
  error: string;
  message?: string;
}
