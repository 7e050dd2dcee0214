import type { RequestInitWithSignal } from "./types";
import type { RoadGlanceErrorResponse } from "../models/common";
import type { RouteConditionsResponse } from "../models/routeConditions";

const trimTrailingSlash = (value: string) => value.replace(/\/+$/, "");
const ensureLeadingSlash = (value: string) => (value.startsWith("/") ? value : `/${value}`);

export const buildUrl = (baseUrl: string, path: string, query?: Record<string, string | number | undefined>) => {
  const url = new URL(`${trimTrailingSlash(baseUrl)}${ensureLeadingSlash(path)}`);
  if (query) {
    Object.entries(query).forEach(([key, value]) => {
      if (value === undefined || value === null) return;
      url.searchParams.set(key, String(value));
    });
  }
  return url.toString();
};

const isErrorResponse = (value: unknown): value is RoadGlanceErrorResponse =>
  typeof value === "object" && value !== null && "error" in value && typeof value.error === "string";

const handleJson = async <T>(response: Response): Promise<T> => {
  if (!response.ok) {
    const body: unknown = await response.json().catch(() => null);
    const detail = isErrorResponse(body) ? `: ${body.message ?? body.error}` : "";
    throw new Error(`RoadGlance API request failed (${response.status})${detail}`);
  }
  return (await response.json()) as T;
};

export interface FetchRouteConditionsParams {
  origin: string;
  destination: string;
  /** ISO-8601 departure; the server applies its default offset when none is given. */
  departure: string;
  speedFactor?: number;
  restIntervalMinutes?: number;
  restDurationMinutes?: number;
}

export const fetchRouteConditions = async (
  baseUrl: string,
  params: FetchRouteConditionsParams,
  init?: RequestInitWithSignal,
): Promise<RouteConditionsResponse> => {
  const url = buildUrl(baseUrl, "/api/route-conditions", {
    origin: params.origin,
    destination: params.destination,
    departure: params.departure,
    speedFactor: params.speedFactor,
    restIntervalMinutes: params.restIntervalMinutes,
    restDurationMinutes: params.restDurationMinutes,
  });
  const response = await fetch(url, { ...init });
  return handleJson<RouteConditionsResponse>(response);
};
