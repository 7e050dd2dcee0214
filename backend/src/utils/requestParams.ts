import { config } from "../config";
import type { RouteConditionsRequest } from "../services/routeConditions";
import { BadRequestError } from "./errors";
import { parseIsoWithOffset } from "./time";

export const MAX_SPEED_FACTOR = 2;

export interface QueryDefaults {
  utcOffset: string;
  restDurationMinutes: number;
}

const readQueryString = (value: unknown): string | undefined => {
  if (Array.isArray(value)) return readQueryString(value[0]);
  if (typeof value !== "string") return undefined;
  const trimmed = value.trim();
  return trimmed.length > 0 ? trimmed : undefined;
};

const readQueryNumber = (query: Record<string, unknown>, key: string): number | undefined => {
  const raw = readQueryString(query[key]);
  if (raw === undefined) return undefined;
  const parsed = Number(raw);
  if (!Number.isFinite(parsed)) throw new BadRequestError(`${key} must be a number`);
  return parsed;
};

/** Validates `/api/route-conditions` query parameters. */
export const parseRouteConditionsQuery = (
  query: Record<string, unknown>,
  defaults: QueryDefaults = { utcOffset: config.defaultUtcOffset, restDurationMinutes: config.restDurationMinutes },
): RouteConditionsRequest => {
  const origin = readQueryString(query.origin);
  const destination = readQueryString(query.destination);
  const departureValue = readQueryString(query.departure);
  if (!origin || !destination || !departureValue) {
    throw new BadRequestError("Missing required params: origin, destination, departure");
  }

  const departure = parseIsoWithOffset(departureValue, defaults.utcOffset);
  if (!departure) throw new BadRequestError("Invalid departure format. Use ISO 8601.");

  const speedFactor = readQueryNumber(query, "speedFactor") ?? 1;
  if (speedFactor <= 0 || speedFactor > MAX_SPEED_FACTOR) {
    throw new BadRequestError(`speedFactor must be greater than 0 and at most ${MAX_SPEED_FACTOR}`);
  }

  const restIntervalMinutes = readQueryNumber(query, "restIntervalMinutes") ?? 0;
  if (restIntervalMinutes < 0) throw new BadRequestError("restIntervalMinutes must not be negative");

  const restDurationMinutes = readQueryNumber(query, "restDurationMinutes") ?? defaults.restDurationMinutes;
  if (restDurationMinutes < 0) throw new BadRequestError("restDurationMinutes must not be negative");

  return { origin, destination, departure, speedFactor, restIntervalMinutes, restDurationMinutes };
};
