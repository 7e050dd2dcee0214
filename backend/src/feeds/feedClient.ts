import { config } from "../config";
import { safeErrorMessage } from "../utils/errors";
import { logger as rootLogger, type Logger } from "../utils/logger";

type QueryValue = string | number | boolean;
export type QueryParams = Record<string, QueryValue | QueryValue[] | undefined>;

interface RateLimitConfig {
  windowMs: number;
  maxRequests: number;
}

export interface FeedTelemetry {
  totalRequests: number;
  retryableResponses: number;
  failedRequests: number;
  totalRateLimitDelayMs: number;
  rateLimitDelayCount: number;
  lastFailureAt: string | null;
  lastFailureMessage: string | null;
  lastFailurePath: string | null;
  lastSuccessAt: string | null;
  lastSuccessPath: string | null;
}

const RETRYABLE_STATUSES = new Set([408, 409, 425, 429, 500, 502, 503, 504]);

const createTelemetry = (): FeedTelemetry => ({
  totalRequests: 0,
  retryableResponses: 0,
  failedRequests: 0,
  totalRateLimitDelayMs: 0,
  rateLimitDelayCount: 0,
  lastFailureAt: null,
  lastFailureMessage: null,
  lastFailurePath: null,
  lastSuccessAt: null,
  lastSuccessPath: null,
});

const telemetryByFeed = new Map<string, FeedTelemetry>();

export const getFeedTelemetry = () => {
  const snapshot: Record<string, FeedTelemetry & { averageRateLimitDelayMs: number }> = {};
  telemetryByFeed.forEach((state, feed) => {
    const averageDelay = state.rateLimitDelayCount === 0 ? 0 : state.totalRateLimitDelayMs / state.rateLimitDelayCount;
    snapshot[feed] = { ...state, averageRateLimitDelayMs: Math.round(averageDelay) };
  });
  return snapshot;
};

const delay = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));

export class FeedRequestError extends Error {
  readonly status: number | null;

  constructor(message: string, status: number | null) {
    super(message);
    this.name = "FeedRequestError";
    this.status = status;
  }
}

export interface FeedClientOptions {
  /** Telemetry and log scope, e.g. "nws". */
  name: string;
  baseUrl: string;
  headers?: Record<string, string>;
  timeoutMs?: number;
  maxRetries?: number;
  retryBaseDelayMs?: number;
  retryMaxDelayMs?: number;
  rateLimit?: RateLimitConfig;
  fetchImpl?: typeof fetch;
}

export interface FeedRequest {
  method?: "GET" | "POST";
  params?: QueryParams;
  body?: unknown;
  headers?: Record<string, string>;
}

/**
 * JSON-over-HTTP client shared by every upstream feed: exponential backoff on
 * retryable statuses, optional sliding-window rate limit, per-feed telemetry.
 */
export class FeedClient {
  readonly name: string;
  private readonly baseUrl: string;
  private readonly headers: Record<string, string>;
  private readonly timeoutMs: number;
  private readonly maxRetries: number;
  private readonly retryBaseDelayMs: number;
  private readonly retryMaxDelayMs: number;
  private readonly rateLimit: RateLimitConfig | undefined;
  private readonly fetchImpl: typeof fetch;
  private readonly telemetry: FeedTelemetry;
  private readonly logger: Logger;
  private readonly requestTimestamps: number[] = [];
  private nextAvailableTimestamp = 0;

  constructor(options: FeedClientOptions) {
    this.name = options.name;
    this.baseUrl = options.baseUrl.replace(/\/+$/, "");
    this.headers = options.headers ?? {};
    this.timeoutMs = options.timeoutMs ?? config.feedTimeoutMs;
    this.maxRetries = options.maxRetries ?? config.feedMaxRetries;
    this.retryBaseDelayMs = options.retryBaseDelayMs ?? config.feedRetryBaseDelayMs;
    this.retryMaxDelayMs = options.retryMaxDelayMs ?? config.feedRetryMaxDelayMs;
    this.rateLimit = options.rateLimit;
    this.fetchImpl = options.fetchImpl ?? fetch;
    this.logger = rootLogger.child(options.name);
    const existing = telemetryByFeed.get(options.name);
    this.telemetry = existing ?? createTelemetry();
    telemetryByFeed.set(options.name, this.telemetry);
  }

  async getJson(path: string, params?: QueryParams): Promise<unknown> {
    return this.request(path, { method: "GET", ...(params ? { params } : {}) });
  }

  async postJson(path: string, body: unknown, headers?: Record<string, string>): Promise<unknown> {
    return this.request(path, { method: "POST", body, ...(headers ? { headers } : {}) });
  }

  async request(path: string, request: FeedRequest = {}): Promise<unknown> {
    await this.acquireRateLimitSlot(path);

    const searchParams = this.buildSearchParams(request.params);
    const url = `${this.resolveUrl(path)}${searchParams ? `?${searchParams}` : ""}`;
    const headers = new Headers({ Accept: "application/json", ...this.headers, ...request.headers });
    const init: RequestInit = { method: request.method ?? "GET", headers };
    if (request.body !== undefined) {
      headers.set("Content-Type", "application/json");
      init.body = JSON.stringify(request.body);
    }

    const response = await this.fetchWithRetry(url, path, init);
    const payload: unknown = await response.json();
    return payload;
  }

  private resolveUrl(path: string) {
    if (/^https?:\/\//.test(path)) return path;
    return `${this.baseUrl}${path.startsWith("/") ? path : `/${path}`}`;
  }

  private async acquireRateLimitSlot(path: string) {
    const rateLimit = this.rateLimit;
    if (!rateLimit) return;
    const minSpacingMs = Math.max(10, Math.floor(rateLimit.windowMs / rateLimit.maxRequests));

    while (true) {
      const now = Date.now();
      while (this.requestTimestamps.length > 0) {
        const oldest = this.requestTimestamps[0];
        if (oldest !== undefined && now - oldest > rateLimit.windowMs) {
          this.requestTimestamps.shift();
          continue;
        }
        break;
      }

      const oldest = this.requestTimestamps[0];
      const windowWait =
        this.requestTimestamps.length >= rateLimit.maxRequests && oldest !== undefined
          ? Math.max(0, rateLimit.windowMs - (now - oldest))
          : 0;
      const spacingWait = Math.max(0, this.nextAvailableTimestamp - now);
      const waitMs = Math.max(windowWait, spacingWait);

      if (waitMs <= 0) {
        this.requestTimestamps.push(now);
        this.nextAvailableTimestamp = now + minSpacingMs;
        return;
      }

      this.logger.debug("Rate limit in effect, delaying request", {
        path,
        waitMs,
        pending: this.requestTimestamps.length,
      });
      this.telemetry.totalRateLimitDelayMs += waitMs;
      this.telemetry.rateLimitDelayCount += 1;
      await delay(waitMs);
    }
  }

  private computeBackoff(attempt: number) {
    const cappedAttempt = Math.min(attempt, 10);
    const delayMs = Math.min(this.retryMaxDelayMs, this.retryBaseDelayMs * 2 ** cappedAttempt);
    const jitter = Math.floor(Math.random() * 0.3 * delayMs);
    return delayMs + jitter;
  }

  private recordFailure(error: unknown, path: string) {
    this.telemetry.failedRequests += 1;
    this.telemetry.lastFailureAt = new Date().toISOString();
    this.telemetry.lastFailureMessage = safeErrorMessage(error);
    this.telemetry.lastFailurePath = path;
  }

  private async fetchWithRetry(url: string, path: string, init: RequestInit): Promise<Response> {
    let attempt = 0;
    let lastError: unknown;

    while (attempt <= this.maxRetries) {
      try {
        const response = await this.fetchImpl(url, { ...init, signal: AbortSignal.timeout(this.timeoutMs) });
        if (response.ok) {
          this.telemetry.totalRequests += 1;
          this.telemetry.lastSuccessAt = new Date().toISOString();
          this.telemetry.lastSuccessPath = path;
          return response;
        }

        const body = await response.text().catch(() => "");
        if (!RETRYABLE_STATUSES.has(response.status) || attempt === this.maxRetries) {
          const terminalError = new FeedRequestError(
            `${this.name} request failed (${response.status} ${response.statusText}) for ${path}${
              body ? ` - ${body.slice(0, 180)}` : ""
            }`,
            response.status,
          );
          this.recordFailure(terminalError, path);
          throw terminalError;
        }

        this.telemetry.retryableResponses += 1;
        lastError = new FeedRequestError(`Retryable status ${response.status} for ${path}`, response.status);
        const waitMs = this.computeBackoff(attempt);
        this.logger.warn("Request hit retryable status, backing off", {
          path,
          status: response.status,
          attempt,
          waitMs,
        });
        await delay(waitMs);
      } catch (error) {
        if (error instanceof FeedRequestError && error.status !== null && !RETRYABLE_STATUSES.has(error.status)) {
          throw error;
        }
        if (error instanceof FeedRequestError && attempt === this.maxRetries) {
          throw error;
        }
        this.telemetry.retryableResponses += 1;
        lastError = error;
        if (attempt === this.maxRetries) {
          break;
        }
        const waitMs = this.computeBackoff(attempt);
        this.logger.warn("Request failed, retrying", {
          path,
          attempt,
          waitMs,
          message: safeErrorMessage(error),
        });
        await delay(waitMs);
      }
      attempt += 1;
    }

    this.recordFailure(lastError, path);
    throw new FeedRequestError(`${this.name} request exhausted retries for ${path}: ${safeErrorMessage(lastError)}`, null);
  }

  private buildSearchParams(params?: QueryParams) {
    if (!params) return "";
    const searchParams = new URLSearchParams();
    Object.entries(params).forEach(([key, value]) => {
      if (value === undefined) return;
      if (Array.isArray(value)) {
        value.forEach((entry) => searchParams.append(key, String(entry)));
        return;
      }
      searchParams.set(key, String(value));
    });
    return searchParams.toString();
  }
}
