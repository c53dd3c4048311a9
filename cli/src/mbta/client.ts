import type { z } from "zod";
import {
  mbtaPredictionResponseSchema,
  mbtaScheduleResponseSchema,
  mbtaStopResponseSchema,
} from "../models/mbta";
import { config } from "../config";
import { logger, safeErrorMessage } from "../utils/logger";
import { DecodeError, FetchError, RateLimitedError } from "./errors";

export type QueryParams = Record<string, string | number | boolean | Array<string | number | boolean>>;

export type FetchLike = (input: string, init?: RequestInit) => Promise<Response>;

// 429 is deliberately absent: a rate limit ends the run instead of being retried.
const RETRYABLE_STATUSES = new Set([408, 409, 425, 500, 502, 503, 504]);

const delay = (ms: number) => new Promise((resolve) => setTimeout(resolve, ms));

export interface RetryPolicy {
  maxRetries: number;
  baseDelayMs: number;
  maxDelayMs: number;
}

const computeBackoff = (attempt: number, policy: RetryPolicy) => {
  const cappedAttempt = Math.min(attempt, 10);
  const delayMs = Math.min(policy.maxDelayMs, policy.baseDelayMs * 2 ** cappedAttempt);
  const jitter = Math.floor(Math.random() * 0.3 * delayMs);
  return delayMs + jitter;
};

const formatZodIssues = (error: z.ZodError): string[] =>
  error.issues.map((issue) => `${issue.path.join(".") || "<root>"}: ${issue.message}`);

export interface MbtaClientOptions {
  baseUrl?: string;
  apiKey?: string;
  fetch?: FetchLike;
  retry?: Partial<RetryPolicy>;
  timeoutMs?: number;
}

/**
 * Thin MBTA v3 client. Holds only read-only settings, so one instance is shared
 * by every concurrent stop query.
 */
export class MbtaClient {
  private readonly baseUrl: string;
  private readonly apiKey: string | undefined;
  private readonly fetchImpl: FetchLike;
  private readonly retry: RetryPolicy;
  private readonly timeoutMs: number;

  constructor(options: MbtaClientOptions = {}) {
    this.baseUrl = options.baseUrl ?? config.mbtaApiBaseUrl;
    this.apiKey = options.apiKey ?? config.mbtaApiKey;
    this.fetchImpl = options.fetch ?? ((input, init) => fetch(input, init));
    this.retry = {
      maxRetries: options.retry?.maxRetries ?? config.mbtaMaxRetries,
      baseDelayMs: options.retry?.baseDelayMs ?? config.mbtaRetryBaseDelayMs,
      maxDelayMs: options.retry?.maxDelayMs ?? config.mbtaRetryMaxDelayMs,
    };
    this.timeoutMs = options.timeoutMs ?? config.mbtaRequestTimeoutMs;
  }

  async getSchedules(params?: QueryParams) {
    return this.get("/schedules", mbtaScheduleResponseSchema, params);
  }

  async getPredictions(params?: QueryParams) {
    return this.get("/predictions", mbtaPredictionResponseSchema, params);
  }

  async getStops(params?: QueryParams) {
    return this.get("/stops", mbtaStopResponseSchema, params);
  }

  private async get<TSchema extends z.ZodTypeAny>(
    path: string,
    schema: TSchema,
    params?: QueryParams,
  ): Promise<z.infer<TSchema>> {
    const searchParams = this.buildSearchParams(params);
    const url = `${this.baseUrl}${path}${searchParams ? `?${searchParams}` : ""}`;

    const headers = new Headers({
      accept: "application/vnd.api+json",
    });
    if (this.apiKey) {
      headers.set("x-api-key", this.apiKey);
    }

    logger.debug("MBTA request", { url });
    const response = await this.fetchWithRetry(url, path, { headers });

    let body: unknown;
    try {
      body = await response.json();
    } catch (error) {
      throw new DecodeError(path, [`body is not JSON (${safeErrorMessage(error)})`], { cause: error });
    }

    const parsed = schema.safeParse(body);
    if (!parsed.success) {
      throw new DecodeError(path, formatZodIssues(parsed.error), { cause: parsed.error });
    }
    return parsed.data;
  }

  private async fetchWithRetry(url: string, path: string, init: RequestInit): Promise<Response> {
    let attempt = 0;
    let lastError: unknown;

    while (attempt <= this.retry.maxRetries) {
      let response: Response;
      try {
        response = await this.fetchImpl(url, this.withTimeout(init));
      } catch (error) {
        lastError = error;
        if (attempt === this.retry.maxRetries) {
          break;
        }
        const waitMs = computeBackoff(attempt, this.retry);
        logger.warn("MBTA request failed, retrying", {
          path,
          attempt,
          waitMs,
          message: safeErrorMessage(error),
        });
        await delay(waitMs);
        attempt += 1;
        continue;
      }

      if (response.ok) {
        return response;
      }
      if (response.status === 429) {
        throw new RateLimitedError(path);
      }

      const body = await response.text().catch(() => "");
      if (!RETRYABLE_STATUSES.has(response.status) || attempt === this.retry.maxRetries) {
        throw new FetchError(
          `MBTA request failed (${response.status} ${response.statusText}) for ${path}${body ? ` - ${body.slice(0, 180)}` : ""}`,
          path,
          response.status,
        );
      }

      const waitMs = computeBackoff(attempt, this.retry);
      logger.warn("MBTA request hit retryable status, backing off", {
        path,
        status: response.status,
        attempt,
        waitMs,
      });
      await delay(waitMs);
      attempt += 1;
    }

    throw new FetchError(
      `MBTA request exhausted retries for ${path}: ${safeErrorMessage(lastError)}`,
      path,
      undefined,
      { cause: lastError },
    );
  }

  private withTimeout(init: RequestInit): RequestInit {
    if (this.timeoutMs <= 0) return init;
    return { ...init, signal: AbortSignal.timeout(this.timeoutMs) };
  }

  private buildSearchParams(params?: QueryParams) {
    if (!params) return "";
    const searchParams = new URLSearchParams();
    Object.entries(params).forEach(([key, value]) => {
      if (Array.isArray(value)) {
        searchParams.set(key, value.map(String).join(","));
        return;
      }
      searchParams.set(key, String(value));
    });
    return searchParams.toString();
  }
}

export const createMbtaClient = () => {
  const options: MbtaClientOptions = {
    baseUrl: config.mbtaApiBaseUrl,
  };

  if (config.mbtaApiKey) {
    options.apiKey = config.mbtaApiKey;
  }

  return new MbtaClient(options);
};
