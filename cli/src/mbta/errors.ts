export class FetchError extends Error {
  readonly path: string;
  readonly status: number | undefined;

  constructor(message: string, path: string, status?: number, options?: ErrorOptions) {
    super(message, options);
    this.name = "FetchError";
    this.path = path;
    this.status = status;
  }
}

/** Upstream answered 429; the whole run should stop rather than render partially. */
export class RateLimitedError extends FetchError {
  constructor(path: string) {
    super(`MBTA rate limit exceeded for ${path}`, path, 429);
    this.name = "RateLimitedError";
  }
}

export class DecodeError extends FetchError {
  readonly issues: string[];

  constructor(path: string, issues: string[], options?: ErrorOptions) {
    super(`Unexpected MBTA response for ${path}: ${issues.join("; ")}`, path, undefined, options);
    this.name = "DecodeError";
    this.issues = issues;
  }
}

export const isRateLimited = (error: unknown): error is RateLimitedError => error instanceof RateLimitedError;
