// ============================================
// Domain Errors
// ============================================

export type ErrorCode =
  | "INVALID_PARAMETER"
  | "LOCATION_NOT_FOUND"
  | "TASK_NOT_FOUND"
  | "SEARCH_ORDER_NOT_FOUND"
  | "FORBIDDEN"
  | "UNKNOWN_PROVIDER"
  | "UPSTREAM_UNAVAILABLE"
  | "UPSTREAM_REJECTED"
  | "UPSTREAM_MALFORMED"
  | "NORMALIZATION_ERROR"
  | "CACHE_WRITE_CONFLICT";

export type ErrorStatus = 400 | 403 | 404 | 500 | 502;

/**
 * Base class for every failure the core reports to its callers.
 * `code` is stable and is what the HTTP layer puts in `error`.
 */
export abstract class PadelWatchError extends Error {
  abstract readonly code: ErrorCode;
  abstract readonly status: ErrorStatus;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class InvalidParameterError extends PadelWatchError {
  readonly code = "INVALID_PARAMETER";
  readonly status = 400;
}

export class LocationNotFoundError extends PadelWatchError {
  readonly code = "LOCATION_NOT_FOUND";
  readonly status = 404;

  constructor(readonly locationId: number | string) {
    super(`Location ${locationId} not found`);
  }
}

export class TaskNotFoundError extends PadelWatchError {
  readonly code = "TASK_NOT_FOUND";
  readonly status = 404;

  constructor(readonly taskId: string) {
    super(`Task ${taskId} not found`);
  }
}

export class SearchOrderNotFoundError extends PadelWatchError {
  readonly code = "SEARCH_ORDER_NOT_FOUND";
  readonly status = 404;

  constructor(readonly searchOrderId: number) {
    super(`Search order ${searchOrderId} not found`);
  }
}

export class ForbiddenError extends PadelWatchError {
  readonly code = "FORBIDDEN";
  readonly status = 403;
}

export class UnknownProviderError extends PadelWatchError {
  readonly code = "UNKNOWN_PROVIDER";
  readonly status = 400;

  constructor(readonly provider: string) {
    super(`Unsupported provider: ${provider}`);
  }
}

// Provider-side failures

export abstract class UpstreamError extends PadelWatchError {
  readonly status = 502;
}

export class UpstreamUnavailableError extends UpstreamError {
  readonly code = "UPSTREAM_UNAVAILABLE";
}

export class UpstreamRejectedError extends UpstreamError {
  readonly code = "UPSTREAM_REJECTED";

  constructor(
    message: string,
    readonly upstreamStatus: number
  ) {
    super(message);
  }
}

export class UpstreamMalformedError extends UpstreamError {
  readonly code = "UPSTREAM_MALFORMED";
}

/**
 * A single raw record that could not be normalized. Never thrown past the
 * normalizer: collected and counted so the rest of the batch survives.
 */
export class NormalizationError extends PadelWatchError {
  readonly code = "NORMALIZATION_ERROR";
  readonly status = 500;

  constructor(
    message: string,
    readonly record: unknown
  ) {
    super(message);
  }
}

export class CacheWriteConflictError extends PadelWatchError {
  readonly code = "CACHE_WRITE_CONFLICT";
  readonly status = 500;
}

/**
 * Upstream failures the cache coordinator is allowed to retry once
 */
export function isRetryableUpstreamError(error: unknown): boolean {
  return error instanceof UpstreamUnavailableError || error instanceof UpstreamRejectedError;
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : "Unknown error";
}
