// src/http/errors.ts
/**
 * Purpose:
 * - Error values handlers throw or pass to helpers that write an error envelope.
 * - `status` is the HTTP status the envelope goes out with; `message` becomes
 *   the envelope's `error` text.
 */

export class ApiError extends Error {
  constructor(
    public readonly status: number,
    public readonly code: string,
    message: string
  ) {
    super(message);
    this.name = "ApiError";
  }
}

/**
 * A handler read something only the routing layer can provide (route params)
 * but was dispatched without it. Wiring bug, not a client error.
 */
export class RouteContractError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "RouteContractError";
  }
}

export const forbidden = (message = "forbidden") =>
  new ApiError(403, "FORBIDDEN", message);

export const unauthorized = (message = "unauthorized") =>
  new ApiError(401, "UNAUTHORIZED", message);

export const notFound = (message = "not found") =>
  new ApiError(404, "NOT_FOUND", message);

export const missingRequiredData = () =>
  new ApiError(400, "MISSING_REQUIRED_DATA", "missing required data");

export const notRecognized = () =>
  new ApiError(401, "NOT_RECOGNIZED", "not recognized");

export function isApiError(err: unknown): err is ApiError {
  return err instanceof ApiError;
}

/** HTTP status for any thrown value; only ApiError carries one. */
export function statusOf(err: unknown): number {
  if (isApiError(err) && err.status >= 400 && err.status < 600) {
    return err.status;
  }
  return 500;
}
