/**
 * Consistent JSON response and error handling for API routes.
 */

import type { ApiError, ApiErrorCode } from "./error-types";
import { parseBoolean } from "@/lib/config/settings";

const HTTP_STATUS: Record<ApiErrorCode, number> = {
  validation_failed: 400,
  unauthorized: 401,
  forbidden: 403,
  not_found: 404,
  internal_error: 500,
};

export function json<T>(data: T, status = 200): Response {
  return new Response(JSON.stringify(data), {
    status,
    headers: {
      "Content-Type": "application/json",
    },
  });
}

export function noContent(): Response {
  return new Response(null, { status: 204 });
}

export function errorResponse(
  error: ApiErrorCode,
  message: string,
  details?: Record<string, string[]>
): Response {
  const status = HTTP_STATUS[error];
  const body: ApiError = {
    error,
    message,
    ...(details && { details }),
  };
  return new Response(JSON.stringify(body), {
    status,
    headers: {
      "Content-Type": "application/json",
    },
  });
}

export function validationError(
  message: string,
  details?: Record<string, string[]>
): Response {
  return errorResponse("validation_failed", message, details);
}

/** Single-field validation failure, e.g. fieldError("avatar", "Avatar is not set."). */
export function fieldError(field: string, message: string): Response {
  return validationError(message, { [field]: [message] });
}

export function unauthorizedError(
  message = "Authentication credentials were not provided."
): Response {
  return errorResponse("unauthorized", message);
}

export function forbiddenError(
  message = "You do not have permission to perform this action."
): Response {
  return errorResponse("forbidden", message);
}

export function notFoundError(message = "Resource not found"): Response {
  return errorResponse("not_found", message);
}

/** Debug mode exposes the underlying error message. */
export function internalError(err?: unknown): Response {
  const message =
    err instanceof Error && parseBoolean(process.env.DEBUG)
      ? err.message
      : "An unexpected error occurred";
  return errorResponse("internal_error", message);
}
