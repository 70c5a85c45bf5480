/**
 * Structured API Error Utilities
 *
 * Consistent error bodies for every knowledge-base endpoint.
 * All API errors include: code, message, and optionally details.
 */

import { logErrorObject } from "@/lib/error-logger";
import { getErrorMessage, RagportError } from "@/lib/errors";

/**
 * Error codes for API responses
 */
export type ApiErrorCode =
  | "BAD_REQUEST"
  | "VALIDATION_ERROR"
  | "NOT_FOUND"
  | "METHOD_NOT_ALLOWED"
  | "INTERNAL_ERROR"
  | "UPSTREAM_ERROR"
  | "SERVICE_UNAVAILABLE";

/**
 * Structured API error response
 */
export interface ApiErrorResponse {
  code: ApiErrorCode;
  message: string;
  details?: unknown;
}

/**
 * HTTP status codes for each error type
 */
const ERROR_STATUS_MAP: Record<ApiErrorCode, number> = {
  BAD_REQUEST: 400,
  VALIDATION_ERROR: 400,
  NOT_FOUND: 404,
  METHOD_NOT_ALLOWED: 405,
  INTERNAL_ERROR: 500,
  UPSTREAM_ERROR: 502,
  SERVICE_UNAVAILABLE: 503,
};

export function getErrorStatus(code: ApiErrorCode): number {
  return ERROR_STATUS_MAP[code];
}

/**
 * JSON response with the content type set
 */
export function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { "Content-Type": "application/json" },
  });
}

/**
 * Create a structured API error response
 */
export function createApiErrorResponse(
  code: ApiErrorCode,
  message: string,
  details?: unknown
): Response {
  const body: ApiErrorResponse = { code, message, details };
  return jsonResponse(body, ERROR_STATUS_MAP[code]);
}

/**
 * Map a domain error onto the closest API error code
 */
export function toApiErrorCode(error: unknown): ApiErrorCode {
  if (!(error instanceof RagportError)) return "INTERNAL_ERROR";

  switch (error.code) {
    case "MALFORMED_REQUEST":
      return "BAD_REQUEST";
    case "INFERENCE_UNAVAILABLE":
      return "SERVICE_UNAVAILABLE";
    case "KNOWLEDGE_BASE_NOT_FOUND":
      return "NOT_FOUND";
    case "SOURCE_UNAVAILABLE":
      return "UPSTREAM_ERROR";
    default:
      return "INTERNAL_ERROR";
  }
}

/**
 * Wrap an async route handler with try-catch and structured error responses
 */
export function withErrorHandlingResponse<T extends unknown[]>(
  handler: (...args: T) => Promise<Response>,
  context?: string
): (...args: T) => Promise<Response> {
  return async (...args: T): Promise<Response> => {
    try {
      return await handler(...args);
    } catch (error) {
      const code = toApiErrorCode(error);

      if (code !== "INTERNAL_ERROR") {
        return createApiErrorResponse(code, getErrorMessage(error));
      }

      console.error(`[${context || "api"}] Unhandled error:`, error);
      void logErrorObject(error, {
        error_type: "api_error",
        status_code: 500,
        metadata: { context: context || "api" },
      });

      return createApiErrorResponse(
        "INTERNAL_ERROR",
        "An unexpected error occurred",
        { originalError: getErrorMessage(error) }
      );
    }
  };
}
