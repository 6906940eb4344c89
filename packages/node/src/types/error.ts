/**
 * API error envelope: `{ error: { code, message, details? } }`.
 *
 * Route-level failures go through `apiError`, which takes the status from
 * the code. Errors thrown out of handlers are mapped by the onError handler.
 */

import type { Context } from "hono";
import type { ContentfulStatusCode } from "hono/utils/http-status";

// =============================================================================
// Error Codes
// =============================================================================

export type ApiErrorCode =
  | "VALIDATION_ERROR"
  | "NOT_FOUND"
  | "CONFLICT"
  | "UNKNOWN_CHANNEL"
  | "NOT_READY"
  | "INTERNAL_ERROR";

export const API_ERROR_STATUS: Readonly<Record<ApiErrorCode, ContentfulStatusCode>> = {
  VALIDATION_ERROR: 400,
  NOT_FOUND: 404,
  CONFLICT: 409,
  UNKNOWN_CHANNEL: 404,
  NOT_READY: 503,
  INTERNAL_ERROR: 500,
};

// =============================================================================
// Envelope
// =============================================================================

/** `code` is an ApiErrorCode or a domain error code passed through. */
export interface ErrorDetail {
  readonly code: string;
  readonly message: string;
  readonly details?: Record<string, unknown>;
}

export interface ErrorEnvelope {
  readonly error: ErrorDetail;
}

export function createErrorEnvelope(
  code: string,
  message: string,
  details?: Record<string, unknown>,
): ErrorEnvelope {
  return details === undefined
    ? { error: { code, message } }
    : { error: { code, message, details } };
}

export function apiError(
  c: Context,
  code: ApiErrorCode,
  message: string,
  details?: Record<string, unknown>,
): Response {
  return c.json(createErrorEnvelope(code, message, details), API_ERROR_STATUS[code]);
}
