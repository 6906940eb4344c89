/**
 * Global error handler.
 *
 * Catches all errors thrown by route handlers and produces
 * a consistent error envelope response. Known domain error codes map to
 * HTTP statuses; everything else is a 500 with the details logged, not
 * returned.
 */

import type { Context } from "hono";
import type { ContentfulStatusCode } from "hono/utils/http-status";
import type { Logger } from "pino";
import { createErrorEnvelope } from "../types/error.js";

// =============================================================================
// Domain Error → HTTP Status Mapping
// =============================================================================

const STATUS_MAP: Readonly<Record<string, ContentfulStatusCode>> = {
  // Coordinator errors
  INTENT_NOT_FOUND: 404,
  PROPOSAL_NOT_FOUND: 404,
  SESSION_NOT_FOUND: 404,
  INVALID_ARGUMENT: 400,
  TIMEOUT: 504,

  // Codec errors
  DECODE_FAILED: 400,
  ENCODE_FAILED: 500,

  // Ledger client errors
  NOT_CONNECTED: 503,
  NO_ACCOUNT: 503,
  UNSUPPORTED_CHAIN: 500,
  INVALID_ADDRESS: 400,
  INVALID_CALLDATA: 400,
  INVALID_VALUE: 400,
  SUBMISSION_FAILED: 502,
};

function errorCode(err: Error): string | undefined {
  return "code" in err && typeof err.code === "string" ? err.code : undefined;
}

// =============================================================================
// Handler
// =============================================================================

/**
 * Create the onError handler. Unmapped errors are logged at error level.
 */
export function createErrorHandler(logger: Logger) {
  return (err: Error, c: Context): Response => {
    const code = errorCode(err);
    const status = (code !== undefined ? STATUS_MAP[code] : undefined) ?? 500;

    if (status === 500) {
      logger.error({ err, path: c.req.path }, "Unhandled error");
      // Don't leak internal details
      return c.json(createErrorEnvelope(code ?? "INTERNAL_ERROR", "Internal server error"), 500);
    }

    return c.json(createErrorEnvelope(code ?? "INTERNAL_ERROR", err.message), status);
  };
}
