/**
 * Global error handler middleware.
 *
 * Catches all errors thrown by route handlers and produces
 * a consistent error envelope response.
 *
 * Maps coordinator and request errors to HTTP status codes by `code`.
 * Anything without a known code is a 500 whose message is not exposed.
 */

import type { Context } from "hono";
import type { ContentfulStatusCode } from "hono/utils/http-status";
import { isRecord } from "@multicustody/types";
import { createErrorEnvelope } from "../types/error.js";

// =============================================================================
// Domain Error → HTTP Status Mapping
// =============================================================================

const STATUS_MAP: Record<string, ContentfulStatusCode> = {
  // Request validation
  VALIDATION_ERROR: 400,

  // Coordinator errors
  NOT_FOUND: 404,
  NOT_AUTHORIZED: 403,
  ALREADY_SIGNED: 409,
  INVALID_STATE: 409,
  QUORUM_NOT_MET: 409,
  EXPIRED: 410,
  INVALID_IMPORT: 400,
  INVALID_ADDRESS: 400,
  ZERO_ADDRESS: 400,
  ZERO_AMOUNT: 400,
  INVALID_AMOUNT: 400,
  BROADCAST_REJECTED: 502,
};

function codeOf(err: Error): string | undefined {
  return "code" in err && typeof err.code === "string" ? err.code : undefined;
}

function detailsOf(err: Error): Record<string, unknown> | undefined {
  return "details" in err && isRecord(err.details) ? err.details : undefined;
}

// =============================================================================
// Middleware
// =============================================================================

/**
 * Global error handler. Registered as Hono's onError handler.
 */
export function handleError(err: Error, c: Context): Response {
  const code = codeOf(err);
  const status = code !== undefined ? STATUS_MAP[code] : undefined;

  if (code === undefined || status === undefined) {
    // Don't leak internal details
    return c.json(createErrorEnvelope("INTERNAL_ERROR", "Internal server error"), 500);
  }

  return c.json(createErrorEnvelope(code, err.message, detailsOf(err)), status);
}
