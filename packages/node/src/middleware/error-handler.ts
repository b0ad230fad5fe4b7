/**
 * Global error handler.
 *
 * Catches all errors thrown by route handlers and produces
 * a consistent error envelope response.
 *
 * Domain errors carry an ErrorKind, which decides the status:
 * validation → 400, not_found → 404, conflict → 409, database → 500.
 */

import type { ErrorHandler } from "hono";
import type { Logger } from "pino";
import { ZodError } from "zod";
import { isFinanceError } from "@ledgerline/types";
import type { ErrorKind } from "@ledgerline/types";
import { createErrorEnvelope } from "../types/error.js";

// =============================================================================
// Domain Error → HTTP Status Mapping
// =============================================================================

type ErrorStatus = 400 | 404 | 409 | 500;

const KIND_STATUS: Readonly<Record<ErrorKind, ErrorStatus>> = {
  validation: 400,
  not_found: 404,
  conflict: 409,
  database: 500,
};

export function statusForKind(kind: ErrorKind): ErrorStatus {
  return KIND_STATUS[kind];
}

// =============================================================================
// Handler
// =============================================================================

/**
 * Create the handler registered as Hono's onError.
 *
 * Database and unexpected errors are logged with the request id and
 * answered with a generic INTERNAL_ERROR.
 */
export function createErrorHandler(logger: Logger): ErrorHandler {
  return (err, c) => {
    const requestId: unknown = c.get("requestId");

    if (err instanceof ZodError) {
      return c.json(
        createErrorEnvelope("VALIDATION_ERROR", "Request validation failed", {
          issues: err.issues.map((issue) => ({
            path: issue.path.join("."),
            message: issue.message,
          })),
        }),
        400,
      );
    }

    if (isFinanceError(err) && err.kind !== "database") {
      const envelope =
        err.details !== undefined
          ? createErrorEnvelope(err.code, err.message, err.details)
          : createErrorEnvelope(err.code, err.message);
      return c.json(envelope, statusForKind(err.kind));
    }

    logger.error(
      { err, requestId, method: c.req.method, path: c.req.path },
      "request failed",
    );
    return c.json(createErrorEnvelope("INTERNAL_ERROR", "Internal server error"), 500);
  };
}
