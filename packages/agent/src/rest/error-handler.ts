/**
 * Express error handler for the status API.
 *
 * Maps errors to HTTP responses:
 *
 *   - ZodError        → 400 with validation details
 *   - BoardlinkError  → HTTP status based on error code prefix
 *   - Everything else → 500 Internal Server Error
 *
 * The full error is always logged. Stack traces are only included in
 * responses outside production.
 */

import type { ErrorRequestHandler } from "express";
import type { Logger } from "pino";
import { ZodError } from "zod";
import { BoardlinkError } from "@boardlink/shared";

/** Map a BoardlinkError code prefix to an HTTP status code */
export function mapErrorCodeToStatus(code: string): number {
  if (code.startsWith("VALIDATION_")) return 400;
  if (code.startsWith("CONFIG_")) return 500;
  if (code.startsWith("NETWORK_")) return 502;
  if (code.startsWith("STORAGE_")) return 503;
  return 500;
}

export function createErrorHandler(
  logger: Logger,
  production: boolean = process.env.NODE_ENV === "production",
): ErrorRequestHandler {
  return (err: unknown, _req, res, _next) => {
    const error = err instanceof Error ? err : new Error(String(err));
    logger.error(
      { err: error, code: error instanceof BoardlinkError ? error.code : undefined },
      `Request error: ${error.message}`,
    );

    if (error instanceof ZodError) {
      res.status(400).json({ error: "Validation failed", details: error.issues });
      return;
    }

    if (error instanceof BoardlinkError) {
      res.status(mapErrorCodeToStatus(error.code)).json({
        error: error.message,
        code: error.code,
        ...(production ? {} : { stack: error.stack }),
      });
      return;
    }

    res.status(500).json({
      error: "Internal server error",
      ...(production ? {} : { stack: error.stack }),
    });
  };
}
