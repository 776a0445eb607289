/**
 * Error types and the Hono fault boundary.
 * Faults from a wrapped handler are not caught by the Dispatcher; on the
 * Hono path they land here.
 */

import type { Context } from "hono";
import type { ContentfulStatusCode } from "hono/utils/http-status";
import { ZodError } from "zod";
import { createLogger } from "../utils/logger";
import type { TransportEnv } from "../types/env";

export class AppError extends Error {
  constructor(
    message: string,
    public statusCode: ContentfulStatusCode = 500,
    public code?: string,
  ) {
    super(message);
    this.name = "AppError";
  }
}

/**
 * Unusable setup: bad environment, or a handler the Dispatcher cannot drive.
 * Raised before any traffic is accepted.
 */
export class ConfigurationError extends AppError {
  constructor(message: string, public details?: unknown) {
    super(message, 500, "CONFIGURATION_ERROR");
    this.name = "ConfigurationError";
  }
}

export class NotFoundError extends AppError {
  constructor(message = "Not found") {
    super(message, 404, "NOT_FOUND");
    this.name = "NotFoundError";
  }
}

interface ErrorReply {
  expected: boolean;
  status: ContentfulStatusCode;
  body: { error: string; code?: string; details?: unknown };
}

const toReply = (err: Error): ErrorReply => {
  if (err instanceof ZodError) {
    return {
      expected: true,
      status: 400,
      body: { error: "Validation error", code: "VALIDATION_ERROR", details: err.errors },
    };
  }
  if (err instanceof AppError) {
    return { expected: true, status: err.statusCode, body: { error: err.message, code: err.code } };
  }
  return { expected: false, status: 500, body: { error: "Internal server error", code: "INTERNAL_ERROR" } };
};

/**
 * Hono onError boundary. Known errors are answered with their own status
 * and logged as warnings; anything else is a 500 logged with its stack.
 */
export const errorHandler = () => {
  return async (err: Error, c: Context<TransportEnv>): Promise<Response> => {
    const logger = createLogger(c.var);
    const { expected, status, body } = toReply(err);

    if (expected) {
      logger.warn(`${err.name}: ${err.message}`, { status, code: body.code, path: c.req.path });
    } else {
      logger.error("Unhandled error", { error: err, path: c.req.path });
    }

    return c.json(body, status);
  };
};
