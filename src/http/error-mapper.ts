/**
 * Maps failures to HTTP status codes and the JSON error body.
 * @module http/error-mapper
 */

import type { ErrorRequestHandler } from "express";
import { TodoError } from "../errors.js";
import { getLogger } from "../logging/logger.js";
import type { ErrorResponse, ValidationErrorDetail } from "../types.js";
import { getRequestId } from "./request-context.js";

const logger = getLogger("http");

/** Value of the X-Error-Type header */
export type ErrorType =
  | "VALIDATION_ERROR"
  | "ENTITY_NOT_FOUND"
  | "MALFORMED_REQUEST"
  | "INTERNAL_ERROR";

/**
 * A failure ready to be written to the response.
 */
export interface MappedError {
  status: number;
  errorType: ErrorType;
  body: ErrorResponse;
}

interface RequestInfo {
  path: string;
  correlationId: string;
}

/**
 * Shape of the errors thrown by express.json() (body-parser).
 * @internal
 */
interface BodyParserError extends Error {
  type: string;
  status: number;
}

function isBodyParserError(error: unknown): error is BodyParserError {
  return (
    error instanceof Error &&
    "type" in error &&
    typeof error.type === "string" &&
    "status" in error &&
    typeof error.status === "number" &&
    error.status >= 400 &&
    error.status < 500
  );
}

function summarize(details: ValidationErrorDetail[]): string {
  return details.map((d) => `${d.field}: ${d.message}`).join(", ");
}

function buildBody(
  status: number,
  message: string,
  details: string,
  info: RequestInfo,
  validationErrors: ValidationErrorDetail[] | null = null,
): ErrorResponse {
  return {
    message,
    details,
    status,
    timestamp: new Date().toISOString(),
    correlationId: info.correlationId,
    path: info.path,
    validationErrors,
  };
}

/**
 * Classify an error and build the response for it.
 *
 * Anything that is not a TodoError or a body parsing failure becomes a
 * 500 whose body says nothing about the cause.
 */
export function mapError(error: unknown, info: RequestInfo): MappedError {
  if (TodoError.isTodoError(error)) {
    if (error.isValidationError) {
      const details = error.validationErrors ?? [];
      return {
        status: 400,
        errorType: "VALIDATION_ERROR",
        body: buildBody(
          400,
          "Validation failed",
          details.length > 0 ? summarize(details) : error.message,
          info,
          details,
        ),
      };
    }

    if (error.isNotFound) {
      return {
        status: 404,
        errorType: "ENTITY_NOT_FOUND",
        body: buildBody(
          404,
          error.message,
          "The requested todo does not exist",
          info,
        ),
      };
    }

    if (error.code === "MALFORMED_REQUEST") {
      const status = error.statusCode ?? 400;
      return {
        status,
        errorType: "MALFORMED_REQUEST",
        body: buildBody(
          status,
          error.message,
          "The request could not be parsed",
          info,
        ),
      };
    }
  }

  if (isBodyParserError(error)) {
    const message =
      error.type === "entity.parse.failed"
        ? "Malformed JSON request body"
        : error.message;
    return {
      status: error.status,
      errorType: "MALFORMED_REQUEST",
      body: buildBody(
        error.status,
        message,
        "The request could not be parsed",
        info,
      ),
    };
  }

  return {
    status: 500,
    errorType: "INTERNAL_ERROR",
    body: buildBody(
      500,
      "Internal server error",
      "An unexpected error occurred",
      info,
    ),
  };
}

/**
 * Express error middleware. The only place failures become HTTP responses.
 */
export const errorHandler: ErrorRequestHandler = (err, req, res, next) => {
  if (res.headersSent) {
    next(err);
    return;
  }

  const mapped = mapError(err, {
    path: req.originalUrl.split("?")[0] ?? req.originalUrl,
    correlationId: getRequestId(res),
  });

  if (mapped.status >= 500) {
    logger.error("Unhandled error", {
      path: mapped.body.path,
      correlationId: mapped.body.correlationId,
      error: err instanceof Error ? (err.stack ?? err.message) : String(err),
    });
  } else {
    logger.debug(`${mapped.errorType}: ${mapped.body.message}`, {
      path: mapped.body.path,
    });
  }

  res
    .status(mapped.status)
    .set("X-Correlation-ID", mapped.body.correlationId)
    .set("X-Error-Type", mapped.errorType);
  if (mapped.body.validationErrors) {
    res.set(
      "X-Validation-Error-Count",
      String(mapped.body.validationErrors.length),
    );
  }
  res.json(mapped.body);
};
