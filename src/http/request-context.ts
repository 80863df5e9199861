/**
 * Per-request id and access logging.
 * @module http/request-context
 */

import { randomUUID } from "node:crypto";
import type { RequestHandler, Response } from "express";
import { getLogger } from "../logging/logger.js";

const logger = getLogger("http");

const REQUEST_ID_HEADER = "X-Request-ID";
const REQUEST_ID_PATTERN = /^[\w.-]{1,128}$/;

/**
 * Id of the current request, as set by requestContext().
 */
export function getRequestId(res: Response): string {
  const id: unknown = res.locals["requestId"];
  return typeof id === "string" ? id : randomUUID();
}

/**
 * Assign a request id (echoing a well-formed incoming X-Request-ID) and log
 * each request when its response finishes.
 */
export function requestContext(): RequestHandler {
  return (req, res, next) => {
    const incoming = req.get(REQUEST_ID_HEADER);
    const requestId =
      incoming && REQUEST_ID_PATTERN.test(incoming) ? incoming : randomUUID();

    res.locals["requestId"] = requestId;
    res.set(REQUEST_ID_HEADER, requestId);

    const started = process.hrtime.bigint();
    res.on("finish", () => {
      const durationMs = Number(process.hrtime.bigint() - started) / 1e6;
      logger.http(
        `${req.method} ${req.originalUrl} ${res.statusCode} ${durationMs.toFixed(1)}ms`,
        { requestId },
      );
    });

    next();
  };
}
