// src/middleware/problemJson.ts

/**
 * Tail middleware: every unanswered or failed request ends in an error
 * envelope. Mount after the ApiRouter gate.
 *
 * Notes:
 * - Status comes from ApiError; anything else is a 500.
 * - 5xx detail is replaced with a generic text so internals do not leak;
 *   the original error is logged with the request context.
 */

import type { NextFunction, Request, Response } from "express";
import { isApiError, notFound, statusOf } from "../http/errors";
import { writeResponse } from "../http/respond";
import { stringErrorResponse } from "../contracts/apiResponse.contract";
import { extractLogContext, requestLogger } from "../utils/logger";

export function notFoundEnvelope() {
  return (req: Request, res: Response): void => {
    writeResponse(req, res, stringErrorResponse(notFound().message), 404);
  };
}

export function errorEnvelope() {
  return (err: unknown, req: Request, res: Response, next: NextFunction): void => {
    if (res.headersSent) return next(err);

    const status = statusOf(err);
    if (status >= 500) {
      requestLogger(req).error(
        {
          ...extractLogContext(req),
          err: err instanceof Error ? { name: err.name, message: err.message, stack: err.stack } : String(err),
        },
        "unhandled error"
      );
    }

    const text =
      isApiError(err) && status < 500 ? err.message : "internal server error";
    writeResponse(req, res, stringErrorResponse(text), status);
  };
}
