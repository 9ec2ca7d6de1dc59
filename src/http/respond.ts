// src/http/respond.ts
import type { Request, Response } from "express";
import {
  errorResponse,
  isErrorEnvelope,
  type ApiResponse,
} from "../contracts/apiResponse.contract";
import { requestLogger } from "../utils/logger";
import { statusOf } from "./errors";

/**
 * Write an envelope as JSON. ERROR envelopes are logged once, with the
 * request path and user agent, before the body goes out.
 */
export function writeResponse(
  req: Request,
  res: Response,
  envelope: ApiResponse,
  httpStatus = 200
): void {
  if (isErrorEnvelope(envelope)) {
    requestLogger(req).error(
      {
        path: req.originalUrl,
        error: envelope.error,
        userAgent: req.get("user-agent") ?? "",
      },
      "error handling request"
    );
  }
  res.status(httpStatus).json(envelope);
}

export function writeError(req: Request, res: Response, err: Error): void {
  writeResponse(req, res, errorResponse(err), statusOf(err));
}
