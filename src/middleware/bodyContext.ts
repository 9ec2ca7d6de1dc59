// src/middleware/bodyContext.ts
import type { NextFunction, Request, Response } from "express";
import { REQUEST_BODY } from "../http/params";
import { contextOf, withContext } from "../http/RequestContext";

/** Same rule body parsers use: a body exists when framing headers say so. */
function hasBody(req: Request): boolean {
  return (
    req.headers["transfer-encoding"] !== undefined ||
    (req.headers["content-length"] !== undefined &&
      req.headers["content-length"] !== "0")
  );
}

/**
 * Bind the parsed body into the request context.
 * Mount after a body parser (express.json()); a request without a parsed
 * body (no framing headers, or nothing parsed) is left as is, so
 * requestBody() answers undefined.
 */
export function captureBody() {
  return (req: Request, _res: Response, next: NextFunction): void => {
    const body: unknown = req.body;
    if (body !== undefined && hasBody(req)) {
      withContext(req, contextOf(req).withValue(REQUEST_BODY, body));
    }
    next();
  };
}
