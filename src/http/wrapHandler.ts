// src/http/wrapHandler.ts
/**
 * Purpose:
 * - Adapt an ApiHandler (no parameter argument) to the router, moving the
 *   router-extracted path params into the request context.
 *
 * Invariants:
 * - No params extracted → request passes through untouched.
 * - Params extracted → req.ctx is replaced by a derived context; bindings
 *   already present upstream (body, claims) stay visible.
 * - Async rejections go to next(err), never unhandled.
 */

import type { NextFunction, Request, RequestHandler, Response } from "express";
import { contextOf, withContext } from "./RequestContext";
import { RouteParams } from "./RouteParams";
import { ROUTE_PARAMS } from "./params";

export type ApiHandler = (
  req: Request,
  res: Response,
  next: NextFunction
) => void | Promise<void>;

export function injectRouteParams(req: Request): Request {
  const params = RouteParams.fromRecord(req.params);
  if (params.size === 0) return req;
  return withContext(req, contextOf(req).withValue(ROUTE_PARAMS, params));
}

export function wrapHandler(handler: ApiHandler): RequestHandler {
  return (req: Request, res: Response, next: NextFunction): void => {
    const scoped = injectRouteParams(req);
    Promise.resolve(handler(scoped, res, next)).catch(next);
  };
}
