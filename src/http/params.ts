// src/http/params.ts
import type { Request } from "express";
import { ContextKey, contextOf } from "./RequestContext";
import { RouteContractError } from "./errors";
import { RouteParams } from "./RouteParams";

export const ROUTE_PARAMS = new ContextKey<RouteParams>("route.params");
export const REQUEST_BODY = new ContextKey<unknown>("request.body");

/**
 * Path parameter bound by the handler wrapper.
 * Throws when the request never went through a parameterised route.
 */
export function paramByName(name: string, req: Request): string {
  const params = contextOf(req).value(ROUTE_PARAMS);
  if (!params) {
    throw new RouteContractError(
      `route params not attached (looking up "${name}" on ${req.method} ${req.originalUrl})`
    );
  }
  return params.byName(name);
}

function searchParams(req: Request): URLSearchParams {
  const q = req.originalUrl.indexOf("?");
  return new URLSearchParams(q === -1 ? "" : req.originalUrl.slice(q + 1));
}

/** First value of a query parameter, "" when absent. */
export function queryParamByName(name: string, req: Request): string {
  return searchParams(req).get(name) ?? "";
}

/** Every value of a query parameter, [] when absent. */
export function queryParamsByName(name: string, req: Request): string[] {
  return searchParams(req).getAll(name);
}

/** Body bound by the body-capture middleware; undefined when none was. */
export function requestBody(req: Request): unknown {
  return contextOf(req).value(REQUEST_BODY);
}
