// src/security/session.ts
/**
 * Purpose:
 * - Identity/authorization reads over the session claims bound by
 *   authenticate().
 *
 * Invariants:
 * - No claims bound → "" / [] (public routes ask too; never throws).
 * - authorize() reports the outcome. When it returns false the Forbidden
 *   envelope is already written and the caller must return without writing.
 */

import type { NextFunction, Request, Response } from "express";
import { forbidden } from "../http/errors";
import { paramByName } from "../http/params";
import { contextOf } from "../http/RequestContext";
import { writeError } from "../http/respond";
import type { ApiHandler } from "../http/wrapHandler";
import { SESSION_CLAIMS, type SessionClaims } from "./sessionClaims";

/** Route parameter naming the resource owner. */
export const OWNER_PARAM = "uid";

export function sessionClaims(req: Request): SessionClaims | undefined {
  return contextOf(req).value(SESSION_CLAIMS);
}

export function sessionUserId(req: Request): string {
  return sessionClaims(req)?.uid ?? "";
}

export function userRoles(req: Request): string[] {
  return [...(sessionClaims(req)?.roles ?? [])];
}

export function hasRole(req: Request, role: string): boolean {
  return userRoles(req).includes(role);
}

/**
 * Session user owns the resource named by the `uid` route param.
 * An anonymous session owns nothing, even when the param is empty.
 */
export function isResourceOwner(req: Request): boolean {
  const sid = sessionUserId(req);
  return sid !== "" && sid === paramByName(OWNER_PARAM, req);
}

export function authorize(req: Request, res: Response): boolean {
  if (isResourceOwner(req)) return true;
  writeError(req, res, forbidden());
  return false;
}

/**
 * Route-handler form: the inner handler only runs for the resource owner.
 * Register through ApiRouter so route params are already bound.
 */
export function ownerOnly(handler: ApiHandler): ApiHandler {
  return (req: Request, res: Response, next: NextFunction) => {
    if (!authorize(req, res)) return;
    return handler(req, res, next);
  };
}
