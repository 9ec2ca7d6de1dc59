// src/middleware/authenticate.ts
/**
 * Purpose:
 * - Verify the bearer JWT and bind typed session claims into req.ctx.
 *
 * Outcomes:
 * - No Authorization header          → continue anonymous (public routes).
 * - Secret not configured            → 500 envelope.
 * - Bad signature / expired / string → 401 envelope.
 * - Verified but claims unusable     → continue anonymous (identity reads
 *                                      answer "" / []).
 * - Verified and parsed              → SESSION_CLAIMS bound, continue.
 */

import type { NextFunction, Request, RequestHandler, Response } from "express";
import jwt from "jsonwebtoken";
import { CONFIG_KEYS, type ConfigLookup } from "../config/ConfigLookup";
import { ApiError, unauthorized } from "../http/errors";
import { contextOf, withContext } from "../http/RequestContext";
import { writeError } from "../http/respond";
import {
  parseSessionClaims,
  withSessionClaims,
} from "../security/sessionClaims";
import { requestLogger } from "../utils/logger";

export type AuthenticateOptions = {
  config: ConfigLookup;
  /** Config key holding the HMAC secret. */
  secretKey?: string;
  algorithms?: jwt.Algorithm[];
};

/** Accepts "Bearer <jwt>" (any case); anything else is treated as absent. */
export function extractBearerToken(req: Request): string | undefined {
  const hAuth = req.get("authorization");
  if (!hAuth) return undefined;
  const m = /^bearer\s+(.+)$/i.exec(hAuth.trim());
  return m ? m[1].trim() : undefined;
}

export function authenticate(opts: AuthenticateOptions): RequestHandler {
  const secretKey = opts.secretKey ?? CONFIG_KEYS.jwtSecret;
  const algorithms = opts.algorithms ?? ["HS256"];

  return (req: Request, res: Response, next: NextFunction): void => {
    const token = extractBearerToken(req);
    if (!token) return next();

    const secret = opts.config.get(secretKey);
    if (!secret) {
      writeError(
        req,
        res,
        new ApiError(500, "MISCONFIGURED", `server misconfigured: ${secretKey} is not set`)
      );
      return;
    }

    let decoded: string | jwt.JwtPayload;
    try {
      decoded = jwt.verify(token, secret, { algorithms });
    } catch (err) {
      requestLogger(req).debug(
        { err: err instanceof Error ? err.message : String(err) },
        "authenticate: token rejected"
      );
      writeError(req, res, unauthorized("invalid or expired token"));
      return;
    }

    if (typeof decoded !== "object" || decoded === null) {
      writeError(req, res, unauthorized("invalid token payload"));
      return;
    }

    const claims = parseSessionClaims(decoded);
    if (!claims) {
      requestLogger(req).debug("authenticate: claims unusable; continuing anonymous");
      return next();
    }

    withContext(req, withSessionClaims(contextOf(req), claims));
    next();
  };
}
