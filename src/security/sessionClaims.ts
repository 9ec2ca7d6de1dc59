// src/security/sessionClaims.ts
/**
 * Purpose:
 * - Typed claims carrier for the session user, parsed once at the
 *   authentication boundary and bound into the request context.
 *
 * Invariants:
 * - Only a payload that parses is ever bound; readers never see a
 *   half-shaped claims object.
 * - `roles` is always an array (a lone role string is wrapped).
 * - `uid` is taken as issued; a padded uid is rejected, not trimmed.
 */

import { z } from "zod";
import { ContextKey, type RequestContext } from "../http/RequestContext";

const RolesClaim = z
  .union([z.string(), z.array(z.string())])
  .optional()
  .transform((r) => (r === undefined ? [] : typeof r === "string" ? [r] : r));

export const SessionClaimsSchema = z
  .object({
    uid: z
      .union([
        z
          .string()
          .min(1)
          .refine((v) => v.trim() === v, "uid must not carry surrounding whitespace"),
        z.number().int(),
      ])
      .transform((v) => String(v)),
    roles: RolesClaim,
  })
  .passthrough();

export type SessionClaims = {
  uid: string;
  roles: string[];
  /** The verified payload as received, for claims this module does not model. */
  raw: Readonly<Record<string, unknown>>;
};

export const SESSION_CLAIMS = new ContextKey<SessionClaims>("session.claims");

/** Parse a verified token payload; undefined when it lacks a usable shape. */
export function parseSessionClaims(payload: unknown): SessionClaims | undefined {
  const parsed = SessionClaimsSchema.safeParse(payload);
  if (!parsed.success) return undefined;
  const { uid, roles, ...rest } = parsed.data;
  return { uid, roles, raw: { ...rest, uid, roles } };
}

export function withSessionClaims(
  ctx: RequestContext,
  claims: SessionClaims
): RequestContext {
  return ctx.withValue(SESSION_CLAIMS, claims);
}
