// src/contracts/apiResponse.contract.ts
/**
 * Purpose:
 * - Canonical response envelope for every API response.
 *
 * Wire shape:
 * - success: { "status": "OK", "data"?: <payload> }
 * - error:   { "error": "<text>", "status": "ERROR" }
 *
 * Invariants:
 * - Exactly one variant: an error envelope never carries data and a success
 *   envelope never carries error text.
 */

import { z } from "zod";

export const OkEnvelopeSchema = z
  .object({
    status: z.literal("OK"),
    data: z.unknown().optional(),
  })
  .strict();

export const ErrorEnvelopeSchema = z
  .object({
    error: z.string().min(1),
    status: z.literal("ERROR"),
  })
  .strict();

export const ApiResponseSchema = z.union([OkEnvelopeSchema, ErrorEnvelopeSchema]);

export type OkEnvelope<T = unknown> = { status: "OK"; data?: T };
export type ErrorEnvelope = { error: string; status: "ERROR" };
export type ApiResponse<T = unknown> = OkEnvelope<T> | ErrorEnvelope;

export function dataResponse<T>(data?: T): OkEnvelope<T> {
  return data === undefined ? { status: "OK" } : { status: "OK", data };
}

export function stringErrorResponse(error: string): ErrorEnvelope {
  return { error, status: "ERROR" };
}

export function errorResponse(err: Error): ErrorEnvelope {
  return stringErrorResponse(err.message);
}

export function isErrorEnvelope(res: ApiResponse): res is ErrorEnvelope {
  return res.status === "ERROR";
}
