// src/utils/logger.ts
import type { Request } from "express";
import pino, { type Logger, type LoggerOptions } from "pino";
import { readEnv } from "../env/EnvLoader";
import { contextOf } from "../http/RequestContext";
import { SESSION_CLAIMS } from "../security/sessionClaims";

// ─────────────────────────── Env (fail fast for required) ─────────────────────
const env = readEnv();

// ────────────────────────────── Pino (stdout only) ────────────────────────────
const pinoOptions: LoggerOptions = {
  level: env.LOG_LEVEL,
  base: { service: env.SERVICE_NAME },
  redact: {
    remove: true,
    paths: [
      "req.headers.authorization",
      "req.headers.cookie",
      "req.body.password",
      "req.body.token",
      "res.headers['set-cookie']",
    ],
  },
};

export const logger: Logger = pino(pinoOptions);

// ───────────────────────────── Request context helper ─────────────────────────
export function extractLogContext(req: Request): Record<string, unknown> {
  const hdrId = req.headers["x-request-id"];
  return {
    requestId: req.id ?? (typeof hdrId === "string" ? hdrId : null),
    method: req.method,
    path: req.originalUrl,
    userId: contextOf(req).value(SESSION_CLAIMS)?.uid ?? null,
    ip: req.ip,
  };
}

/** Per-request logger when pino-http is mounted, root logger otherwise. */
export function requestLogger(req: Request): Logger {
  return req.log ?? logger;
}
