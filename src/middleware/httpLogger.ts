// src/middleware/httpLogger.ts

/**
 * Structured request logging (telemetry only; never blocks a request).
 *
 * Notes:
 * - Severity mapping: 2xx/3xx=info, 4xx=warn, 5xx/error=error.
 * - Health/favicon probes are not logged.
 * - A caller-supplied x-request-id is reused; otherwise a UUID is minted.
 *   Either way it is echoed on the response.
 */

import { randomUUID } from "node:crypto";
import type { IncomingMessage, ServerResponse } from "node:http";
import pinoHttp from "pino-http";
import { logger as rootLogger } from "../utils/logger";

const QUIET_PATHS = new Set(["/health", "/healthz", "/readyz", "/favicon.ico"]);

function firstHeader(v: string | string[] | undefined): string | undefined {
  return Array.isArray(v) ? v[0] : v;
}

export function makeHttpLogger(serviceName: string) {
  const logger = rootLogger.child({ service: serviceName });

  return pinoHttp({
    logger,

    genReqId: (req: IncomingMessage, res: ServerResponse) => {
      const id =
        firstHeader(req.headers["x-request-id"])?.trim() ||
        firstHeader(req.headers["x-correlation-id"])?.trim() ||
        randomUUID();
      res.setHeader("x-request-id", id);
      return id;
    },

    customLogLevel: (
      _req: IncomingMessage,
      res: ServerResponse,
      err?: Error
    ) => {
      if (err) return "error";
      if (res.statusCode >= 500) return "error";
      if (res.statusCode >= 400) return "warn";
      return "info";
    },

    autoLogging: {
      ignore: (req: IncomingMessage) => QUIET_PATHS.has(req.url ?? ""),
    },

    serializers: {
      req(req: IncomingMessage) {
        return { id: req.id, method: req.method, url: req.url };
      },
      res(res: ServerResponse) {
        return { statusCode: res.statusCode };
      },
      err(err: Error) {
        return { type: err.name, msg: err.message };
      },
    },
  });
}
