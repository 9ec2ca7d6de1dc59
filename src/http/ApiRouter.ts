// src/http/ApiRouter.ts
/**
 * Purpose:
 * - Single entry point for API traffic: CORS decision first, then dispatch
 *   into an express.Router() whose handlers are wrapped by wrapHandler().
 *
 * Order (per request):
 *   origin check (cors) → CORS headers → router dispatch
 *   Nothing is matched or invoked before the origin check has passed.
 *
 * Notes:
 * - The allow-list is read from ConfigLookup on every request so that a
 *   config change needs no restart.
 * - Preflight: by default the request is still dispatched, so a registered
 *   OPTIONS handler answers it with its own status and body. A preflight no
 *   route answers is ended with the CORS headers alone.
 *   `preflight: "terminate"` answers 204 without dispatching.
 * - Routes are registered before the first request; the table is sealed after.
 */

import cors from "cors";
import express, {
  type NextFunction,
  type Request,
  type RequestHandler,
  type Response,
  type Router,
} from "express";
import { CONFIG_KEYS, type ConfigLookup } from "../config/ConfigLookup";
import { requestLogger } from "../utils/logger";
import { forbidden } from "./errors";
import { RequestContext, withContext } from "./RequestContext";
import { writeError } from "./respond";
import { wrapHandler, type ApiHandler } from "./wrapHandler";

export const CORS_ALLOW_METHODS = "POST, GET, OPTIONS, PUT, DELETE";
export const CORS_ALLOW_HEADERS =
  "Accept, Content-Type, Content-Length, Accept-Encoding, X-CSRF-Token, Authorization, X-Requested-With, X-App-Source, X-Request-Id";

export type PreflightMode = "dispatch" | "terminate";

/**
 * substring: the origin appears anywhere in the raw list value.
 * exact:     the origin equals one comma-separated entry.
 */
export type OriginMatch = "substring" | "exact";

export type ApiRouterOptions = {
  config: ConfigLookup;
  /** Config key holding the comma-separated origin allow-list. */
  corsKey?: string;
  preflight?: PreflightMode;
  originMatch?: OriginMatch;
  /** Seeds req.ctx for requests that arrive without a context. */
  baseContext?: RequestContext;
};

export function parseOriginList(list: string | undefined): string[] {
  return String(list ?? "")
    .split(",")
    .map((s) => s.trim())
    .filter(Boolean);
}

export function isOriginAllowed(
  origin: string,
  list: string | undefined,
  match: OriginMatch = "substring"
): boolean {
  if (match === "exact") return parseOriginList(list).includes(origin);
  return origin !== "" && (list ?? "").includes(origin);
}

export class ApiRouter {
  readonly #router: Router = express.Router();
  readonly #config: ConfigLookup;
  readonly #corsKey: string;
  readonly #originMatch: OriginMatch;
  readonly #baseContext: RequestContext | undefined;
  readonly #cors: ReturnType<typeof cors>;
  #sealed = false;

  constructor(opts: ApiRouterOptions) {
    this.#config = opts.config;
    this.#corsKey = opts.corsKey ?? CONFIG_KEYS.corsAllowedList;
    this.#originMatch = opts.originMatch ?? "substring";
    this.#baseContext = opts.baseContext;

    this.#cors = cors({
      origin: (origin, cb) => {
        if (!origin) return cb(null, "*");
        const list = this.#config.get(this.#corsKey);
        if (isOriginAllowed(origin, list, this.#originMatch)) return cb(null, true);
        cb(forbidden());
      },
      credentials: true,
      methods: CORS_ALLOW_METHODS,
      allowedHeaders: CORS_ALLOW_HEADERS,
      preflightContinue: (opts.preflight ?? "dispatch") === "dispatch",
      optionsSuccessStatus: 204,
    });
  }

  // ──────────────────────────────────────────────────────────────────────────
  // Registration
  // ──────────────────────────────────────────────────────────────────────────

  get(path: string, handler: ApiHandler): this {
    this.#assertOpen("GET", path);
    this.#router.get(path, wrapHandler(handler));
    return this;
  }

  post(path: string, handler: ApiHandler): this {
    this.#assertOpen("POST", path);
    this.#router.post(path, wrapHandler(handler));
    return this;
  }

  put(path: string, handler: ApiHandler): this {
    this.#assertOpen("PUT", path);
    this.#router.put(path, wrapHandler(handler));
    return this;
  }

  delete(path: string, handler: ApiHandler): this {
    this.#assertOpen("DELETE", path);
    this.#router.delete(path, wrapHandler(handler));
    return this;
  }

  options(path: string, handler: ApiHandler): this {
    this.#assertOpen("OPTIONS", path);
    this.#router.options(path, wrapHandler(handler));
    return this;
  }

  /** Middleware that runs after the gate and before route matching. */
  use(...handlers: RequestHandler[]): this {
    this.#assertOpen("USE", "*");
    this.#router.use(...handlers);
    return this;
  }

  #assertOpen(method: string, path: string): void {
    if (this.#sealed) {
      throw new Error(
        `ApiRouter: cannot register ${method} ${path} after the router started serving`
      );
    }
  }

  // ──────────────────────────────────────────────────────────────────────────
  // Entry gate
  // ──────────────────────────────────────────────────────────────────────────

  readonly serve: RequestHandler = (
    req: Request,
    res: Response,
    next: NextFunction
  ): void => {
    this.#sealed = true;

    // Rejected origins come back as an error before any CORS header is set.
    this.#cors(req, res, (err?: unknown) => {
      if (err) {
        writeError(req, res, err instanceof Error ? err : forbidden());
        return;
      }

      // cors only advertises these on preflight; every response carries them.
      if (req.method !== "OPTIONS") {
        res.setHeader("Access-Control-Allow-Methods", CORS_ALLOW_METHODS);
        res.setHeader("Access-Control-Allow-Headers", CORS_ALLOW_HEADERS);
      }

      if (!req.ctx && this.#baseContext) withContext(req, this.#baseContext);

      this.#router(req, res, (routeErr?: unknown) => {
        this.#afterDispatch(routeErr, req, res, next);
      });
    });
  };

  #afterDispatch(
    err: unknown,
    req: Request,
    res: Response,
    next: NextFunction
  ): void {
    const failure = err === "router" || err === "route" ? undefined : err;

    // A handler started writing, then failed: nothing downstream can answer.
    if (res.headersSent) {
      if (failure) {
        requestLogger(req).warn(
          { path: req.originalUrl, err: failure },
          "error after response headers were sent"
        );
      }
      if (!res.writableEnded) res.end();
      return;
    }

    if (failure) return next(failure);

    // Unanswered preflight: the CORS headers are the whole answer.
    if (req.method === "OPTIONS") {
      res.status(200).end();
      return;
    }

    next();
  }
}
