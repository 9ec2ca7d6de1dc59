// src/app/createApp.ts
/**
 * Assemble the Express app around an ApiRouter:
 *   httpLogger → ApiRouter.serve (CORS gate → pre-route middleware → routes)
 *   → 404 envelope → error envelope.
 */

import express, { type Express } from "express";
import type { ApiRouter } from "../http/ApiRouter";
import { makeHttpLogger } from "../middleware/httpLogger";
import { errorEnvelope, notFoundEnvelope } from "../middleware/problemJson";

export type CreateAppOptions = {
  router: ApiRouter;
  serviceName: string;
  /** Off in tests that assert on log calls without pino-http's child logger. */
  httpLogging?: boolean;
};

export function createApp(opts: CreateAppOptions): Express {
  const app = express();
  app.disable("x-powered-by");

  if (opts.httpLogging ?? true) {
    app.use(makeHttpLogger(opts.serviceName));
  }

  app.use(opts.router.serve);
  app.use(notFoundEnvelope());
  app.use(errorEnvelope());

  return app;
}
