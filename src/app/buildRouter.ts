// src/app/buildRouter.ts
import express from "express";
import { EnvConfig, type ConfigLookup } from "../config/ConfigLookup";
import { dataResponse } from "../contracts/apiResponse.contract";
import { ApiRouter } from "../http/ApiRouter";
import { writeResponse } from "../http/respond";
import { authenticate } from "../middleware/authenticate";
import { captureBody } from "../middleware/bodyContext";

/**
 * Router with the standard pre-route chain (JSON body → context, bearer
 * claims → context) and a health probe. Services register their own routes
 * on the result before the app starts serving.
 */
export function buildRouter(config: ConfigLookup = new EnvConfig()): ApiRouter {
  const router = new ApiRouter({ config });
  router.use(
    express.json({ limit: "2mb" }),
    captureBody(),
    authenticate({ config })
  );
  router.get("/health", (req, res) => {
    writeResponse(req, res, dataResponse({ ok: true }));
  });
  return router;
}
