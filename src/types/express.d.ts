// src/types/express.d.ts

import type { RequestContext } from "../http/RequestContext";

/**
 * Global Express request augmentation.
 * - ctx: request-scoped context chain; replaced (never mutated) by the
 *   handler wrapper, body capture and authentication.
 */
declare global {
  namespace Express {
    interface Request {
      ctx?: RequestContext;
    }
  }
}

export {};
