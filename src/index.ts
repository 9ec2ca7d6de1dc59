// src/index.ts
export {
  ApiRouter,
  CORS_ALLOW_HEADERS,
  CORS_ALLOW_METHODS,
  isOriginAllowed,
  parseOriginList,
} from "./http/ApiRouter";
export type { ApiRouterOptions, OriginMatch, PreflightMode } from "./http/ApiRouter";
export { wrapHandler, injectRouteParams } from "./http/wrapHandler";
export type { ApiHandler } from "./http/wrapHandler";
export { RequestContext, ContextKey, contextOf, withContext } from "./http/RequestContext";
export { RouteParams } from "./http/RouteParams";
export type { RouteParam } from "./http/RouteParams";
export {
  paramByName,
  queryParamByName,
  queryParamsByName,
  requestBody,
  ROUTE_PARAMS,
  REQUEST_BODY,
} from "./http/params";
export { writeResponse, writeError } from "./http/respond";
export {
  ApiError,
  RouteContractError,
  forbidden,
  unauthorized,
  notFound,
  missingRequiredData,
  notRecognized,
  isApiError,
  statusOf,
} from "./http/errors";
export {
  ApiResponseSchema,
  dataResponse,
  stringErrorResponse,
  errorResponse,
  isErrorEnvelope,
} from "./contracts/apiResponse.contract";
export type { ApiResponse, OkEnvelope, ErrorEnvelope } from "./contracts/apiResponse.contract";
export {
  sessionClaims,
  sessionUserId,
  userRoles,
  hasRole,
  isResourceOwner,
  authorize,
  ownerOnly,
} from "./security/session";
export { SESSION_CLAIMS, parseSessionClaims, withSessionClaims } from "./security/sessionClaims";
export type { SessionClaims } from "./security/sessionClaims";
export { authenticate, extractBearerToken } from "./middleware/authenticate";
export { captureBody } from "./middleware/bodyContext";
export { notFoundEnvelope, errorEnvelope } from "./middleware/problemJson";
export { makeHttpLogger } from "./middleware/httpLogger";
export { EnvConfig, StaticConfig, CONFIG_KEYS, toEnvKey } from "./config/ConfigLookup";
export type { ConfigLookup } from "./config/ConfigLookup";
export { createApp } from "./app/createApp";
export { buildRouter } from "./app/buildRouter";
