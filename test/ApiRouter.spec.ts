// test/ApiRouter.spec.ts
import request from "supertest";
import { describe, it, expect, vi } from "vitest";
import { dataResponse } from "../src/contracts/apiResponse.contract";
import {
  ApiRouter,
  CORS_ALLOW_HEADERS,
  CORS_ALLOW_METHODS,
  isOriginAllowed,
  parseOriginList,
  type ApiRouterOptions,
} from "../src/http/ApiRouter";
import { forbidden } from "../src/http/errors";
import { paramByName } from "../src/http/params";
import { writeError, writeResponse } from "../src/http/respond";
import type { ApiHandler } from "../src/http/wrapHandler";
import {
  ADMIN_ORIGIN,
  APP_ORIGIN,
  buildTestApp,
  testConfig,
} from "./helpers/app";

function setup(opts: Omit<ApiRouterOptions, "config"> = {}) {
  const config = testConfig();
  const getItem = vi.fn<ApiHandler>((req, res) => {
    writeResponse(req, res, dataResponse({ id: paramByName("id", req) }));
  });
  const router = new ApiRouter({ config, ...opts });
  router.get("/items/:id", getItem);
  return { app: buildTestApp(router), router, config, getItem };
}

describe("origin list parsing", () => {
  it("splits on commas and trims entries", () => {
    expect(parseOriginList(" https://a.test ,https://b.test,, ")).toEqual([
      "https://a.test",
      "https://b.test",
    ]);
  });

  it("treats a missing list as empty", () => {
    expect(parseOriginList(undefined)).toEqual([]);
    expect(isOriginAllowed("https://a.test", undefined)).toBe(false);
  });

  it("matches anywhere in the list value by default", () => {
    const list = "https://app.example.test:8443,https://b.test";

    expect(isOriginAllowed("https://app.example.test", list)).toBe(true);
    expect(isOriginAllowed("https://b.test", list)).toBe(true);
    expect(isOriginAllowed("https://c.test", list)).toBe(false);
    expect(isOriginAllowed("", list)).toBe(false);
  });

  it("matches whole entries only in exact mode", () => {
    const list = "https://a.test.evil, https://b.test";

    expect(isOriginAllowed("https://a.test", list, "exact")).toBe(false);
    expect(isOriginAllowed("https://b.test", list, "exact")).toBe(true);
  });
});

describe("ApiRouter entry gate", () => {
  it("allows any origin when the request carries no Origin header", async () => {
    const { app, getItem } = setup();

    const res = await request(app).get("/items/42").expect(200);

    expect(res.headers["access-control-allow-origin"]).toBe("*");
    expect(res.headers["access-control-allow-credentials"]).toBe("true");
    expect(res.headers["access-control-allow-methods"]).toBe(CORS_ALLOW_METHODS);
    expect(res.headers["access-control-allow-headers"]).toBe(CORS_ALLOW_HEADERS);
    expect(res.body).toEqual({ status: "OK", data: { id: "42" } });
    expect(getItem).toHaveBeenCalledTimes(1);
  });

  it("echoes an allow-listed origin and dispatches", async () => {
    const { app, getItem } = setup();

    const res = await request(app)
      .get("/items/7")
      .set("Origin", ADMIN_ORIGIN)
      .expect(200);

    expect(res.headers["access-control-allow-origin"]).toBe(ADMIN_ORIGIN);
    expect(res.headers["access-control-allow-credentials"]).toBe("true");
    expect(res.body).toEqual({ status: "OK", data: { id: "7" } });
    expect(getItem).toHaveBeenCalledTimes(1);
  });

  it("rejects an unlisted origin with a Forbidden envelope and never dispatches", async () => {
    const { app, getItem } = setup();

    const res = await request(app)
      .get("/items/42")
      .set("Origin", "https://evil.example.test")
      .expect(403);

    expect(res.body).toEqual({ error: "forbidden", status: "ERROR" });
    expect(res.headers["access-control-allow-origin"]).toBeUndefined();
    expect(res.headers["access-control-allow-credentials"]).toBeUndefined();
    expect(getItem).not.toHaveBeenCalled();
  });

  it("accepts a fragment of the allow-list value by default", async () => {
    const { app } = setup();

    const res = await request(app)
      .get("/items/42")
      .set("Origin", "https://app.example")
      .expect(200);

    expect(res.headers["access-control-allow-origin"]).toBe("https://app.example");
  });

  it("does not accept a prefix of an allow-listed origin in exact mode", async () => {
    const { app, getItem } = setup({ originMatch: "exact" });

    const res = await request(app)
      .get("/items/42")
      .set("Origin", "https://app.example")
      .expect(403);

    expect(res.body).toEqual({ error: "forbidden", status: "ERROR" });
    expect(getItem).not.toHaveBeenCalled();
  });

  it("reads the allow-list on every request", async () => {
    const { app, config } = setup();
    const late = "https://late.example.test";

    await request(app).get("/items/1").set("Origin", late).expect(403);

    config.set("cors.allowed.list", `${APP_ORIGIN},${late}`);

    const res = await request(app).get("/items/1").set("Origin", late).expect(200);
    expect(res.headers["access-control-allow-origin"]).toBe(late);
  });

  it("answers unmatched paths with a not-found envelope after the CORS headers", async () => {
    const { app } = setup();

    const res = await request(app).get("/nope").expect(404);

    expect(res.body).toEqual({ error: "not found", status: "ERROR" });
    expect(res.headers["access-control-allow-origin"]).toBe("*");
  });

  it("refuses route registration once serving has started", async () => {
    const { app, router } = setup();

    await request(app).get("/items/1").expect(200);

    expect(() => router.get("/late", (_req, res) => void res.end())).toThrow(
      "ApiRouter: cannot register GET /late after the router started serving"
    );
  });
});

describe("ApiRouter preflight", () => {
  it("sets CORS headers and still dispatches by default", async () => {
    const { app, router, getItem } = setup();
    const preflight = vi.fn<ApiHandler>((_req, res) => {
      res.end();
    });
    router.options("/items/:id", preflight);

    const res = await request(app)
      .options("/items/9")
      .set("Origin", APP_ORIGIN)
      .expect(200);

    expect(res.headers["access-control-allow-origin"]).toBe(APP_ORIGIN);
    expect(res.headers["access-control-allow-methods"]).toBe(CORS_ALLOW_METHODS);
    expect(res.headers["access-control-allow-headers"]).toBe(CORS_ALLOW_HEADERS);
    expect(preflight).toHaveBeenCalledTimes(1);
    expect(getItem).not.toHaveBeenCalled();
  });

  it("delivers the envelope a dispatched OPTIONS handler writes", async () => {
    const { app, router } = setup();
    router.options("/items/:id", (req, res) => {
      writeResponse(req, res, dataResponse({ allow: "GET" }));
    });

    const res = await request(app)
      .options("/items/1")
      .set("Origin", APP_ORIGIN)
      .expect(200);

    expect(res.headers["access-control-allow-origin"]).toBe(APP_ORIGIN);
    expect(res.body).toEqual({ status: "OK", data: { allow: "GET" } });
  });

  it("keeps the status of an error a dispatched OPTIONS handler writes", async () => {
    const { app, router } = setup();
    router.options("/items/:id", (req, res) => {
      writeError(req, res, forbidden());
    });

    const res = await request(app).options("/items/1").expect(403);

    expect(res.headers["access-control-allow-origin"]).toBe("*");
    expect(res.body).toEqual({ error: "forbidden", status: "ERROR" });
  });

  it("lets the router answer a preflight for a path with other methods", async () => {
    const { app, getItem } = setup();

    const res = await request(app).options("/items/9").expect(200);

    expect(res.headers["access-control-allow-origin"]).toBe("*");
    expect(res.headers.allow).toBe("GET,HEAD");
    expect(getItem).not.toHaveBeenCalled();
  });

  it("ends a preflight no route answers with the CORS headers alone", async () => {
    const { app } = setup();

    const res = await request(app)
      .options("/nowhere")
      .set("Origin", ADMIN_ORIGIN)
      .expect(200);

    expect(res.headers["access-control-allow-origin"]).toBe(ADMIN_ORIGIN);
    expect(res.headers["access-control-allow-credentials"]).toBe("true");
    expect(res.text).toBe("");
  });

  it("answers 204 without dispatching in terminate mode", async () => {
    const { app, router } = setup({ preflight: "terminate" });
    const preflight = vi.fn<ApiHandler>((_req, res) => {
      res.end();
    });
    router.options("/items/:id", preflight);

    const res = await request(app)
      .options("/items/9")
      .set("Origin", APP_ORIGIN)
      .expect(204);

    expect(res.headers["access-control-allow-origin"]).toBe(APP_ORIGIN);
    expect(res.headers["access-control-allow-credentials"]).toBe("true");
    expect(preflight).not.toHaveBeenCalled();
  });

  it("still rejects a preflight from an unlisted origin", async () => {
    const { app } = setup();

    const res = await request(app)
      .options("/items/9")
      .set("Origin", "https://evil.example.test")
      .expect(403);

    expect(res.body).toEqual({ error: "forbidden", status: "ERROR" });
  });
});
