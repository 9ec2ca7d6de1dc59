// test/params.spec.ts
import express from "express";
import request from "supertest";
import { describe, it, expect } from "vitest";
import { dataResponse } from "../src/contracts/apiResponse.contract";
import { ApiRouter } from "../src/http/ApiRouter";
import {
  queryParamByName,
  queryParamsByName,
  requestBody,
} from "../src/http/params";
import { writeResponse } from "../src/http/respond";
import { captureBody } from "../src/middleware/bodyContext";
import { buildTestApp, testConfig } from "./helpers/app";

function appWithRoutes() {
  const router = new ApiRouter({ config: testConfig() });
  router.use(express.json(), captureBody());
  router.get("/search", (req, res) => {
    writeResponse(
      req,
      res,
      dataResponse({
        q: queryParamByName("q", req),
        tags: queryParamsByName("tag", req),
        missing: queryParamByName("nope", req),
        none: queryParamsByName("nope", req),
      })
    );
  });
  router.post("/echo", (req, res) => {
    writeResponse(req, res, dataResponse({ body: requestBody(req) ?? null }));
  });
  router.get("/echo", (req, res) => {
    writeResponse(req, res, dataResponse({ body: requestBody(req) ?? null }));
  });
  return buildTestApp(router);
}

describe("query accessors", () => {
  it("reads single and repeated values, '' and [] when absent", async () => {
    const res = await request(appWithRoutes())
      .get("/search?q=hello%20world&tag=a&tag=b")
      .expect(200);

    expect(res.body).toEqual({
      status: "OK",
      data: { q: "hello world", tags: ["a", "b"], missing: "", none: [] },
    });
  });

  it("works without any query string", async () => {
    const res = await request(appWithRoutes()).get("/search").expect(200);

    expect(res.body.data).toEqual({ q: "", tags: [], missing: "", none: [] });
  });
});

describe("requestBody", () => {
  it("returns the parsed JSON body bound upstream", async () => {
    const res = await request(appWithRoutes())
      .post("/echo")
      .send({ name: "ada", tags: ["x"] })
      .expect(200);

    expect(res.body).toEqual({
      status: "OK",
      data: { body: { name: "ada", tags: ["x"] } },
    });
  });

  it("is undefined when the request carried no body", async () => {
    const res = await request(appWithRoutes()).get("/echo").expect(200);

    expect(res.body).toEqual({ status: "OK", data: { body: null } });
  });
});
