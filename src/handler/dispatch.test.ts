import { describe, it, expect, beforeAll, afterAll } from "vitest";
import Fastify from "fastify";

import { ExperimentRequestSchema } from "../contracts/wire";
import { notFound } from "../serializer/http_error";
import {
  newCountResponse,
  newEmptyResponse,
  newResponse,
  newVersionResponse,
} from "../serializer/serializers";
import { HeaderIdentityResolver } from "../service/identity";
import { readJsonBody, toRouteHandler, urlParamInt, useRawBodies, withContext } from "./dispatch";

const makeApp = () => {
  const app = Fastify({ logger: false });
  const identity = new HeaderIdentityResolver();

  app.register(async (scoped) => {
    useRawBodies(scoped);

    scoped.get("/items/:itemId", toRouteHandler(async (req) => newCountResponse(urlParamInt(req, "itemId"))));
    scoped.get("/unnamed", toRouteHandler(async (req) => newCountResponse(urlParamInt(req, "itemId"))));
    scoped.get("/empty", toRouteHandler(async () => newEmptyResponse()));
    scoped.get("/nothing", toRouteHandler(async () => newResponse(null)));
    scoped.get("/boom", toRouteHandler(async () => {
      throw new Error("kaput");
    }));
    scoped.get("/gone", toRouteHandler(async () => {
      throw notFound("gone");
    }));
    scoped.get("/wrapped", toRouteHandler(() =>
      withContext("error loading", Promise.reject(new Error("timeout")))
    ));
    scoped.get("/whoami", toRouteHandler(async (req) => newCountResponse(identity.getUserId(req))));
    scoped.post("/echo", toRouteHandler(async (req) =>
      newVersionResponse(readJsonBody(req, ExperimentRequestSchema).name)
    ));
  });

  return app;
};

describe("dispatch", () => {
  const app = makeApp();

  beforeAll(async () => {
    await app.ready();
  });

  afterAll(async () => {
    await app.close();
  });

  it("parses signed integer path parameters", async () => {
    expect((await app.inject({ method: "GET", url: "/items/42" })).json()).toEqual({
      status: 200,
      data: { count: 42 },
    });
    expect((await app.inject({ method: "GET", url: "/items/-3" })).json().data.count).toBe(-3);
    expect((await app.inject({ method: "GET", url: "/items/+7" })).json().data.count).toBe(7);
  });

  it("rejects path parameters that are not integers", async () => {
    for (const raw of ["12a", "1.5", "0x10"]) {
      const response = await app.inject({ method: "GET", url: `/items/${raw}` });
      expect(response.statusCode).toBe(400);
      expect(response.json().errors[0].title).toBe(`wrong format in parameter itemId; received ${raw}`);
    }
  });

  it("rejects a missing path parameter", async () => {
    const response = await app.inject({ method: "GET", url: "/unnamed" });

    expect(response.statusCode).toBe(400);
    expect(response.json().errors[0].title).toBe("wrong format in parameter itemId; received nothing");
  });

  it("sends empty and no-content envelopes as a bare 204", async () => {
    for (const url of ["/empty", "/nothing"]) {
      const response = await app.inject({ method: "GET", url });
      expect(response.statusCode).toBe(204);
      expect(response.body).toBe("");
    }
  });

  it("turns untyped failures into a 500 envelope", async () => {
    const response = await app.inject({ method: "GET", url: "/boom" });

    expect(response.statusCode).toBe(500);
    expect(response.json()).toEqual({
      status: 500,
      errors: [{ status: 500, title: "kaput" }],
    });
  });

  it("keeps the status of typed failures", async () => {
    const response = await app.inject({ method: "GET", url: "/gone" });

    expect(response.statusCode).toBe(404);
    expect(response.json()).toEqual({
      status: 404,
      errors: [{ status: 404, title: "gone" }],
    });
  });

  it("wraps collaborator faults with their context", async () => {
    const response = await app.inject({ method: "GET", url: "/wrapped" });

    expect(response.statusCode).toBe(500);
    expect(response.json().errors[0].title).toBe("error loading: timeout");
  });

  it("resolves the caller from the user id header", async () => {
    const ok = await app.inject({ method: "GET", url: "/whoami", headers: { "x-user-id": "12" } });
    expect(ok.json()).toEqual({ status: 200, data: { count: 12 } });

    for (const headers of [{}, { "x-user-id": "0" }, { "x-user-id": "abc" }, { "x-user-id": "-4" }]) {
      const response = await app.inject({ method: "GET", url: "/whoami", headers });
      expect(response.statusCode).toBe(401);
      expect(response.json().errors[0].title).toBe("user is not authenticated");
    }
  });

  it("reads JSON bodies whatever the content type", async () => {
    const response = await app.inject({
      method: "POST",
      url: "/echo",
      headers: { "content-type": "text/plain" },
      payload: '{"name":"plain","extra":true}',
    });

    expect(response.statusCode).toBe(200);
    expect(response.json().data).toEqual({ version: "plain" });
  });

  it("reports malformed and empty bodies as bad requests", async () => {
    for (const payload of ["{", ""]) {
      const response = await app.inject({
        method: "POST",
        url: "/echo",
        headers: { "content-type": "application/json" },
        payload,
      });
      expect(response.statusCode).toBe(400);
      expect(response.json().errors[0].title).toBe("malformed request body");
      expect(typeof response.json().errors[0].details).toBe("string");
    }
  });

  it("reports schema violations with the issue path", async () => {
    const response = await app.inject({
      method: "POST",
      url: "/echo",
      payload: { name: "ok", description: false },
    });

    expect(response.statusCode).toBe(400);
    expect(response.json().errors).toEqual([
      {
        status: 400,
        title: "invalid request body",
        details: "description: Expected string, received boolean",
      },
    ]);
  });
});
