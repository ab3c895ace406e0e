import type { FastifyInstance } from "fastify";
import { afterEach, describe, it, expect } from "vitest";
import { buildApp } from "../../../app.js";
import { createTestContext } from "../../../__tests__/support/context.js";

let app: FastifyInstance | undefined;

afterEach(async () => {
  await app?.close();
  app = undefined;
});

async function setup() {
  const t = createTestContext();
  const built = await buildApp({ logger: false, context: (log) => ({ ...t.ctx, log }) });
  app = built.app;
  const user = t.store.seedUser();
  const pkg = t.store.seedPackage();
  const token = built.app.jwt.sign({ userId: user.id, role: "investor" });
  return { t, app: built.app, user, pkg, authorization: `Bearer ${token}` };
}

describe("/v1/investments", () => {
  it("requires authentication", async () => {
    const { app: server } = await setup();

    const res = await server.inject({ method: "GET", url: "/v1/investments" });

    expect(res.statusCode).toBe(401);
    expect(res.json()).toMatchObject({ error: "Unauthorized", code: "AUTH_FAILED" });
  });

  it("demands a CSRF token from cookie clients", async () => {
    const { app: server, pkg } = await setup();

    const res = await server.inject({ method: "POST", url: "/v1/investments", payload: { packageId: pkg.id, amount: 100 } });

    expect(res.statusCode).toBe(403);
    expect(res.json()).toMatchObject({ error: "CSRF token missing" });
  });

  it("rejects a CSRF header whose encoded length differs from the cookie", async () => {
    const { app: server, pkg } = await setup();

    const res = await server.inject({
      method: "POST",
      url: "/v1/investments",
      headers: { "x-csrf-token": "\u00e9" },
      cookies: { harvest_csrf: "a" },
      payload: { packageId: pkg.id, amount: 100 },
    });

    expect(res.statusCode).toBe(403);
    expect(res.json()).toMatchObject({ error: "CSRF token mismatch" });
  });

  it("creates a pending investment with a normalized amount", async () => {
    const { t, app: server, user, pkg, authorization } = await setup();

    const res = await server.inject({
      method: "POST",
      url: "/v1/investments",
      headers: { authorization },
      payload: { packageId: pkg.id, amount: 100 },
    });

    expect(res.statusCode).toBe(201);
    expect(res.json()).toMatchObject({ userId: user.id, amount: "100.00", status: "pending", reservation: "none" });
    expect(t.store.tables.investments.size).toBe(1);
  });

  it("replays a repeated command id instead of creating twice", async () => {
    const { t, app: server, pkg, authorization } = await setup();
    const headers = { authorization, "idempotency-key": "cmd-1" };

    const first = await server.inject({
      method: "POST",
      url: "/v1/investments",
      headers,
      payload: { packageId: pkg.id, amount: "100" },
    });
    const second = await server.inject({
      method: "POST",
      url: "/v1/investments",
      headers,
      payload: { packageId: pkg.id, amount: "100" },
    });

    expect(second.statusCode).toBe(201);
    expect(second.json()).toEqual(first.json());
    expect(t.store.tables.investments.size).toBe(1);

    const changed = await server.inject({
      method: "POST",
      url: "/v1/investments",
      headers,
      payload: { packageId: pkg.id, amount: "200" },
    });
    expect(changed.statusCode).toBe(409);
    expect(changed.json()).toMatchObject({ code: "CONFLICT" });
  });

  it("answers 400 for a malformed body", async () => {
    const { app: server, authorization } = await setup();

    const res = await server.inject({
      method: "POST",
      url: "/v1/investments",
      headers: { authorization },
      payload: { packageId: "not-an-id", amount: "abc" },
    });

    expect(res.statusCode).toBe(400);
    expect(res.json()).toMatchObject({ error: "Validation failed", code: "VALIDATION_ERROR" });
  });
});

describe("admin routes", () => {
  it("are closed to investors", async () => {
    const { app: server, authorization } = await setup();

    const res = await server.inject({ method: "GET", url: "/v1/admin/investments/stats", headers: { authorization } });

    expect(res.statusCode).toBe(403);
  });

  it("report investment statistics to admins", async () => {
    const { t, app: server, user, pkg } = await setup();
    const admin = t.store.seedUser({ role: "admin" });
    t.store.seedInvestment({ userId: user.id, packageId: pkg.id, amount: "100.00" });
    const authorization = `Bearer ${server.jwt.sign({ userId: admin.id, role: "admin" })}`;

    const res = await server.inject({ method: "GET", url: "/v1/admin/investments/stats", headers: { authorization } });

    expect(res.statusCode).toBe(200);
    expect(res.json()).toMatchObject({ totalInvestments: 1, pendingInvestments: 1, totalAmount: "100.00" });
  });
});
