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
  const token = built.app.jwt.sign({ userId: user.id, role: "investor" });
  return { t, app: built.app, authorization: `Bearer ${token}` };
}

describe("POST /v1/withdrawals", () => {
  it("applies the tighter per-route limit", async () => {
    const { app: server, authorization } = await setup();

    const statuses: number[] = [];
    for (let i = 0; i < 6; i += 1) {
      const res = await server.inject({
        method: "POST",
        url: "/v1/withdrawals",
        headers: { authorization },
        payload: { type: "full" },
      });
      statuses.push(res.statusCode);
    }

    expect(statuses).toEqual([422, 422, 422, 422, 422, 429]);
  });

  it("keys the limit on the connection address, not a forwarded header", async () => {
    const { app: server, authorization } = await setup();

    let last = 0;
    for (let i = 0; i < 6; i += 1) {
      const res = await server.inject({
        method: "POST",
        url: "/v1/withdrawals",
        headers: { authorization, "x-forwarded-for": `10.0.0.${i + 1}` },
        payload: { type: "full" },
      });
      last = res.statusCode;
      if (i === 5) expect(res.json()).toMatchObject({ code: "RATE_LIMITED" });
    }

    expect(last).toBe(429);
  });
});
