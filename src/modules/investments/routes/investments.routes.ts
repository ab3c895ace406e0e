import type { FastifyInstance } from "fastify";
import type { ContextOptions } from "../../../context.js";
import { MONEY_ROUTE_LIMITS } from "../../../middleware/rate-limit.js";
import { requireRole } from "../../../utils/rbac.js";
import { createInvestmentController } from "../controllers/investments.controller.js";

export async function investmentRoutes(app: FastifyInstance, { ctx }: ContextOptions) {
  const controller = createInvestmentController(ctx);
  const admin = { preHandler: [app.authenticate, requireRole("admin")] };

  app.post(
    "/v1/investments",
    { config: { rateLimit: MONEY_ROUTE_LIMITS.createInvestment }, preHandler: [app.authenticate] },
    async (request, reply) => {
      const investment = await controller.create(request);
      return reply.status(201).send(investment);
    },
  );

  app.get("/v1/investments", { preHandler: [app.authenticate] }, controller.list);

  app.get("/v1/investments/withdrawable", { preHandler: [app.authenticate] }, controller.withdrawable);

  app.get("/v1/investments/summary", { preHandler: [app.authenticate] }, controller.summary);

  app.post("/v1/investments/purge-cancelled", { preHandler: [app.authenticate] }, controller.purgeCancelled);

  app.get("/v1/investments/:id", { preHandler: [app.authenticate] }, controller.getById);

  app.post("/v1/investments/:id/cancel", { preHandler: [app.authenticate] }, controller.cancel);

  app.post("/v1/investments/:id/complete", { preHandler: [app.authenticate] }, controller.complete);

  app.post("/v1/investments/:id/mature", { preHandler: [app.authenticate] }, controller.mature);

  app.get("/v1/admin/investments/stats", admin, controller.stats);

  app.post("/v1/admin/investments/:id/force-approve", admin, controller.forceApprove);

  app.post("/v1/admin/investments/:id/reject", admin, controller.reject);
}
