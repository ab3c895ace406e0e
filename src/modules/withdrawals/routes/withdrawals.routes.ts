import type { FastifyInstance } from "fastify";
import type { ContextOptions } from "../../../context.js";
import { MONEY_ROUTE_LIMITS } from "../../../middleware/rate-limit.js";
import { requireRole } from "../../../utils/rbac.js";
import { createWithdrawalController } from "../controllers/withdrawals.controller.js";

export async function withdrawalRoutes(app: FastifyInstance, { ctx }: ContextOptions) {
  const controller = createWithdrawalController(ctx);

  app.post(
    "/v1/withdrawals",
    { config: { rateLimit: MONEY_ROUTE_LIMITS.createWithdrawal }, preHandler: [app.authenticate] },
    async (request, reply) => {
      const withdrawal = await controller.create(request);
      return reply.status(201).send(withdrawal);
    },
  );

  app.get("/v1/withdrawals", { preHandler: [app.authenticate] }, controller.list);

  app.get("/v1/withdrawals/:id", { preHandler: [app.authenticate] }, controller.getById);

  app.post(
    "/v1/admin/withdrawals/:id/notes",
    { preHandler: [app.authenticate, requireRole("admin")] },
    controller.addNote,
  );

  app.post(
    "/v1/admin/withdrawals/:id/:action",
    { preHandler: [app.authenticate, requireRole("admin")] },
    controller.process,
  );
}
