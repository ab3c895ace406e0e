import type { FastifyInstance } from "fastify";
import type { ContextOptions } from "../../../context.js";
import { MONEY_ROUTE_LIMITS } from "../../../middleware/rate-limit.js";
import { createPaymentController } from "../controllers/payments.controller.js";

export async function paymentRoutes(app: FastifyInstance, { ctx }: ContextOptions) {
  const controller = createPaymentController(ctx);

  app.post(
    "/v1/investments/:id/payments",
    { config: { rateLimit: MONEY_ROUTE_LIMITS.initializePayment }, preHandler: [app.authenticate] },
    async (request, reply) => {
      const session = await controller.initialize(request);
      return reply.status(201).send(session);
    },
  );

  app.get("/v1/investments/:id/payment-status", { preHandler: [app.authenticate] }, controller.status);

  app.post(
    "/v1/payments/verify",
    { config: { rateLimit: MONEY_ROUTE_LIMITS.verifyPayment }, preHandler: [app.authenticate] },
    controller.verify,
  );

  app.get("/v1/payments", { preHandler: [app.authenticate] }, controller.list);
}
