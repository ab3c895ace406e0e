import type { FastifyInstance } from "fastify";
import type { ContextOptions } from "../../../context.js";
import { requireRole } from "../../../utils/rbac.js";
import { createPackageController } from "../controllers/packages.controller.js";

export async function packageRoutes(app: FastifyInstance, { ctx }: ContextOptions) {
  const controller = createPackageController(ctx);

  app.get("/v1/packages", { preHandler: [app.authenticate] }, controller.list);

  app.get("/v1/packages/categories", { preHandler: [app.authenticate] }, controller.categories);

  app.get("/v1/packages/:id", { preHandler: [app.authenticate] }, controller.getById);

  app.post(
    "/v1/admin/packages",
    { preHandler: [app.authenticate, requireRole("admin")] },
    async (request, reply) => {
      const pkg = await controller.create(request);
      return reply.status(201).send(pkg);
    },
  );

  app.patch(
    "/v1/admin/packages/:id/status",
    { preHandler: [app.authenticate, requireRole("admin")] },
    controller.setStatus,
  );
}
