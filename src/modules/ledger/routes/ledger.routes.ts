import type { FastifyInstance } from "fastify";
import type { ContextOptions } from "../../../context.js";
import { createLedgerController } from "../controllers/ledger.controller.js";

export async function ledgerRoutes(app: FastifyInstance, { ctx }: ContextOptions) {
  const controller = createLedgerController(ctx);

  app.get("/v1/transactions", { preHandler: [app.authenticate] }, controller.list);
}
