import type { FastifyInstance } from "fastify";
import type { EngineContext } from "../context.js";
import { investmentRoutes } from "../modules/investments/index.js";
import { ledgerRoutes } from "../modules/ledger/index.js";
import { packageRoutes } from "../modules/packages/index.js";
import { paymentRoutes } from "../modules/payments/index.js";
import { paystackWebhookRoutes } from "../modules/webhooks/index.js";
import { withdrawalRoutes } from "../modules/withdrawals/index.js";

const ROUTE_REGISTRARS = [
  packageRoutes,
  investmentRoutes,
  paymentRoutes,
  paystackWebhookRoutes,
  withdrawalRoutes,
  ledgerRoutes,
] as const;

export async function registerApiRoutes(app: FastifyInstance, ctx: EngineContext) {
  for (const register of ROUTE_REGISTRARS) {
    await app.register(register, { ctx });
  }
}
