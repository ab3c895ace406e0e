/**
 * Global limit: 200 req/min per client IP (`request.ip`, which honours
 * TRUST_PROXY). Money-moving endpoints carry tighter limits in their route
 * `config.rateLimit`.
 */

import type { FastifyInstance } from "fastify";
import rateLimit from "@fastify/rate-limit";

export const MONEY_ROUTE_LIMITS = {
  createInvestment: { max: 20, timeWindow: "1 minute" },
  initializePayment: { max: 10, timeWindow: "1 minute" },
  verifyPayment: { max: 30, timeWindow: "1 minute" },
  createWithdrawal: { max: 5, timeWindow: "1 minute" },
} as const;

export async function registerRateLimit(app: FastifyInstance): Promise<void> {
  await app.register(rateLimit, {
    global: true,
    max: 200,
    timeWindow: "1 minute",
    keyGenerator: (request) => request.ip,
    errorResponseBuilder: (_request, context) => ({
      statusCode: 429,
      error: `Rate limit exceeded. Retry after ${context.after}.`,
      code: "RATE_LIMITED",
    }),
  });

  app.log.debug("[rate-limit] registered (200 req/min global, tighter on money-moving routes)");
}
