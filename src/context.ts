import type { FastifyBaseLogger } from "fastify";
import { env } from "./config/env.js";
import { createMongoStore } from "./db/mongo-store.js";
import type { Store } from "./db/store.js";
import { createInventoryAllocator, type InventoryAllocator } from "./services/inventory.js";
import type { PaymentGateway } from "./services/payment-gateway.js";
import { createPaystackGateway } from "./services/paystack.js";

export interface EngineConfig {
  currency: string;
  paystackEnabled: boolean;
  callbackUrl?: string;
}

/** Collaborators shared by every route, service and worker. */
export interface EngineContext {
  store: Store;
  gateway: PaymentGateway;
  inventory: InventoryAllocator;
  config: EngineConfig;
  log: FastifyBaseLogger;
  now: () => Date;
}

/** Plugin options every route registrar receives. */
export interface ContextOptions {
  ctx: EngineContext;
}

export function createContext(log: FastifyBaseLogger): EngineContext {
  return {
    store: createMongoStore(),
    gateway: createPaystackGateway({
      baseUrl: env.PAYSTACK_BASE_URL,
      secretKey: env.PAYSTACK_SECRET_KEY,
      webhookSecret: env.PAYSTACK_WEBHOOK_SECRET,
      timeoutMs: env.PAYSTACK_TIMEOUT_MS,
    }),
    inventory: createInventoryAllocator(env.RESERVATION_POLICY),
    config: {
      currency: env.CURRENCY,
      paystackEnabled: env.PAYSTACK_ENABLED,
      callbackUrl: env.PAYSTACK_CALLBACK_URL,
    },
    log,
    now: () => new Date(),
  };
}
