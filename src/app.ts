import Fastify, { type FastifyBaseLogger, type FastifyInstance } from "fastify";
import cors from "@fastify/cors";
import swagger from "@fastify/swagger";
import swaggerUi from "@fastify/swagger-ui";
import helmet from "@fastify/helmet";
import { ZodError } from "zod";
import authPlugin from "./plugins/auth.js";
import { HttpError, type ErrorCode } from "./utils/errors.js";
import { registerApiRoutes } from "./routes/index.js";
import { registerRateLimit } from "./middleware/rate-limit.js";
import { registerRequestLogger } from "./middleware/request-logger.js";
import { csrfGuard, registerCsrfRoutes } from "./middleware/csrf.js";
import { env } from "./config/env.js";
import { createContext, type EngineContext } from "./context.js";

export interface BuildAppOptions {
  /** Builds the engine context from the app logger; defaults to MongoDB + Paystack. */
  context?: (log: FastifyBaseLogger) => EngineContext;
  logger?: boolean;
}

function readStatusCode(error: unknown): number | undefined {
  if (typeof error !== "object" || error === null || !("statusCode" in error)) return undefined;
  return typeof error.statusCode === "number" ? error.statusCode : undefined;
}

function readMessage(error: unknown): string {
  if (error instanceof Error) return error.message;
  if (typeof error === "object" && error !== null && "error" in error && typeof error.error === "string") {
    return error.error;
  }
  return "Request failed";
}

function codeFor(statusCode: number): ErrorCode {
  if (statusCode === 400) return "VALIDATION_ERROR";
  if (statusCode === 404) return "NOT_FOUND";
  if (statusCode === 429) return "RATE_LIMITED";
  return "INTERNAL";
}

export async function buildApp(options: BuildAppOptions = {}): Promise<{ app: FastifyInstance; ctx: EngineContext }> {
  const app = Fastify({
    trustProxy: env.TRUST_PROXY,
    logger: options.logger === false ? false : {
      level: env.NODE_ENV === "production" ? "info" : "debug",
    },
  });
  const ctx = (options.context ?? createContext)(app.log);

  await app.register(cors, {
    origin: env.ALLOWED_ORIGINS.split(",").map((o) => o.trim()),
    credentials: true,
  });

  await app.register(helmet, {
    contentSecurityPolicy: {
      directives: {
        defaultSrc: ["'self'"],
        scriptSrc: ["'self'"],
        styleSrc: ["'self'", "'unsafe-inline'"],
        imgSrc: ["'self'", "data:", "https:"],
        connectSrc: ["'self'"],
      },
    },
    frameguard: { action: "deny" },
    referrerPolicy: { policy: "strict-origin-when-cross-origin" },
  });

  await app.register(swagger, {
    openapi: {
      info: {
        title: "Harvest Invest API",
        version: "0.1.0",
        description: "Investment lifecycle, Paystack payment reconciliation and withdrawals",
      },
      servers: [{ url: "/", description: "Local" }],
      tags: [
        { name: "packages" },
        { name: "investments" },
        { name: "payments" },
        { name: "webhooks" },
        { name: "withdrawals" },
        { name: "ledger" },
      ],
    },
  });

  await app.register(swaggerUi, {
    routePrefix: "/docs",
  });

  await registerRateLimit(app);

  await app.register(authPlugin, { ctx });

  await registerRequestLogger(app);

  registerCsrfRoutes(app);
  app.addHook("preHandler", csrfGuard);

  app.setErrorHandler((error, _request, reply) => {
    if (error instanceof HttpError) {
      if (error.statusCode >= 500) app.log.warn({ err: error }, error.message);
      return reply.status(error.statusCode).send({
        error: error.message,
        code: error.code,
        details: error.details,
      });
    }

    if (error instanceof ZodError) {
      return reply.status(400).send({
        error: "Validation failed",
        code: "VALIDATION_ERROR",
        details: error.flatten(),
      });
    }

    const statusCode = readStatusCode(error);
    if (statusCode && statusCode >= 400 && statusCode < 500) {
      return reply.status(statusCode).send({
        error: readMessage(error),
        code: codeFor(statusCode),
      });
    }

    app.log.error(error);
    return reply.status(500).send({ error: "Internal Server Error", code: "INTERNAL" });
  });

  app.get("/health", async () => ({ ok: true }));

  await registerApiRoutes(app, ctx);

  return { app, ctx };
}
