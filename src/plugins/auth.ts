import fp from "fastify-plugin";
import jwt from "@fastify/jwt";
import cookie from "@fastify/cookie";
import type { FastifyInstance, FastifyReply, FastifyRequest } from "fastify";
import { z } from "zod";
import { env } from "../config/env.js";
import type { ContextOptions } from "../context.js";
import { roles } from "../utils/constants.js";
import { HttpError } from "../utils/errors.js";

export const AUTH_COOKIE_NAME = "harvest_token";

// Tokens are issued by the account service; this API only verifies them.
const tokenPayloadSchema = z.object({
  userId: z.string().min(1),
  role: z.enum(roles),
  iat: z.number().optional(),
});

async function authPlugin(app: FastifyInstance, { ctx }: ContextOptions) {
  await app.register(jwt, {
    secret: env.JWT_SECRET,
  });

  await app.register(cookie);

  app.decorate("authenticate", async function authenticate(request: FastifyRequest, _reply: FastifyReply) {
    try {
      // cookie first, then Authorization header
      const cookieToken = request.cookies[AUTH_COOKIE_NAME];
      const authHeader = request.headers.authorization;
      const headerToken = authHeader?.startsWith("Bearer ") ? authHeader.slice(7) : undefined;
      const token = cookieToken || headerToken;

      if (!token) {
        throw new HttpError(401, "Unauthorized");
      }

      const payload = tokenPayloadSchema.parse(app.jwt.verify<object>(token));

      const user = await ctx.store.users.findById(payload.userId);
      if (!user) {
        throw new HttpError(401, "Unauthorized");
      }
      if (user.status === "disabled") {
        throw new HttpError(403, "Account disabled");
      }
      if (user.tokenInvalidatedAt) {
        const issuedAt = payload.iat ?? 0;
        if (issuedAt < Math.floor(user.tokenInvalidatedAt.getTime() / 1000)) {
          throw new HttpError(401, "Session expired. Please log in again.");
        }
      }

      request.authUser = {
        userId: user.id,
        role: user.role,
      };
    } catch (err) {
      if (err instanceof HttpError) throw err;
      throw new HttpError(401, "Unauthorized");
    }
  });
}

export default fp(authPlugin, { name: "auth" });
