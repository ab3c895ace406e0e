import crypto from "node:crypto";
import type { FastifyInstance, FastifyRequest, FastifyReply } from "fastify";
import { env } from "../config/env.js";
import { HttpError } from "../utils/errors.js";

const CSRF_HEADER = "x-csrf-token";
const CSRF_COOKIE = "harvest_csrf";
const MUTATING_METHODS = new Set(["POST", "PUT", "DELETE", "PATCH"]);

// Webhooks carry their own signature
const CSRF_EXEMPT_PATHS = ["/v1/webhooks/", "/health"];

function generateCsrfToken(): string {
  return crypto.randomBytes(32).toString("hex");
}

export function registerCsrfRoutes(app: FastifyInstance) {
  app.get("/v1/auth/csrf-token", async (_request: FastifyRequest, reply: FastifyReply) => {
    const token = generateCsrfToken();
    reply.setCookie(CSRF_COOKIE, token, {
      httpOnly: true,
      secure: env.NODE_ENV === "production",
      sameSite: "strict",
      path: "/",
      maxAge: 8 * 60 * 60,
    });
    return { csrfToken: token };
  });
}

export async function csrfGuard(request: FastifyRequest, _reply: FastifyReply) {
  if (!MUTATING_METHODS.has(request.method)) return;

  const isExempt = CSRF_EXEMPT_PATHS.some((p) => request.url.startsWith(p));
  if (isExempt) return;

  // Bearer clients are not exposed to cross-site cookie replay
  if (request.headers.authorization?.startsWith("Bearer ")) return;

  const rawHeader = request.headers[CSRF_HEADER];
  const headerToken = Array.isArray(rawHeader) ? rawHeader[0] : rawHeader;
  const cookieToken = request.cookies[CSRF_COOKIE];

  if (!headerToken || !cookieToken) {
    throw new HttpError(403, "CSRF token missing");
  }

  const a = Buffer.from(headerToken);
  const b = Buffer.from(cookieToken);
  if (a.length !== b.length || !crypto.timingSafeEqual(a, b)) {
    throw new HttpError(403, "CSRF token mismatch");
  }
}
