import dotenv from "dotenv";
import { z } from "zod";

dotenv.config();

const emptyToUndefined = <T>(schema: z.ZodType<T>) =>
  z.preprocess((value) => {
    if (typeof value === "string" && value.trim().length === 0)
      return undefined;
    return value;
  }, schema);

// z.coerce.boolean() turns the string "false" into true
const flag = (fallback: boolean) =>
  z
    .enum(["true", "false", "1", "0"])
    .optional()
    .transform((value) => (value === undefined ? fallback : value === "true" || value === "1"));

export const reservationPolicies = ["on_payment", "on_create"] as const;
export type ReservationPolicy = (typeof reservationPolicies)[number];

const schema = z.object({
  NODE_ENV: z
    .enum(["development", "test", "production"])
    .default("development"),
  PORT: z.coerce.number().default(4000),
  MONGODB_URI: z.string().min(1),
  MONGODB_DB_NAME: z.string().default("harvest"),
  ALLOWED_ORIGINS: z.string().min(1),
  // set behind a reverse proxy so request.ip reads X-Forwarded-For
  TRUST_PROXY: flag(false),
  JWT_SECRET: z.string().min(32),
  PAYSTACK_ENABLED: flag(false),
  PAYSTACK_BASE_URL: z.string().url().default("https://api.paystack.co"),
  PAYSTACK_SECRET_KEY: emptyToUndefined(z.string().min(8).optional()),
  PAYSTACK_WEBHOOK_SECRET: emptyToUndefined(z.string().min(8).optional()),
  PAYSTACK_CALLBACK_URL: emptyToUndefined(z.string().url().optional()),
  PAYSTACK_TIMEOUT_MS: z.coerce.number().int().positive().default(10000),
  CURRENCY: z.string().min(3).max(5).default("NGN"),
  RESERVATION_POLICY: z.enum(reservationPolicies).default("on_payment"),
  TRANSACTION_TIMEOUT_MS: z.coerce.number().int().positive().default(5000),
  MATURITY_WORKER_ENABLED: flag(true),
  MATURITY_WORKER_INTERVAL_MS: z.coerce
    .number()
    .int()
    .positive()
    .default(60 * 60 * 1000),
  MATURITY_WORKER_BATCH_LIMIT: z.coerce
    .number()
    .int()
    .positive()
    .max(500)
    .default(100),
});

const parsed = schema.safeParse(process.env);
if (!parsed.success) {
  console.error(parsed.error.flatten().fieldErrors);
  throw new Error("Invalid environment configuration");
}

export const env = parsed.data;
export type Env = typeof env;
