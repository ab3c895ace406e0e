import crypto from "node:crypto";
import { z } from "zod";
import type {
  GatewayPaymentStatus,
  GatewaySession,
  GatewayStatus,
  InitializeInput,
  PaymentGateway,
  WebhookEvent,
} from "./payment-gateway.js";
import { toGatewayAmount } from "../utils/decimal.js";
import { GatewayUnavailableError, InvalidSignatureError } from "../utils/errors.js";

export interface PaystackOptions {
  baseUrl: string;
  secretKey?: string;
  webhookSecret?: string;
  timeoutMs: number;
}

const envelopeSchema = z.object({
  status: z.boolean(),
  message: z.string().default(""),
  data: z.unknown(),
});

const checkoutSchema = z.object({
  authorization_url: z.string(),
  access_code: z.string(),
  reference: z.string(),
});

const transactionSchema = z.object({
  id: z.union([z.number(), z.string()]).optional(),
  status: z.string(),
  reference: z.string(),
  amount: z.number().int().optional(),
  currency: z.string().optional(),
  gateway_response: z.string().nullish(),
});

const webhookSchema = z.object({
  event: z.string(),
  data: z
    .object({
      id: z.union([z.number(), z.string()]).optional(),
      reference: z.string().optional(),
      amount: z.number().int().optional(),
      gateway_response: z.string().nullish(),
    })
    .passthrough()
    .default({}),
});

const FAILED_STATUSES = new Set(["failed", "abandoned", "reversed"]);

function toStatus(raw: string): GatewayPaymentStatus {
  if (raw === "success") return "success";
  if (FAILED_STATUSES.has(raw)) return "failed";
  return "pending";
}

function describe(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export function verifyPaystackWebhookSignature(rawBody: string, signature: string, secret: string): boolean {
  const expected = Buffer.from(crypto.createHmac("sha512", secret).update(rawBody).digest("hex"));
  const given = Buffer.from(signature);
  if (expected.length !== given.length) return false;
  return crypto.timingSafeEqual(expected, given);
}

export function createPaystackGateway(options: PaystackOptions): PaymentGateway {
  function headers(): Record<string, string> {
    if (!options.secretKey) throw new GatewayUnavailableError("PAYSTACK_SECRET_KEY is not configured");
    return {
      Authorization: `Bearer ${options.secretKey}`,
      "Content-Type": "application/json",
    };
  }

  async function call(path: string, init: { method: "GET" | "POST"; body?: unknown }): Promise<unknown> {
    let res: Response;
    try {
      res = await fetch(`${options.baseUrl}${path}`, {
        method: init.method,
        headers: headers(),
        body: init.body === undefined ? undefined : JSON.stringify(init.body),
        signal: AbortSignal.timeout(options.timeoutMs),
      });
    } catch (error) {
      if (error instanceof GatewayUnavailableError) throw error;
      throw new GatewayUnavailableError(`Paystack request failed: ${describe(error)}`);
    }

    if (!res.ok) throw new GatewayUnavailableError(`Paystack responded with HTTP ${res.status}`);

    // the timeout signal still covers the body read
    let body: unknown;
    try {
      body = JSON.parse(await res.text());
    } catch (error) {
      throw new GatewayUnavailableError(`Paystack response could not be read: ${describe(error)}`);
    }

    const envelope = envelopeSchema.safeParse(body);
    if (!envelope.success) throw new GatewayUnavailableError("Paystack returned an unreadable response");
    if (!envelope.data.status) throw new GatewayUnavailableError(`Paystack error: ${envelope.data.message}`);
    return envelope.data.data;
  }

  return {
    async initialize(input: InitializeInput): Promise<GatewaySession> {
      const data = await call("/transaction/initialize", {
        method: "POST",
        body: {
          email: input.email,
          amount: toGatewayAmount(input.amount),
          reference: input.reference,
          callback_url: input.callbackUrl,
          metadata: input.metadata ?? {},
          currency: input.currency,
        },
      });
      const checkout = checkoutSchema.safeParse(data);
      if (!checkout.success) throw new GatewayUnavailableError("Paystack returned an incomplete checkout session");
      return {
        reference: checkout.data.reference,
        authorizationUrl: checkout.data.authorization_url,
        accessCode: checkout.data.access_code,
      };
    },

    async verify(reference: string): Promise<GatewayStatus> {
      const data = await call(`/transaction/verify/${encodeURIComponent(reference)}`, { method: "GET" });
      const tx = transactionSchema.safeParse(data);
      if (!tx.success) throw new GatewayUnavailableError("Paystack returned an incomplete transaction");
      return {
        status: toStatus(tx.data.status),
        reference: tx.data.reference,
        gatewayId: tx.data.id === undefined ? undefined : String(tx.data.id),
        amountMinor: tx.data.amount,
        currency: tx.data.currency,
        gatewayResponse: tx.data.gateway_response ?? undefined,
        raw: data,
      };
    },

    parseWebhook(rawBody: string, signature: string | undefined): WebhookEvent {
      const secret = options.webhookSecret ?? options.secretKey;
      if (!secret || !signature || !verifyPaystackWebhookSignature(rawBody, signature, secret)) {
        throw new InvalidSignatureError();
      }

      let body: unknown;
      try {
        body = JSON.parse(rawBody);
      } catch {
        return { event: "unparseable", raw: rawBody };
      }
      const parsed = webhookSchema.safeParse(body);
      if (!parsed.success) return { event: "unrecognized", raw: body };

      const { data } = parsed.data;
      return {
        event: parsed.data.event,
        reference: data.reference,
        gatewayId: data.id === undefined ? undefined : String(data.id),
        amountMinor: data.amount,
        gatewayResponse: data.gateway_response ?? undefined,
        raw: data,
      };
    },
  };
}
