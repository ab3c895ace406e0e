import type { FastifyInstance, FastifyRequest } from "fastify";
import type { ContextOptions } from "../../../context.js";
import { handlePaymentEvent, type PaymentEvent } from "../../payments/services/payment-events.js";

const EVENT_KINDS: Record<string, PaymentEvent["kind"]> = {
  "charge.success": "confirmed",
  "charge.failed": "failed",
};

export async function paystackWebhookRoutes(app: FastifyInstance, { ctx }: ContextOptions) {
  // Keep the raw body for HMAC signature verification
  app.addContentTypeParser<string>("application/json", { parseAs: "string" }, (request, body, done) => {
    request.rawBody = body;
    done(null, body);
  });

  app.post("/v1/webhooks/paystack", async (request: FastifyRequest, reply) => {
    const signature = request.headers["x-paystack-signature"];
    // throws InvalidSignatureError before anything is read or written
    const event = ctx.gateway.parseWebhook(
      request.rawBody ?? "",
      typeof signature === "string" ? signature : undefined,
    );

    if (!ctx.config.paystackEnabled) {
      return reply.status(200).send({ status: "ignored" });
    }

    const kind = Object.hasOwn(EVENT_KINDS, event.event) ? EVENT_KINDS[event.event] : undefined;
    if (!kind || !event.reference) {
      app.log.info({ event: event.event }, "Paystack webhook ignored");
      return reply.status(200).send({ status: "ignored" });
    }

    const result = await handlePaymentEvent(ctx, {
      kind,
      reference: event.reference,
      source: "webhook",
      gatewayId: event.gatewayId,
      amountMinor: event.amountMinor,
      gatewayResponse: event.gatewayResponse,
      raw: event.raw,
    });

    if (result.outcome !== "applied") {
      app.log.info({ reference: event.reference, outcome: result.outcome }, "Paystack webhook not applied");
      return reply.status(200).send({ status: "ignored" });
    }
    return reply.status(200).send({ status: "success" });
  });
}
