import type { EngineContext } from "../../../context.js";
import type { PaymentRecord } from "../../../db/store.js";
import type { AuthUser } from "../../../types.js";
import { appendEvent } from "../../../utils/audit.js";
import type { PaymentStatus } from "../../../utils/constants.js";
import {
  GatewayUnavailableError,
  InvalidTransitionError,
  NotFoundError,
  OutOfStockError,
} from "../../../utils/errors.js";
import { assertOwner } from "../../../utils/rbac.js";
import { handlePaymentEvent } from "./payment-events.js";

export function paymentReference(investmentId: string, at: Date) {
  return `INV_${investmentId}_${at.getTime()}`;
}

/**
 * Opens a checkout session with the gateway. The payment row is written only
 * after the gateway answers, so a failed call leaves nothing behind.
 */
export async function initializePayment(ctx: EngineContext, actor: AuthUser, investmentId: string) {
  if (!ctx.config.paystackEnabled) throw new GatewayUnavailableError("Online payments are disabled");

  const investment = await ctx.store.investments.findById(investmentId);
  if (!investment) throw new NotFoundError("Investment not found");
  assertOwner(actor, investment.userId);
  if (investment.status !== "pending") {
    throw new InvalidTransitionError("Only pending investments can be paid for", investment.status);
  }

  const user = await ctx.store.users.findById(investment.userId);
  if (!user) throw new NotFoundError("User not found");

  const reference = paymentReference(investment.id, ctx.now());
  const session = await ctx.gateway.initialize({
    email: user.email,
    amount: investment.amount,
    currency: ctx.config.currency,
    reference,
    callbackUrl: ctx.config.callbackUrl,
    metadata: { investmentId: investment.id, userId: investment.userId },
  });

  const payment = await ctx.store.transaction(async (tx) => {
    const created = await tx.payments.create({
      userId: investment.userId,
      investmentId: investment.id,
      amount: investment.amount,
      currency: ctx.config.currency,
      status: "pending",
      channel: "paystack",
      reference: session.reference,
      authorizationUrl: session.authorizationUrl,
      accessCode: session.accessCode,
      metadata: {},
    });
    await appendEvent(tx, actor, {
      entityType: "payment",
      entityId: created.id,
      action: "PaymentInitialized",
      notes: created.reference,
    });
    return created;
  });

  return {
    reference: payment.reference,
    authorizationUrl: session.authorizationUrl,
    accessCode: session.accessCode,
    payment,
  };
}

export interface VerifyResult {
  status: PaymentStatus;
  payment: PaymentRecord;
  message?: string;
}

export async function verifyPayment(ctx: EngineContext, actor: AuthUser, reference: string): Promise<VerifyResult> {
  const payment = await ctx.store.payments.findByReference(reference);
  if (!payment || (actor.role !== "admin" && payment.userId !== actor.userId)) {
    throw new NotFoundError("Payment not found");
  }
  if (payment.status === "success") return { status: "success", payment };

  const result = await ctx.gateway.verify(reference);
  if (result.status === "pending") {
    return { status: "pending", payment, message: result.gatewayResponse };
  }

  const outcome = await handlePaymentEvent(ctx, {
    kind: result.status === "success" ? "confirmed" : "failed",
    reference,
    source: "verify",
    gatewayId: result.gatewayId,
    amountMinor: result.amountMinor,
    gatewayResponse: result.gatewayResponse,
    raw: result.raw,
  });

  if (outcome.outcome === "out_of_stock") throw new OutOfStockError(outcome.investment.packageId);

  const status = outcome.payment.status;
  return {
    status,
    payment: outcome.payment,
    message: status === "failed" ? result.gatewayResponse ?? "Payment failed" : undefined,
  };
}

export async function listPayments(ctx: EngineContext, actor: AuthUser, userId?: string) {
  const owner = actor.role === "admin" && userId ? userId : actor.userId;
  return ctx.store.payments.listForUser(owner);
}

export async function getPaymentStatus(ctx: EngineContext, actor: AuthUser, investmentId: string) {
  const investment = await ctx.store.investments.findById(investmentId);
  if (!investment) throw new NotFoundError("Investment not found");
  assertOwner(actor, investment.userId);

  const [latest] = await ctx.store.payments.listForInvestment(investment.id);
  return {
    investmentStatus: investment.status,
    paymentExists: latest !== undefined,
    canWithdraw: investment.status === "completed" && latest?.status === "success",
    paymentStatus: latest?.status,
    paymentAmount: latest?.amount,
    paymentDate: latest?.paidAt,
    reconciliationFlag: investment.reconciliationFlag ?? latest?.reconciliationFlag,
  };
}
