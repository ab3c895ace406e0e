import type { EngineContext } from "../../../context.js";
import type { InvestmentRecord, PaymentPatch, PaymentRecord, StoreSession } from "../../../db/store.js";
import { SYSTEM_ACTOR, appendEvent } from "../../../utils/audit.js";
import type { ReconciliationFlag } from "../../../utils/constants.js";
import { applyReturnRate, toMinorUnits } from "../../../utils/decimal.js";
import { NotFoundError, OutOfStockError } from "../../../utils/errors.js";
import { assertTransition } from "../../../utils/state-machine.js";

const DAY_MS = 24 * 60 * 60 * 1000;

export type PaymentEventSource = "webhook" | "verify" | "admin_override";

/** Gateway outcome for one payment reference, whichever way it reached us. */
export interface PaymentEvent {
  kind: "confirmed" | "failed";
  reference: string;
  source: PaymentEventSource;
  gatewayId?: string;
  amountMinor?: number;
  gatewayResponse?: string;
  raw: unknown;
}

export type PaymentEventResult =
  | { outcome: "applied"; payment: PaymentRecord; investment?: InvestmentRecord }
  | { outcome: "duplicate"; payment: PaymentRecord }
  | { outcome: "flagged"; payment: PaymentRecord; flag: ReconciliationFlag }
  | { outcome: "out_of_stock"; payment: PaymentRecord; investment: InvestmentRecord };

function withGatewayData(payment: PaymentRecord, event: PaymentEvent): Record<string, unknown> {
  return { ...payment.metadata, [`${event.source}Data`]: event.raw };
}

async function loadPayment(tx: StoreSession, reference: string): Promise<PaymentRecord> {
  const payment = await tx.payments.findByReference(reference);
  if (!payment) throw new NotFoundError("Payment not found");
  return payment;
}

/**
 * Applies a gateway confirmation inside `tx`. Replays are answered from the
 * payment's current status. Throws OutOfStockError when the slot can no longer
 * be committed; the caller's transaction must then roll back.
 */
export async function applyConfirmation(
  ctx: EngineContext,
  tx: StoreSession,
  event: PaymentEvent,
): Promise<PaymentEventResult> {
  const payment = await loadPayment(tx, event.reference);
  if (payment.status === "success") return { outcome: "duplicate", payment };

  const metadata = withGatewayData(payment, event);

  if (event.amountMinor !== undefined && BigInt(event.amountMinor) !== toMinorUnits(payment.amount)) {
    const flagged = await tx.payments.update(payment.id, { reconciliationFlag: "amount_mismatch", metadata });
    ctx.log.warn(
      { reference: payment.reference, expected: payment.amount, receivedMinor: event.amountMinor },
      "Gateway amount does not match payment",
    );
    await appendEvent(tx, SYSTEM_ACTOR, {
      entityType: "payment",
      entityId: payment.id,
      action: "PaymentFlagged",
      notes: `amount_mismatch:${event.source}`,
    });
    return { outcome: "flagged", payment: flagged, flag: "amount_mismatch" };
  }

  const now = ctx.now();
  const settled: PaymentPatch = {
    status: assertTransition("payment", payment.status, "success", { gatewayConfirmed: true }),
    paidAt: now,
    gatewayId: event.gatewayId,
    metadata,
  };

  const investment = payment.investmentId ? await tx.investments.findById(payment.investmentId) : null;
  if (!investment) {
    const paid = await tx.payments.update(payment.id, settled);
    return { outcome: "applied", payment: paid };
  }

  const siblings = await tx.payments.listForInvestment(investment.id);
  const alreadyPaid = siblings.some((other) => other.id !== payment.id && other.status === "success");

  // Money was taken either way; the charge is kept and flagged for a refund decision.
  if (investment.status !== "pending" || alreadyPaid) {
    const paid = await tx.payments.update(payment.id, { ...settled, reconciliationFlag: "duplicate_charge" });
    ctx.log.warn(
      { reference: payment.reference, investmentId: investment.id, investmentStatus: investment.status },
      "Successful payment for an investment that is no longer awaiting payment",
    );
    await appendEvent(tx, SYSTEM_ACTOR, {
      entityType: "payment",
      entityId: payment.id,
      action: "PaymentFlagged",
      notes: `duplicate_charge:${event.source}`,
    });
    return { outcome: "flagged", payment: paid, flag: "duplicate_charge" };
  }

  const pkg = await tx.packages.findById(investment.packageId);
  if (!pkg) throw new NotFoundError("Package not found");

  const reservation = await ctx.inventory.commit(tx, investment);
  const paid = await tx.payments.update(payment.id, settled);

  const activated = await tx.investments.update(investment.id, {
    status: assertTransition("investment", investment.status, "active", {
      hasSuccessfulPayment: paid.status === "success",
    }),
    reservation,
    startDate: now,
    endDate: new Date(now.getTime() + pkg.durationDays * DAY_MS),
    expectedReturn: applyReturnRate(investment.amount, pkg.returnRate),
  });

  const idempotencyKey = `payment:${paid.reference}:investment`;
  if (!(await tx.ledger.findByIdempotencyKey(idempotencyKey))) {
    await tx.ledger.append({
      userId: investment.userId,
      investmentId: investment.id,
      transactionType: "investment",
      amount: paid.amount,
      status: "completed",
      description: `Payment for ${investment.packageName}`,
      paymentReference: paid.reference,
      idempotencyKey,
    });
  }

  await appendEvent(tx, SYSTEM_ACTOR, {
    entityType: "investment",
    entityId: investment.id,
    action: "InvestmentActivated",
    notes: `${event.source}:${paid.reference}`,
  });

  return { outcome: "applied", payment: paid, investment: activated };
}

async function flagOutOfStock(ctx: EngineContext, tx: StoreSession, event: PaymentEvent): Promise<PaymentEventResult> {
  const payment = await loadPayment(tx, event.reference);
  if (payment.status === "success") return { outcome: "duplicate", payment };

  const investment = payment.investmentId ? await tx.investments.findById(payment.investmentId) : null;
  if (!investment) throw new NotFoundError("Investment not found");

  const flaggedPayment = await tx.payments.update(payment.id, {
    reconciliationFlag: "out_of_stock",
    metadata: withGatewayData(payment, event),
  });
  const flaggedInvestment = await tx.investments.update(investment.id, { reconciliationFlag: "out_of_stock" });

  ctx.log.warn(
    { reference: payment.reference, investmentId: investment.id, packageId: investment.packageId },
    "Payment confirmed but no slot is left; flagged for reconciliation",
  );
  await appendEvent(tx, SYSTEM_ACTOR, {
    entityType: "investment",
    entityId: investment.id,
    action: "InvestmentFlagged",
    notes: `out_of_stock:${event.source}:${payment.reference}`,
  });

  return { outcome: "out_of_stock", payment: flaggedPayment, investment: flaggedInvestment };
}

async function applyFailure(tx: StoreSession, event: PaymentEvent): Promise<PaymentEventResult> {
  const payment = await loadPayment(tx, event.reference);
  if (payment.status !== "pending") return { outcome: "duplicate", payment };

  const failed = await tx.payments.update(payment.id, {
    status: assertTransition("payment", payment.status, "failed"),
    gatewayId: event.gatewayId,
    metadata: { ...withGatewayData(payment, event), gatewayResponse: event.gatewayResponse },
  });

  await appendEvent(tx, SYSTEM_ACTOR, {
    entityType: "payment",
    entityId: payment.id,
    action: "PaymentFailed",
    notes: event.gatewayResponse ?? event.source,
  });
  return { outcome: "applied", payment: failed };
}

/** The one entry point for webhook deliveries and client-side verification. */
export async function handlePaymentEvent(ctx: EngineContext, event: PaymentEvent): Promise<PaymentEventResult> {
  if (event.kind === "failed") {
    return ctx.store.transaction((tx) => applyFailure(tx, event));
  }

  try {
    return await ctx.store.transaction((tx) => applyConfirmation(ctx, tx, event));
  } catch (error) {
    if (!(error instanceof OutOfStockError)) throw error;
    return ctx.store.transaction((tx) => flagOutOfStock(ctx, tx, event));
  }
}
