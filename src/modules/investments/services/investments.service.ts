import type { EngineContext } from "../../../context.js";
import type { InvestmentRecord, StoreSession } from "../../../db/store.js";
import type { AuthUser } from "../../../types.js";
import { SYSTEM_ACTOR, appendEvent } from "../../../utils/audit.js";
import { compareAmounts, multiplyAmount, sumAmounts } from "../../../utils/decimal.js";
import {
  HttpError,
  InvalidTransitionError,
  NotFoundError,
  ValidationError,
} from "../../../utils/errors.js";
import { assertOwner } from "../../../utils/rbac.js";
import { assertTransition } from "../../../utils/state-machine.js";
import { applyConfirmation } from "../../payments/services/payment-events.js";
import type { CreateInvestmentPayload, ListInvestmentsQuery } from "../schemas/investments.schemas.js";

export async function createInvestment(ctx: EngineContext, actor: AuthUser, payload: CreateInvestmentPayload) {
  const user = await ctx.store.users.findById(actor.userId);
  if (!user) throw new NotFoundError("User not found");
  if (!user.kycComplete) {
    throw new HttpError(403, "You must complete KYC verification before making investments");
  }

  return ctx.store.transaction(async (tx) => {
    const pkg = await tx.packages.findById(payload.packageId);
    if (!pkg) throw new NotFoundError("Package not found");
    if (pkg.status !== "active") throw new ValidationError("Package is not open for investment");

    let quantity = 1;
    let amount: string;
    if (pkg.kind === "storage") {
      if (!pkg.unitPrice) throw new ValidationError("Storage plan has no unit price");
      quantity = payload.quantity ?? 1;
      amount = multiplyAmount(pkg.unitPrice, quantity);
    } else {
      if (!payload.amount) throw new ValidationError("amount is required");
      if (payload.quantity !== undefined && payload.quantity !== 1) {
        throw new ValidationError("Direct packages take exactly one slot");
      }
      amount = payload.amount;
      if (compareAmounts(amount, pkg.minAmount) < 0) {
        throw new ValidationError(`Minimum investment is ${pkg.minAmount}`);
      }
      if (pkg.maxAmount && compareAmounts(amount, pkg.maxAmount) > 0) {
        throw new ValidationError(`Maximum investment is ${pkg.maxAmount}`);
      }
    }

    const token = await ctx.inventory.reserve(tx, pkg, quantity);
    const investment = await tx.investments.create({
      userId: actor.userId,
      packageId: pkg.id,
      packageName: pkg.name,
      kind: pkg.kind,
      quantity,
      amount,
      status: "pending",
      reservation: token.state,
    });

    await appendEvent(tx, actor, {
      entityType: "investment",
      entityId: investment.id,
      action: "InvestmentCreated",
      notes: `${pkg.name}:${amount}`,
    });
    return investment;
  });
}

export async function listInvestments(ctx: EngineContext, actor: AuthUser, query: ListInvestmentsQuery) {
  const userId = actor.role === "admin" ? query.userId : actor.userId;
  return ctx.store.investments.list({ userId, status: query.status, packageId: query.packageId });
}

export async function getInvestment(ctx: EngineContext, actor: AuthUser, id: string) {
  const investment = await ctx.store.investments.findById(id);
  if (!investment) throw new NotFoundError("Investment not found");
  assertOwner(actor, investment.userId);
  return investment;
}

export async function listWithdrawable(ctx: EngineContext, actor: AuthUser) {
  return ctx.store.investments.findWithdrawable(actor.userId);
}

export async function getInvestmentSummary(ctx: EngineContext, actor: AuthUser) {
  const rows = await ctx.store.investments.list({ userId: actor.userId });
  const funded = rows.filter((row) => row.status === "active" || row.status === "completed");
  const completed = rows.filter((row) => row.status === "completed");

  const totalInvested = sumAmounts(funded.map((row) => row.amount));
  const totalReturns = sumAmounts(completed.map((row) => row.actualReturn ?? row.amount));

  return {
    totalInvested,
    totalReturns,
    pendingInvestments: rows.filter((row) => row.status === "pending").length,
    activeInvestments: funded.length - completed.length,
    completedInvestments: completed.length,
    totalPortfolioValue: sumAmounts([totalInvested, totalReturns]),
  };
}

/**
 * pending -> cancelled. The refund entry is written before the slot is
 * released; the record itself stays, see purgeCancelled.
 */
export async function cancelInvestment(ctx: EngineContext, actor: AuthUser, id: string): Promise<InvestmentRecord> {
  return ctx.store.transaction(async (tx) => {
    const investment = await tx.investments.findById(id);
    if (!investment) throw new NotFoundError("Investment not found");
    assertOwner(actor, investment.userId);

    const payments = await tx.payments.listForInvestment(investment.id);
    const status = assertTransition("investment", investment.status, "cancelled", {
      hasSuccessfulPayment: payments.some((payment) => payment.status === "success"),
    });

    await tx.ledger.append({
      userId: investment.userId,
      investmentId: investment.id,
      transactionType: "refund",
      amount: investment.amount,
      status: "completed",
      description: `Refund for cancelled investment in ${investment.packageName}`,
      idempotencyKey: `investment:${investment.id}:refund`,
    });

    const reservation = await ctx.inventory.release(tx, investment);
    const cancelled = await tx.investments.update(investment.id, {
      status,
      reservation,
      cancelledAt: ctx.now(),
    });

    await appendEvent(tx, actor, {
      entityType: "investment",
      entityId: investment.id,
      action: "InvestmentCancelled",
      notes: reservation === "released" ? `released ${investment.quantity} slot(s)` : undefined,
    });
    return cancelled;
  });
}

async function completeInTransaction(
  ctx: EngineContext,
  tx: StoreSession,
  actor: AuthUser,
  investment: InvestmentRecord,
): Promise<InvestmentRecord> {
  const now = ctx.now();
  const status = assertTransition("investment", investment.status, "completed", {
    matured: investment.endDate !== undefined && now.getTime() >= investment.endDate.getTime(),
  });

  const completed = await tx.investments.update(investment.id, {
    status,
    completedDate: now,
    actualReturn: investment.expectedReturn ?? investment.amount,
  });

  await appendEvent(tx, actor, {
    entityType: "investment",
    entityId: investment.id,
    action: "InvestmentCompleted",
    notes: completed.actualReturn,
  });
  return completed;
}

/** active -> completed once endDate has passed. `storageOnly` backs the /mature alias. */
export async function completeInvestment(
  ctx: EngineContext,
  actor: AuthUser,
  id: string,
  options: { storageOnly?: boolean } = {},
) {
  return ctx.store.transaction(async (tx) => {
    const investment = await tx.investments.findById(id);
    if (!investment) throw new NotFoundError("Investment not found");
    assertOwner(actor, investment.userId);
    if (options.storageOnly && investment.kind !== "storage") {
      throw new ValidationError("Only storage plans mature; use complete for direct investments");
    }
    return completeInTransaction(ctx, tx, actor, investment);
  });
}

/** Completes up to `limit` matured investments, one transaction each. */
export async function completeMaturedInvestments(ctx: EngineContext, limit: number) {
  const due = await ctx.store.investments.findMatured(ctx.now(), limit);
  let completed = 0;

  for (const candidate of due) {
    try {
      const done = await ctx.store.transaction(async (tx) => {
        // re-read inside the unit: a user may have completed it meanwhile
        const investment = await tx.investments.findById(candidate.id);
        if (!investment || investment.status !== "active") return false;
        await completeInTransaction(ctx, tx, SYSTEM_ACTOR, investment);
        return true;
      });
      if (done) completed += 1;
    } catch (error) {
      ctx.log.error({ err: error, investmentId: candidate.id }, "Failed to complete matured investment");
    }
  }

  return { scanned: due.length, completed };
}

export async function purgeCancelled(ctx: EngineContext, actor: AuthUser, userId?: string) {
  const owner = actor.role === "admin" ? userId : actor.userId;
  const deleted = await ctx.store.investments.deleteCancelled(owner);
  ctx.log.info({ actor: actor.userId, owner: owner ?? "all", deleted }, "Purged cancelled investments");
  return { deleted };
}

/**
 * Admin override: records an `admin_override` payment and runs the regular
 * confirmation, so activation still requires a successful payment.
 */
export async function forceActivate(ctx: EngineContext, actor: AuthUser, id: string, note?: string) {
  return ctx.store.transaction(async (tx) => {
    const investment = await tx.investments.findById(id);
    if (!investment) throw new NotFoundError("Investment not found");
    if (investment.status !== "pending") {
      throw new InvalidTransitionError("Only pending investments can be force-approved", investment.status);
    }

    const reference = `ADMIN-${investment.id}-${ctx.now().getTime()}`;
    await tx.payments.create({
      userId: investment.userId,
      investmentId: investment.id,
      amount: investment.amount,
      currency: ctx.config.currency,
      status: "pending",
      channel: "admin_override",
      reference,
      metadata: { adminOverride: true, adminUserId: actor.userId, note },
    });

    const result = await applyConfirmation(ctx, tx, {
      kind: "confirmed",
      reference,
      source: "admin_override",
      raw: { adminUserId: actor.userId, note },
    });
    if (result.outcome !== "applied" || !result.investment) {
      throw new InvalidTransitionError("Investment could not be activated", investment.status);
    }

    await appendEvent(tx, actor, {
      entityType: "investment",
      entityId: investment.id,
      action: "InvestmentForceApproved",
      notes: note,
    });
    return result.investment;
  });
}

export async function getInvestmentStats(ctx: EngineContext) {
  const rows = await ctx.store.investments.list({});
  const pending = rows.filter((row) => row.status === "pending");

  let pendingWithPayment = 0;
  for (const investment of pending) {
    const payments = await ctx.store.payments.listForInvestment(investment.id);
    if (payments.some((payment) => payment.status === "success")) pendingWithPayment += 1;
  }

  return {
    totalInvestments: rows.length,
    pendingInvestments: pending.length,
    pendingWithPayment,
    activeInvestments: rows.filter((row) => row.status === "active").length,
    completedInvestments: rows.filter((row) => row.status === "completed").length,
    cancelledInvestments: rows.filter((row) => row.status === "cancelled").length,
    totalAmount: sumAmounts(rows.filter((row) => row.status !== "cancelled").map((row) => row.amount)),
  };
}
