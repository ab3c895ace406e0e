import type { EngineContext } from "../../../context.js";
import type { InvestmentRecord, WithdrawalPatch, WithdrawalRecord } from "../../../db/store.js";
import type { AuthUser } from "../../../types.js";
import { appendEvent } from "../../../utils/audit.js";
import type { WithdrawalAction, WithdrawalStatus, WithdrawalType } from "../../../utils/constants.js";
import { compareAmounts, subtractAmounts, sumAmounts, type Amount } from "../../../utils/decimal.js";
import {
  ConflictError,
  NoEligibleInvestmentsError,
  NotFoundError,
  ValidationError,
} from "../../../utils/errors.js";
import { assertOwner } from "../../../utils/rbac.js";
import { assertTransition } from "../../../utils/state-machine.js";
import type { CreateWithdrawalPayload } from "../schemas/withdrawals.schemas.js";

/** interest and reinvest pay out the gain only; full pays principal plus gain. */
export function computeWithdrawalAmount(
  type: WithdrawalType,
  investments: Pick<InvestmentRecord, "amount" | "actualReturn">[],
): Amount {
  const totalReturn = sumAmounts(investments.map((row) => row.actualReturn ?? row.amount));
  if (type === "full") return totalReturn;

  const principal = sumAmounts(investments.map((row) => row.amount));
  const gain = subtractAmounts(totalReturn, principal);
  if (compareAmounts(gain, "0") <= 0) {
    throw new ValidationError("Selected investments have no interest to withdraw");
  }
  return gain;
}

export function appendNote(existing: string, line: string) {
  return existing ? `${existing}\n${line}` : line;
}

export async function createWithdrawal(ctx: EngineContext, actor: AuthUser, payload: CreateWithdrawalPayload) {
  return ctx.store.transaction(async (tx) => {
    const eligible = await tx.investments.findWithdrawable(actor.userId, payload.investmentIds);
    if (eligible.length === 0) {
      throw new NoEligibleInvestmentsError(
        payload.investmentIds ? "No valid investments selected" : undefined,
      );
    }

    const investmentIds = eligible.map((row) => row.id);
    const withdrawal = await tx.withdrawals.create({
      userId: actor.userId,
      amount: computeWithdrawalAmount(payload.type, eligible),
      type: payload.type,
      status: "pending",
      adminNotes: "",
      investmentIds,
    });

    // conditional on withdrawalRequestId being unset; a concurrent request may have won
    const claimed = await tx.investments.linkToWithdrawal(investmentIds, withdrawal.id);
    if (claimed < investmentIds.length) {
      throw new ConflictError("Some investments were claimed by another withdrawal request", {
        selected: investmentIds.length,
        claimed,
      });
    }

    await appendEvent(tx, actor, {
      entityType: "withdrawal",
      entityId: withdrawal.id,
      action: "WithdrawalRequested",
      notes: `${withdrawal.type}:${withdrawal.amount}`,
    });
    return withdrawal;
  });
}

export async function listWithdrawals(
  ctx: EngineContext,
  actor: AuthUser,
  query: { status?: WithdrawalStatus; userId?: string },
) {
  const userId = actor.role === "admin" ? query.userId : actor.userId;
  return ctx.store.withdrawals.list({ userId, status: query.status });
}

export async function getWithdrawal(ctx: EngineContext, actor: AuthUser, id: string) {
  const withdrawal = await ctx.store.withdrawals.findById(id);
  if (!withdrawal) throw new NotFoundError("Withdrawal request not found");
  assertOwner(actor, withdrawal.userId);
  return withdrawal;
}

const ACTION_EVENTS: Record<WithdrawalAction, string> = {
  approve: "WithdrawalApproved",
  reject: "WithdrawalRejected",
  mark_paid: "WithdrawalPaid",
  mark_failed: "WithdrawalFailed",
};

function planAction(
  withdrawal: WithdrawalRecord,
  action: WithdrawalAction,
  now: Date,
  reason?: string,
): WithdrawalPatch {
  switch (action) {
    case "approve":
      return {
        status: assertTransition("withdrawal", withdrawal.status, "approved"),
        processedDate: now,
        paymentReference: `PAY-${Math.floor(now.getTime() / 1000)}`,
        adminNotes: appendNote(withdrawal.adminNotes, "Approved by admin."),
      };
    case "reject":
      return {
        status: assertTransition("withdrawal", withdrawal.status, "rejected"),
        processedDate: now,
        adminNotes: appendNote(withdrawal.adminNotes, "Rejected by admin."),
      };
    case "mark_paid":
      return {
        status: assertTransition("withdrawal", withdrawal.status, "completed", {
          hasPaymentReference: Boolean(withdrawal.paymentReference),
        }),
        processedDate: now,
        adminNotes: appendNote(withdrawal.adminNotes, "Marked as paid manually by admin."),
      };
    case "mark_failed":
      return {
        status: assertTransition("withdrawal", withdrawal.status, "failed"),
        processedDate: now,
        adminNotes: appendNote(withdrawal.adminNotes, reason ? `Payout failed: ${reason}` : "Payout failed."),
      };
  }
}

export async function processWithdrawalAction(
  ctx: EngineContext,
  actor: AuthUser,
  id: string,
  action: WithdrawalAction,
  reason?: string,
) {
  return ctx.store.transaction(async (tx) => {
    const withdrawal = await tx.withdrawals.findById(id);
    if (!withdrawal) throw new NotFoundError("Withdrawal request not found");

    // transition checks throw before anything is written
    const patch = planAction(withdrawal, action, ctx.now(), reason);
    const updated = await tx.withdrawals.update(withdrawal.id, patch);

    if (action === "mark_paid") {
      await tx.ledger.append({
        userId: updated.userId,
        withdrawalRequestId: updated.id,
        transactionType: "withdrawal",
        amount: updated.amount,
        status: "completed",
        description: `Withdrawal (${updated.type}) paid out`,
        paymentReference: updated.paymentReference,
        idempotencyKey: `withdrawal:${updated.id}:paid`,
      });
    }

    await appendEvent(tx, actor, {
      entityType: "withdrawal",
      entityId: updated.id,
      action: ACTION_EVENTS[action],
      notes: reason,
    });
    return updated;
  });
}

export async function addWithdrawalNote(ctx: EngineContext, actor: AuthUser, id: string, notes: string) {
  return ctx.store.transaction(async (tx) => {
    const withdrawal = await tx.withdrawals.findById(id);
    if (!withdrawal) throw new NotFoundError("Withdrawal request not found");

    const updated = await tx.withdrawals.update(withdrawal.id, {
      adminNotes: appendNote(withdrawal.adminNotes, notes),
    });
    await appendEvent(tx, actor, {
      entityType: "withdrawal",
      entityId: withdrawal.id,
      action: "WithdrawalNoteAdded",
    });
    return updated;
  });
}
