import { InvalidTransitionError } from "./errors.js";
import type { InvestmentStatus, PaymentStatus, WithdrawalStatus } from "./constants.js";

interface InvestmentContext {
  hasSuccessfulPayment?: boolean;
  matured?: boolean;
}

interface PaymentContext {
  gatewayConfirmed?: boolean;
}

interface WithdrawalContext {
  hasPaymentReference?: boolean;
}

interface TransitionContext extends InvestmentContext, PaymentContext, WithdrawalContext {}

const investmentTransitions: Record<InvestmentStatus, InvestmentStatus[]> = {
  pending: ["active", "cancelled"],
  active: ["completed"],
  completed: [],
  cancelled: [],
};

// failed -> success: a late gateway confirmation is authoritative
const paymentTransitions: Record<PaymentStatus, PaymentStatus[]> = {
  pending: ["success", "failed"],
  failed: ["success"],
  success: [],
};

const withdrawalTransitions: Record<WithdrawalStatus, WithdrawalStatus[]> = {
  pending: ["approved", "rejected"],
  approved: ["completed", "failed"],
  failed: ["approved"],
  rejected: [],
  completed: [],
};

function invalidTransition(entityType: string, fromStatus: string, toStatus: string): never {
  throw new InvalidTransitionError(`Invalid ${entityType} transition: ${fromStatus} -> ${toStatus}`, fromStatus);
}

export function canTransition(entityType: "investment", fromStatus: InvestmentStatus, toStatus: InvestmentStatus): boolean;
export function canTransition(entityType: "payment", fromStatus: PaymentStatus, toStatus: PaymentStatus): boolean;
export function canTransition(entityType: "withdrawal", fromStatus: WithdrawalStatus, toStatus: WithdrawalStatus): boolean;
export function canTransition(
  entityType: "investment" | "payment" | "withdrawal",
  fromStatus: string,
  toStatus: string,
): boolean {
  if (entityType === "investment") {
    return isInvestmentStatus(fromStatus) && investmentTransitions[fromStatus].some((next) => next === toStatus);
  }
  if (entityType === "payment") {
    return isPaymentStatus(fromStatus) && paymentTransitions[fromStatus].some((next) => next === toStatus);
  }
  return isWithdrawalStatus(fromStatus) && withdrawalTransitions[fromStatus].some((next) => next === toStatus);
}

function isInvestmentStatus(value: string): value is InvestmentStatus {
  return Object.hasOwn(investmentTransitions, value);
}

function isPaymentStatus(value: string): value is PaymentStatus {
  return Object.hasOwn(paymentTransitions, value);
}

function isWithdrawalStatus(value: string): value is WithdrawalStatus {
  return Object.hasOwn(withdrawalTransitions, value);
}

export function assertTransition(
  entityType: "investment",
  fromStatus: InvestmentStatus,
  toStatus: InvestmentStatus,
  context?: InvestmentContext,
): InvestmentStatus;
export function assertTransition(
  entityType: "payment",
  fromStatus: PaymentStatus,
  toStatus: PaymentStatus,
  context?: PaymentContext,
): PaymentStatus;
export function assertTransition(
  entityType: "withdrawal",
  fromStatus: WithdrawalStatus,
  toStatus: WithdrawalStatus,
  context?: WithdrawalContext,
): WithdrawalStatus;
export function assertTransition(
  entityType: "investment" | "payment" | "withdrawal",
  fromStatus: string,
  toStatus: string,
  context: TransitionContext = {},
): string {
  if (entityType === "investment") {
    if (!isInvestmentStatus(fromStatus) || !isInvestmentStatus(toStatus)) {
      return invalidTransition(entityType, fromStatus, toStatus);
    }
    if (!canTransition("investment", fromStatus, toStatus)) invalidTransition(entityType, fromStatus, toStatus);

    if (toStatus === "active" && !context.hasSuccessfulPayment) {
      throw new InvalidTransitionError("Investment cannot be activated without a successful payment", fromStatus);
    }

    if (toStatus === "cancelled" && context.hasSuccessfulPayment) {
      throw new InvalidTransitionError("Investment has a successful payment and can no longer be cancelled", fromStatus);
    }

    if (toStatus === "completed" && !context.matured) {
      throw new InvalidTransitionError("Investment is not yet due for completion", fromStatus);
    }
    return toStatus;
  }

  if (entityType === "payment") {
    if (!isPaymentStatus(fromStatus) || !isPaymentStatus(toStatus)) {
      return invalidTransition(entityType, fromStatus, toStatus);
    }
    if (!canTransition("payment", fromStatus, toStatus)) invalidTransition(entityType, fromStatus, toStatus);

    if (toStatus === "success" && !context.gatewayConfirmed) {
      throw new InvalidTransitionError("Payment success requires gateway confirmation", fromStatus);
    }
    return toStatus;
  }

  if (!isWithdrawalStatus(fromStatus) || !isWithdrawalStatus(toStatus)) {
    return invalidTransition(entityType, fromStatus, toStatus);
  }
  if (!canTransition("withdrawal", fromStatus, toStatus)) invalidTransition(entityType, fromStatus, toStatus);

  if (toStatus === "completed" && !context.hasPaymentReference) {
    throw new InvalidTransitionError("Cannot mark withdrawal paid without a payment reference", fromStatus);
  }
  return toStatus;
}
