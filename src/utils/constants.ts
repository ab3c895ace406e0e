export const roles = ["admin", "investor"] as const;
export type Role = (typeof roles)[number];

export const userStatuses = ["active", "disabled"] as const;
export type UserStatus = (typeof userStatuses)[number];

export const packageKinds = ["direct", "storage"] as const;
export type PackageKind = (typeof packageKinds)[number];

export const packageStatuses = ["active", "inactive"] as const;
export type PackageStatus = (typeof packageStatuses)[number];

export const investmentStatuses = ["pending", "active", "completed", "cancelled"] as const;
export type InvestmentStatus = (typeof investmentStatuses)[number];

// none: nothing taken from the package; held: taken at creation;
// committed: consumed by a confirmed payment; released: given back on cancel
export const reservationStates = ["none", "held", "committed", "released"] as const;
export type ReservationState = (typeof reservationStates)[number];

export const reconciliationFlags = ["out_of_stock", "duplicate_charge", "amount_mismatch"] as const;
export type ReconciliationFlag = (typeof reconciliationFlags)[number];

export const paymentStatuses = ["pending", "success", "failed"] as const;
export type PaymentStatus = (typeof paymentStatuses)[number];

export const paymentChannels = ["paystack", "admin_override"] as const;
export type PaymentChannel = (typeof paymentChannels)[number];

export const transactionTypes = ["investment", "refund", "withdrawal", "referral_bonus"] as const;
export type TransactionType = (typeof transactionTypes)[number];

export const transactionStatuses = ["pending", "completed"] as const;
export type TransactionStatus = (typeof transactionStatuses)[number];

export const withdrawalTypes = ["interest", "reinvest", "full"] as const;
export type WithdrawalType = (typeof withdrawalTypes)[number];

export const withdrawalStatuses = ["pending", "approved", "rejected", "completed", "failed"] as const;
export type WithdrawalStatus = (typeof withdrawalStatuses)[number];

export const withdrawalActions = ["approve", "reject", "mark_paid", "mark_failed"] as const;
export type WithdrawalAction = (typeof withdrawalActions)[number];

export const entityTypes = [
  "package",
  "investment",
  "payment",
  "ledger_entry",
  "withdrawal",
] as const;
export type EntityType = (typeof entityTypes)[number];
