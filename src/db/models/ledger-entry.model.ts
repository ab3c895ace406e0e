import mongoose, { Schema, type Model, type Types } from "mongoose";
import {
  transactionStatuses,
  transactionTypes,
  type TransactionStatus,
  type TransactionType,
} from "../../utils/constants.js";
import { timestamped } from "./_shared.js";

export interface LedgerEntryDoc {
  userId: Types.ObjectId;
  investmentId?: Types.ObjectId;
  withdrawalRequestId?: Types.ObjectId;
  transactionType: TransactionType;
  amount: Types.Decimal128;
  status: TransactionStatus;
  description: string;
  paymentReference?: string;
  idempotencyKey: string;
}

const ledgerEntrySchema = new Schema<LedgerEntryDoc>(
  {
    userId: { type: Schema.Types.ObjectId, ref: "User", required: true, index: true },
    investmentId: { type: Schema.Types.ObjectId, ref: "Investment", index: true },
    withdrawalRequestId: { type: Schema.Types.ObjectId, ref: "WithdrawalRequest" },
    transactionType: { type: String, enum: transactionTypes, required: true, index: true },
    amount: { type: Schema.Types.Decimal128, required: true },
    status: { type: String, enum: transactionStatuses, default: "completed" },
    description: { type: String, required: true },
    paymentReference: { type: String, index: true },
    idempotencyKey: { type: String, required: true, unique: true },
  },
  { ...timestamped, collection: "transactions" },
);
ledgerEntrySchema.index({ userId: 1, createdAt: -1 });

// Append-only: entries are written once and never rewritten or removed.
const rewriteQueries = [
  "updateOne",
  "updateMany",
  "findOneAndUpdate",
  "replaceOne",
  "findOneAndReplace",
  "deleteOne",
  "deleteMany",
  "findOneAndDelete",
] as const;
for (const query of rewriteQueries) {
  ledgerEntrySchema.pre(query, function rejectRewrite() {
    throw new Error(`Ledger entries are append-only (${query} rejected)`);
  });
}

export const LedgerEntryModel: Model<LedgerEntryDoc> =
  mongoose.models.LedgerEntry ?? mongoose.model<LedgerEntryDoc>("LedgerEntry", ledgerEntrySchema);
